/**
 * Typed errors for the storage adapters (Supabase, Upstash).
 */

export class StorageError extends Error {
  readonly code = 'STORAGE_ERROR';
  constructor(
    message: string,
    public readonly operation: string,
    cause?: unknown
  ) {
    super(message);
    this.name = 'StorageError';
    if (cause instanceof Error) this.cause = cause;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
