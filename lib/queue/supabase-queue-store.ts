import type { SupabaseClient } from '@supabase/supabase-js';
import { StorageError } from '@/lib/storage/errors';
import type { QueueStore } from './types';

/** Queue rows in the host's queue table (see supabase/migrations). */
export class SupabaseQueueStore implements QueueStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly table: string
  ) {}

  async resetFailedJobs(reporter: string): Promise<number> {
    const { data, error } = await this.client
      .from(this.table)
      .update({ status: 'pending', attempts: 0, error_message: null })
      .eq('reporter', reporter)
      .eq('status', 'failed')
      .select('id');
    if (error) {
      throw new StorageError(`Failed to reset failed jobs: ${error.message}`, 'queue.reset');
    }
    return Array.isArray(data) ? data.length : 0;
  }
}
