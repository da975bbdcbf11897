/**
 * Admin API guard: `Authorization: Bearer <ADMIN_API_SECRET>`.
 * Returns null if allowed; a 401/403 JSON response otherwise. Fail-closed when
 * the secret is not configured.
 */

import { createHash, timingSafeEqual } from 'node:crypto';

const JSON_HEADERS = { 'Content-Type': 'application/json' } as const;

function deny(status: 401 | 403, code: string): Response {
  return new Response(JSON.stringify({ error: status === 401 ? 'unauthorized' : 'forbidden', code }), {
    status,
    headers: JSON_HEADERS,
  });
}

/** Constant-time equality; hashing first evens out the lengths. */
function secretsMatch(a: string, b: string): boolean {
  const da = createHash('sha256').update(a, 'utf8').digest();
  const db = createHash('sha256').update(b, 'utf8').digest();
  return timingSafeEqual(da, db);
}

export function requireAdminAuth(req: Request): Response | null {
  const secret = process.env.ADMIN_API_SECRET?.trim();
  if (!secret) {
    return deny(403, 'ADMIN_AUTH_NOT_CONFIGURED');
  }

  const header = req.headers.get('authorization') ?? '';
  const token = header.startsWith('Bearer ') ? header.slice('Bearer '.length).trim() : '';
  if (!token) {
    return deny(401, 'ADMIN_AUTH_MISSING');
  }
  if (!secretsMatch(token, secret)) {
    return deny(403, 'ADMIN_AUTH_FORBIDDEN');
  }
  return null;
}
