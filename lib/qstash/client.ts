import { Client } from '@upstash/qstash';
import type { QstashPublisher } from '@/lib/queue/qstash-trigger';
import { assertQstashEnv } from './env';

let _client: Client | null = null;

// Lazy: fail-fast in production on first use, not at build time.
function getClient(): Client {
  if (!_client) {
    assertQstashEnv();
    _client = new Client({ token: process.env.QSTASH_TOKEN || '' });
  }
  return _client;
}

/** Centralized QStash publisher used by the queue trigger. */
export const qstash: QstashPublisher = {
  async publishJSON(request) {
    const res = await getClient().publishJSON({ url: request.url, body: request.body });
    return { messageId: res.messageId };
  },
};
