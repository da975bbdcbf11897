import { logInfo, logWarn } from '@/lib/logging/logger';
import type { QueueTrigger } from './types';

/** Publisher narrowed to the one QStash call the trigger makes. */
export type QstashPublisher = {
  publishJSON(request: { url: string; body: Record<string, string> }): Promise<{ messageId: string }>;
};

/**
 * Publishes one immediate message to the queue processor endpoint.
 * Without a target URL the run is skipped and the scheduled processor picks the jobs up later.
 */
export class QstashQueueTrigger implements QueueTrigger {
  constructor(
    private readonly publisher: QstashPublisher,
    private readonly url: string | null
  ) {}

  async scheduleRun(reporter: string, reason: string): Promise<void> {
    if (!this.url) {
      logWarn('QUEUE_TRIGGER_SKIPPED', { reporter, reason: 'QUEUE_PROCESS_URL not set' });
      return;
    }
    const { messageId } = await this.publisher.publishJSON({ url: this.url, body: { reporter, reason } });
    logInfo('QUEUE_TRIGGER_PUBLISHED', { reporter, reason, message_id: messageId });
  }
}
