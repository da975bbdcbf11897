/**
 * The job queue is owned by the host; the reporter only needs these two hooks
 * to hand failed jobs back after credentials are fixed.
 */

export interface QueueStore {
  /** failed -> pending, attempts 0, error cleared for one reporter. Returns rows reset. */
  resetFailedJobs(reporter: string): Promise<number>;
}

export interface QueueTrigger {
  /** Asks the queue processor for one run as soon as possible. */
  scheduleRun(reporter: string, reason: string): Promise<void>;
}
