import { Injectable, Logger } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { Queue } from 'bullmq';

export const DAY_SUMMARY_QUEUE = 'day-summary-sync';

/** Bursts of changes on one date collapse into one refresh */
const DEBOUNCE_DELAY_MS = 5_000;

export interface DaySummaryJobData {
  date: string;
  reason: string;
}

/**
 * Job ids a date's refresh may use: the regular one, and a follow-up that
 * queues behind a refresh already running (which may have read the day
 * before the latest change).
 */
export function daySummaryJobIds(date: string): [string, string] {
  return [`day-summary-${date}`, `day-summary-${date}-followup`];
}

/**
 * Producer for day summary refreshes.
 *
 * At most one refresh per date waits in the queue at a time. A new change
 * replaces the waiting job (restarting the debounce window), clears a job
 * left over from a failed run, and never merges into a running job.
 */
@Injectable()
export class DaySummaryQueueService {
  private readonly logger = new Logger(DaySummaryQueueService.name);

  constructor(@InjectQueue(DAY_SUMMARY_QUEUE) private readonly queue: Queue) {}

  async enqueue(date: string, reason: string): Promise<void> {
    try {
      const jobId = await this.claimJobId(date);
      await this.queue.add(
        'refresh-day-summary',
        { date, reason } satisfies DaySummaryJobData,
        {
          jobId,
          delay: DEBOUNCE_DELAY_MS,
          attempts: 3,
          backoff: { type: 'exponential', delay: 5_000 },
          removeOnComplete: true,
          removeOnFail: 50,
        },
      );
      this.logger.debug(`Queued day summary ${date} as ${jobId} (${reason})`);
    } catch (error) {
      this.logger.error(
        `Failed to enqueue day summary refresh for ${date}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
  }

  /**
   * First id not held by a running job. Whatever job sits under it
   * (waiting, delayed or failed) is removed so `add` is not a no-op.
   */
  private async claimJobId(date: string): Promise<string> {
    for (const jobId of daySummaryJobIds(date)) {
      const job = await this.queue.getJob(jobId);
      if (!job) return jobId;
      const state = await job.getState();
      if (state === 'active') continue;
      await job.remove();
      return jobId;
    }
    // Both slots are running; refreshes of one date are serialized in-process
    return `day-summary-${date}-${Date.now()}`;
  }
}
