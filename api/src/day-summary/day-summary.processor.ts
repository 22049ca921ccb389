import { Logger } from '@nestjs/common';
import { Processor, WorkerHost } from '@nestjs/bullmq';
import { Job } from 'bullmq';
import { DaySummaryService } from './day-summary.service';
import { DAY_SUMMARY_QUEUE, type DaySummaryJobData } from './day-summary.queue';

/**
 * Runs debounced day-summary refreshes. A failed refresh is retried by
 * BullMQ with exponential backoff.
 */
@Processor(DAY_SUMMARY_QUEUE)
export class DaySummaryProcessor extends WorkerHost {
  private readonly logger = new Logger(DaySummaryProcessor.name);

  constructor(private readonly daySummaryService: DaySummaryService) {
    super();
  }

  async process(job: Job<DaySummaryJobData>): Promise<void> {
    const { date, reason } = job.data;
    this.logger.debug(`Refreshing day summary ${date} (reason: ${reason})`);
    await this.daySummaryService.refresh(date);
  }
}
