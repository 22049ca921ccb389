import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import {
  APPLICATION_EVENTS,
  type ApplicationStatusChangedPayload,
  type ApplicationsSubmittedPayload,
} from '../applications/applications.constants';
import {
  PROCEDURE_EVENTS,
  type ProcedureEventPayload,
} from '../events/events.constants';
import { DaySummaryQueueService } from './day-summary.queue';

/**
 * Enqueues a day-summary refresh whenever something on a date changes.
 */
@Injectable()
export class DaySummaryListener {
  private readonly logger = new Logger(DaySummaryListener.name);

  constructor(private readonly queue: DaySummaryQueueService) {}

  @OnEvent(APPLICATION_EVENTS.SUBMITTED)
  async onSubmitted(payload: ApplicationsSubmittedPayload): Promise<void> {
    for (const date of payload.dates) {
      await this.queue.enqueue(date, 'submitted');
    }
  }

  @OnEvent(APPLICATION_EVENTS.STATUS_CHANGED)
  async onStatusChanged(payload: ApplicationStatusChangedPayload): Promise<void> {
    this.logger.debug(
      `Application ${payload.applicationId} ${payload.from} -> ${payload.to}`,
    );
    await this.queue.enqueue(payload.date, payload.action);
  }

  @OnEvent(PROCEDURE_EVENTS.PUBLISHED)
  async onPublished(payload: ProcedureEventPayload): Promise<void> {
    await this.queue.enqueue(payload.date, 'published');
  }

  @OnEvent(PROCEDURE_EVENTS.CANCELLED)
  async onCancelled(payload: ProcedureEventPayload): Promise<void> {
    await this.queue.enqueue(payload.date, 'event-cancelled');
  }
}
