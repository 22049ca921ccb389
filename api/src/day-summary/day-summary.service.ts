import { Inject, Injectable, Logger } from '@nestjs/common';
import { and, asc, eq, inArray, ne } from 'drizzle-orm';
import { DrizzleAsyncProvider } from '../drizzle/drizzle.module';
import * as schema from '../drizzle/schema';
import type { Database, DaySummaryMessageRow } from '../drizzle/types';
import {
  NOTIFICATION_CHANNEL,
  channelTarget,
  isNotificationChannelError,
  type MessageHandle,
  type NotificationChannel,
  type OutboundMessage,
} from '../notifications/notification-channel';
import { ChannelConfigService } from '../settings/channel-config.service';
import { groupHandleOf } from '../applications/application-message.service';
import {
  countApplicationsPerUser,
  renderDaySummary,
  type DaySummaryEvent,
} from './day-summary.renderer';

export type DaySummaryResult = 'sent' | 'edited' | 'unchanged' | 'skipped';

/**
 * Keeps exactly one admin message per date that lists every application
 * on that date.
 */
@Injectable()
export class DaySummaryService {
  private readonly logger = new Logger(DaySummaryService.name);
  /** Tail of the in-flight refresh per date */
  private readonly inFlight = new Map<string, Promise<DaySummaryResult>>();

  constructor(
    @Inject(DrizzleAsyncProvider)
    private db: Database,
    @Inject(NOTIFICATION_CHANNEL)
    private readonly channel: NotificationChannel,
    private readonly channelConfig: ChannelConfigService,
  ) {}

  /**
   * Bring the date's summary message in line with the stored applications.
   * Refreshes of the same date run one after another.
   */
  refresh(date: string): Promise<DaySummaryResult> {
    const previous: Promise<unknown> =
      this.inFlight.get(date) ?? Promise.resolve();
    const run: Promise<DaySummaryResult> = previous
      .catch(() => undefined)
      .then(() => this.refreshOnce(date, true))
      .finally(() => {
        if (this.inFlight.get(date) === run) this.inFlight.delete(date);
      });
    this.inFlight.set(date, run);
    return run;
  }

  private async refreshOnce(
    date: string,
    retryOnMigration: boolean,
  ): Promise<DaySummaryResult> {
    const events = await this.loadDay(date);
    const message = renderDaySummary({
      date,
      events,
      applicationsPerUser: countApplicationsPerUser(events),
      linkFor: (application) => {
        const handle = groupHandleOf(application);
        return handle ? this.channel.linkTo(handle) : null;
      },
    });
    const stored = await this.findStored(date);

    if (!stored && events.length === 0) {
      return 'skipped';
    }

    try {
      return await this.publish(date, stored, message);
    } catch (error) {
      if (
        retryOnMigration &&
        isNotificationChannelError(error, 'migrated') &&
        error.migratedTo
      ) {
        await this.channelConfig.recordMigration('admin', error.migratedTo);
        // The old message lives in the old channel; post a fresh one
        await this.forget(date);
        return this.refreshOnce(date, false);
      }
      throw error;
    }
  }

  private async publish(
    date: string,
    stored: DaySummaryMessageRow | undefined,
    message: OutboundMessage,
  ): Promise<DaySummaryResult> {
    if (stored) {
      const handle = { channelId: stored.channelId, messageId: stored.messageId };
      try {
        const result = await this.channel.edit(handle, message);
        this.logger.debug(`Day summary ${date}: ${result}`);
        return result;
      } catch (error) {
        if (!isNotificationChannelError(error, 'not_found')) throw error;
        this.logger.warn(`Day summary message for ${date} is gone, reposting`);
        await this.forget(date);
      }
    }

    const channelId = await this.channelConfig.getAdminChannelId();
    if (!channelId) {
      this.logger.warn(`No admin channel configured, day summary ${date} not posted`);
      return 'skipped';
    }
    const handle = await this.channel.send(channelTarget(channelId), message);
    await this.remember(date, handle);
    this.logger.log(`Day summary ${date} posted`);
    return 'sent';
  }

  private async loadDay(date: string): Promise<DaySummaryEvent[]> {
    const events = await this.db
      .select()
      .from(schema.events)
      .where(and(eq(schema.events.date, date), ne(schema.events.status, 'cancelled')))
      .orderBy(asc(schema.events.time), asc(schema.events.id));
    if (events.length === 0) return [];

    const applications = await this.db
      .select()
      .from(schema.applications)
      .where(inArray(schema.applications.eventId, events.map((e) => e.id)))
      .orderBy(asc(schema.applications.createdAt), asc(schema.applications.id));

    return events.map((event) => ({
      event,
      applications: applications.filter((a) => a.eventId === event.id),
    }));
  }

  private async findStored(date: string): Promise<DaySummaryMessageRow | undefined> {
    const [row] = await this.db
      .select()
      .from(schema.daySummaryMessages)
      .where(eq(schema.daySummaryMessages.date, date))
      .limit(1);
    return row;
  }

  private async remember(date: string, handle: MessageHandle): Promise<void> {
    const values = {
      channelId: handle.channelId,
      messageId: handle.messageId,
      updatedAt: new Date(),
    };
    await this.db
      .insert(schema.daySummaryMessages)
      .values({ date, ...values })
      .onConflictDoUpdate({ target: schema.daySummaryMessages.date, set: values });
  }

  private async forget(date: string): Promise<void> {
    await this.db
      .delete(schema.daySummaryMessages)
      .where(eq(schema.daySummaryMessages.date, date));
  }
}
