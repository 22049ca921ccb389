import { Inject, Injectable, Logger } from '@nestjs/common';
import { and, asc, count, eq, inArray, type SQL } from 'drizzle-orm';
import { DrizzleAsyncProvider } from '../drizzle/drizzle.module';
import * as schema from '../drizzle/schema';
import type { ApplicationRow, Database } from '../drizzle/types';
import {
  NOTIFICATION_CHANNEL,
  isNotificationChannelError,
  type MessageHandle,
  type NotificationChannel,
} from '../notifications/notification-channel';
import { NotifierService } from '../notifications/notifier.service';
import {
  renderApplicationGroup,
  type ApplicationGroup,
  type ApplicationGroupItem,
  type PendingConfirmation,
} from './application-message.renderer';

export function groupHandleOf(
  application: Pick<ApplicationRow, 'groupChannelId' | 'groupMessageId'>,
): MessageHandle | null {
  if (!application.groupChannelId || !application.groupMessageId) return null;
  return {
    channelId: application.groupChannelId,
    messageId: application.groupMessageId,
  };
}

/**
 * Keeps the combined admin message of a submission in sync with its
 * applications. The message is always rebuilt from every application that
 * shares its handle.
 */
@Injectable()
export class ApplicationMessageService {
  private readonly logger = new Logger(ApplicationMessageService.name);
  /** Tail of the in-flight refresh per message */
  private readonly inFlight = new Map<string, Promise<void>>();

  constructor(
    @Inject(DrizzleAsyncProvider)
    private db: Database,
    @Inject(NOTIFICATION_CHANNEL)
    private readonly channel: NotificationChannel,
    private readonly notifier: NotifierService,
  ) {}

  /**
   * Post the combined message for freshly submitted applications and store
   * its handle on each of them.
   */
  async publishGroup(
    applicationIds: number[],
    photos: string[] = [],
  ): Promise<MessageHandle> {
    const items = await this.loadItems(
      inArray(schema.applications.id, applicationIds),
    );
    const message = renderApplicationGroup(this.toGroup(items, photos.length));
    const handle = await this.notifier.sendToConfiguredChannel('admin', {
      ...message,
      media: photos,
    });

    await this.db
      .update(schema.applications)
      .set({
        groupChannelId: handle.channelId,
        groupMessageId: handle.messageId,
      })
      .where(inArray(schema.applications.id, applicationIds));

    return handle;
  }

  /**
   * Re-render the combined message. Best effort: a deleted message is
   * logged and left alone. Refreshes of one message run one after another,
   * each reading the rows when its turn comes.
   */
  refreshGroup(
    handle: MessageHandle,
    confirming?: PendingConfirmation,
  ): Promise<void> {
    const key = `${handle.channelId}/${handle.messageId}`;
    const previous: Promise<unknown> =
      this.inFlight.get(key) ?? Promise.resolve();
    const run: Promise<void> = previous
      .catch(() => undefined)
      .then(() => this.refreshOnce(handle, confirming))
      .finally(() => {
        if (this.inFlight.get(key) === run) this.inFlight.delete(key);
      });
    this.inFlight.set(key, run);
    return run;
  }

  private async refreshOnce(
    handle: MessageHandle,
    confirming?: PendingConfirmation,
  ): Promise<void> {
    try {
      const group = await this.loadGroup(handle);
      if (!group) {
        this.logger.debug(`No applications for message ${handle.messageId}`);
        return;
      }
      await this.channel.edit(handle, renderApplicationGroup(group, confirming));
    } catch (error) {
      if (isNotificationChannelError(error, 'not_found')) {
        this.logger.debug(
          `Application message ${handle.messageId} no longer exists`,
        );
        return;
      }
      this.logger.warn(
        `Failed to refresh application message ${handle.messageId}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
  }

  /** Re-render the group every given application belongs to, once each */
  async refreshGroupsOf(
    applications: Pick<ApplicationRow, 'groupChannelId' | 'groupMessageId'>[],
  ): Promise<void> {
    const seen = new Set<string>();
    for (const application of applications) {
      const handle = groupHandleOf(application);
      if (!handle || seen.has(handle.messageId)) continue;
      seen.add(handle.messageId);
      await this.refreshGroup(handle);
    }
  }

  async loadGroup(handle: MessageHandle): Promise<ApplicationGroup | null> {
    const items = await this.loadItems(
      and(
        eq(schema.applications.groupChannelId, handle.channelId),
        eq(schema.applications.groupMessageId, handle.messageId),
      ),
    );
    if (items.length === 0) return null;

    const [photos] = await this.db
      .select({ total: count() })
      .from(schema.applicationPhotos)
      .where(
        eq(schema.applicationPhotos.applicationId, items[0].application.id),
      );
    return this.toGroup(items, photos?.total ?? 0);
  }

  private async loadItems(
    filter: SQL | undefined,
  ): Promise<ApplicationGroupItem[]> {
    const rows = await this.db
      .select()
      .from(schema.applications)
      .innerJoin(schema.events, eq(schema.applications.eventId, schema.events.id))
      .where(filter)
      .orderBy(
        asc(schema.events.date),
        asc(schema.events.time),
        asc(schema.applications.id),
      );
    return rows.map((row) => ({
      application: row.applications,
      event: row.events,
    }));
  }

  private toGroup(
    items: ApplicationGroupItem[],
    photoCount: number,
  ): ApplicationGroup {
    const first = items[0]?.application;
    return {
      fullName: first?.fullName ?? 'Unknown',
      phone: first?.phone ?? '',
      photoCount,
      items,
    };
  }
}
