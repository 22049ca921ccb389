import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { and, asc, desc, eq, gte, inArray, lt, ne } from 'drizzle-orm';
import {
  ACTIVE_APPLICATION_STATUSES,
  CreateProcedureEventSchema,
  EVENT_STATUS_TRANSITIONS,
  EventStatusSchema,
  type CreateProcedureEventInput,
  type EventStatus,
} from '@procedure-desk/contract';
import { DrizzleAsyncProvider } from '../drizzle/drizzle.module';
import * as schema from '../drizzle/schema';
import type { ApplicationRow, Database, EventRow } from '../drizzle/types';
import {
  NOTIFICATION_CHANNEL,
  isNotificationChannelError,
  type NotificationChannel,
} from '../notifications/notification-channel';
import { NotifierService } from '../notifications/notifier.service';
import { UsersService } from '../users/users.service';
import { ProcedureTypesService } from '../procedure-types/procedure-types.service';
import { QueueService } from '../applications/queue.service';
import { ApplicationMessageService } from '../applications/application-message.service';
import { eventCancelledNotice } from '../applications/candidate-messages';
import { renderAnnouncement, renderCancelledAnnouncement } from './event-messages';
import { toIsoDate } from './event.mapper';
import {
  PROCEDURE_EVENTS,
  type ProcedureEventPayload,
} from './events.constants';

export interface CancelEventResult {
  event: EventRow;
  /** Applications that were active and are now cancelled */
  cancelledApplications: ApplicationRow[];
}

/**
 * Event store: procedure slots from draft to archive.
 */
@Injectable()
export class EventsService {
  private readonly logger = new Logger(EventsService.name);

  constructor(
    @Inject(DrizzleAsyncProvider)
    private db: Database,
    @Inject(NOTIFICATION_CHANNEL)
    private readonly channel: NotificationChannel,
    private readonly procedureTypesService: ProcedureTypesService,
    private readonly queueService: QueueService,
    private readonly messageService: ApplicationMessageService,
    private readonly notifier: NotifierService,
    private readonly usersService: UsersService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /**
   * Create a draft event. The procedure name is copied onto the event so
   * later renames of the type leave it untouched.
   *
   * @throws BadRequestException on invalid input or an inactive type
   * @throws NotFoundException if the procedure type does not exist
   */
  async create(input: CreateProcedureEventInput): Promise<EventRow> {
    const parsed = CreateProcedureEventSchema.safeParse(input);
    if (!parsed.success) {
      throw new BadRequestException({
        message: 'Validation failed',
        errors: parsed.error.issues.map(
          (issue) => `${issue.path.join('.')}: ${issue.message}`,
        ),
      });
    }
    const dto = parsed.data;

    const type = await this.procedureTypesService.findById(dto.procedureTypeId);
    if (!type.isActive) {
      throw new BadRequestException(
        `Procedure type "${type.name}" is not active`,
      );
    }

    const [event] = await this.db
      .insert(schema.events)
      .values({
        date: dto.date,
        time: dto.time,
        procedureTypeId: type.id,
        procedureName: type.name,
        needsPhoto: dto.needsPhoto,
        comment: dto.comment || null,
      })
      .returning();

    this.logger.log(
      `Draft event ${event.id} created: ${type.name} on ${dto.date} at ${dto.time}`,
    );
    return event;
  }

  /**
   * Post the announcement to the publish channel and mark the event
   * published.
   *
   * @throws NotFoundException
   * @throws BadRequestException if the event is not a draft, checked again
   *   when it is marked published
   */
  async publish(eventId: number): Promise<EventRow> {
    const event = await this.findById(eventId);
    this.assertTransition(event, 'published');

    const handle = await this.notifier.sendToConfiguredChannel(
      'publish',
      renderAnnouncement(event),
    );

    const now = new Date();
    const [published] = await this.db
      .update(schema.events)
      .set({
        status: 'published',
        channelId: handle.channelId,
        messageId: handle.messageId,
        publishedAt: now,
        updatedAt: now,
      })
      .where(and(eq(schema.events.id, eventId), eq(schema.events.status, 'draft')))
      .returning();

    if (!published) {
      // Published or cancelled by someone else while the announcement was posted
      await this.channel.delete(handle).catch((error: unknown) => {
        this.logger.warn(
          `Failed to remove duplicate announcement of event ${eventId}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        );
      });
      throw new BadRequestException(`Event ${eventId} is no longer a draft`);
    }

    this.logger.log(`Event ${eventId} published`);
    this.eventEmitter.emit(PROCEDURE_EVENTS.PUBLISHED, {
      eventId,
      date: published.date,
    } satisfies ProcedureEventPayload);
    return published;
  }

  /**
   * Cancel the event and every active application on it in one locked
   * transaction, then tell the candidates and update the posted messages.
   *
   * @throws NotFoundException
   * @throws BadRequestException if the event is already cancelled or archived
   */
  async cancel(eventId: number): Promise<CancelEventResult> {
    const result = await this.queueService.withEventLock(
      eventId,
      async (tx, locked) => {
        this.assertTransition(locked, 'cancelled');
        const now = new Date();
        const [event] = await tx
          .update(schema.events)
          .set({ status: 'cancelled', cancelledAt: now, updatedAt: now })
          .where(eq(schema.events.id, eventId))
          .returning();
        const cancelledApplications = await tx
          .update(schema.applications)
          .set({ status: 'cancelled', position: 0 })
          .where(
            and(
              eq(schema.applications.eventId, eventId),
              inArray(schema.applications.status, [
                ...ACTIVE_APPLICATION_STATUSES,
              ]),
            ),
          )
          .returning();
        return { event, cancelledApplications };
      },
    );

    const { event, cancelledApplications } = result;
    this.logger.log(
      `Event ${eventId} cancelled, ${cancelledApplications.length} application(s) closed`,
    );

    for (const application of cancelledApplications) {
      await this.notifyCancelled(application, event);
    }

    if (event.channelId && event.messageId) {
      await this.channel
        .edit(
          { channelId: event.channelId, messageId: event.messageId },
          renderCancelledAnnouncement(event),
        )
        .catch((error: unknown) => {
          if (isNotificationChannelError(error, 'not_found')) return;
          this.logger.warn(
            `Failed to update announcement of event ${eventId}: ${error instanceof Error ? error.message : 'Unknown error'}`,
          );
        });
    }

    await this.messageService.refreshGroupsOf(cancelledApplications);

    this.eventEmitter.emit(PROCEDURE_EVENTS.CANCELLED, {
      eventId,
      date: event.date,
    } satisfies ProcedureEventPayload);
    return result;
  }

  /**
   * @throws NotFoundException
   */
  async findById(eventId: number): Promise<EventRow> {
    const [event] = await this.db
      .select()
      .from(schema.events)
      .where(eq(schema.events.id, eventId))
      .limit(1);
    if (!event) {
      throw new NotFoundException(`Event ${eventId} not found`);
    }
    return event;
  }

  findByIds(eventIds: number[]): Promise<EventRow[]> {
    if (eventIds.length === 0) return Promise.resolve([]);
    return this.db
      .select()
      .from(schema.events)
      .where(inArray(schema.events.id, eventIds))
      .orderBy(asc(schema.events.date), asc(schema.events.time), asc(schema.events.id));
  }

  /** Every event on the date except cancelled ones, by time */
  findByDate(date: string): Promise<EventRow[]> {
    return this.db
      .select()
      .from(schema.events)
      .where(and(eq(schema.events.date, date), ne(schema.events.status, 'cancelled')))
      .orderBy(asc(schema.events.time), asc(schema.events.id));
  }

  /** Published events from `today` on: the ones candidates can apply for */
  listActive(today: string = toIsoDate(new Date())): Promise<EventRow[]> {
    return this.db
      .select()
      .from(schema.events)
      .where(and(eq(schema.events.status, 'published'), gte(schema.events.date, today)))
      .orderBy(asc(schema.events.date), asc(schema.events.time));
  }

  /** Draft and published events from `today` on, for admin pickers */
  listUpcoming(today: string = toIsoDate(new Date())): Promise<EventRow[]> {
    return this.db
      .select()
      .from(schema.events)
      .where(
        and(
          inArray(schema.events.status, ['draft', 'published']),
          gte(schema.events.date, today),
        ),
      )
      .orderBy(asc(schema.events.date), asc(schema.events.time));
  }

  /** Events before `today`, most recent first */
  listPast(today: string = toIsoDate(new Date()), limit = 25): Promise<EventRow[]> {
    return this.db
      .select()
      .from(schema.events)
      .where(lt(schema.events.date, today))
      .orderBy(desc(schema.events.date), desc(schema.events.time))
      .limit(limit);
  }

  private assertTransition(event: EventRow, to: EventStatus): void {
    const from = EventStatusSchema.parse(event.status);
    if (!EVENT_STATUS_TRANSITIONS[from].includes(to)) {
      throw new BadRequestException(
        `Event ${event.id} is ${from} and cannot become ${to}`,
      );
    }
  }

  private async notifyCancelled(
    application: ApplicationRow,
    event: EventRow,
  ): Promise<void> {
    try {
      const user = await this.usersService.findById(application.userId);
      if (user) {
        await this.notifier.notifyCandidate(user, eventCancelledNotice(event));
      }
    } catch (error) {
      this.logger.warn(
        `Failed to notify applicant of application ${application.id}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
  }
}
