import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { and, eq, inArray } from 'drizzle-orm';
import {
  ACTIVE_APPLICATION_STATUSES,
  MAX_APPLICATION_PHOTOS,
  SubmitApplicationSchema,
  normalizePhone,
  type SubmitApplicationInput,
  type SubmitApplicationResultDto,
} from '@procedure-desk/contract';
import * as schema from '../drizzle/schema';
import type { EventRow } from '../drizzle/types';
import { NotifierService } from '../notifications/notifier.service';
import { UsersService } from '../users/users.service';
import { QueueService } from './queue.service';
import { ApplicationMessageService } from './application-message.service';
import { submissionReceipt } from './candidate-messages';
import {
  APPLICATION_EVENTS,
  type ApplicationsSubmittedPayload,
} from './applications.constants';

/**
 * Candidate submissions: one application per selected event.
 */
@Injectable()
export class ApplicationsService {
  private readonly logger = new Logger(ApplicationsService.name);

  constructor(
    private readonly usersService: UsersService,
    private readonly queueService: QueueService,
    private readonly messageService: ApplicationMessageService,
    private readonly notifier: NotifierService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /**
   * Submit one application per selected event.
   *
   * Rows and photos are inserted, and each event's queue recomputed, in one
   * transaction holding the locks of every selected event. Posting the
   * admin message and the candidate receipt are best effort.
   *
   * @throws BadRequestException on invalid input, an event not accepting
   *   applications, or missing photos for a photo-required event
   * @throws ForbiddenException if the candidate is banned
   * @throws NotFoundException if an event does not exist
   * @throws ConflictException if the candidate already has an active
   *   application for one of the events
   */
  async submit(
    input: SubmitApplicationInput,
  ): Promise<SubmitApplicationResultDto> {
    const parsed = SubmitApplicationSchema.safeParse(input);
    if (!parsed.success) {
      throw new BadRequestException({
        message: 'Validation failed',
        errors: parsed.error.issues.map(
          (issue) => `${issue.path.join('.')}: ${issue.message}`,
        ),
      });
    }
    const dto = parsed.data;

    const user = await this.usersService.ensureUser(dto.candidateDiscordId);
    if (user.isBlocked) {
      throw new ForbiddenException('You are not allowed to apply');
    }

    const photos = dto.photos.slice(0, MAX_APPLICATION_PHOTOS);
    const photosTruncated = dto.photos.length > MAX_APPLICATION_PHOTOS;
    const phone = normalizePhone(dto.phone);

    // Event status and duplicates are checked under the event locks
    const { events, inserted } = await this.queueService.withEventsLock(
      dto.eventIds,
      async (tx, locked) => {
        assertAcceptingApplications(dto.eventIds, locked, photos.length);

        const duplicates = await tx
          .select({ eventId: schema.applications.eventId })
          .from(schema.applications)
          .where(
            and(
              eq(schema.applications.userId, user.id),
              inArray(schema.applications.eventId, dto.eventIds),
              inArray(schema.applications.status, [
                ...ACTIVE_APPLICATION_STATUSES,
              ]),
            ),
          );
        if (duplicates.length > 0) {
          throw new ConflictException(
            `You have already applied for event ${duplicates[0].eventId}`,
          );
        }

        const rows = await tx
          .insert(schema.applications)
          .values(
            dto.eventIds.map((eventId) => ({
              eventId,
              userId: user.id,
              fullName: dto.fullName,
              phone,
              consent: dto.consent,
            })),
          )
          .returning();
        if (photos.length > 0) {
          await tx.insert(schema.applicationPhotos).values(
            rows.flatMap((row) =>
              photos.map((fileRef) => ({ applicationId: row.id, fileRef })),
            ),
          );
        }
        for (const eventId of dto.eventIds) {
          await this.queueService.recalculateInTransaction(tx, eventId);
        }
        return { events: locked, inserted: rows };
      },
    );
    const eventsById = new Map(events.map((e) => [e.id, e]));

    await this.usersService.saveContact(user.id, dto.fullName, phone);

    const applicationIds = inserted.map((row) => row.id);
    this.logger.log(
      `User ${user.id} submitted applications ${applicationIds.join(', ')}`,
    );

    try {
      await this.messageService.publishGroup(applicationIds, photos);
    } catch (error) {
      this.logger.error(
        `Failed to post admin message for applications ${applicationIds.join(', ')}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }

    const items = inserted.flatMap((application) => {
      const event = eventsById.get(application.eventId);
      return event ? [{ application, event }] : [];
    });
    await this.notifier.notifyCandidate(
      { ...user, botBlockedAt: null },
      submissionReceipt(items, photosTruncated),
    );

    this.eventEmitter.emit(APPLICATION_EVENTS.SUBMITTED, {
      applicationIds,
      eventIds: dto.eventIds,
      dates: [...new Set(events.map((e) => e.date))],
    } satisfies ApplicationsSubmittedPayload);

    return { applicationIds, photosTruncated };
  }
}

/**
 * @throws NotFoundException if an event does not exist
 * @throws BadRequestException if an event is not published, or a
 *   photo-required event comes without photos
 */
function assertAcceptingApplications(
  eventIds: readonly number[],
  events: readonly EventRow[],
  photoCount: number,
): void {
  const eventsById = new Map(events.map((e) => [e.id, e]));
  for (const eventId of eventIds) {
    const event = eventsById.get(eventId);
    if (!event) {
      throw new NotFoundException(`Event ${eventId} not found`);
    }
    if (event.status !== 'published') {
      throw new BadRequestException(
        `Event ${eventId} is not accepting applications`,
      );
    }
  }
  if (photoCount === 0 && events.some((e) => e.needsPhoto)) {
    throw new BadRequestException(
      'A photo is required for the selected procedure',
    );
  }
}
