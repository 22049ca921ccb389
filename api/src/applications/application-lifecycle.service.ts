import {
  ForbiddenException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { and, eq } from 'drizzle-orm';
import { isPrimary, type ApplicationStatus } from '@procedure-desk/contract';
import { DrizzleAsyncProvider } from '../drizzle/drizzle.module';
import * as schema from '../drizzle/schema';
import type {
  ApplicationRow,
  Database,
  EventRow,
  Transaction,
} from '../drizzle/types';
import { NotifierService } from '../notifications/notifier.service';
import type { OutboundMessage } from '../notifications/notification-channel';
import { UsersService } from '../users/users.service';
import { QueueService } from './queue.service';
import {
  ApplicationMessageService,
  groupHandleOf,
} from './application-message.service';
import { InvalidTransitionException } from './application.exceptions';
import {
  TRANSITIONS,
  canTransition,
  entersQueue,
  removesFromQueue,
  requiresConfirmation,
  type TransitionAction,
} from './application-transitions';
import {
  parseApplicationStatus,
  pickPromotionCandidate,
  type QueueSlot,
} from './queue-planner';
import {
  approvedNotice,
  autoPromotedNotice,
  cancelledByAdminNotice,
  candidateWithdrewNotice,
  noPrimaryLeftNotice,
  primaryInstructions,
  rejectedNotice,
} from './candidate-messages';
import {
  APPLICATION_EVENTS,
  type ApplicationStatusChangedPayload,
} from './applications.constants';

export interface ConfirmationRequired {
  kind: 'confirmation_required';
  action: TransitionAction;
  application: ApplicationRow;
}

export interface TransitionApplied {
  kind: 'applied';
  action: TransitionAction;
  /** The application after the transition and recomputation */
  application: ApplicationRow;
  event: EventRow;
  previousStatus: ApplicationStatus;
  /** False when the application already had the target status */
  changed: boolean;
  /** Application auto-promoted to primary in the same transaction */
  promoted: ApplicationRow | null;
  /** The event was left with neither a primary nor approved candidates */
  eventWithoutPrimary: boolean;
}

export type TransitionOutcome = ConfirmationRequired | TransitionApplied;

interface TransitionOptions {
  confirmed?: boolean;
  /** Set for candidate self-service: the acting user must own the application */
  actorUserId?: number;
}

/**
 * Application lifecycle state machine.
 *
 * Each transition runs under the event lock: status change, queue
 * recomputation and auto-promotion commit together. Notifications and
 * message refreshes run after commit and never undo a transition.
 */
@Injectable()
export class ApplicationLifecycleService {
  private readonly logger = new Logger(ApplicationLifecycleService.name);

  constructor(
    @Inject(DrizzleAsyncProvider)
    private db: Database,
    private readonly queueService: QueueService,
    private readonly messageService: ApplicationMessageService,
    private readonly notifier: NotifierService,
    private readonly usersService: UsersService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  approve(applicationId: number): Promise<TransitionOutcome> {
    return this.transition(applicationId, 'approve');
  }

  /**
   * Rejecting the primary candidate needs `confirmed: true`; without it the
   * admin message switches to a confirm/keep prompt.
   */
  reject(
    applicationId: number,
    options: { confirmed?: boolean } = {},
  ): Promise<TransitionOutcome> {
    return this.transition(applicationId, 'reject', options);
  }

  /**
   * Only an approved application can be promoted, and only while the event
   * has no primary. The current primary has to be rejected or cancelled first.
   */
  promote(applicationId: number): Promise<TransitionOutcome> {
    return this.transition(applicationId, 'promote');
  }

  cancelByAdmin(
    applicationId: number,
    options: { confirmed?: boolean } = {},
  ): Promise<TransitionOutcome> {
    return this.transition(applicationId, 'cancel', options);
  }

  /**
   * Candidate withdraws their own application.
   *
   * @throws ForbiddenException if the application belongs to someone else
   */
  async cancelByCandidate(
    applicationId: number,
    candidateDiscordId: string,
  ): Promise<TransitionOutcome> {
    const user = await this.usersService.findByDiscordId(candidateDiscordId);
    if (!user) {
      throw new ForbiddenException('You can only withdraw your own applications');
    }
    return this.transition(applicationId, 'self-cancel', {
      actorUserId: user.id,
    });
  }

  /**
   * Admin declined a pending confirmation: restore the normal view.
   */
  async declineConfirmation(applicationId: number): Promise<void> {
    const application = await this.findApplication(applicationId);
    await this.messageService.refreshGroupsOf([application]);
  }

  private async transition(
    applicationId: number,
    action: TransitionAction,
    options: TransitionOptions = {},
  ): Promise<TransitionOutcome> {
    const existing = await this.findApplication(applicationId);

    const outcome = await this.queueService.withEventLock(
      existing.eventId,
      (tx, event) => this.applyLocked(tx, event, applicationId, action, options),
    );

    if (outcome.kind === 'confirmation_required') {
      const handle = groupHandleOf(outcome.application);
      if (handle && (action === 'reject' || action === 'cancel')) {
        await this.messageService.refreshGroup(handle, {
          applicationId,
          action,
        });
      }
      return outcome;
    }

    if (outcome.changed) {
      this.logger.log(
        `Application ${applicationId}: ${outcome.previousStatus} -> ${outcome.application.status} (${action})` +
          (outcome.promoted
            ? `, application ${outcome.promoted.id} auto-promoted`
            : ''),
      );
      await this.afterCommit(outcome);
    }
    return outcome;
  }

  private async applyLocked(
    tx: Transaction,
    event: EventRow,
    applicationId: number,
    action: TransitionAction,
    options: TransitionOptions,
  ): Promise<TransitionOutcome> {
    const [current] = await tx
      .select()
      .from(schema.applications)
      .where(eq(schema.applications.id, applicationId))
      .limit(1);
    if (!current) {
      throw new NotFoundException(`Application ${applicationId} not found`);
    }
    if (
      options.actorUserId !== undefined &&
      current.userId !== options.actorUserId
    ) {
      throw new ForbiddenException(
        'You can only withdraw your own applications',
      );
    }

    const from = parseApplicationStatus(current.status);
    if (!canTransition(action, from)) {
      throw new InvalidTransitionException(applicationId, from, action);
    }
    if (entersQueue(action) && event.status !== 'published') {
      throw new InvalidTransitionException(
        applicationId,
        from,
        action,
        `Event ${event.id} is ${event.status}; its queue is closed`,
      );
    }
    if (requiresConfirmation(action, from) && !options.confirmed) {
      return { kind: 'confirmation_required', action, application: current };
    }

    const to = TRANSITIONS[action].to;
    if (from === to) {
      return {
        kind: 'applied',
        action,
        application: current,
        event,
        previousStatus: from,
        changed: false,
        promoted: null,
        eventWithoutPrimary: false,
      };
    }

    if (action === 'promote') {
      const [holder] = await tx
        .select({ id: schema.applications.id })
        .from(schema.applications)
        .where(
          and(
            eq(schema.applications.eventId, event.id),
            eq(schema.applications.status, 'primary'),
          ),
        )
        .limit(1);
      if (holder) {
        throw new InvalidTransitionException(
          applicationId,
          from,
          action,
          `Event ${event.id} already has a primary candidate (#${holder.id})`,
        );
      }
    }

    await tx
      .update(schema.applications)
      .set({ status: to })
      .where(eq(schema.applications.id, applicationId));
    let plan = await this.queueService.recalculateInTransaction(tx, event.id);

    let promoted: ApplicationRow | null = null;
    let eventWithoutPrimary = false;
    if (removesFromQueue(action)) {
      const candidate = pickPromotionCandidate(plan);
      if (candidate) {
        await tx
          .update(schema.applications)
          .set({ status: 'primary' })
          .where(eq(schema.applications.id, candidate.id));
        plan = await this.queueService.recalculateInTransaction(tx, event.id);
        const [row] = await tx
          .select()
          .from(schema.applications)
          .where(eq(schema.applications.id, candidate.id))
          .limit(1);
        promoted = row ?? null;
      } else if (
        (from === 'primary' || from === 'approved') &&
        !plan.some(isPrimary)
      ) {
        eventWithoutPrimary = true;
      }
    }

    return {
      kind: 'applied',
      action,
      application: withSlot(current, plan),
      event,
      previousStatus: from,
      changed: true,
      promoted,
      eventWithoutPrimary,
    };
  }

  private async afterCommit(outcome: TransitionApplied): Promise<void> {
    const { action, application, event, previousStatus, promoted } = outcome;
    const wasPrimary = previousStatus === 'primary';

    const candidateMessage = this.candidateMessageFor(action, event, wasPrimary);
    if (candidateMessage) {
      await this.notifyApplicant(application, candidateMessage);
    }

    if (action === 'self-cancel') {
      await this.notifier.notifyAdmins(
        candidateWithdrewNotice(application, event, previousStatus),
      );
    }

    if (promoted) {
      await this.notifyApplicant(promoted, primaryInstructions(event));
      await this.notifier.notifyAdmins(autoPromotedNotice(promoted, event));
    } else if (outcome.eventWithoutPrimary) {
      await this.notifier.notifyAdmins(noPrimaryLeftNotice(event));
    }

    await this.messageService.refreshGroupsOf(
      promoted ? [application, promoted] : [application],
    );

    this.eventEmitter.emit(APPLICATION_EVENTS.STATUS_CHANGED, {
      applicationId: application.id,
      eventId: event.id,
      date: event.date,
      action: action === 'self-cancel' ? 'cancel' : action,
      from: previousStatus,
      to: parseApplicationStatus(application.status),
      promotedApplicationId: promoted?.id ?? null,
    } satisfies ApplicationStatusChangedPayload);
  }

  private candidateMessageFor(
    action: TransitionAction,
    event: EventRow,
    wasPrimary: boolean,
  ): OutboundMessage | null {
    switch (action) {
      case 'approve':
        return approvedNotice(event);
      case 'promote':
        return primaryInstructions(event);
      case 'reject':
        return rejectedNotice(event, wasPrimary);
      case 'cancel':
        return cancelledByAdminNotice(event, wasPrimary);
      case 'self-cancel':
        return null;
    }
  }

  private async notifyApplicant(
    application: ApplicationRow,
    message: OutboundMessage,
  ): Promise<void> {
    try {
      const user = await this.usersService.findById(application.userId);
      if (!user) {
        this.logger.warn(`User ${application.userId} not found, skipping DM`);
        return;
      }
      await this.notifier.notifyCandidate(user, message);
    } catch (error) {
      this.logger.warn(
        `Failed to notify applicant of application ${application.id}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
  }

  /**
   * @throws NotFoundException
   */
  private async findApplication(applicationId: number): Promise<ApplicationRow> {
    const [application] = await this.db
      .select()
      .from(schema.applications)
      .where(eq(schema.applications.id, applicationId))
      .limit(1);
    if (!application) {
      throw new NotFoundException(`Application ${applicationId} not found`);
    }
    return application;
  }
}

function withSlot(
  application: ApplicationRow,
  plan: readonly QueueSlot[],
): ApplicationRow {
  const slot = plan.find((s) => s.id === application.id);
  return slot
    ? { ...application, status: slot.status, position: slot.position }
    : application;
}
