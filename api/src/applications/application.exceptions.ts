import { ConflictException } from '@nestjs/common';
import type { ApplicationStatus } from '@procedure-desk/contract';
import type { TransitionAction } from './application-transitions';

/**
 * The requested action is not legal from the application's current status.
 * Callers re-fetch the application and present the options that are.
 */
export class InvalidTransitionException extends ConflictException {
  constructor(
    readonly applicationId: number,
    readonly from: ApplicationStatus,
    readonly action: TransitionAction,
    reason?: string,
  ) {
    super(
      reason ??
        `Cannot ${action} application ${applicationId} while it is ${from}`,
    );
  }
}

/**
 * The per-event lock could not be taken within the retry budget.
 * The action was not applied.
 */
export class QueueContentionException extends ConflictException {
  constructor(
    readonly eventId: number,
    readonly attempts: number,
  ) {
    super(
      `Queue for event ${eventId} is busy (gave up after ${attempts} attempts)`,
    );
  }
}
