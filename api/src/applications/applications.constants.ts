import type { ApplicationAction, ApplicationStatus } from '@procedure-desk/contract';

/**
 * Application-level event names.
 * Emitted by the application services, consumed by the day-summary listener.
 */
export const APPLICATION_EVENTS = {
  SUBMITTED: 'application.submitted',
  STATUS_CHANGED: 'application.status-changed',
} as const;

export interface ApplicationsSubmittedPayload {
  applicationIds: number[];
  eventIds: number[];
  /** Distinct dates of the events applied for */
  dates: string[];
}

export interface ApplicationStatusChangedPayload {
  applicationId: number;
  eventId: number;
  date: string;
  action: ApplicationAction;
  from: ApplicationStatus;
  to: ApplicationStatus;
  promotedApplicationId: number | null;
}
