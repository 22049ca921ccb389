import type { ApplicationStatus, EventStatus } from '@procedure-desk/contract';

/**
 * Lifecycle actions. `cancel` is the admin cancel; `self-cancel` is the
 * candidate withdrawing their own application.
 */
export type TransitionAction =
  | 'approve'
  | 'reject'
  | 'promote'
  | 'cancel'
  | 'self-cancel';

interface TransitionRule {
  from: readonly ApplicationStatus[];
  to: ApplicationStatus;
  /** Statuses that need an explicit confirmation before the change applies */
  confirmFrom: readonly ApplicationStatus[];
}

const ALL_STATUSES: readonly ApplicationStatus[] = [
  'pending',
  'approved',
  'primary',
  'rejected',
  'cancelled',
];

export const TRANSITIONS: Record<TransitionAction, TransitionRule> = {
  approve: {
    from: ['pending', 'rejected', 'cancelled'],
    to: 'approved',
    confirmFrom: [],
  },
  reject: {
    from: ALL_STATUSES,
    to: 'rejected',
    confirmFrom: ['primary'],
  },
  promote: {
    from: ['approved'],
    to: 'primary',
    confirmFrom: [],
  },
  cancel: {
    from: ALL_STATUSES,
    to: 'cancelled',
    confirmFrom: ['primary'],
  },
  'self-cancel': {
    from: ['pending', 'approved', 'primary'],
    to: 'cancelled',
    confirmFrom: [],
  },
};

export function canTransition(
  action: TransitionAction,
  from: ApplicationStatus,
): boolean {
  return TRANSITIONS[action].from.includes(from);
}

export function requiresConfirmation(
  action: TransitionAction,
  from: ApplicationStatus,
): boolean {
  return TRANSITIONS[action].confirmFrom.includes(from);
}

/**
 * Actions an admin can take on an application in this status. Only a
 * published event has a live queue; its applications are otherwise frozen.
 */
export function availableAdminActions(
  status: ApplicationStatus,
  eventStatus: EventStatus,
): ('approve' | 'reject' | 'promote' | 'cancel')[] {
  if (eventStatus !== 'published') return [];
  const actions: ('approve' | 'reject' | 'promote' | 'cancel')[] = [
    'approve',
    'promote',
    'reject',
    'cancel',
  ];
  // Re-rejecting or re-cancelling is a no-op; don't offer it
  return actions.filter(
    (action) => canTransition(action, status) && TRANSITIONS[action].to !== status,
  );
}

/** Actions that take an application out of the queue and may free the primary slot */
export function removesFromQueue(action: TransitionAction): boolean {
  return action === 'reject' || action === 'cancel' || action === 'self-cancel';
}

/** Actions that put an application (back) into the queue */
export function entersQueue(action: TransitionAction): boolean {
  return action === 'approve' || action === 'promote';
}
