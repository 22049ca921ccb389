import { isPrimary, type ApplicationStatus } from '@procedure-desk/contract';

/** The fields of an application the queue is computed from */
export interface QueueMember {
  id: number;
  status: string;
  position: number;
  createdAt: Date;
}

export interface QueueSlot {
  id: number;
  status: ApplicationStatus;
  position: number;
}

/**
 * Display order of statuses in queue views and summaries.
 * Unknown statuses sort last.
 */
export const STATUS_DISPLAY_ORDER: readonly ApplicationStatus[] = [
  'primary',
  'approved',
  'pending',
  'cancelled',
  'rejected',
];

export function statusRank(status: string): number {
  const rank = STATUS_DISPLAY_ORDER.findIndex((s) => s === status);
  return rank === -1 ? STATUS_DISPLAY_ORDER.length : rank;
}

/** created_at ascending, id as tie-break */
export function compareByCreation(a: QueueMember, b: QueueMember): number {
  return a.createdAt.getTime() - b.createdAt.getTime() || a.id - b.id;
}

/** Status rank, then queue position, then creation order */
export function compareForDisplay(a: QueueMember, b: QueueMember): number {
  return (
    statusRank(a.status) - statusRank(b.status) ||
    a.position - b.position ||
    compareByCreation(a, b)
  );
}

export function parseApplicationStatus(status: string): ApplicationStatus {
  const known = STATUS_DISPLAY_ORDER.find((s) => s === status);
  if (!known) {
    throw new Error(`Unknown application status "${status}"`);
  }
  return known;
}

/**
 * Compute the canonical queue for one event's applications.
 *
 * - The earliest primary keeps the status; any later primary is demoted to
 *   approved.
 * - The primary takes position 1, approved applications follow in creation
 *   order, everything else gets 0.
 *
 * Returns one slot per input, in creation order.
 */
export function planQueue(members: readonly QueueMember[]): QueueSlot[] {
  const ordered = [...members].sort(compareByCreation);
  let primarySeen = false;

  const slots = ordered.map((member) => {
    let status = parseApplicationStatus(member.status);
    if (status === 'primary') {
      if (primarySeen) status = 'approved';
      primarySeen = true;
    }
    return { id: member.id, status, position: 0 };
  });

  let next = 1;
  for (const slot of slots) {
    if (isPrimary(slot)) slot.position = next++;
  }
  for (const slot of slots) {
    if (slot.status === 'approved') slot.position = next++;
  }
  return slots;
}

/**
 * Slots whose status or position differ from the stored rows.
 */
export function diffQueue(
  members: readonly QueueMember[],
  plan: readonly QueueSlot[],
): QueueSlot[] {
  const byId = new Map(members.map((m) => [m.id, m]));
  return plan.filter((slot) => {
    const current = byId.get(slot.id);
    return (
      !current ||
      current.status !== slot.status ||
      current.position !== slot.position
    );
  });
}

/**
 * The application to auto-promote after a primary left the queue: the
 * earliest approved one, and only while the event has no primary.
 */
export function pickPromotionCandidate(
  plan: readonly QueueSlot[],
): QueueSlot | null {
  if (plan.some(isPrimary)) return null;
  return plan.find((slot) => slot.status === 'approved') ?? null;
}
