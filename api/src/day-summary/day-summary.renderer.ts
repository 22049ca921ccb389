import type { ApplicationStatus } from '@procedure-desk/contract';
import type { ApplicationRow, EventRow } from '../drizzle/types';
import type { OutboundMessage } from '../notifications/notification-channel';
import { formatEventDate } from '../events/event.mapper';
import {
  STATUS_DISPLAY_ORDER,
  compareForDisplay,
  parseApplicationStatus,
} from '../applications/queue-planner';

export const STATUS_ICONS: Record<ApplicationStatus, string> = {
  primary: '⭐',
  approved: '✅',
  pending: '⏳',
  cancelled: '🚫',
  rejected: '❌',
};

export interface DaySummaryEvent {
  event: EventRow;
  applications: ApplicationRow[];
}

export interface DaySummaryInput {
  date: string;
  /** Events of the day in display order */
  events: DaySummaryEvent[];
  /** Per user: how many applications they have on this date */
  applicationsPerUser: ReadonlyMap<number, number>;
  /** Link to the combined admin message of an application, if any */
  linkFor: (application: ApplicationRow) => string | null;
}

function header(date: string): string {
  return `📋 **${formatEventDate(date)} (${date})**`;
}

function statusCounts(applications: ApplicationRow[]): string {
  const counts = new Map<ApplicationStatus, number>();
  for (const application of applications) {
    const status = parseApplicationStatus(application.status);
    counts.set(status, (counts.get(status) ?? 0) + 1);
  }
  const parts = STATUS_DISPLAY_ORDER.flatMap((status) => {
    const n = counts.get(status);
    return n ? [`${STATUS_ICONS[status]} ${n}`] : [];
  });
  return parts.length > 0 ? parts.join(' · ') : 'no applications';
}

function applicationLine(
  application: ApplicationRow,
  input: DaySummaryInput,
): string {
  const icon = STATUS_ICONS[parseApplicationStatus(application.status)];
  let line = `${icon} ${application.fullName}, ${application.phone}`;

  const sameDay = input.applicationsPerUser.get(application.userId) ?? 0;
  if (sameDay > 1) line += ` (${sameDay} on this day)`;

  const link = input.linkFor(application);
  if (link) line += ` · [#${application.id}](${link})`;
  return line;
}

/**
 * Admin overview of one date: every event with its applications.
 * The same input always renders the same text, so re-rendering an
 * unchanged day is a no-op edit.
 */
export function renderDaySummary(input: DaySummaryInput): OutboundMessage {
  if (input.events.length === 0) {
    return {
      content: `${header(input.date)}\n\nNo procedures scheduled.`,
      tone: 'info',
    };
  }

  const lines = [header(input.date)];
  for (const { event, applications } of input.events) {
    lines.push(
      '',
      `**${event.time} ${event.procedureName}** · ${statusCounts(applications)}`,
    );
    for (const application of [...applications].sort(compareForDisplay)) {
      lines.push(applicationLine(application, input));
    }
  }
  return { content: lines.join('\n'), tone: 'info' };
}

/** Count applications per user across the day's events */
export function countApplicationsPerUser(
  events: DaySummaryEvent[],
): Map<number, number> {
  const counts = new Map<number, number>();
  for (const { applications } of events) {
    for (const application of applications) {
      counts.set(application.userId, (counts.get(application.userId) ?? 0) + 1);
    }
  }
  return counts;
}
