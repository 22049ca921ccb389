import {
  EventStatusSchema,
  type EventStatus,
  type ProcedureEventDto,
} from '@procedure-desk/contract';
import type { EventRow } from '../drizzle/types';

export function parseEventStatus(status: string): EventStatus {
  return EventStatusSchema.parse(status);
}

export function toEventDto(event: EventRow): ProcedureEventDto {
  return {
    id: event.id,
    date: event.date,
    time: event.time,
    procedureTypeId: event.procedureTypeId,
    procedureName: event.procedureName,
    needsPhoto: event.needsPhoto,
    comment: event.comment,
    status: parseEventStatus(event.status),
  };
}

const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];

/** "Tue 10.03" style label used in messages */
export function formatEventDate(date: string): string {
  const [year, month, day] = date.split('-').map(Number);
  const weekday = WEEKDAYS[new Date(Date.UTC(year, month - 1, day)).getUTCDay()];
  return `${weekday} ${String(day).padStart(2, '0')}.${String(month).padStart(2, '0')}`;
}

/** One-line description: "Laser hair removal, Tue 10.03 at 10:00" */
export function describeEvent(
  event: Pick<EventRow, 'procedureName' | 'date' | 'time'>,
): string {
  return `${event.procedureName}, ${formatEventDate(event.date)} at ${event.time}`;
}

/** `YYYY-MM-DD` of a timestamp, in UTC */
export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}
