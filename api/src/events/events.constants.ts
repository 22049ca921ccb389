/**
 * Procedure event lifecycle notifications.
 * Consumed by the day-summary listener.
 */
export const PROCEDURE_EVENTS = {
  PUBLISHED: 'procedure.published',
  CANCELLED: 'procedure.cancelled',
} as const;

export interface ProcedureEventPayload {
  eventId: number;
  date: string;
}

/** Button on the announcement that opens the application form */
export const APPLY_PREFIX = 'apply';

export function applyButtonId(eventId: number): string {
  return `${APPLY_PREFIX}:${eventId}`;
}

export function parseApplyButtonId(customId: string): number | null {
  const [prefix, rawId] = customId.split(':');
  if (prefix !== APPLY_PREFIX || !rawId || !/^\d+$/.test(rawId)) return null;
  return Number(rawId);
}
