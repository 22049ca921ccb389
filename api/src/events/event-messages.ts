import type { EventRow } from '../drizzle/types';
import type { OutboundMessage } from '../notifications/notification-channel';
import { formatEventDate } from './event.mapper';
import { applyButtonId } from './events.constants';

type AnnouncedEvent = Pick<
  EventRow,
  'id' | 'procedureName' | 'date' | 'time' | 'comment' | 'needsPhoto'
>;

/** Channel post for a published event, with the Apply button */
export function renderAnnouncement(event: AnnouncedEvent): OutboundMessage {
  const lines = [
    `**${event.procedureName}**`,
    `📅 ${formatEventDate(event.date)} at ${event.time}`,
  ];
  if (event.comment) lines.push(`📝 ${event.comment}`);
  if (event.needsPhoto) lines.push('📷 A photo is required to apply.');

  return {
    content: lines.join('\n'),
    tone: 'info',
    actions: [
      [{ id: applyButtonId(event.id), label: 'Apply', style: 'primary' }],
    ],
  };
}

/** The announcement after cancellation: no buttons left */
export function renderCancelledAnnouncement(
  event: AnnouncedEvent,
): OutboundMessage {
  return {
    content: [
      `~~${event.procedureName}~~`,
      `📅 ${formatEventDate(event.date)} at ${event.time}`,
      '❌ This procedure has been cancelled.',
    ].join('\n'),
    tone: 'danger',
    actions: [],
  };
}
