import type { ApplicationStatus } from '@procedure-desk/contract';
import type { ApplicationRow, EventRow } from '../drizzle/types';
import type { OutboundMessage } from '../notifications/notification-channel';
import { describeEvent } from '../events/event.mapper';
import { selfCancelId } from './application-actions';
import { STATUS_MARKERS } from './application-message.renderer';

type EventInfo = Pick<EventRow, 'procedureName' | 'date' | 'time'>;

export function submissionReceipt(
  items: { application: ApplicationRow; event: EventInfo }[],
  photosTruncated: boolean,
): OutboundMessage {
  const lines = ['Thank you! Your application has been received:', ''];
  for (const { application, event } of items) {
    lines.push(`#${application.id} ${describeEvent(event)}`);
  }
  lines.push('', 'We will message you once an administrator has reviewed it.');
  if (photosTruncated) {
    lines.push('', '⚠️ Only the first 3 photos were kept.');
  }
  return {
    content: lines.join('\n'),
    tone: 'info',
    actions: [
      items.map(({ application }) => ({
        id: selfCancelId(application.id),
        label: `Withdraw #${application.id}`,
        style: 'secondary' as const,
      })),
    ],
  };
}

export function approvedNotice(event: EventInfo): OutboundMessage {
  return {
    content: `✅ Your application for ${describeEvent(event)} has been approved. You are in the queue; we will confirm the final slot soon.`,
    tone: 'success',
  };
}

export function primaryInstructions(event: EventInfo): OutboundMessage {
  return {
    content: [
      `⭐ You are confirmed for ${describeEvent(event)}.`,
      '',
      'Please arrive 10 minutes early and bring an ID.',
      'If your plans change, withdraw your application as soon as possible so the next candidate can take the slot.',
    ].join('\n'),
    tone: 'success',
  };
}

export function rejectedNotice(
  event: EventInfo,
  wasPrimary: boolean,
): OutboundMessage {
  return {
    content: wasPrimary
      ? `We are sorry, but your confirmed slot for ${describeEvent(event)} can no longer go ahead. We apologise for the inconvenience.`
      : `Unfortunately your application for ${describeEvent(event)} was not accepted. Thank you for your interest.`,
    tone: 'danger',
  };
}

export function cancelledByAdminNotice(
  event: EventInfo,
  wasPrimary: boolean,
): OutboundMessage {
  return {
    content: wasPrimary
      ? `We are sorry, but your confirmed slot for ${describeEvent(event)} has been cancelled. We apologise for the inconvenience.`
      : `Your application for ${describeEvent(event)} has been cancelled by an administrator.`,
    tone: 'danger',
  };
}

export function eventCancelledNotice(event: EventInfo): OutboundMessage {
  return {
    content: `The procedure ${describeEvent(event)} has been cancelled. Your application is closed. We apologise for the inconvenience.`,
    tone: 'danger',
  };
}

// Admin channel notices

export function candidateWithdrewNotice(
  application: Pick<ApplicationRow, 'id' | 'fullName'>,
  event: EventInfo,
  previousStatus: ApplicationStatus,
): OutboundMessage {
  return {
    content: `🚫 ${application.fullName} withdrew application #${application.id} for ${describeEvent(event)} (was ${STATUS_MARKERS[previousStatus]}).`,
    tone: 'warning',
  };
}

export function autoPromotedNotice(
  application: Pick<ApplicationRow, 'id' | 'fullName'>,
  event: EventInfo,
): OutboundMessage {
  return {
    content: `⭐ ${application.fullName} (#${application.id}) was promoted to primary for ${describeEvent(event)}.`,
    tone: 'success',
  };
}

export function noPrimaryLeftNotice(event: EventInfo): OutboundMessage {
  return {
    content: `⚠️ ${describeEvent(event)} has no primary candidate and no approved applications left.`,
    tone: 'warning',
  };
}
