import type { ApplicationStatus } from '@procedure-desk/contract';
import type { ApplicationRow, EventRow } from '../drizzle/types';
import type {
  MessageAction,
  OutboundMessage,
} from '../notifications/notification-channel';
import { describeEvent } from '../events/event.mapper';
import { availableAdminActions } from './application-transitions';
import { adminActionId } from './application-actions';
import { parseApplicationStatus } from './queue-planner';
import { parseEventStatus } from '../events/event.mapper';

export interface ApplicationGroupItem {
  application: ApplicationRow;
  event: EventRow;
}

/** Every application posted together in one combined admin message */
export interface ApplicationGroup {
  fullName: string;
  phone: string;
  photoCount: number;
  items: ApplicationGroupItem[];
}

export interface PendingConfirmation {
  applicationId: number;
  action: 'reject' | 'cancel';
}

export const STATUS_MARKERS: Record<ApplicationStatus, string> = {
  pending: '⏳ Pending',
  approved: '✅ Approved',
  primary: '⭐ Primary',
  rejected: '❌ Rejected',
  cancelled: '🚫 Cancelled',
};

const ACTION_BUTTONS: Record<
  'approve' | 'reject' | 'promote' | 'cancel',
  Pick<MessageAction, 'label' | 'style'>
> = {
  approve: { label: 'Approve', style: 'success' },
  promote: { label: 'Make primary', style: 'primary' },
  reject: { label: 'Reject', style: 'danger' },
  cancel: { label: 'Cancel', style: 'secondary' },
};

export function describeStatus(status: string, position: number): string {
  const parsed = parseApplicationStatus(status);
  const marker = STATUS_MARKERS[parsed];
  return parsed === 'approved' && position > 0
    ? `${marker} (queue #${position})`
    : marker;
}

function actionRow(
  item: ApplicationGroupItem,
  confirming: PendingConfirmation | undefined,
): MessageAction[] {
  const { application, event } = item;
  const tag = `#${application.id}`;

  if (confirming?.applicationId === application.id) {
    return [
      {
        id: adminActionId(
          confirming.action === 'reject' ? 'confirm-reject' : 'confirm-cancel',
          application.id,
        ),
        label: `Confirm ${confirming.action} ${tag}`,
        style: 'danger',
      },
      { id: adminActionId('keep', application.id), label: `Keep ${tag}`, style: 'secondary' },
    ];
  }

  return availableAdminActions(
    parseApplicationStatus(application.status),
    parseEventStatus(event.status),
  ).map(
    (action) => ({
      id: adminActionId(action, application.id),
      label: `${ACTION_BUTTONS[action].label} ${tag}`,
      style: ACTION_BUTTONS[action].style,
    }),
  );
}

/**
 * Render the combined admin message for one submission. Each application
 * gets its own line and its own button row.
 */
export function renderApplicationGroup(
  group: ApplicationGroup,
  confirming?: PendingConfirmation,
): OutboundMessage {
  const lines = [
    `**Application from ${group.fullName}**`,
    `Phone: ${group.phone}`,
  ];
  if (group.photoCount > 0) {
    lines.push(`Photos: ${group.photoCount}`);
  }
  lines.push('');

  for (const { application, event } of group.items) {
    lines.push(
      `#${application.id} ${describeEvent(event)}: ${describeStatus(application.status, application.position)}`,
    );
  }

  if (confirming) {
    lines.push(
      '',
      `⚠️ #${confirming.applicationId} is the primary candidate. Confirm to ${confirming.action} it.`,
    );
  }

  return {
    content: lines.join('\n'),
    tone: confirming ? 'warning' : 'info',
    actions: group.items
      .map((item) => actionRow(item, confirming))
      .filter((row) => row.length > 0),
  };
}
