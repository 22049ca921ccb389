/**
 * Transport-neutral port for every outbound message the service sends:
 * candidate DMs, the combined application message, the day summary and
 * event announcements.
 */
export const NOTIFICATION_CHANNEL = 'NOTIFICATION_CHANNEL';

export type MessageTarget =
  | { kind: 'channel'; channelId: string }
  | { kind: 'user'; userId: string };

/** Identifies a posted message so it can be edited or deleted later */
export interface MessageHandle {
  channelId: string;
  messageId: string;
}

export type MessageTone = 'info' | 'success' | 'warning' | 'danger';

export type MessageActionStyle = 'primary' | 'secondary' | 'success' | 'danger';

/** A button. `id` is routed back to the interaction handlers. */
export interface MessageAction {
  id: string;
  label: string;
  style: MessageActionStyle;
}

export interface OutboundMessage {
  content: string;
  tone?: MessageTone;
  /** Button rows, at most 5 buttons each */
  actions?: MessageAction[][];
  /** Opaque media references attached on send; ignored on edit */
  media?: string[];
}

/** `unchanged` means the message already showed exactly this content */
export type EditResult = 'edited' | 'unchanged';

export interface NotificationChannel {
  send(target: MessageTarget, message: OutboundMessage): Promise<MessageHandle>;
  edit(handle: MessageHandle, message: OutboundMessage): Promise<EditResult>;
  delete(handle: MessageHandle): Promise<void>;
  /** Permalink to a posted message */
  linkTo(handle: MessageHandle): string;
}

/**
 * - unreachable: the recipient blocked the bot or the bot lost access
 * - transient: network or rate-limit failure, may succeed later
 * - not_found: the message or channel no longer exists
 * - migrated: the channel moved to `migratedTo`
 */
export type NotificationChannelErrorKind =
  | 'unreachable'
  | 'transient'
  | 'not_found'
  | 'migrated';

export class NotificationChannelError extends Error {
  constructor(
    readonly kind: NotificationChannelErrorKind,
    message: string,
    readonly migratedTo?: string,
  ) {
    super(message);
    this.name = 'NotificationChannelError';
  }
}

export function isNotificationChannelError(
  error: unknown,
  kind?: NotificationChannelErrorKind,
): error is NotificationChannelError {
  return (
    error instanceof NotificationChannelError &&
    (kind === undefined || error.kind === kind)
  );
}

export function channelTarget(channelId: string): MessageTarget {
  return { kind: 'channel', channelId };
}

export function userTarget(userId: string): MessageTarget {
  return { kind: 'user', userId };
}
