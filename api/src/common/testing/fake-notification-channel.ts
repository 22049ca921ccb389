import {
  NotificationChannelError,
  type EditResult,
  type MessageHandle,
  type MessageTarget,
  type NotificationChannel,
  type NotificationChannelErrorKind,
  type OutboundMessage,
} from '../../notifications/notification-channel';

export interface SentMessage {
  target: MessageTarget;
  handle: MessageHandle;
  message: OutboundMessage;
}

/**
 * In-memory NotificationChannel for unit tests.
 *
 * Keeps the current content of every posted message so edits can report
 * `unchanged`, and can be told to fail the next call(s) of a given
 * operation with a given error kind.
 */
export class FakeNotificationChannel implements NotificationChannel {
  readonly sent: SentMessage[] = [];
  readonly edits: { handle: MessageHandle; message: OutboundMessage }[] = [];
  readonly deleted: MessageHandle[] = [];

  private readonly messages = new Map<string, OutboundMessage>();
  private readonly failures: {
    op: 'send' | 'edit' | 'delete';
    error: NotificationChannelError;
  }[] = [];
  private nextId = 1;

  /** Queue a failure for the next matching operation */
  failNext(
    op: 'send' | 'edit' | 'delete',
    kind: NotificationChannelErrorKind,
    migratedTo?: string,
  ): void {
    this.failures.push({
      op,
      error: new NotificationChannelError(kind, `fake ${kind}`, migratedTo),
    });
  }

  /** Pretend a message was posted earlier */
  seed(handle: MessageHandle, message: OutboundMessage): void {
    this.messages.set(this.key(handle), message);
  }

  current(handle: MessageHandle): OutboundMessage | undefined {
    return this.messages.get(this.key(handle));
  }

  async send(
    target: MessageTarget,
    message: OutboundMessage,
  ): Promise<MessageHandle> {
    this.throwIfQueued('send');
    const channelId =
      target.kind === 'channel' ? target.channelId : `dm-${target.userId}`;
    const handle = { channelId, messageId: `msg-${this.nextId++}` };
    this.messages.set(this.key(handle), message);
    this.sent.push({ target, handle, message });
    return handle;
  }

  async edit(
    handle: MessageHandle,
    message: OutboundMessage,
  ): Promise<EditResult> {
    this.throwIfQueued('edit');
    const existing = this.messages.get(this.key(handle));
    if (!existing) {
      throw new NotificationChannelError('not_found', 'fake not_found');
    }
    if (
      existing.content === message.content &&
      existing.tone === message.tone &&
      JSON.stringify(existing.actions ?? []) ===
        JSON.stringify(message.actions ?? [])
    ) {
      return 'unchanged';
    }
    this.messages.set(this.key(handle), message);
    this.edits.push({ handle, message });
    return 'edited';
  }

  async delete(handle: MessageHandle): Promise<void> {
    this.throwIfQueued('delete');
    this.messages.delete(this.key(handle));
    this.deleted.push(handle);
  }

  linkTo(handle: MessageHandle): string {
    return `https://chat.test/${handle.channelId}/${handle.messageId}`;
  }

  /** Messages sent to a given user id */
  sentToUser(userId: string): OutboundMessage[] {
    return this.sent
      .filter((s) => s.target.kind === 'user' && s.target.userId === userId)
      .map((s) => s.message);
  }

  /** Messages sent to a given channel id */
  sentToChannel(channelId: string): OutboundMessage[] {
    return this.sent
      .filter(
        (s) => s.target.kind === 'channel' && s.target.channelId === channelId,
      )
      .map((s) => s.message);
  }

  private throwIfQueued(op: 'send' | 'edit' | 'delete'): void {
    const index = this.failures.findIndex((f) => f.op === op);
    if (index === -1) return;
    const [failure] = this.failures.splice(index, 1);
    throw failure.error;
  }

  private key(handle: MessageHandle): string {
    return `${handle.channelId}/${handle.messageId}`;
  }
}
