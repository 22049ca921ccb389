import { Inject, Injectable, Logger } from '@nestjs/common';
import { UsersService } from '../users/users.service';
import {
  ChannelConfigService,
  type ChannelKind,
} from '../settings/channel-config.service';
import type { UserRow } from '../drizzle/types';
import {
  NOTIFICATION_CHANNEL,
  NotificationChannelError,
  channelTarget,
  isNotificationChannelError,
  userTarget,
  type MessageHandle,
  type NotificationChannel,
  type OutboundMessage,
} from './notification-channel';

export type NotifiableUser = Pick<UserRow, 'id' | 'discordId' | 'botBlockedAt'>;

/**
 * Sends messages through the NotificationChannel on behalf of the domain
 * services. Candidate and admin notices are best effort: failures are
 * logged and never undo the state change that triggered them.
 */
@Injectable()
export class NotifierService {
  private readonly logger = new Logger(NotifierService.name);

  constructor(
    @Inject(NOTIFICATION_CHANNEL)
    private readonly channel: NotificationChannel,
    private readonly usersService: UsersService,
    private readonly channelConfig: ChannelConfigService,
  ) {}

  /**
   * Direct message to a candidate. Skipped while the candidate is marked
   * unreachable; a refused DM marks them unreachable.
   *
   * @returns the posted message handle, or null when nothing was sent
   */
  async notifyCandidate(
    user: NotifiableUser,
    message: OutboundMessage,
  ): Promise<MessageHandle | null> {
    if (user.botBlockedAt) {
      this.logger.debug(`User ${user.id} is unreachable, skipping DM`);
      return null;
    }

    try {
      return await this.channel.send(userTarget(user.discordId), message);
    } catch (error) {
      if (isNotificationChannelError(error, 'unreachable')) {
        await this.usersService.markBotBlocked(user.id).catch((err: unknown) =>
          this.logger.warn(
            `Failed to mark user ${user.id} unreachable: ${err instanceof Error ? err.message : 'Unknown error'}`,
          ),
        );
      } else {
        this.logger.warn(
          `Failed to notify user ${user.id}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        );
      }
      return null;
    }
  }

  /**
   * Post a notice to the admin channel. Best effort.
   */
  async notifyAdmins(message: OutboundMessage): Promise<MessageHandle | null> {
    try {
      return await this.sendToConfiguredChannel('admin', message);
    } catch (error) {
      this.logger.warn(
        `Failed to notify admins: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      return null;
    }
  }

  /**
   * Send to one of the configured channels. When the channel reports that it
   * moved, the new identity is persisted and the send is retried once.
   *
   * @throws NotificationChannelError when no channel is configured or the send fails
   */
  async sendToConfiguredChannel(
    kind: ChannelKind,
    message: OutboundMessage,
  ): Promise<MessageHandle> {
    const channelId = await this.channelConfig.getChannelId(kind);
    if (!channelId) {
      throw new NotificationChannelError(
        'not_found',
        `No ${kind} channel configured`,
      );
    }

    try {
      return await this.channel.send(channelTarget(channelId), message);
    } catch (error) {
      if (!isNotificationChannelError(error, 'migrated') || !error.migratedTo) {
        throw error;
      }
      await this.channelConfig.recordMigration(kind, error.migratedTo);
      return this.channel.send(channelTarget(error.migratedTo), message);
    }
  }
}
