import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SETTING_KEYS, type SettingKey } from '../drizzle/schema';
import { SettingsService } from './settings.service';

/** Which configured channel a message is bound for */
export type ChannelKind = 'publish' | 'admin';

const CHANNEL_SETTINGS: Record<
  ChannelKind,
  { key: SettingKey; env: string }
> = {
  publish: { key: SETTING_KEYS.PUBLISH_CHANNEL_ID, env: 'PUBLISH_CHANNEL_ID' },
  admin: { key: SETTING_KEYS.ADMIN_CHANNEL_ID, env: 'ADMIN_CHANNEL_ID' },
};

/**
 * Resolves the channel identities used for announcements and admin
 * messages. A stored setting wins over the environment so that a channel
 * migration survives restarts.
 */
@Injectable()
export class ChannelConfigService {
  private readonly logger = new Logger(ChannelConfigService.name);

  constructor(
    private readonly settingsService: SettingsService,
    private readonly configService: ConfigService,
  ) {}

  async getChannelId(kind: ChannelKind): Promise<string | null> {
    const { key, env } = CHANNEL_SETTINGS[kind];
    const stored = await this.settingsService.get(key);
    if (stored) return stored;
    return this.configService.get<string>(env) || null;
  }

  getPublishChannelId(): Promise<string | null> {
    return this.getChannelId('publish');
  }

  getAdminChannelId(): Promise<string | null> {
    return this.getChannelId('admin');
  }

  /**
   * Persist the new identity of a channel that moved (for example a group
   * upgraded to a new id). Later sends go to the new channel.
   */
  async recordMigration(kind: ChannelKind, newChannelId: string): Promise<void> {
    const previous = await this.getChannelId(kind);
    await this.settingsService.set(CHANNEL_SETTINGS[kind].key, newChannelId);
    this.logger.log(
      `${kind} channel migrated from ${previous ?? 'unset'} to ${newChannelId}`,
    );
  }
}
