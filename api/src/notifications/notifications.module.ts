import { Global, Module } from '@nestjs/common';
import { SettingsModule } from '../settings/settings.module';
import { UsersModule } from '../users/users.module';
import { DiscordBotClientService } from '../discord-bot/discord-bot-client.service';
import { DiscordNotificationChannel } from './discord-notification.channel';
import { NOTIFICATION_CHANNEL } from './notification-channel';
import { NotifierService } from './notifier.service';

/**
 * Outbound messaging. Owns the Discord client so that domain modules can
 * send without depending on the interaction layer.
 */
@Global()
@Module({
  imports: [SettingsModule, UsersModule],
  providers: [
    DiscordBotClientService,
    DiscordNotificationChannel,
    { provide: NOTIFICATION_CHANNEL, useExisting: DiscordNotificationChannel },
    NotifierService,
  ],
  exports: [DiscordBotClientService, NOTIFICATION_CHANNEL, NotifierService],
})
export class NotificationsModule {}
