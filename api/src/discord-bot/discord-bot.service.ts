import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DiscordBotClientService } from './discord-bot-client.service';

/**
 * Bot lifecycle: connect once the application has started, disconnect on
 * shutdown. Without a token the bot stays offline and the rest of the
 * application keeps running.
 */
@Injectable()
export class DiscordBotService
  implements OnApplicationBootstrap, OnModuleDestroy
{
  private readonly logger = new Logger(DiscordBotService.name);

  constructor(
    private readonly clientService: DiscordBotClientService,
    private readonly configService: ConfigService,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    const token = this.configService.get<string>('DISCORD_BOT_TOKEN');
    if (!token) {
      this.logger.warn('DISCORD_BOT_TOKEN is not set, the bot stays offline');
      return;
    }

    try {
      this.logger.log('Connecting Discord bot...');
      await this.clientService.connect(token);
    } catch (error) {
      this.logger.error(
        'Failed to connect Discord bot on startup:',
        error instanceof Error ? error.message : error,
      );
    }
  }

  async onModuleDestroy(): Promise<void> {
    await this.clientService.disconnect();
  }
}
