import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  Client,
  GatewayIntentBits,
  Events,
  Partials,
  type GuildTextBasedChannel,
  type User,
} from 'discord.js';
import {
  DISCORD_BOT_EVENTS,
  friendlyDiscordErrorMessage,
} from './discord-bot.constants';

const DEFAULT_READY_TIMEOUT_MS = 15_000;

class ReadyTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Discord bot connection timed out after ${timeoutMs / 1000}s`);
    this.name = 'ReadyTimeoutError';
  }
}

/**
 * Owns the single gateway session of the desk bot. Everything that talks to
 * Discord (the notification channel, command registration, interaction
 * routing, photo collection) goes through the client held here.
 */
@Injectable()
export class DiscordBotClientService {
  private readonly logger = new Logger(DiscordBotClientService.name);
  private readonly readyTimeoutMs: number;
  private client: Client | null = null;

  constructor(
    private readonly eventEmitter: EventEmitter2,
    configService: ConfigService,
  ) {
    this.readyTimeoutMs =
      Number(configService.get<string>('DISCORD_READY_TIMEOUT_MS')) ||
      DEFAULT_READY_TIMEOUT_MS;
  }

  /**
   * Log in and wait for the gateway to report ready. Resolves after the
   * CONNECTED handlers (command registration, interaction routing) ran.
   * A session that is already open is closed first.
   */
  async connect(token: string): Promise<void> {
    if (this.client) {
      await this.disconnect();
    }

    const client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.DirectMessages,
      ],
      // DM channels are not cached until the first message arrives
      partials: [Partials.Channel],
    });
    this.client = client;

    try {
      await this.waitUntilReady(client, client.login(token));
    } catch (error) {
      const message =
        error instanceof ReadyTimeoutError
          ? error.message
          : friendlyDiscordErrorMessage(error);
      this.logger.error(`Discord bot failed to connect: ${message}`);
      if (!(error instanceof ReadyTimeoutError)) {
        this.eventEmitter.emit(DISCORD_BOT_EVENTS.ERROR, error);
      }
      if (this.client === client) await this.disconnect();
      throw new Error(message);
    }

    this.logger.log(`Discord bot connected as ${client.user?.tag}`);
    await this.eventEmitter
      .emitAsync(DISCORD_BOT_EVENTS.CONNECTED)
      .catch((error: unknown) => {
        this.logger.error(
          `CONNECTED handlers failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
        );
      });
  }

  async disconnect(): Promise<void> {
    const client = this.client;
    if (!client) return;
    this.client = null;

    try {
      await client.destroy();
      this.logger.log('Discord bot disconnected');
      this.eventEmitter.emit(DISCORD_BOT_EVENTS.DISCONNECTED);
    } catch (error) {
      this.logger.error('Error disconnecting Discord bot:', error);
    }
  }

  /** Raw client, for listeners that subscribe to gateway events */
  getClient(): Client | null {
    return this.client;
  }

  /** The desk's server: the first guild the bot is a member of */
  getGuildId(): string | null {
    if (!this.client?.isReady()) return null;
    return this.client.guilds.cache.first()?.id ?? null;
  }

  getClientId(): string | null {
    if (!this.client?.isReady()) return null;
    return this.client.user.id;
  }

  /**
   * Resolve a guild text channel by id: the publish and admin channels.
   * Null when the id names a DM or a channel without text.
   */
  async fetchTextChannel(
    channelId: string,
  ): Promise<GuildTextBasedChannel | null> {
    const channel = await this.requireClient().channels.fetch(channelId);
    if (!channel || !channel.isTextBased() || channel.isDMBased()) {
      return null;
    }
    return channel;
  }

  async fetchUser(discordId: string): Promise<User> {
    return this.requireClient().users.fetch(discordId);
  }

  /** Settles on the first of: ready, a client error, a failed login, the timeout */
  private waitUntilReady(client: Client, login: Promise<unknown>): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const timeout = setTimeout(() => {
        reject(new ReadyTimeoutError(this.readyTimeoutMs));
      }, this.readyTimeoutMs);
      const fail = (error: unknown): void => {
        clearTimeout(timeout);
        reject(error instanceof Error ? error : new Error(String(error)));
      };

      client.once(Events.ClientReady, () => {
        clearTimeout(timeout);
        resolve();
      });
      client.once(Events.Error, fail);
      login.catch(fail);
    });
  }

  private requireClient(): Client<true> {
    if (!this.client?.isReady()) {
      throw new Error('Discord bot is not connected');
    }
    return this.client;
  }
}
