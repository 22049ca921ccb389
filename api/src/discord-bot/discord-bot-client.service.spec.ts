/* eslint-disable @typescript-eslint/unbound-method */
import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { EventEmitter } from 'events';
import { DiscordBotClientService } from './discord-bot-client.service';
import { DISCORD_BOT_EVENTS } from './discord-bot.constants';
import { Events } from 'discord.js';

/**
 * Typed interface for the mock Discord.js Client used in these tests.
 */
interface MockDiscordClient extends EventEmitter {
  user: { tag: string; id: string } | null;
  guilds: {
    cache: { first: jest.Mock };
  };
  channels: {
    fetch: jest.Mock;
  };
  users: {
    fetch: jest.Mock;
  };
  login: jest.Mock;
  destroy: jest.Mock;
  isReady: jest.Mock;
}

// Access the private `client` field
function getClient(service: DiscordBotClientService): MockDiscordClient {
  const client = (service as unknown as { client: MockDiscordClient | null })
    .client;
  if (!client) throw new Error('client was not created');
  return client;
}

// Mock discord.js Client
jest.mock('discord.js', () => {
  class MockClient extends EventEmitter {
    user: { tag: string; id: string } | null = null;
    guilds = {
      cache: { first: jest.fn() },
    };
    channels = {
      fetch: jest.fn(),
    };
    users = {
      fetch: jest.fn(),
    };

    static nextLogin = jest.fn().mockResolvedValue('test-token');

    login = jest.fn((token: string) => MockClient.nextLogin(token));
    destroy = jest.fn().mockResolvedValue(undefined);
    isReady = jest.fn().mockReturnValue(false);
  }

  return {
    Client: MockClient,
    GatewayIntentBits: {
      Guilds: 1,
      GuildMessages: 2,
      DirectMessages: 64,
    },
    Partials: {
      Channel: 1,
    },
    Events: {
      ClientReady: 'ready',
      Error: 'error',
    },
  };
});

describe('DiscordBotClientService', () => {
  let service: DiscordBotClientService;
  let eventEmitter: EventEmitter2;
  let config: Record<string, string>;

  async function connectReady(): Promise<MockDiscordClient> {
    const connectPromise = service.connect('test-token');
    const client = getClient(service);
    client.user = { tag: 'DeskBot#0001', id: 'bot-1' };
    client.isReady.mockReturnValue(true);
    client.emit(Events.ClientReady);
    await connectPromise;
    return client;
  }

  beforeEach(async () => {
    config = {};
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DiscordBotClientService,
        {
          provide: EventEmitter2,
          useValue: {
            emit: jest.fn(),
            emitAsync: jest.fn().mockResolvedValue([]),
          },
        },
        {
          provide: ConfigService,
          useValue: { get: jest.fn((key: string) => config[key]) },
        },
      ],
    }).compile();

    service = module.get<DiscordBotClientService>(DiscordBotClientService);
    eventEmitter = module.get<EventEmitter2>(EventEmitter2);

    jest.clearAllMocks();
  });

  afterEach(async () => {
    await service.disconnect();
  });

  describe('connect', () => {
    it('should log in and emit CONNECTED once ready', async () => {
      const client = await connectReady();

      expect(client.login).toHaveBeenCalledWith('test-token');
      expect(eventEmitter.emitAsync).toHaveBeenCalledWith(
        DISCORD_BOT_EVENTS.CONNECTED,
      );
      expect(service.getClientId()).toBe('bot-1');
    });

    it('should reject with a friendly message on client error', async () => {
      const error = new Error('An invalid token was provided.');
      const connectPromise = service.connect('test-token');

      getClient(service).emit(Events.Error, error);

      await expect(connectPromise).rejects.toThrow(
        'Invalid bot token. Please check the token and try again.',
      );
      expect(eventEmitter.emit).toHaveBeenCalledWith(
        DISCORD_BOT_EVENTS.ERROR,
        error,
      );
      expect(service.getClient()).toBeNull();
    });

    it('should reject when the login itself fails', async () => {
      const error = new Error('getaddrinfo ENOTFOUND discord.com');
      jest
        .requireMock<{ Client: { nextLogin: jest.Mock } }>('discord.js')
        .Client.nextLogin.mockRejectedValueOnce(error);

      await expect(service.connect('test-token')).rejects.toThrow(
        'Unable to reach Discord servers. Check your internet connection.',
      );
      expect(service.getClient()).toBeNull();
    });

    it('should time out after 15 seconds', async () => {
      jest.useFakeTimers();
      const connectPromise = service.connect('test-token');

      jest.advanceTimersByTime(15_000);

      await expect(connectPromise).rejects.toThrow(
        'Discord bot connection timed out after 15s',
      );
      expect(eventEmitter.emit).not.toHaveBeenCalledWith(
        DISCORD_BOT_EVENTS.ERROR,
        expect.anything(),
      );
      jest.useRealTimers();
    });

    it('should use the configured ready timeout', async () => {
      config.DISCORD_READY_TIMEOUT_MS = '5000';
      const module = await Test.createTestingModule({
        providers: [
          DiscordBotClientService,
          { provide: EventEmitter2, useValue: eventEmitter },
          {
            provide: ConfigService,
            useValue: { get: jest.fn((key: string) => config[key]) },
          },
        ],
      }).compile();
      const configured = module.get(DiscordBotClientService);
      jest.useFakeTimers();
      const connectPromise = configured.connect('test-token');

      jest.advanceTimersByTime(5_000);

      await expect(connectPromise).rejects.toThrow(
        'Discord bot connection timed out after 5s',
      );
      jest.useRealTimers();
    });

    it('should destroy the previous client before reconnecting', async () => {
      const first = await connectReady();

      const secondConnect = service.connect('test-token-2');
      // Let the disconnect of the first client settle
      await new Promise((resolve) => setImmediate(resolve));
      const second = getClient(service);
      second.emit(Events.ClientReady);
      await secondConnect;

      expect(first.destroy).toHaveBeenCalled();
      expect(second).not.toBe(first);
      expect(second.login).toHaveBeenCalledWith('test-token-2');
    });
  });

  describe('disconnect', () => {
    it('should destroy the client and emit DISCONNECTED', async () => {
      const client = await connectReady();

      await service.disconnect();

      expect(client.destroy).toHaveBeenCalled();
      expect(eventEmitter.emit).toHaveBeenCalledWith(
        DISCORD_BOT_EVENTS.DISCONNECTED,
      );
      expect(service.getClient()).toBeNull();
    });

    it('should do nothing without a client', async () => {
      await service.disconnect();
      expect(eventEmitter.emit).not.toHaveBeenCalled();
    });
  });

  describe('identity', () => {
    it('should report nothing while offline', () => {
      expect(service.getGuildId()).toBeNull();
      expect(service.getClientId()).toBeNull();
    });

    it('should expose the guild and bot ids once ready', async () => {
      const client = await connectReady();
      client.guilds.cache.first.mockReturnValue({ id: 'guild-1' });

      expect(service.getGuildId()).toBe('guild-1');
      expect(service.getClientId()).toBe('bot-1');
    });
  });

  describe('fetchTextChannel', () => {
    it('should throw while offline', async () => {
      await expect(service.fetchTextChannel('admin-channel')).rejects.toThrow(
        'Discord bot is not connected',
      );
    });

    it('should return guild text channels', async () => {
      const client = await connectReady();
      const channel = {
        id: 'admin-channel',
        isTextBased: () => true,
        isDMBased: () => false,
      };
      client.channels.fetch.mockResolvedValue(channel);

      await expect(service.fetchTextChannel('admin-channel')).resolves.toBe(
        channel,
      );
    });

    it('should return null for DM and voice-only channels', async () => {
      const client = await connectReady();
      client.channels.fetch.mockResolvedValueOnce({
        isTextBased: () => true,
        isDMBased: () => true,
      });
      client.channels.fetch.mockResolvedValueOnce({
        isTextBased: () => false,
        isDMBased: () => false,
      });

      await expect(service.fetchTextChannel('dm')).resolves.toBeNull();
      await expect(service.fetchTextChannel('voice')).resolves.toBeNull();
    });
  });

  describe('fetchUser', () => {
    it('should fetch through the client', async () => {
      const client = await connectReady();
      client.users.fetch.mockResolvedValue({ id: 'user-1' });

      await expect(service.fetchUser('user-1')).resolves.toEqual({
        id: 'user-1',
      });
      expect(client.users.fetch).toHaveBeenCalledWith('user-1');
    });
  });
});
