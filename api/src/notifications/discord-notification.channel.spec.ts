import { ButtonStyle, DiscordAPIError } from 'discord.js';
import {
  DiscordNotificationChannel,
  buildActionRows,
  buildEmbed,
  toNotificationChannelError,
} from './discord-notification.channel';
import { NotificationChannelError } from './notification-channel';
import { DiscordBotClientService } from '../discord-bot/discord-bot-client.service';
import { EMBED_COLORS } from '../discord-bot/discord-bot.constants';

function apiError(code: number): DiscordAPIError {
  return new DiscordAPIError(
    { code, message: `error ${code}` },
    code,
    400,
    'POST',
    '/channels/1/messages',
    {},
  );
}

describe('toNotificationChannelError', () => {
  it.each([
    [50007, 'unreachable'],
    [50013, 'unreachable'],
    [10008, 'not_found'],
    [10003, 'not_found'],
    [50035, 'transient'],
  ])('maps Discord code %d to %s', (code, kind) => {
    expect(toNotificationChannelError(apiError(code)).kind).toBe(kind);
  });

  it('treats unknown errors as transient', () => {
    const mapped = toNotificationChannelError(new Error('socket hang up'));
    expect(mapped.kind).toBe('transient');
    expect(mapped.message).toBe('socket hang up');
  });

  it('passes channel errors through', () => {
    const original = new NotificationChannelError('migrated', 'moved', 'c2');
    expect(toNotificationChannelError(original)).toBe(original);
  });
});

describe('message builders', () => {
  it('colors the embed by tone', () => {
    const embed = buildEmbed({ content: 'Done', tone: 'success' });
    expect(embed.data.description).toBe('Done');
    expect(embed.data.color).toBe(EMBED_COLORS.SUCCESS);
  });

  it('truncates descriptions over the Discord limit', () => {
    const embed = buildEmbed({ content: 'x'.repeat(5000) });
    expect(embed.data.description).toHaveLength(4096);
    expect(embed.data.description?.endsWith('…')).toBe(true);
  });

  it('builds one button row per action row and skips empty rows', () => {
    const rows = buildActionRows([
      [
        { id: 'app:approve:1', label: 'Approve', style: 'success' },
        { id: 'app:reject:1', label: 'Reject', style: 'danger' },
      ],
      [],
    ]);

    expect(rows).toHaveLength(1);
    const json = rows[0].toJSON();
    expect(json.components).toHaveLength(2);
    expect(json.components[1]).toMatchObject({
      custom_id: 'app:reject:1',
      label: 'Reject',
      style: ButtonStyle.Danger,
    });
  });
});

describe('DiscordNotificationChannel', () => {
  let clientService: {
    fetchTextChannel: jest.Mock;
    fetchUser: jest.Mock;
    getGuildId: jest.Mock;
  };
  let channel: DiscordNotificationChannel;
  let existing: {
    embeds: { description: string; color: number }[];
    components: never[];
    edit: jest.Mock;
    delete: jest.Mock;
  };

  beforeEach(() => {
    existing = {
      embeds: [{ description: 'Hello', color: EMBED_COLORS.INFO }],
      components: [],
      edit: jest.fn().mockResolvedValue(undefined),
      delete: jest.fn().mockResolvedValue(undefined),
    };
    clientService = {
      fetchTextChannel: jest.fn().mockResolvedValue({
        send: jest
          .fn()
          .mockResolvedValue({ channelId: 'c1', id: 'm9' }),
        messages: { fetch: jest.fn().mockResolvedValue(existing) },
      }),
      fetchUser: jest.fn().mockResolvedValue({
        send: jest.fn().mockRejectedValue(apiError(50007)),
      }),
      getGuildId: jest.fn().mockReturnValue('g1'),
    };
    channel = new DiscordNotificationChannel(
      clientService as unknown as DiscordBotClientService,
    );
  });

  it('returns the handle of a channel post', async () => {
    await expect(
      channel.send({ kind: 'channel', channelId: 'c1' }, { content: 'Hi' }),
    ).resolves.toEqual({ channelId: 'c1', messageId: 'm9' });
  });

  it('reports a refused DM as unreachable', async () => {
    await expect(
      channel.send({ kind: 'user', userId: 'u1' }, { content: 'Hi' }),
    ).rejects.toMatchObject({ kind: 'unreachable' });
  });

  it('reports a missing channel as not_found', async () => {
    clientService.fetchTextChannel.mockResolvedValue(null);

    await expect(
      channel.send({ kind: 'channel', channelId: 'gone' }, { content: 'Hi' }),
    ).rejects.toMatchObject({ kind: 'not_found' });
  });

  it('skips the API call when content is identical', async () => {
    await expect(
      channel.edit({ channelId: 'c1', messageId: 'm1' }, { content: 'Hello' }),
    ).resolves.toBe('unchanged');
    expect(existing.edit).not.toHaveBeenCalled();
  });

  it('edits when content differs', async () => {
    await expect(
      channel.edit({ channelId: 'c1', messageId: 'm1' }, { content: 'Bye' }),
    ).resolves.toBe('edited');
    expect(existing.edit).toHaveBeenCalledTimes(1);
  });

  it('ignores deleting a message that is already gone', async () => {
    existing.delete.mockRejectedValue(apiError(10008));

    await expect(
      channel.delete({ channelId: 'c1', messageId: 'm1' }),
    ).resolves.toBeUndefined();
  });

  it('links to the message within the guild', () => {
    expect(channel.linkTo({ channelId: 'c1', messageId: 'm1' })).toBe(
      'https://discord.com/channels/g1/c1/m1',
    );
  });
});
