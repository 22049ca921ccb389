import { Injectable, Logger } from '@nestjs/common';
import {
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  ComponentType,
  DiscordAPIError,
  EmbedBuilder,
  RESTJSONErrorCodes,
  messageLink,
  type Message,
} from 'discord.js';
import { DiscordBotClientService } from '../discord-bot/discord-bot-client.service';
import { EMBED_COLORS } from '../discord-bot/discord-bot.constants';
import {
  NotificationChannelError,
  type EditResult,
  type MessageAction,
  type MessageActionStyle,
  type MessageHandle,
  type MessageTarget,
  type MessageTone,
  type NotificationChannel,
  type OutboundMessage,
} from './notification-channel';

/** Discord's embed description limit */
const MAX_DESCRIPTION_LENGTH = 4096;

const TONE_COLORS: Record<MessageTone, number> = {
  info: EMBED_COLORS.INFO,
  success: EMBED_COLORS.SUCCESS,
  warning: EMBED_COLORS.WARNING,
  danger: EMBED_COLORS.DANGER,
};

const BUTTON_STYLES: Record<MessageActionStyle, ButtonStyle> = {
  primary: ButtonStyle.Primary,
  secondary: ButtonStyle.Secondary,
  success: ButtonStyle.Success,
  danger: ButtonStyle.Danger,
};

const UNREACHABLE_CODES = new Set<number | string>([
  RESTJSONErrorCodes.CannotSendMessagesToThisUser,
  RESTJSONErrorCodes.MissingAccess,
  RESTJSONErrorCodes.MissingPermissions,
]);

const NOT_FOUND_CODES = new Set<number | string>([
  RESTJSONErrorCodes.UnknownMessage,
  RESTJSONErrorCodes.UnknownChannel,
  RESTJSONErrorCodes.UnknownUser,
]);

/**
 * Map a discord.js failure onto the transport-neutral error kinds.
 * Discord has no notion of a channel changing id, so `migrated` never
 * comes from here.
 */
export function toNotificationChannelError(
  error: unknown,
): NotificationChannelError {
  if (error instanceof NotificationChannelError) return error;
  if (error instanceof DiscordAPIError) {
    if (UNREACHABLE_CODES.has(error.code)) {
      return new NotificationChannelError('unreachable', error.message);
    }
    if (NOT_FOUND_CODES.has(error.code)) {
      return new NotificationChannelError('not_found', error.message);
    }
  }
  const message = error instanceof Error ? error.message : String(error);
  return new NotificationChannelError('transient', message);
}

export function buildEmbed(message: OutboundMessage): EmbedBuilder {
  let description = message.content;
  if (description.length > MAX_DESCRIPTION_LENGTH) {
    description = `${description.slice(0, MAX_DESCRIPTION_LENGTH - 1)}…`;
  }
  return new EmbedBuilder()
    .setDescription(description)
    .setColor(TONE_COLORS[message.tone ?? 'info']);
}

export function buildActionRows(
  actions: MessageAction[][] = [],
): ActionRowBuilder<ButtonBuilder>[] {
  return actions
    .filter((row) => row.length > 0)
    .map((row) =>
      new ActionRowBuilder<ButtonBuilder>().addComponents(
        row.map((action) =>
          new ButtonBuilder()
            .setCustomId(action.id)
            .setLabel(action.label)
            .setStyle(BUTTON_STYLES[action.style]),
        ),
      ),
    );
}

/** Stable fingerprint of the buttons currently attached to a message */
function describeComponents(message: Message): string {
  const parts: string[] = [];
  for (const component of message.components) {
    const json = component.toJSON();
    if (json.type !== ComponentType.ActionRow) continue;
    for (const child of json.components) {
      if (child.type === ComponentType.Button && 'custom_id' in child) {
        parts.push(`${child.custom_id}:${child.label ?? ''}:${child.style}`);
      }
    }
  }
  return parts.join('|');
}

function describeActions(actions: MessageAction[][] = []): string {
  return actions
    .flat()
    .map((a) => `${a.id}:${a.label}:${BUTTON_STYLES[a.style]}`)
    .join('|');
}

/**
 * NotificationChannel backed by the Discord bot. Messages render as a
 * single embed plus button rows.
 */
@Injectable()
export class DiscordNotificationChannel implements NotificationChannel {
  private readonly logger = new Logger(DiscordNotificationChannel.name);

  constructor(private readonly clientService: DiscordBotClientService) {}

  async send(
    target: MessageTarget,
    message: OutboundMessage,
  ): Promise<MessageHandle> {
    const payload = {
      embeds: [buildEmbed(message)],
      components: buildActionRows(message.actions),
      files: message.media ?? [],
    };

    try {
      let sent: Message;
      if (target.kind === 'user') {
        const user = await this.clientService.fetchUser(target.userId);
        sent = await user.send(payload);
      } else {
        const channel = await this.clientService.fetchTextChannel(
          target.channelId,
        );
        if (!channel) {
          throw new NotificationChannelError(
            'not_found',
            `Channel ${target.channelId} is not a text channel`,
          );
        }
        sent = await channel.send(payload);
      }
      return { channelId: sent.channelId, messageId: sent.id };
    } catch (error) {
      throw toNotificationChannelError(error);
    }
  }

  async edit(
    handle: MessageHandle,
    message: OutboundMessage,
  ): Promise<EditResult> {
    try {
      const existing = await this.fetchMessage(handle);
      const embed = buildEmbed(message);
      const current = existing.embeds[0];

      if (
        current?.description === embed.data.description &&
        current?.color === embed.data.color &&
        describeComponents(existing) === describeActions(message.actions)
      ) {
        return 'unchanged';
      }

      await existing.edit({
        embeds: [embed],
        components: buildActionRows(message.actions),
      });
      return 'edited';
    } catch (error) {
      throw toNotificationChannelError(error);
    }
  }

  async delete(handle: MessageHandle): Promise<void> {
    try {
      const existing = await this.fetchMessage(handle);
      await existing.delete();
    } catch (error) {
      const mapped = toNotificationChannelError(error);
      if (mapped.kind === 'not_found') {
        this.logger.debug(
          `Message ${handle.messageId} already gone, nothing to delete`,
        );
        return;
      }
      throw mapped;
    }
  }

  linkTo(handle: MessageHandle): string {
    const guildId = this.clientService.getGuildId();
    return guildId
      ? messageLink(handle.channelId, handle.messageId, guildId)
      : messageLink(handle.channelId, handle.messageId);
  }

  private async fetchMessage(handle: MessageHandle): Promise<Message> {
    const channel = await this.clientService.fetchTextChannel(handle.channelId);
    if (!channel) {
      throw new NotificationChannelError(
        'not_found',
        `Channel ${handle.channelId} is not a text channel`,
      );
    }
    return channel.messages.fetch(handle.messageId);
  }
}
