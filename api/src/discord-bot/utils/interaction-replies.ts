import { BadRequestException, HttpException } from '@nestjs/common';
import type {
  ChatInputCommandInteraction,
  InteractionEditReplyOptions,
  RepliableInteraction,
} from 'discord.js';

export const GENERIC_ERROR_MESSAGE =
  'Something went wrong. Please try again later.';

/**
 * Code 40060 = Interaction has already been acknowledged
 * Code 10062 = Unknown interaction (token expired)
 */
export function isDiscordInteractionError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 40060 || error.code === 10062)
  );
}

/**
 * Text a user may see for a failed action. Domain exceptions carry
 * messages written for users; anything else gets the generic reply.
 */
export function userFacingMessage(error: unknown): string {
  if (error instanceof BadRequestException) {
    const body = error.getResponse();
    if (typeof body === 'object' && body !== null && 'errors' in body) {
      const issues = body.errors;
      if (Array.isArray(issues) && issues.length > 0) {
        return issues.map(String).join('\n');
      }
    }
    return error.message;
  }
  if (error instanceof HttpException) return error.message;
  return GENERIC_ERROR_MESSAGE;
}

/**
 * Reply or edit the pending reply, whichever the interaction still allows.
 * Expired or already-acknowledged interactions are ignored.
 */
export async function safeReply(
  interaction: RepliableInteraction,
  options: InteractionEditReplyOptions & { content: string },
): Promise<void> {
  try {
    if (interaction.deferred || interaction.replied) {
      await interaction.editReply(options);
    } else {
      await interaction.reply({ content: options.content, ephemeral: true });
    }
  } catch (error: unknown) {
    if (isDiscordInteractionError(error)) return;
    throw error;
  }
}

/**
 * Show a domain error on a deferred command reply. Anything that is not a
 * domain error is rethrown for the interaction router to log.
 */
export async function editReplyWithError(
  interaction: ChatInputCommandInteraction,
  error: unknown,
): Promise<void> {
  if (!(error instanceof HttpException)) throw error;
  await interaction.editReply({ content: userFacingMessage(error) });
}
