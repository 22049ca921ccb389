import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { RepliableInteraction } from 'discord.js';

/** Parse a comma-separated id list, ignoring blanks */
export function parseAdminIds(raw: string | undefined): Set<string> {
  return new Set(
    (raw ?? '')
      .split(',')
      .map((id) => id.trim())
      .filter((id) => id.length > 0),
  );
}

/**
 * Admin membership comes from `ADMIN_DISCORD_IDS`. Anyone else is treated
 * as a candidate.
 */
@Injectable()
export class AdminAccessService {
  private readonly adminIds: Set<string>;

  constructor(configService: ConfigService) {
    this.adminIds = parseAdminIds(configService.get<string>('ADMIN_DISCORD_IDS'));
  }

  isAdmin(discordId: string): boolean {
    return this.adminIds.has(discordId);
  }

  /**
   * Refuse the interaction for non-admins.
   * @returns whether the caller may go on
   */
  async ensureAdmin(interaction: RepliableInteraction): Promise<boolean> {
    if (this.isAdmin(interaction.user.id)) return true;
    await interaction.reply({
      content: 'Only administrators can do that.',
      ephemeral: true,
    });
    return false;
  }
}
