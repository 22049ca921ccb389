import { Injectable } from '@nestjs/common';
import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import { EventDateSchema } from '@procedure-desk/contract';
import {
  DaySummaryService,
  type DaySummaryResult,
} from '../../day-summary/day-summary.service';
import { toIsoDate } from '../../events/event.mapper';
import { AdminAccessService } from '../services/admin-access.service';
import type { SlashCommandHandler } from './register-commands';
import type { CommandInteractionHandler } from '../listeners/interaction.listener';

const RESULT_MESSAGES: Record<DaySummaryResult, (date: string) => string> = {
  sent: (date) => `Day summary for ${date} posted.`,
  edited: (date) => `Day summary for ${date} updated.`,
  unchanged: (date) => `Day summary for ${date} is already up to date.`,
  skipped: (date) =>
    `Nothing to post for ${date}: no procedures, or no admin channel configured.`,
};

/**
 * Rebuild a day summary on demand, e.g. after the message was deleted
 * by hand.
 */
@Injectable()
export class SummaryCommand
  implements SlashCommandHandler, CommandInteractionHandler
{
  readonly commandName = 'summary';

  constructor(
    private readonly daySummaryService: DaySummaryService,
    private readonly adminAccess: AdminAccessService,
  ) {}

  getDefinition(): RESTPostAPIChatInputApplicationCommandsJSONBody {
    return new SlashCommandBuilder()
      .setName('summary')
      .setDescription('Refresh the day summary in the admin channel')
      .setDMPermission(false)
      .addStringOption((opt) =>
        opt
          .setName('date')
          .setDescription('Date as YYYY-MM-DD (default: today)'),
      )
      .toJSON();
  }

  async handleInteraction(
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    if (!(await this.adminAccess.ensureAdmin(interaction))) return;
    await interaction.deferReply({ ephemeral: true });

    const raw = interaction.options.getString('date') ?? toIsoDate(new Date());
    const parsed = EventDateSchema.safeParse(raw.trim());
    if (!parsed.success) {
      await interaction.editReply({
        content: `"${raw}" is not a date. Use YYYY-MM-DD.`,
      });
      return;
    }

    const result = await this.daySummaryService.refresh(parsed.data);
    await interaction.editReply({
      content: RESULT_MESSAGES[result](parsed.data),
    });
  }
}
