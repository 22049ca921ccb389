import { Injectable } from '@nestjs/common';
import {
  EmbedBuilder,
  SlashCommandBuilder,
  type AutocompleteInteraction,
  type ChatInputCommandInteraction,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import type { QueueEntryDto, QueueViewDto } from '@procedure-desk/contract';
import { QueueService } from '../../applications/queue.service';
import { EventsService } from '../../events/events.service';
import { describeEvent } from '../../events/event.mapper';
import { STATUS_ICONS } from '../../day-summary/day-summary.renderer';
import { EMBED_COLORS } from '../discord-bot.constants';
import { AdminAccessService } from '../services/admin-access.service';
import { editReplyWithError } from '../utils/interaction-replies';
import { eventChoice, filterChoices } from './command-choices';
import type { SlashCommandHandler } from './register-commands';
import type { CommandInteractionHandler } from '../listeners/interaction.listener';

/** Primary and approved entries hold a place in the queue */
function queuePlace(entry: QueueEntryDto): string {
  const queued = entry.status === 'primary' || entry.status === 'approved';
  return queued && entry.position > 0 ? `${entry.position}.` : '–';
}

/** Queue lines: queued applications numbered by position, the rest after */
export function renderQueueLines(view: QueueViewDto): string[] {
  return view.entries.map(
    (entry) =>
      `${queuePlace(entry)} ${STATUS_ICONS[entry.status]} ${entry.fullName}, ${entry.phone} · #${entry.applicationId}`,
  );
}

@Injectable()
export class QueueCommand
  implements SlashCommandHandler, CommandInteractionHandler
{
  readonly commandName = 'queue';

  constructor(
    private readonly queueService: QueueService,
    private readonly eventsService: EventsService,
    private readonly adminAccess: AdminAccessService,
  ) {}

  getDefinition(): RESTPostAPIChatInputApplicationCommandsJSONBody {
    return new SlashCommandBuilder()
      .setName('queue')
      .setDescription('Show the candidate queue of a procedure slot')
      .setDMPermission(false)
      .addIntegerOption((opt) =>
        opt
          .setName('event')
          .setDescription('Procedure slot')
          .setRequired(true)
          .setAutocomplete(true),
      )
      .toJSON();
  }

  async handleInteraction(
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    if (!(await this.adminAccess.ensureAdmin(interaction))) return;
    await interaction.deferReply({ ephemeral: true });

    try {
      const view = await this.queueService.getQueue(
        interaction.options.getInteger('event', true),
      );
      const lines = renderQueueLines(view);
      const embed = new EmbedBuilder()
        .setTitle(describeEvent(view.event))
        .setColor(EMBED_COLORS.INFO)
        .setDescription(lines.length > 0 ? lines.join('\n') : 'No applications yet.')
        .setFooter({ text: `Event #${view.event.id} · ${view.event.status}` });
      await interaction.editReply({ embeds: [embed] });
    } catch (error) {
      await editReplyWithError(interaction, error);
    }
  }

  async handleAutocomplete(
    interaction: AutocompleteInteraction,
  ): Promise<void> {
    const focused = interaction.options.getFocused(true);
    const events = await this.eventsService.listUpcoming();
    await interaction.respond(
      filterChoices(events.map(eventChoice), focused.value),
    );
  }
}
