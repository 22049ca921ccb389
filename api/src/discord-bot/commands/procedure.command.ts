import { Injectable, Logger } from '@nestjs/common';
import {
  EmbedBuilder,
  SlashCommandBuilder,
  type AutocompleteInteraction,
  type ChatInputCommandInteraction,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import { TIME_SLOTS } from '@procedure-desk/contract';
import { EventsService } from '../../events/events.service';
import { describeEvent } from '../../events/event.mapper';
import { ProcedureTypesService } from '../../procedure-types/procedure-types.service';
import type { EventRow } from '../../drizzle/types';
import { EMBED_COLORS } from '../discord-bot.constants';
import { AdminAccessService } from '../services/admin-access.service';
import { editReplyWithError } from '../utils/interaction-replies';
import {
  eventChoice,
  filterChoices,
  procedureTypeChoice,
} from './command-choices';
import type { SlashCommandHandler } from './register-commands';
import type { CommandInteractionHandler } from '../listeners/interaction.listener';

/** One line per event for the list embed */
export function formatEventLine(event: EventRow): string {
  const photo = event.needsPhoto ? ' 📷' : '';
  return `\`#${event.id}\` ${describeEvent(event)} · ${event.status}${photo}`;
}

@Injectable()
export class ProcedureCommand
  implements SlashCommandHandler, CommandInteractionHandler
{
  readonly commandName = 'procedure';
  private readonly logger = new Logger(ProcedureCommand.name);

  constructor(
    private readonly eventsService: EventsService,
    private readonly procedureTypesService: ProcedureTypesService,
    private readonly adminAccess: AdminAccessService,
  ) {}

  getDefinition(): RESTPostAPIChatInputApplicationCommandsJSONBody {
    return new SlashCommandBuilder()
      .setName('procedure')
      .setDescription('Manage procedure slots')
      .setDMPermission(false)
      .addSubcommand((sub) =>
        sub
          .setName('create')
          .setDescription('Create a draft procedure slot')
          .addStringOption((opt) =>
            opt
              .setName('date')
              .setDescription('Date as YYYY-MM-DD')
              .setRequired(true),
          )
          .addStringOption((opt) =>
            opt
              .setName('time')
              .setDescription('Start time, 09:00 to 17:00 in 10-minute steps')
              .setRequired(true)
              .setAutocomplete(true),
          )
          .addIntegerOption((opt) =>
            opt
              .setName('type')
              .setDescription('Procedure type')
              .setRequired(true)
              .setAutocomplete(true),
          )
          .addBooleanOption((opt) =>
            opt
              .setName('photo')
              .setDescription('Candidates must send a photo (default: no)'),
          )
          .addStringOption((opt) =>
            opt
              .setName('comment')
              .setDescription('Shown on the announcement')
              .setMaxLength(1000),
          ),
      )
      .addSubcommand((sub) =>
        sub
          .setName('publish')
          .setDescription('Announce a draft and open applications')
          .addIntegerOption((opt) =>
            opt
              .setName('event')
              .setDescription('Procedure slot')
              .setRequired(true)
              .setAutocomplete(true),
          ),
      )
      .addSubcommand((sub) =>
        sub
          .setName('cancel')
          .setDescription('Cancel a slot and every active application for it')
          .addIntegerOption((opt) =>
            opt
              .setName('event')
              .setDescription('Procedure slot')
              .setRequired(true)
              .setAutocomplete(true),
          ),
      )
      .addSubcommand((sub) =>
        sub
          .setName('list')
          .setDescription('List upcoming procedure slots')
          .addBooleanOption((opt) =>
            opt
              .setName('past')
              .setDescription('Show past slots instead'),
          ),
      )
      .toJSON();
  }

  async handleInteraction(
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    if (!(await this.adminAccess.ensureAdmin(interaction))) return;
    await interaction.deferReply({ ephemeral: true });

    try {
      switch (interaction.options.getSubcommand()) {
        case 'create':
          await this.handleCreate(interaction);
          break;
        case 'publish':
          await this.handlePublish(interaction);
          break;
        case 'cancel':
          await this.handleCancel(interaction);
          break;
        case 'list':
          await this.handleList(interaction);
          break;
      }
    } catch (error) {
      await editReplyWithError(interaction, error);
    }
  }

  async handleAutocomplete(
    interaction: AutocompleteInteraction,
  ): Promise<void> {
    const focused = interaction.options.getFocused(true);
    switch (focused.name) {
      case 'time':
        await interaction.respond(
          filterChoices(
            TIME_SLOTS.map((slot) => ({ name: slot, value: slot })),
            focused.value,
          ),
        );
        break;
      case 'type': {
        const types = await this.procedureTypesService.listActive();
        await interaction.respond(
          filterChoices(types.map(procedureTypeChoice), focused.value),
        );
        break;
      }
      case 'event': {
        const events = await this.eventsService.listUpcoming();
        const subcommand = interaction.options.getSubcommand();
        const candidates =
          subcommand === 'publish'
            ? events.filter((event) => event.status === 'draft')
            : events;
        await interaction.respond(
          filterChoices(candidates.map(eventChoice), focused.value),
        );
        break;
      }
      default:
        await interaction.respond([]);
    }
  }

  private async handleCreate(
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    const event = await this.eventsService.create({
      date: interaction.options.getString('date', true),
      time: interaction.options.getString('time', true),
      procedureTypeId: interaction.options.getInteger('type', true),
      needsPhoto: interaction.options.getBoolean('photo') ?? false,
      comment: interaction.options.getString('comment') ?? undefined,
    });
    this.logger.log(
      `Draft event ${event.id} created by ${interaction.user.id}`,
    );
    await interaction.editReply({
      content: `Draft \`#${event.id}\` created: ${describeEvent(event)}. Announce it with \`/procedure publish\`.`,
    });
  }

  private async handlePublish(
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    const event = await this.eventsService.publish(
      interaction.options.getInteger('event', true),
    );
    await interaction.editReply({
      content: `Published \`#${event.id}\`: ${describeEvent(event)}.`,
    });
  }

  private async handleCancel(
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    const { event, cancelledApplications } = await this.eventsService.cancel(
      interaction.options.getInteger('event', true),
    );
    await interaction.editReply({
      content: `Cancelled \`#${event.id}\` ${describeEvent(event)}. ${cancelledApplications.length} application(s) cancelled.`,
    });
  }

  private async handleList(
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    const past = interaction.options.getBoolean('past') ?? false;
    const events = past
      ? await this.eventsService.listPast()
      : await this.eventsService.listUpcoming();

    if (events.length === 0) {
      await interaction.editReply({
        content: past ? 'No past procedures.' : 'No upcoming procedures.',
      });
      return;
    }

    const embed = new EmbedBuilder()
      .setTitle(past ? 'Past procedures' : 'Upcoming procedures')
      .setColor(EMBED_COLORS.INFO)
      .setDescription(events.map(formatEventLine).join('\n'));
    await interaction.editReply({ embeds: [embed] });
  }
}
