import { Injectable } from '@nestjs/common';
import {
  EmbedBuilder,
  SlashCommandBuilder,
  type AutocompleteInteraction,
  type ChatInputCommandInteraction,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import { ProcedureTypesService } from '../../procedure-types/procedure-types.service';
import { EMBED_COLORS } from '../discord-bot.constants';
import { AdminAccessService } from '../services/admin-access.service';
import { editReplyWithError } from '../utils/interaction-replies';
import { filterChoices, procedureTypeChoice } from './command-choices';
import type { SlashCommandHandler } from './register-commands';
import type { CommandInteractionHandler } from '../listeners/interaction.listener';

@Injectable()
export class ProcedureTypeCommand
  implements SlashCommandHandler, CommandInteractionHandler
{
  readonly commandName = 'procedure-type';

  constructor(
    private readonly procedureTypesService: ProcedureTypesService,
    private readonly adminAccess: AdminAccessService,
  ) {}

  getDefinition(): RESTPostAPIChatInputApplicationCommandsJSONBody {
    return new SlashCommandBuilder()
      .setName('procedure-type')
      .setDescription('Manage the procedure catalog')
      .setDMPermission(false)
      .addSubcommand((sub) =>
        sub
          .setName('add')
          .setDescription('Add a procedure type')
          .addStringOption((opt) =>
            opt
              .setName('name')
              .setDescription('Name')
              .setRequired(true)
              .setMaxLength(100),
          ),
      )
      .addSubcommand((sub) =>
        sub
          .setName('rename')
          .setDescription('Rename a procedure type; existing slots keep the old name')
          .addIntegerOption((opt) =>
            opt
              .setName('type')
              .setDescription('Procedure type')
              .setRequired(true)
              .setAutocomplete(true),
          )
          .addStringOption((opt) =>
            opt
              .setName('name')
              .setDescription('New name')
              .setRequired(true)
              .setMaxLength(100),
          ),
      )
      .addSubcommand((sub) =>
        sub
          .setName('toggle')
          .setDescription('Activate or deactivate a procedure type')
          .addIntegerOption((opt) =>
            opt
              .setName('type')
              .setDescription('Procedure type')
              .setRequired(true)
              .setAutocomplete(true),
          ),
      )
      .addSubcommand((sub) =>
        sub
          .setName('remove')
          .setDescription('Delete a procedure type no slot uses')
          .addIntegerOption((opt) =>
            opt
              .setName('type')
              .setDescription('Procedure type')
              .setRequired(true)
              .setAutocomplete(true),
          ),
      )
      .addSubcommand((sub) =>
        sub.setName('list').setDescription('List procedure types'),
      )
      .toJSON();
  }

  async handleInteraction(
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    if (!(await this.adminAccess.ensureAdmin(interaction))) return;
    await interaction.deferReply({ ephemeral: true });

    try {
      const content = await this.runSubcommand(interaction);
      if (content !== null) {
        await interaction.editReply({ content });
      }
    } catch (error) {
      await editReplyWithError(interaction, error);
    }
  }

  async handleAutocomplete(
    interaction: AutocompleteInteraction,
  ): Promise<void> {
    const focused = interaction.options.getFocused(true);
    const types = await this.procedureTypesService.listAll();
    await interaction.respond(
      filterChoices(types.map(procedureTypeChoice), focused.value),
    );
  }

  /** @returns the reply text, or null when the reply was already sent */
  private async runSubcommand(
    interaction: ChatInputCommandInteraction,
  ): Promise<string | null> {
    const options = interaction.options;
    switch (options.getSubcommand()) {
      case 'add': {
        const type = await this.procedureTypesService.create(
          options.getString('name', true),
        );
        return `Added "${type.name}".`;
      }
      case 'rename': {
        const type = await this.procedureTypesService.rename(
          options.getInteger('type', true),
          options.getString('name', true),
        );
        return `Renamed to "${type.name}".`;
      }
      case 'toggle': {
        const type = await this.procedureTypesService.toggle(
          options.getInteger('type', true),
        );
        return `"${type.name}" is now ${type.isActive ? 'active' : 'inactive'}.`;
      }
      case 'remove': {
        const id = options.getInteger('type', true);
        const type = await this.procedureTypesService.findById(id);
        await this.procedureTypesService.delete(id);
        return `Removed "${type.name}".`;
      }
      default: {
        await this.replyWithList(interaction);
        return null;
      }
    }
  }

  private async replyWithList(
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    const types = await this.procedureTypesService.listAll();
    const embed = new EmbedBuilder()
      .setTitle('Procedure types')
      .setColor(EMBED_COLORS.INFO)
      .setDescription(
        types.length > 0
          ? types
              .map((type) => `\`#${type.id}\` ${type.isActive ? '✅' : '⏸️'} ${type.name}`)
              .join('\n')
          : 'No procedure types yet.',
      );
    await interaction.editReply({ embeds: [embed] });
  }
}
