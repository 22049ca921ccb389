import { Injectable, Logger } from '@nestjs/common';
import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import { UsersService } from '../../users/users.service';
import { AdminAccessService } from '../services/admin-access.service';
import type { SlashCommandHandler } from './register-commands';
import type { CommandInteractionHandler } from '../listeners/interaction.listener';

/**
 * Ban list. A blocked candidate can no longer open or submit the form;
 * existing applications are left as they are.
 */
@Injectable()
export class CandidateCommand
  implements SlashCommandHandler, CommandInteractionHandler
{
  readonly commandName = 'candidate';
  private readonly logger = new Logger(CandidateCommand.name);

  constructor(
    private readonly usersService: UsersService,
    private readonly adminAccess: AdminAccessService,
  ) {}

  getDefinition(): RESTPostAPIChatInputApplicationCommandsJSONBody {
    return new SlashCommandBuilder()
      .setName('candidate')
      .setDescription('Manage candidates')
      .setDMPermission(false)
      .addSubcommand((sub) =>
        sub
          .setName('block')
          .setDescription('Stop a user from applying')
          .addUserOption((opt) =>
            opt.setName('user').setDescription('Candidate').setRequired(true),
          ),
      )
      .addSubcommand((sub) =>
        sub
          .setName('unblock')
          .setDescription('Allow a blocked user to apply again')
          .addUserOption((opt) =>
            opt.setName('user').setDescription('Candidate').setRequired(true),
          ),
      )
      .toJSON();
  }

  async handleInteraction(
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    if (!(await this.adminAccess.ensureAdmin(interaction))) return;
    await interaction.deferReply({ ephemeral: true });

    const target = interaction.options.getUser('user', true);
    if (interaction.options.getSubcommand() === 'block') {
      await this.usersService.block(target.id);
      this.logger.log(`${interaction.user.id} blocked ${target.id}`);
      await interaction.editReply({ content: `<@${target.id}> is blocked.` });
      return;
    }

    const user = await this.usersService.unblock(target.id);
    await interaction.editReply({
      content: user
        ? `<@${target.id}> can apply again.`
        : `<@${target.id}> has never applied.`,
    });
  }
}
