import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OnEvent } from '@nestjs/event-emitter';
import {
  REST,
  Routes,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import { DiscordBotClientService } from '../discord-bot-client.service';
import { DISCORD_BOT_EVENTS } from '../discord-bot.constants';
import { ProcedureCommand } from './procedure.command';
import { ProcedureTypeCommand } from './procedure-type.command';
import { QueueCommand } from './queue.command';
import { SummaryCommand } from './summary.command';
import { CandidateCommand } from './candidate.command';

/**
 * Describes a slash command handler that can be registered with Discord.
 */
export interface SlashCommandHandler {
  /** The command definition for Discord API registration */
  getDefinition(): RESTPostAPIChatInputApplicationCommandsJSONBody;
}

/**
 * Registers all slash commands in the bot's guild on startup.
 */
@Injectable()
export class RegisterCommandsService {
  private readonly logger = new Logger(RegisterCommandsService.name);

  constructor(
    private readonly clientService: DiscordBotClientService,
    private readonly configService: ConfigService,
    private readonly procedureCommand: ProcedureCommand,
    private readonly procedureTypeCommand: ProcedureTypeCommand,
    private readonly queueCommand: QueueCommand,
    private readonly summaryCommand: SummaryCommand,
    private readonly candidateCommand: CandidateCommand,
  ) {}

  private getCommandHandlers(): SlashCommandHandler[] {
    return [
      this.procedureCommand,
      this.procedureTypeCommand,
      this.queueCommand,
      this.summaryCommand,
      this.candidateCommand,
    ];
  }

  @OnEvent(DISCORD_BOT_EVENTS.CONNECTED)
  async registerCommands(): Promise<void> {
    const token = this.configService.get<string>('DISCORD_BOT_TOKEN');
    const clientId = this.clientService.getClientId();
    const guildId = this.clientService.getGuildId();
    if (!token || !clientId || !guildId) {
      this.logger.warn(
        'Bot token, client ID or guild unknown, skipping command registration',
      );
      return;
    }

    const commands = this.getCommandHandlers().map((h) => h.getDefinition());

    try {
      const rest = new REST({ version: '10' }).setToken(token);
      // Guild commands update immediately; global ones can take an hour
      await rest.put(Routes.applicationGuildCommands(clientId, guildId), {
        body: commands,
      });
      this.logger.log(`Registered ${commands.length} slash command(s)`);
    } catch (error) {
      this.logger.error('Failed to register slash commands:', error);
    }
  }
}
