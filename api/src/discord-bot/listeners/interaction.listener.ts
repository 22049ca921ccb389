import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import {
  Events,
  type AutocompleteInteraction,
  type ButtonInteraction,
  type ChatInputCommandInteraction,
  type Interaction,
  type ModalSubmitInteraction,
  type RepliableInteraction,
  type StringSelectMenuInteraction,
} from 'discord.js';
import {
  parseAdminActionId,
  parseSelfCancelId,
} from '../../applications/application-actions';
import { parseApplyButtonId } from '../../events/events.constants';
import { UsersService } from '../../users/users.service';
import { DiscordBotClientService } from '../discord-bot-client.service';
import { DISCORD_BOT_EVENTS, INTERACTION_IDS } from '../discord-bot.constants';
import { ProcedureCommand } from '../commands/procedure.command';
import { ProcedureTypeCommand } from '../commands/procedure-type.command';
import { QueueCommand } from '../commands/queue.command';
import { SummaryCommand } from '../commands/summary.command';
import { CandidateCommand } from '../commands/candidate.command';
import { GENERIC_ERROR_MESSAGE } from '../utils/interaction-replies';
import { ApplicationActionListener } from './application-action.listener';
import { ApplyFlowListener, parseApplyFormId } from './apply-flow.listener';

/**
 * Describes a command that can handle slash command interactions.
 */
export interface CommandInteractionHandler {
  readonly commandName: string;
  handleInteraction(interaction: ChatInputCommandInteraction): Promise<void>;
  handleAutocomplete?(interaction: AutocompleteInteraction): Promise<void>;
}

/**
 * Listens for Discord interactions and routes them: slash commands and
 * autocomplete to command handlers, buttons, the event picker and the
 * form modal to the application listeners.
 */
@Injectable()
export class InteractionListener {
  private readonly logger = new Logger(InteractionListener.name);
  private listenerAttached = false;

  constructor(
    private readonly clientService: DiscordBotClientService,
    private readonly usersService: UsersService,
    private readonly applicationActions: ApplicationActionListener,
    private readonly applyFlow: ApplyFlowListener,
    private readonly procedureCommand: ProcedureCommand,
    private readonly procedureTypeCommand: ProcedureTypeCommand,
    private readonly queueCommand: QueueCommand,
    private readonly summaryCommand: SummaryCommand,
    private readonly candidateCommand: CandidateCommand,
  ) {}

  private getHandlers(): CommandInteractionHandler[] {
    return [
      this.procedureCommand,
      this.procedureTypeCommand,
      this.queueCommand,
      this.summaryCommand,
      this.candidateCommand,
    ];
  }

  /**
   * Attach the interaction listener when the bot connects.
   */
  @OnEvent(DISCORD_BOT_EVENTS.CONNECTED)
  attachListener(): void {
    const client = this.clientService.getClient();
    if (!client || this.listenerAttached) return;

    client.on(Events.InteractionCreate, (interaction: Interaction) => {
      this.handleInteraction(interaction).catch((err) => {
        this.logger.error('Unhandled error in interaction handler:', err);
      });
    });

    this.listenerAttached = true;
    this.logger.log('Interaction listener attached');
  }

  /**
   * Reset listener state when bot disconnects (will re-attach on reconnect).
   */
  @OnEvent(DISCORD_BOT_EVENTS.DISCONNECTED)
  detachListener(): void {
    this.listenerAttached = false;
  }

  async handleInteraction(interaction: Interaction): Promise<void> {
    if (interaction.isChatInputCommand()) {
      await this.handleCommand(interaction);
    } else if (interaction.isAutocomplete()) {
      await this.handleAutocomplete(interaction);
    } else if (interaction.isButton()) {
      await this.guard(interaction, () => this.handleButton(interaction));
    } else if (interaction.isStringSelectMenu()) {
      if (interaction.customId !== INTERACTION_IDS.APPLY_SELECT) return;
      await this.guard(interaction, () =>
        this.applyFlow.handleEventSelect(interaction),
      );
    } else if (interaction.isModalSubmit()) {
      await this.guard(interaction, () => this.handleModal(interaction));
    }
  }

  private async handleButton(interaction: ButtonInteraction): Promise<void> {
    const { customId } = interaction;

    const adminAction = parseAdminActionId(customId);
    if (adminAction) {
      await this.applicationActions.handleAdminAction(
        interaction,
        adminAction.action,
        adminAction.applicationId,
      );
      return;
    }

    const selfCancelId = parseSelfCancelId(customId);
    if (selfCancelId !== null) {
      await this.markReachable(interaction.user.id);
      await this.applicationActions.handleSelfCancel(interaction, selfCancelId);
      return;
    }

    const applyEventId = parseApplyButtonId(customId);
    if (applyEventId !== null) {
      await this.markReachable(interaction.user.id);
      await this.applyFlow.handleApplyButton(interaction, applyEventId);
      return;
    }

    this.logger.debug(`Ignoring unknown button: ${customId}`);
  }

  private async handleModal(
    interaction: ModalSubmitInteraction,
  ): Promise<void> {
    const eventIds = parseApplyFormId(interaction.customId);
    if (!eventIds) {
      this.logger.debug(`Ignoring unknown modal: ${interaction.customId}`);
      return;
    }
    await this.applyFlow.handleFormSubmit(interaction, eventIds);
  }

  /**
   * A user who interacts with the bot can be messaged again.
   */
  private async markReachable(discordId: string): Promise<void> {
    const user = await this.usersService.findByDiscordId(discordId);
    if (user?.botBlockedAt) {
      await this.usersService.clearBotBlocked(user.id);
    }
  }

  private async guard(
    interaction:
      | ButtonInteraction
      | StringSelectMenuInteraction
      | ModalSubmitInteraction,
    work: () => Promise<void>,
  ): Promise<void> {
    try {
      await work();
    } catch (error) {
      this.logger.error(
        `Error handling interaction ${interaction.customId}:`,
        error,
      );
      await this.replyWithError(interaction);
    }
  }

  private async replyWithError(
    interaction: RepliableInteraction,
  ): Promise<void> {
    const content = GENERIC_ERROR_MESSAGE;
    if (interaction.replied || interaction.deferred) {
      await interaction.followUp({ content, ephemeral: true }).catch(() => {});
    } else {
      await interaction.reply({ content, ephemeral: true }).catch(() => {});
    }
  }

  private async handleCommand(
    interaction: ChatInputCommandInteraction,
  ): Promise<void> {
    const handler = this.getHandlers().find(
      (h) => h.commandName === interaction.commandName,
    );

    if (!handler) {
      this.logger.warn(`No handler for command: ${interaction.commandName}`);
      return;
    }

    try {
      await handler.handleInteraction(interaction);
    } catch (error) {
      this.logger.error(`Error handling /${interaction.commandName}:`, error);
      await this.replyWithError(interaction);
    }
  }

  private async handleAutocomplete(
    interaction: AutocompleteInteraction,
  ): Promise<void> {
    const handler = this.getHandlers().find(
      (h) => h.commandName === interaction.commandName,
    );

    if (!handler?.handleAutocomplete) return;

    try {
      await handler.handleAutocomplete(interaction);
    } catch (error) {
      this.logger.error(
        `Error handling autocomplete for /${interaction.commandName}:`,
        error,
      );
      await interaction.respond([]).catch(() => {});
    }
  }
}
