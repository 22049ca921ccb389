import { Injectable, Logger } from '@nestjs/common';
import type { ButtonInteraction } from 'discord.js';
import { ApplicationLifecycleService } from '../../applications/application-lifecycle.service';
import type { AdminButtonAction } from '../../applications/application-actions';
import { InvalidTransitionException } from '../../applications/application.exceptions';
import { AdminAccessService } from '../services/admin-access.service';
import {
  isDiscordInteractionError,
  userFacingMessage,
} from '../utils/interaction-replies';

/**
 * Handles the buttons on application messages: admin actions on the
 * combined message in the admin channel and the candidate's own
 * cancel button on the submission receipt.
 */
@Injectable()
export class ApplicationActionListener {
  private readonly logger = new Logger(ApplicationActionListener.name);

  constructor(
    private readonly lifecycle: ApplicationLifecycleService,
    private readonly adminAccess: AdminAccessService,
  ) {}

  async handleAdminAction(
    interaction: ButtonInteraction,
    action: AdminButtonAction,
    applicationId: number,
  ): Promise<void> {
    if (!(await this.adminAccess.ensureAdmin(interaction))) return;

    // The message itself is re-rendered by the lifecycle service
    await interaction.deferUpdate();

    try {
      await this.runAdminAction(action, applicationId);
    } catch (error) {
      if (error instanceof InvalidTransitionException) {
        this.logger.debug(error.message);
        await this.refreshQuietly(applicationId);
        await this.followUp(interaction, 'Action no longer valid, refreshed.');
        return;
      }
      this.logger.error(
        `Admin action ${action} on application ${applicationId} failed:`,
        error,
      );
      await this.followUp(interaction, userFacingMessage(error));
    }
  }

  async handleSelfCancel(
    interaction: ButtonInteraction,
    applicationId: number,
  ): Promise<void> {
    await interaction.deferReply({ ephemeral: true });

    try {
      await this.lifecycle.cancelByCandidate(applicationId, interaction.user.id);
      await interaction.editReply({
        content: `Application #${applicationId} has been withdrawn.`,
      });
    } catch (error) {
      if (error instanceof InvalidTransitionException) {
        await interaction.editReply({
          content: 'This application can no longer be withdrawn.',
        });
        return;
      }
      this.logger.error(
        `Self-cancel of application ${applicationId} failed:`,
        error,
      );
      await interaction.editReply({ content: userFacingMessage(error) });
    }
  }

  private runAdminAction(
    action: AdminButtonAction,
    applicationId: number,
  ): Promise<unknown> {
    switch (action) {
      case 'approve':
        return this.lifecycle.approve(applicationId);
      case 'reject':
        return this.lifecycle.reject(applicationId);
      case 'promote':
        return this.lifecycle.promote(applicationId);
      case 'cancel':
        return this.lifecycle.cancelByAdmin(applicationId);
      case 'confirm-reject':
        return this.lifecycle.reject(applicationId, { confirmed: true });
      case 'confirm-cancel':
        return this.lifecycle.cancelByAdmin(applicationId, { confirmed: true });
      case 'keep':
        return this.lifecycle.declineConfirmation(applicationId);
    }
  }

  /** Re-render the group so the admin sees the current state */
  private async refreshQuietly(applicationId: number): Promise<void> {
    try {
      await this.lifecycle.declineConfirmation(applicationId);
    } catch (error) {
      this.logger.warn(
        `Could not refresh application ${applicationId}: ${userFacingMessage(error)}`,
      );
    }
  }

  private async followUp(
    interaction: ButtonInteraction,
    content: string,
  ): Promise<void> {
    try {
      await interaction.followUp({ content, ephemeral: true });
    } catch (error) {
      if (isDiscordInteractionError(error)) return;
      throw error;
    }
  }
}
