import { Injectable, Logger } from '@nestjs/common';
import {
  ActionRowBuilder,
  ModalBuilder,
  StringSelectMenuBuilder,
  TextInputBuilder,
  TextInputStyle,
  type ButtonInteraction,
  type ModalSubmitInteraction,
  type StringSelectMenuInteraction,
} from 'discord.js';
import {
  MAX_APPLICATION_PHOTOS,
  MAX_EVENTS_PER_SUBMISSION,
} from '@procedure-desk/contract';
import { ApplicationsService } from '../../applications/applications.service';
import { EventsService } from '../../events/events.service';
import { describeEvent } from '../../events/event.mapper';
import { UsersService } from '../../users/users.service';
import type { EventRow, UserRow } from '../../drizzle/types';
import { APPLY_FORM_FIELDS, INTERACTION_IDS } from '../discord-bot.constants';
import { PhotoCollectorService } from '../services/photo-collector.service';
import { safeReply, userFacingMessage } from '../utils/interaction-replies';

/** Discord caps select menus at 25 options */
const MAX_SELECT_OPTIONS = 25;

export function applyFormId(eventIds: number[]): string {
  return `${INTERACTION_IDS.APPLY_MODAL}:${eventIds.join(',')}`;
}

export function parseApplyFormId(customId: string): number[] | null {
  const [prefix, rawIds] = customId.split(':');
  if (prefix !== INTERACTION_IDS.APPLY_MODAL || !rawIds) return null;
  const ids = rawIds.split(',');
  if (!ids.every((id) => /^\d+$/.test(id))) return null;
  return ids.map(Number);
}

/**
 * Candidate side of applying: the Apply button, the optional event picker,
 * the form modal and, for procedures that need one, photo collection in DM.
 */
@Injectable()
export class ApplyFlowListener {
  private readonly logger = new Logger(ApplyFlowListener.name);

  constructor(
    private readonly applicationsService: ApplicationsService,
    private readonly eventsService: EventsService,
    private readonly usersService: UsersService,
    private readonly photoCollector: PhotoCollectorService,
  ) {}

  /**
   * Apply button on an announcement. With several procedures open the
   * candidate first picks which ones to apply for, the clicked one
   * preselected.
   */
  async handleApplyButton(
    interaction: ButtonInteraction,
    eventId: number,
  ): Promise<void> {
    const discordId = interaction.user.id;
    if (await this.usersService.isBlocked(discordId)) {
      await interaction.reply({
        content: 'You are not allowed to apply.',
        ephemeral: true,
      });
      return;
    }

    const event = await this.eventsService.findById(eventId);
    if (event.status !== 'published') {
      await interaction.reply({
        content: 'This procedure is no longer accepting applications.',
        ephemeral: true,
      });
      return;
    }

    const open = (await this.eventsService.listActive()).slice(
      0,
      MAX_SELECT_OPTIONS,
    );
    if (open.length <= 1 || !open.some((e) => e.id === eventId)) {
      await interaction.showModal(
        await this.buildForm([eventId], discordId),
      );
      return;
    }

    await interaction.reply({
      content: `Choose the procedures you want to apply for (up to ${MAX_EVENTS_PER_SUBMISSION}).`,
      components: [this.buildEventPicker(open, eventId)],
      ephemeral: true,
    });
  }

  async handleEventSelect(
    interaction: StringSelectMenuInteraction,
  ): Promise<void> {
    const eventIds = interaction.values
      .filter((value) => /^\d+$/.test(value))
      .map(Number);
    await interaction.showModal(
      await this.buildForm(eventIds, interaction.user.id),
    );
  }

  /**
   * Form submitted. Submitting the form is the candidate's consent to the
   * processing of the contact details.
   */
  async handleFormSubmit(
    interaction: ModalSubmitInteraction,
    eventIds: number[],
  ): Promise<void> {
    await interaction.deferReply({ ephemeral: true });

    const discordId = interaction.user.id;
    const fullName = interaction.fields.getTextInputValue(
      APPLY_FORM_FIELDS.FULL_NAME,
    );
    const phone = interaction.fields.getTextInputValue(APPLY_FORM_FIELDS.PHONE);

    try {
      const events = await this.eventsService.findByIds(eventIds);
      let photos: string[] = [];
      if (events.some((event) => event.needsPhoto)) {
        await interaction.editReply({
          content:
            'A photo is required for this procedure. Please check your direct messages.',
        });
        photos = await this.photoCollector.collect(
          discordId,
          `Please send up to ${MAX_APPLICATION_PHOTOS} photos in this chat within 10 minutes.`,
        );
        if (photos.length === 0) {
          await interaction.editReply({
            content: 'No photos were received, so the application was not submitted.',
          });
          return;
        }
      }

      const result = await this.applicationsService.submit({
        candidateDiscordId: discordId,
        eventIds,
        fullName,
        phone,
        consent: true,
        photos,
      });
      this.logger.log(
        `User ${discordId} submitted application(s) ${result.applicationIds.join(', ')}`,
      );
      await safeReply(interaction, {
        content: `Application submitted (#${result.applicationIds.join(', #')}). We will contact you soon.`,
      });
    } catch (error) {
      this.logger.warn(
        `Submission by ${discordId} failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      await safeReply(interaction, { content: userFacingMessage(error) });
    }
  }

  private buildEventPicker(
    events: EventRow[],
    selectedId: number,
  ): ActionRowBuilder<StringSelectMenuBuilder> {
    const menu = new StringSelectMenuBuilder()
      .setCustomId(INTERACTION_IDS.APPLY_SELECT)
      .setPlaceholder('Procedures')
      .setMinValues(1)
      .setMaxValues(Math.min(MAX_EVENTS_PER_SUBMISSION, events.length))
      .addOptions(
        events.map((event) => ({
          label: describeEvent(event).slice(0, 100),
          value: String(event.id),
          default: event.id === selectedId,
        })),
      );
    return new ActionRowBuilder<StringSelectMenuBuilder>().addComponents(menu);
  }

  /** The form, pre-filled with contact details from an earlier application */
  private async buildForm(
    eventIds: number[],
    discordId: string,
  ): Promise<ModalBuilder> {
    const user = await this.usersService.findByDiscordId(discordId);

    const nameInput = new TextInputBuilder()
      .setCustomId(APPLY_FORM_FIELDS.FULL_NAME)
      .setLabel('Full name')
      .setStyle(TextInputStyle.Short)
      .setRequired(true)
      .setMaxLength(200);
    const phoneInput = new TextInputBuilder()
      .setCustomId(APPLY_FORM_FIELDS.PHONE)
      .setLabel('Phone number')
      .setStyle(TextInputStyle.Short)
      .setPlaceholder('+380 50 123 4567')
      .setRequired(true)
      .setMaxLength(32);
    prefill(nameInput, user, 'fullName');
    prefill(phoneInput, user, 'phone');

    return new ModalBuilder()
      .setCustomId(applyFormId(eventIds))
      .setTitle('Application: submitting gives consent')
      .addComponents(
        new ActionRowBuilder<TextInputBuilder>().addComponents(nameInput),
        new ActionRowBuilder<TextInputBuilder>().addComponents(phoneInput),
      );
  }
}

function prefill(
  input: TextInputBuilder,
  user: UserRow | undefined,
  field: 'fullName' | 'phone',
): void {
  const value = user?.[field];
  if (value) input.setValue(value);
}
