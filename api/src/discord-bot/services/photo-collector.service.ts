import { Injectable, Logger } from '@nestjs/common';
import type { Message } from 'discord.js';
import { MAX_APPLICATION_PHOTOS } from '@procedure-desk/contract';
import { DiscordBotClientService } from '../discord-bot-client.service';

/** How long a candidate has to send photos after submitting the form */
export const PHOTO_WINDOW_MS = 10 * 60 * 1000;

/** Image attachment urls of a DM, in the order they were sent */
export function imageAttachmentUrls(message: Message): string[] {
  return [...message.attachments.values()]
    .filter((attachment) => attachment.contentType?.startsWith('image/'))
    .map((attachment) => attachment.url);
}

/**
 * Collects application photos from the candidate's DMs.
 *
 * Collection ends once the limit is reached or the window closes. A single
 * message carrying more images than the limit is returned whole so the
 * submission can report the truncation.
 */
@Injectable()
export class PhotoCollectorService {
  private readonly logger = new Logger(PhotoCollectorService.name);

  constructor(private readonly clientService: DiscordBotClientService) {}

  async collect(discordId: string, prompt: string): Promise<string[]> {
    const user = await this.clientService.fetchUser(discordId);
    const dm = await user.createDM();
    await dm.send(prompt);

    return new Promise<string[]>((resolve) => {
      const photos: string[] = [];
      const collector = dm.createMessageCollector({
        filter: (message: Message) =>
          message.author.id === discordId && message.attachments.size > 0,
        time: PHOTO_WINDOW_MS,
      });

      collector.on('collect', (message: Message) => {
        photos.push(...imageAttachmentUrls(message));
        if (photos.length >= MAX_APPLICATION_PHOTOS) {
          collector.stop('limit');
        }
      });

      collector.on('end', (_collected, reason) => {
        this.logger.debug(
          `Photo collection for ${discordId} ended (${reason}) with ${photos.length} photo(s)`,
        );
        resolve(photos);
      });
    });
  }
}
