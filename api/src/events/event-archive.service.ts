import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron } from '@nestjs/schedule';
import { and, eq, lt } from 'drizzle-orm';
import { DrizzleAsyncProvider } from '../drizzle/drizzle.module';
import * as schema from '../drizzle/schema';
import type { Database } from '../drizzle/types';
import { toIsoDate } from './event.mapper';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Events dated strictly before this day are past the retention window */
export function archiveCutoff(now: Date, retentionDays: number): string {
  return toIsoDate(new Date(now.getTime() - retentionDays * DAY_MS));
}

@Injectable()
export class EventArchiveService {
  private readonly logger = new Logger(EventArchiveService.name);
  private readonly retentionDays: number;

  constructor(
    @Inject(DrizzleAsyncProvider)
    private db: Database,
    configService: ConfigService,
  ) {
    this.retentionDays =
      Number(configService.get<string>('ARCHIVE_RETENTION_DAYS', '180')) || 180;
  }

  @Cron('0 3 * * *', { name: 'EventArchiveService_archiveExpired' })
  async handleArchiveSweep(): Promise<void> {
    try {
      await this.archiveExpired();
    } catch (error) {
      this.logger.error('Archive sweep failed:', error);
    }
  }

  /**
   * Archive published events dated before the retention window.
   * @returns number of events archived
   */
  async archiveExpired(now: Date = new Date()): Promise<number> {
    const cutoff = archiveCutoff(now, this.retentionDays);
    const archived = await this.db
      .update(schema.events)
      .set({ status: 'archived', archivedAt: now, updatedAt: now })
      .where(and(eq(schema.events.status, 'published'), lt(schema.events.date, cutoff)))
      .returning({ id: schema.events.id });

    if (archived.length > 0) {
      this.logger.log(
        `Archived ${archived.length} event(s) dated before ${cutoff}`,
      );
    }
    return archived.length;
  }
}
