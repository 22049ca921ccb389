import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { asc, eq, inArray } from 'drizzle-orm';
import type { QueueViewDto } from '@procedure-desk/contract';
import { DrizzleAsyncProvider } from '../drizzle/drizzle.module';
import * as schema from '../drizzle/schema';
import type { Database, EventRow, Transaction } from '../drizzle/types';
import { QueueContentionException } from './application.exceptions';
import {
  compareForDisplay,
  diffQueue,
  parseApplicationStatus,
  planQueue,
  type QueueSlot,
} from './queue-planner';
import { toEventDto } from '../events/event.mapper';

/**
 * PostgreSQL error codes that mean "another transaction got there first":
 * serialization failure, deadlock, lock not available.
 */
const LOCK_CONFLICT_CODES = new Set(['40001', '40P01', '55P03']);

export function isLockConflict(error: unknown): boolean {
  let current: unknown = error;
  // drizzle may wrap the driver error in `cause`
  for (let depth = 0; depth < 3 && current instanceof Error; depth++) {
    const code = 'code' in current ? current.code : undefined;
    if (typeof code === 'string' && LOCK_CONFLICT_CODES.has(code)) return true;
    current = current.cause;
  }
  return false;
}

export type LockedWork<T> = (tx: Transaction, event: EventRow) => Promise<T>;

/**
 * Queue engine: keeps each event's application positions consistent.
 *
 * Every mutation of an event's applications runs inside `withEventLock`,
 * which holds a row lock on the event for the length of one transaction.
 * Work on different events proceeds in parallel.
 */
@Injectable()
export class QueueService {
  private readonly logger = new Logger(QueueService.name);
  private readonly maxAttempts: number;

  constructor(
    @Inject(DrizzleAsyncProvider)
    private db: Database,
    configService: ConfigService,
  ) {
    this.maxAttempts = Math.max(
      1,
      Number(configService.get<string>('QUEUE_LOCK_RETRIES', '3')) || 3,
    );
  }

  /**
   * Run `work` in a transaction holding the event's row lock.
   * The whole transaction is retried on lock conflicts.
   *
   * @throws NotFoundException if the event does not exist
   * @throws QueueContentionException when retries are exhausted
   */
  withEventLock<T>(eventId: number, work: LockedWork<T>): Promise<T> {
    return this.withEventsLock([eventId], (tx, [event]) => {
      if (!event) {
        throw new NotFoundException(`Event ${eventId} not found`);
      }
      return work(tx, event);
    });
  }

  /**
   * Lock several events in one transaction, in id order so that two
   * submissions over overlapping events cannot deadlock. `work` receives the
   * events that exist; checking for missing ones is up to the caller.
   *
   * @throws QueueContentionException when retries are exhausted
   */
  async withEventsLock<T>(
    eventIds: readonly number[],
    work: (tx: Transaction, events: EventRow[]) => Promise<T>,
  ): Promise<T> {
    const ids = [...new Set(eventIds)].sort((a, b) => a - b);
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.db.transaction(async (tx) => {
          const events = await tx
            .select()
            .from(schema.events)
            .where(inArray(schema.events.id, ids))
            .orderBy(asc(schema.events.id))
            .for('update');
          return work(tx, events);
        });
      } catch (error) {
        if (!isLockConflict(error)) throw error;
        const label = ids.join(', ');
        if (attempt >= this.maxAttempts) {
          this.logger.error(
            `Giving up on event ${label} after ${attempt} lock conflicts`,
          );
          throw new QueueContentionException(ids[0], attempt);
        }
        this.logger.warn(
          `Lock conflict on event ${label} (attempt ${attempt}/${this.maxAttempts}), retrying`,
        );
      }
    }
  }

  /**
   * Recompute positions and the primary designation for one event.
   * A missing event is a no-op.
   */
  async recalculatePositions(eventId: number): Promise<void> {
    try {
      await this.withEventLock(eventId, (tx) =>
        this.recalculateInTransaction(tx, eventId),
      );
    } catch (error) {
      if (error instanceof NotFoundException) {
        this.logger.debug(`Event ${eventId} not found, nothing to recalculate`);
        return;
      }
      throw error;
    }
  }

  /**
   * Recompute inside a transaction that already holds the event lock.
   * Only rows whose status or position change are written.
   *
   * @returns the resulting queue, one slot per application in creation order
   */
  async recalculateInTransaction(
    tx: Transaction,
    eventId: number,
  ): Promise<QueueSlot[]> {
    const rows = await tx
      .select({
        id: schema.applications.id,
        status: schema.applications.status,
        position: schema.applications.position,
        createdAt: schema.applications.createdAt,
      })
      .from(schema.applications)
      .where(eq(schema.applications.eventId, eventId))
      .orderBy(asc(schema.applications.createdAt), asc(schema.applications.id));

    const plan = planQueue(rows);
    const changes = diffQueue(rows, plan);

    for (const change of changes) {
      await tx
        .update(schema.applications)
        .set({ status: change.status, position: change.position })
        .where(eq(schema.applications.id, change.id));
    }

    if (changes.length > 0) {
      this.logger.debug(
        `Event ${eventId}: ${changes.length} queue position(s) updated`,
      );
    }
    return plan;
  }

  /**
   * Admin queue view: primary, approved by position, then pending,
   * cancelled and rejected.
   *
   * @throws NotFoundException
   */
  async getQueue(eventId: number): Promise<QueueViewDto> {
    const [event] = await this.db
      .select()
      .from(schema.events)
      .where(eq(schema.events.id, eventId))
      .limit(1);
    if (!event) {
      throw new NotFoundException(`Event ${eventId} not found`);
    }

    const rows = await this.db
      .select()
      .from(schema.applications)
      .where(eq(schema.applications.eventId, eventId));

    const entries = [...rows].sort(compareForDisplay).map((row) => ({
      applicationId: row.id,
      fullName: row.fullName,
      phone: row.phone,
      status: parseApplicationStatus(row.status),
      position: row.position,
      createdAt: row.createdAt.toISOString(),
    }));

    return { event: toEventDto(event), entries };
  }
}
