import {
  pgTable,
  serial,
  integer,
  text,
  timestamp,
  boolean,
  varchar,
  index,
  uniqueIndex,
  check,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { users } from './users';
import { events } from './events';

/**
 * Candidate applications for an event.
 *
 * Queue position is derived from status and creation order:
 * - primary: 1
 * - approved: next positions in created_at order
 * - pending / rejected / cancelled: 0
 * Positions are rewritten by the queue engine after every transition.
 */
export const applications = pgTable(
  'applications',
  {
    id: serial('id').primaryKey(),
    eventId: integer('event_id')
      .references(() => events.id, { onDelete: 'cascade' })
      .notNull(),
    userId: integer('user_id')
      .references(() => users.id, { onDelete: 'cascade' })
      .notNull(),
    fullName: text('full_name').notNull(),
    phone: varchar('phone', { length: 32 }).notNull(),
    consent: boolean('consent').default(false).notNull(),
    /** pending | approved | primary | rejected | cancelled */
    status: varchar('status', { length: 20 }).default('pending').notNull(),
    position: integer('position').default(0).notNull(),
    /**
     * Combined admin message shared by every application of one
     * submission. Null until the message has been posted.
     */
    groupChannelId: varchar('group_channel_id', { length: 64 }),
    groupMessageId: varchar('group_message_id', { length: 64 }),
    createdAt: timestamp('created_at').defaultNow().notNull(),
  },
  (table) => [
    // At most one primary candidate per event
    uniqueIndex('uq_applications_event_primary')
      .on(table.eventId)
      .where(sql`${table.status} = 'primary'`),
    check('position_non_negative', sql`${table.position} >= 0`),
    index('idx_applications_event_id').on(table.eventId),
    index('idx_applications_user_id').on(table.userId),
    index('idx_applications_group_message').on(table.groupMessageId),
  ],
);
