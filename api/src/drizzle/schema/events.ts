import {
  pgTable,
  serial,
  integer,
  text,
  timestamp,
  boolean,
  varchar,
  index,
} from 'drizzle-orm/pg-core';
import { procedureTypes } from './procedure-types';

/**
 * A bookable procedure slot on a given date and time.
 * Status moves forward only: draft -> published -> cancelled | archived.
 */
export const events = pgTable(
  'events',
  {
    id: serial('id').primaryKey(),
    /** Calendar date, YYYY-MM-DD */
    date: varchar('date', { length: 10 }).notNull(),
    /** Slot start, HH:MM */
    time: varchar('time', { length: 5 }).notNull(),
    procedureTypeId: integer('procedure_type_id')
      .references(() => procedureTypes.id, { onDelete: 'restrict' })
      .notNull(),
    /** Procedure name at creation time; survives later renames */
    procedureName: text('procedure_name').notNull(),
    needsPhoto: boolean('needs_photo').default(false).notNull(),
    comment: text('comment'),
    status: varchar('status', { length: 20 }).default('draft').notNull(),
    /** Handle of the announcement in the publish channel */
    channelId: varchar('channel_id', { length: 64 }),
    messageId: varchar('message_id', { length: 64 }),
    publishedAt: timestamp('published_at'),
    cancelledAt: timestamp('cancelled_at'),
    archivedAt: timestamp('archived_at'),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (table) => [
    index('idx_events_date').on(table.date),
    index('idx_events_status').on(table.status),
  ],
);
