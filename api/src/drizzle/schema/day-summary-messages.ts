import { pgTable, varchar, timestamp } from 'drizzle-orm/pg-core';

/**
 * One aggregated admin message per calendar date.
 * The row is replaced when the message has to be re-posted.
 */
export const daySummaryMessages = pgTable('day_summary_messages', {
  date: varchar('date', { length: 10 }).primaryKey(),
  channelId: varchar('channel_id', { length: 64 }).notNull(),
  messageId: varchar('message_id', { length: 64 }).notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
});
