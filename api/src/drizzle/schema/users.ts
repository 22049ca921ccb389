import {
  pgTable,
  serial,
  text,
  timestamp,
  boolean,
  varchar,
} from 'drizzle-orm/pg-core';

export const users = pgTable('users', {
  id: serial('id').primaryKey(),
  discordId: text('discord_id').unique().notNull(),
  /** Last contact details the candidate submitted, offered for reuse */
  fullName: text('full_name'),
  phone: varchar('phone', { length: 32 }),
  /** Admin ban: blocked users cannot apply */
  isBlocked: boolean('is_blocked').default(false).notNull(),
  /**
   * Set when a direct message fails because the user closed DMs or
   * blocked the bot. Outbound DMs are skipped while set; cleared on the
   * user's next submission.
   */
  botBlockedAt: timestamp('bot_blocked_at'),
  createdAt: timestamp('created_at').defaultNow().notNull(),
});
