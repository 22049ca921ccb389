import { pgTable, serial, text, timestamp } from 'drizzle-orm/pg-core';

/**
 * Runtime settings that can change without a restart,
 * such as channel identities after a channel migration.
 */
export const appSettings = pgTable('app_settings', {
  id: serial('id').primaryKey(),
  key: text('key').unique().notNull(),
  value: text('value').notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
  createdAt: timestamp('created_at').defaultNow().notNull(),
});

/**
 * Known setting keys for type safety
 */
export const SETTING_KEYS = {
  PUBLISH_CHANNEL_ID: 'publish_channel_id',
  ADMIN_CHANNEL_ID: 'admin_channel_id',
} as const;

export type SettingKey = (typeof SETTING_KEYS)[keyof typeof SETTING_KEYS];
