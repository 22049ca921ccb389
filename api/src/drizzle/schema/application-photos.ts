import { pgTable, serial, integer, text, timestamp, index } from 'drizzle-orm/pg-core';
import { applications } from './applications';

export const applicationPhotos = pgTable(
  'application_photos',
  {
    id: serial('id').primaryKey(),
    applicationId: integer('application_id')
      .references(() => applications.id, { onDelete: 'cascade' })
      .notNull(),
    /** Opaque media reference (attachment URL) */
    fileRef: text('file_ref').notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
  },
  (table) => [index('idx_application_photos_application_id').on(table.applicationId)],
);
