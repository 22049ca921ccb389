import { pgTable, serial, text, timestamp, boolean } from 'drizzle-orm/pg-core';

/**
 * Catalogue of procedures an event can offer.
 * Deactivated types stay referenced by historical events.
 */
export const procedureTypes = pgTable('procedure_types', {
  id: serial('id').primaryKey(),
  name: text('name').unique().notNull(),
  isActive: boolean('is_active').default(true).notNull(),
  createdAt: timestamp('created_at').defaultNow().notNull(),
});
