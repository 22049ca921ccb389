import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import type * as schema from './schema';

export type Database = PostgresJsDatabase<typeof schema>;

/** Transaction handle passed to `db.transaction()` callbacks */
export type Transaction = Parameters<Parameters<Database['transaction']>[0]>[0];

export type UserRow = typeof schema.users.$inferSelect;
export type ProcedureTypeRow = typeof schema.procedureTypes.$inferSelect;
export type EventRow = typeof schema.events.$inferSelect;
export type ApplicationRow = typeof schema.applications.$inferSelect;
export type ApplicationPhotoRow = typeof schema.applicationPhotos.$inferSelect;
export type DaySummaryMessageRow = typeof schema.daySummaryMessages.$inferSelect;
