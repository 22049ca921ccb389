import { Injectable, Inject, Logger } from '@nestjs/common';
import { eq } from 'drizzle-orm';
import { appSettings, type SettingKey } from '../drizzle/schema';
import { DrizzleAsyncProvider } from '../drizzle/drizzle.module';
import type { Database } from '../drizzle/types';

/** How long the in-memory cache is considered fresh (ms). */
const CACHE_TTL_MS = 60_000;

@Injectable()
export class SettingsService {
  private readonly logger = new Logger(SettingsService.name);

  /** In-memory cache: setting key -> value. */
  private cache = new Map<string, string>();

  /** Timestamp (epoch ms) when the cache was last loaded from DB. */
  private cacheLoadedAt = 0;

  /** Prevents concurrent cache loads from racing. */
  private cacheLoadPromise: Promise<void> | null = null;

  constructor(
    @Inject(DrizzleAsyncProvider)
    private db: Database,
  ) {}

  /**
   * Load all settings into the in-memory cache if stale or empty.
   * Coalesces concurrent callers so only one DB round-trip occurs.
   */
  private async ensureCache(): Promise<void> {
    if (Date.now() - this.cacheLoadedAt < CACHE_TTL_MS) return;

    if (!this.cacheLoadPromise) {
      this.cacheLoadPromise = this.loadCache();
    }
    await this.cacheLoadPromise;
  }

  private async loadCache(): Promise<void> {
    try {
      const rows = await this.db.select().from(appSettings);
      this.cache = new Map(rows.map((row) => [row.key, row.value]));
      this.cacheLoadedAt = Date.now();
      this.logger.debug(`Settings cache loaded (${this.cache.size} entries)`);
    } finally {
      this.cacheLoadPromise = null;
    }
  }

  /**
   * Get a setting value by key.
   * Served from the in-memory cache, reloaded from DB when stale.
   */
  async get(key: SettingKey): Promise<string | null> {
    await this.ensureCache();
    return this.cache.get(key) ?? null;
  }

  /**
   * Set a setting value.
   * Writes through to DB and updates the in-memory cache immediately.
   */
  async set(key: SettingKey, value: string): Promise<void> {
    await this.db
      .insert(appSettings)
      .values({ key, value, updatedAt: new Date() })
      .onConflictDoUpdate({
        target: appSettings.key,
        set: { value, updatedAt: new Date() },
      });

    this.cache.set(key, value);
    this.logger.debug(`Setting ${key} updated`);
  }

  /**
   * Delete a setting.
   * Removes from both DB and the in-memory cache.
   */
  async delete(key: SettingKey): Promise<void> {
    await this.db.delete(appSettings).where(eq(appSettings.key, key));
    this.cache.delete(key);
    this.logger.debug(`Setting ${key} deleted`);
  }
}
