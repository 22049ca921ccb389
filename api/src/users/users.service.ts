import { Inject, Injectable, Logger } from '@nestjs/common';
import { eq } from 'drizzle-orm';
import { DrizzleAsyncProvider } from '../drizzle/drizzle.module';
import * as schema from '../drizzle/schema';
import type { Database, UserRow } from '../drizzle/types';

/**
 * Candidates are identified by their Discord account. A user row is created
 * the first time someone interacts with the bot.
 */
@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    @Inject(DrizzleAsyncProvider)
    private db: Database,
  ) {}

  async findByDiscordId(discordId: string): Promise<UserRow | undefined> {
    const [user] = await this.db
      .select()
      .from(schema.users)
      .where(eq(schema.users.discordId, discordId))
      .limit(1);
    return user;
  }

  async findById(id: number): Promise<UserRow | undefined> {
    const [user] = await this.db
      .select()
      .from(schema.users)
      .where(eq(schema.users.id, id))
      .limit(1);
    return user;
  }

  /**
   * Return the user for a Discord id, creating it on first contact.
   */
  async ensureUser(discordId: string): Promise<UserRow> {
    const [created] = await this.db
      .insert(schema.users)
      .values({ discordId })
      .onConflictDoNothing({ target: schema.users.discordId })
      .returning();
    if (created) return created;

    const existing = await this.findByDiscordId(discordId);
    if (!existing) {
      throw new Error(`User ${discordId} vanished after insert conflict`);
    }
    return existing;
  }

  /**
   * Remember the contact details from the latest submission so the next
   * application form can be pre-filled. Also clears the unreachable flag:
   * a user who just submitted can receive messages again.
   */
  async saveContact(
    userId: number,
    fullName: string,
    phone: string,
  ): Promise<void> {
    await this.db
      .update(schema.users)
      .set({ fullName, phone, botBlockedAt: null })
      .where(eq(schema.users.id, userId));
  }

  async block(discordId: string): Promise<UserRow> {
    const user = await this.ensureUser(discordId);
    await this.db
      .update(schema.users)
      .set({ isBlocked: true })
      .where(eq(schema.users.id, user.id));
    this.logger.log(`User ${discordId} blocked`);
    return { ...user, isBlocked: true };
  }

  async unblock(discordId: string): Promise<UserRow | undefined> {
    const user = await this.findByDiscordId(discordId);
    if (!user) return undefined;
    await this.db
      .update(schema.users)
      .set({ isBlocked: false })
      .where(eq(schema.users.id, user.id));
    this.logger.log(`User ${discordId} unblocked`);
    return { ...user, isBlocked: false };
  }

  async isBlocked(discordId: string): Promise<boolean> {
    const user = await this.findByDiscordId(discordId);
    return user?.isBlocked ?? false;
  }

  /**
   * Mark the user as unreachable after a DM was refused.
   */
  async markBotBlocked(userId: number): Promise<void> {
    await this.db
      .update(schema.users)
      .set({ botBlockedAt: new Date() })
      .where(eq(schema.users.id, userId));
    this.logger.warn(`User ${userId} is unreachable, direct messages paused`);
  }

  /** The user interacted with the bot again: resume direct messages */
  async clearBotBlocked(userId: number): Promise<void> {
    await this.db
      .update(schema.users)
      .set({ botBlockedAt: null })
      .where(eq(schema.users.id, userId));
  }
}
