import {
  ConflictException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
  OnModuleInit,
} from '@nestjs/common';
import { asc, desc, eq } from 'drizzle-orm';
import { ProcedureTypeNameSchema } from '@procedure-desk/contract';
import { DrizzleAsyncProvider } from '../drizzle/drizzle.module';
import * as schema from '../drizzle/schema';
import type { Database, ProcedureTypeRow } from '../drizzle/types';
import defaultProcedureTypes from './default-procedure-types.json';

@Injectable()
export class ProcedureTypesService implements OnModuleInit {
  private readonly logger = new Logger(ProcedureTypesService.name);

  constructor(
    @Inject(DrizzleAsyncProvider)
    private db: Database,
  ) {}

  async onModuleInit(): Promise<void> {
    try {
      await this.seedDefaults();
    } catch (error) {
      this.logger.error('Failed to seed procedure types:', error);
    }
  }

  /**
   * Insert the default catalogue when the table is empty.
   * @returns number of rows inserted
   */
  async seedDefaults(): Promise<number> {
    const [existing] = await this.db
      .select({ id: schema.procedureTypes.id })
      .from(schema.procedureTypes)
      .limit(1);
    if (existing) return 0;

    const inserted = await this.db
      .insert(schema.procedureTypes)
      .values(defaultProcedureTypes.map((name) => ({ name })))
      .onConflictDoNothing()
      .returning({ id: schema.procedureTypes.id });

    this.logger.log(`Seeded ${inserted.length} default procedure types`);
    return inserted.length;
  }

  listActive(): Promise<ProcedureTypeRow[]> {
    return this.db
      .select()
      .from(schema.procedureTypes)
      .where(eq(schema.procedureTypes.isActive, true))
      .orderBy(asc(schema.procedureTypes.name));
  }

  /** Active types first, then by name */
  listAll(): Promise<ProcedureTypeRow[]> {
    return this.db
      .select()
      .from(schema.procedureTypes)
      .orderBy(
        desc(schema.procedureTypes.isActive),
        asc(schema.procedureTypes.name),
      );
  }

  /**
   * @throws NotFoundException
   */
  async findById(id: number): Promise<ProcedureTypeRow> {
    const [type] = await this.db
      .select()
      .from(schema.procedureTypes)
      .where(eq(schema.procedureTypes.id, id))
      .limit(1);
    if (!type) {
      throw new NotFoundException(`Procedure type ${id} not found`);
    }
    return type;
  }

  /**
   * @throws ConflictException if the name is taken
   */
  async create(rawName: string): Promise<ProcedureTypeRow> {
    const name = ProcedureTypeNameSchema.parse(rawName);
    const [created] = await this.db
      .insert(schema.procedureTypes)
      .values({ name })
      .onConflictDoNothing({ target: schema.procedureTypes.name })
      .returning();
    if (!created) {
      throw new ConflictException(`Procedure type "${name}" already exists`);
    }
    this.logger.log(`Procedure type "${name}" created`);
    return created;
  }

  /**
   * Rename a type. Existing events keep the name they were created with.
   *
   * @throws NotFoundException
   * @throws ConflictException if the name is taken
   */
  async rename(id: number, rawName: string): Promise<ProcedureTypeRow> {
    const name = ProcedureTypeNameSchema.parse(rawName);
    await this.findById(id);

    const [clash] = await this.db
      .select({ id: schema.procedureTypes.id })
      .from(schema.procedureTypes)
      .where(eq(schema.procedureTypes.name, name))
      .limit(1);
    if (clash && clash.id !== id) {
      throw new ConflictException(`Procedure type "${name}" already exists`);
    }

    const [updated] = await this.db
      .update(schema.procedureTypes)
      .set({ name })
      .where(eq(schema.procedureTypes.id, id))
      .returning();
    return updated;
  }

  /**
   * Flip the active flag. Inactive types cannot be used for new events.
   */
  async toggle(id: number): Promise<ProcedureTypeRow> {
    const type = await this.findById(id);
    const [updated] = await this.db
      .update(schema.procedureTypes)
      .set({ isActive: !type.isActive })
      .where(eq(schema.procedureTypes.id, id))
      .returning();
    this.logger.log(
      `Procedure type "${type.name}" ${updated.isActive ? 'activated' : 'deactivated'}`,
    );
    return updated;
  }

  /**
   * Delete a type that no event references. Referenced types can only be
   * deactivated.
   *
   * @throws NotFoundException
   * @throws ConflictException if any event uses the type
   */
  async delete(id: number): Promise<void> {
    const type = await this.findById(id);

    const [inUse] = await this.db
      .select({ id: schema.events.id })
      .from(schema.events)
      .where(eq(schema.events.procedureTypeId, id))
      .limit(1);
    if (inUse) {
      throw new ConflictException(
        `Procedure type "${type.name}" is used by existing events; deactivate it instead`,
      );
    }

    await this.db
      .delete(schema.procedureTypes)
      .where(eq(schema.procedureTypes.id, id));
    this.logger.log(`Procedure type "${type.name}" deleted`);
  }
}
