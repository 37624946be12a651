import { and, asc, eq, inArray, isNull, sql } from 'drizzle-orm';
import type { NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import { z } from 'zod';
import type { DepartmentCode } from '@shared/types';
import type { ProcessStore } from '@core/store';
import type {
  FieldDefinition,
  InstancePatch,
  MovementEvent,
  NewFieldDefinition,
  NewMovementEvent,
  NewProcessInstance,
  ProcessInstance,
} from '@core/types';
import * as schema from './schema/index';
import { departmentFieldDefinitions, movementEvents, processInstances } from './schema/index';

/** Either the pool-backed database or an open transaction on it. */
export type TrackerDatabase = PgDatabase<NodePgQueryResultHKT, typeof schema>;

const uuidSchema = z.string().uuid();

/**
 * ProcessStore over PostgreSQL. Writers serialize on the per-case-number
 * advisory lock; reads take no row locks, so no transaction ever waits on a
 * row while holding another one.
 */
export class DrizzleProcessStore implements ProcessStore {
  constructor(private readonly db: TrackerDatabase) {}

  transaction<T>(fn: (tx: ProcessStore) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => fn(new DrizzleProcessStore(tx)));
  }

  async lockCaseNumber(baseNumber: string): Promise<void> {
    await this.db.execute(sql`select pg_advisory_xact_lock(hashtext(${baseNumber}))`);
  }

  // --- Instances ---

  async findInstance(id: string): Promise<ProcessInstance | null> {
    if (!uuidSchema.safeParse(id).success) return null;
    const [row] = await this.db
      .select()
      .from(processInstances)
      .where(eq(processInstances.id, id));
    return row ?? null;
  }

  listByBase(baseNumber: string): Promise<ProcessInstance[]> {
    return this.db
      .select()
      .from(processInstances)
      .where(eq(processInstances.caseNumberBase, baseNumber))
      .orderBy(asc(processInstances.createdAt), asc(processInstances.id));
  }

  listActive(): Promise<ProcessInstance[]> {
    return this.db
      .select()
      .from(processInstances)
      .where(isNull(processInstances.closedAt))
      .orderBy(asc(processInstances.createdAt));
  }

  listUnkeyed(limit: number): Promise<ProcessInstance[]> {
    return this.db
      .select()
      .from(processInstances)
      .where(isNull(processInstances.relationalKey))
      .orderBy(asc(processInstances.caseNumberBase), asc(processInstances.createdAt))
      .limit(limit);
  }

  async insertInstance(values: NewProcessInstance): Promise<ProcessInstance> {
    const [row] = await this.db.insert(processInstances).values(values).returning();
    return row;
  }

  async updateInstance(id: string, patch: InstancePatch): Promise<ProcessInstance> {
    const [row] = await this.db
      .update(processInstances)
      .set(patch)
      .where(eq(processInstances.id, id))
      .returning();
    if (!row) {
      throw new Error(`Process ${id} vanished during update`);
    }
    return row;
  }

  // --- Ledger ---

  async appendEvent(event: NewMovementEvent): Promise<MovementEvent> {
    const [row] = await this.db.insert(movementEvents).values(event).returning();
    return row;
  }

  async listEvents(instanceIds: string[]): Promise<MovementEvent[]> {
    if (instanceIds.length === 0) return [];
    return this.db
      .select()
      .from(movementEvents)
      .where(inArray(movementEvents.instanceId, instanceIds))
      .orderBy(asc(movementEvents.occurredAt), asc(movementEvents.seq));
  }

  // --- Field definitions ---

  listFieldDefinitions(department?: DepartmentCode): Promise<FieldDefinition[]> {
    return this.db
      .select()
      .from(departmentFieldDefinitions)
      .where(department ? eq(departmentFieldDefinitions.department, department) : undefined)
      .orderBy(asc(departmentFieldDefinitions.department), asc(departmentFieldDefinitions.key));
  }

  async insertFieldDefinition(values: NewFieldDefinition): Promise<FieldDefinition> {
    const [row] = await this.db.insert(departmentFieldDefinitions).values(values).returning();
    return row;
  }

  async deleteFieldDefinition(department: DepartmentCode, key: string): Promise<boolean> {
    const deleted = await this.db
      .delete(departmentFieldDefinitions)
      .where(
        and(
          eq(departmentFieldDefinitions.department, department),
          eq(departmentFieldDefinitions.key, key),
        ),
      )
      .returning({ id: departmentFieldDefinitions.id });
    return deleted.length > 0;
  }

  async purgeAttribute(department: DepartmentCode, key: string): Promise<number> {
    const touched = await this.db
      .update(processInstances)
      .set({ attributes: sql`${processInstances.attributes} - ${key}::text` })
      .where(
        and(
          eq(processInstances.currentDepartment, department),
          sql`jsonb_exists(${processInstances.attributes}, ${key}::text)`,
        ),
      )
      .returning({ id: processInstances.id });
    return touched.length;
  }
}
