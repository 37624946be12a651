import { randomUUID } from 'crypto';
import type { DepartmentCode } from '@shared/types';
import type { ProcessStore } from '@core/store';
import { compareEvents } from '@core/snapshot';
import type {
  FieldDefinition,
  InstancePatch,
  MovementEvent,
  NewFieldDefinition,
  NewMovementEvent,
  NewProcessInstance,
  ProcessInstance,
} from '@core/types';

interface MemoryState {
  instances: Map<string, ProcessInstance>;
  events: MovementEvent[];
  fields: FieldDefinition[];
  seq: number;
}

function emptyState(): MemoryState {
  return { instances: new Map(), events: [], fields: [], seq: 0 };
}

/**
 * In-process ProcessStore. A transaction works on a deep copy of the state
 * and swaps it in only when the callback resolves.
 */
export class MemoryProcessStore implements ProcessStore {
  constructor(
    private state: MemoryState = emptyState(),
    readonly lockLog: string[] = [],
    /** Lock calls and group reads, in call order. */
    readonly journal: string[] = [],
    private readonly inTransaction = false,
  ) {}

  async transaction<T>(fn: (tx: ProcessStore) => Promise<T>): Promise<T> {
    if (this.inTransaction) return fn(this);
    const draft = new MemoryProcessStore(structuredClone(this.state), this.lockLog, this.journal, true);
    const result = await fn(draft);
    this.state = draft.state;
    return result;
  }

  async lockCaseNumber(baseNumber: string): Promise<void> {
    this.lockLog.push(baseNumber);
    this.journal.push(`lock:${baseNumber}`);
  }

  // --- Instances ---

  async findInstance(id: string): Promise<ProcessInstance | null> {
    this.journal.push('findInstance');
    const row = this.state.instances.get(id);
    return row ? structuredClone(row) : null;
  }

  async listByBase(baseNumber: string): Promise<ProcessInstance[]> {
    this.journal.push(`listByBase:${baseNumber}`);
    return this.rows()
      .filter((row) => row.caseNumberBase === baseNumber)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }

  async listActive(): Promise<ProcessInstance[]> {
    return this.rows().filter((row) => row.closedAt === null);
  }

  async listUnkeyed(limit: number): Promise<ProcessInstance[]> {
    return this.rows()
      .filter((row) => row.relationalKey === null)
      .sort((a, b) => a.caseNumberBase.localeCompare(b.caseNumberBase) || a.createdAt.getTime() - b.createdAt.getTime())
      .slice(0, limit);
  }

  async insertInstance(values: NewProcessInstance): Promise<ProcessInstance> {
    const row: ProcessInstance = { ...structuredClone(values), id: randomUUID() };
    this.state.instances.set(row.id, row);
    return structuredClone(row);
  }

  async updateInstance(id: string, patch: InstancePatch): Promise<ProcessInstance> {
    const existing = this.state.instances.get(id);
    if (!existing) {
      throw new Error(`Process ${id} vanished during update`);
    }
    const row: ProcessInstance = { ...existing, ...structuredClone(patch) };
    this.state.instances.set(id, row);
    return structuredClone(row);
  }

  // --- Ledger ---

  async appendEvent(event: NewMovementEvent): Promise<MovementEvent> {
    this.state.seq += 1;
    const row: MovementEvent = { ...structuredClone(event), id: randomUUID(), seq: this.state.seq };
    this.state.events.push(row);
    return structuredClone(row);
  }

  async listEvents(instanceIds: string[]): Promise<MovementEvent[]> {
    const ids = new Set(instanceIds);
    return structuredClone(this.state.events.filter((e) => ids.has(e.instanceId))).sort(compareEvents);
  }

  // --- Field definitions ---

  async listFieldDefinitions(department?: DepartmentCode): Promise<FieldDefinition[]> {
    return structuredClone(
      this.state.fields.filter((f) => department === undefined || f.department === department),
    ).sort((a, b) => a.department.localeCompare(b.department) || a.key.localeCompare(b.key));
  }

  async insertFieldDefinition(values: NewFieldDefinition): Promise<FieldDefinition> {
    if (this.state.fields.some((f) => f.department === values.department && f.key === values.key)) {
      throw new Error(`duplicate key value violates unique constraint (${values.department}, ${values.key})`);
    }
    const row: FieldDefinition = { ...values, id: randomUUID(), createdAt: new Date() };
    this.state.fields.push(row);
    return structuredClone(row);
  }

  async deleteFieldDefinition(department: DepartmentCode, key: string): Promise<boolean> {
    const before = this.state.fields.length;
    this.state.fields = this.state.fields.filter((f) => !(f.department === department && f.key === key));
    return this.state.fields.length < before;
  }

  async purgeAttribute(department: DepartmentCode, key: string): Promise<number> {
    let touched = 0;
    for (const row of this.state.instances.values()) {
      if (row.currentDepartment !== department || !(key in row.attributes)) continue;
      delete row.attributes[key];
      touched += 1;
    }
    return touched;
  }

  // --- Test inspection ---

  /** Committed row counts. */
  counts(): { instances: number; events: number } {
    return { instances: this.state.instances.size, events: this.state.events.length };
  }

  private rows(): ProcessInstance[] {
    return structuredClone([...this.state.instances.values()]);
  }
}
