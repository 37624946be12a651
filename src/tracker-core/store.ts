import type { DepartmentCode } from '@shared/types';
import type {
  FieldDefinition,
  InstancePatch,
  MovementEvent,
  NewFieldDefinition,
  NewMovementEvent,
  NewProcessInstance,
  ProcessInstance,
} from './types';

/**
 * Persistence port of the engine. Every engine operation runs inside
 * `transaction`; a throw from the callback must roll back every write made
 * through the transactional store.
 */
export interface ProcessStore {
  transaction<T>(fn: (tx: ProcessStore) => Promise<T>): Promise<T>;

  /**
   * Serializes writers on one case number until the transaction ends. It is
   * the only lock writers take, and it is taken before any guarded read.
   */
  lockCaseNumber(baseNumber: string): Promise<void>;

  findInstance(id: string): Promise<ProcessInstance | null>;
  listByBase(baseNumber: string): Promise<ProcessInstance[]>;
  listActive(): Promise<ProcessInstance[]>;
  listUnkeyed(limit: number): Promise<ProcessInstance[]>;
  insertInstance(values: NewProcessInstance): Promise<ProcessInstance>;
  updateInstance(id: string, patch: InstancePatch): Promise<ProcessInstance>;

  appendEvent(event: NewMovementEvent): Promise<MovementEvent>;
  /** Ordered by occurredAt, then insertion order. */
  listEvents(instanceIds: string[]): Promise<MovementEvent[]>;

  listFieldDefinitions(department?: DepartmentCode): Promise<FieldDefinition[]>;
  insertFieldDefinition(values: NewFieldDefinition): Promise<FieldDefinition>;
  deleteFieldDefinition(department: DepartmentCode, key: string): Promise<boolean>;
  /** Removes `key` from the bags of instances sitting in `department`; returns rows touched. */
  purgeAttribute(department: DepartmentCode, key: string): Promise<number>;
}
