import type {
  AttributeBag,
  DepartmentCode,
  EventLocation,
  FieldValueKind,
  Location,
  MovementKind,
} from '@shared/types';

// ---------------------------------------------------------------------------
// Process instances
// ---------------------------------------------------------------------------

/** Fields a department works on while the instance sits with it. */
export interface WorkflowFields {
  internalDeadline: string | null;
  finalDeadline: string | null;
  status: string | null;
  coordinationUnit: string | null;
  team: string | null;
  notes: string | null;
  attributes: AttributeBag;
  assignedUserRef: string | null;
}

export interface DescriptiveFields {
  subject: string;
  stakeholder: string;
  externalParty: string | null;
}

export interface ProcessInstance extends DescriptiveFields, WorkflowFields {
  id: string;
  caseNumberDisplay: string;
  caseNumberBase: string;
  relationalKey: string | null;
  currentDepartment: Location;
  returnedForTriage: boolean;
  closedAt: Date | null;
  closedBy: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type NewProcessInstance = Omit<ProcessInstance, 'id'>;

export type InstancePatch = Partial<Omit<ProcessInstance, 'id' | 'createdAt'>>;

// ---------------------------------------------------------------------------
// Snapshots and movement ledger
// ---------------------------------------------------------------------------

export interface SnapshotRecord extends DescriptiveFields, WorkflowFields {
  department: Location;
  capturedAt: string;
}

export type SnapshotValues = DescriptiveFields & WorkflowFields;
export type SnapshotField = keyof SnapshotValues;

export interface MovementEvent {
  id: string;
  instanceId: string;
  /** Insertion order; breaks ties between events with the same timestamp. */
  seq: number;
  kind: MovementKind;
  fromDepartment: EventLocation;
  toDepartment: EventLocation;
  reason: string;
  actor: string;
  occurredAt: Date;
  snapshot: SnapshotRecord | null;
}

export type NewMovementEvent = Omit<MovementEvent, 'id' | 'seq'>;

// ---------------------------------------------------------------------------
// Department field definitions
// ---------------------------------------------------------------------------

export interface FieldDefinition {
  id: string;
  department: DepartmentCode;
  key: string;
  label: string;
  valueKind: FieldValueKind;
  createdAt: Date;
}

export type NewFieldDefinition = Omit<FieldDefinition, 'id' | 'createdAt'>;
