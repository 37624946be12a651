import type {
  InstancePatch,
  MovementEvent,
  ProcessInstance,
  SnapshotField,
  SnapshotRecord,
  SnapshotValues,
} from './types';
import type { Location } from '@shared/types';

/**
 * Frozen copy of the department-scoped fields, taken before the department
 * pointer moves.
 */
export function captureSnapshot(instance: ProcessInstance, at: Date): SnapshotRecord {
  return {
    department: instance.currentDepartment,
    capturedAt: at.toISOString(),
    subject: instance.subject,
    stakeholder: instance.stakeholder,
    externalParty: instance.externalParty,
    coordinationUnit: instance.coordinationUnit,
    team: instance.team,
    status: instance.status,
    assignedUserRef: instance.assignedUserRef,
    internalDeadline: instance.internalDeadline,
    finalDeadline: instance.finalDeadline,
    notes: instance.notes,
    attributes: { ...instance.attributes },
  };
}

/** Orders by occurredAt, then by insertion order. */
export function compareEvents(a: MovementEvent, b: MovementEvent): number {
  const byTime = a.occurredAt.getTime() - b.occurredAt.getTime();
  return byTime !== 0 ? byTime : a.seq - b.seq;
}

/** Latest event that left `department` carrying a snapshot. */
export function latestSnapshotEvent(
  events: MovementEvent[],
  department: Location,
): MovementEvent | null {
  let latest: MovementEvent | null = null;
  for (const event of events) {
    if (event.fromDepartment !== department || !event.snapshot) continue;
    if (!latest || compareEvents(event, latest) > 0) latest = event;
  }
  return latest;
}

export function latestSnapshotFor(
  events: MovementEvent[],
  department: Location,
): SnapshotRecord | null {
  return latestSnapshotEvent(events, department)?.snapshot ?? null;
}

export function resolveDisplayValue<F extends SnapshotField>(
  field: F,
  instance: ProcessInstance,
  snapshot: SnapshotRecord | null,
): SnapshotValues[F] {
  const live: SnapshotValues = instance;
  if (!snapshot) return live[field];
  const frozen: SnapshotValues = snapshot;
  const movedOn = instance.currentDepartment !== snapshot.department;
  return instance.closedAt !== null || movedOn ? frozen[field] : live[field];
}

export function resolveDisplayValues(
  instance: ProcessInstance,
  snapshot: SnapshotRecord | null,
): SnapshotValues {
  const pick = <F extends SnapshotField>(field: F) => resolveDisplayValue(field, instance, snapshot);
  return {
    subject: pick('subject'),
    stakeholder: pick('stakeholder'),
    externalParty: pick('externalParty'),
    coordinationUnit: pick('coordinationUnit'),
    team: pick('team'),
    status: pick('status'),
    assignedUserRef: pick('assignedUserRef'),
    internalDeadline: pick('internalDeadline'),
    finalDeadline: pick('finalDeadline'),
    notes: pick('notes'),
    attributes: { ...pick('attributes') },
  };
}

export function restoreFromSnapshot(snapshot: SnapshotRecord): InstancePatch {
  return {
    subject: snapshot.subject,
    stakeholder: snapshot.stakeholder,
    externalParty: snapshot.externalParty,
    coordinationUnit: snapshot.coordinationUnit,
    team: snapshot.team,
    status: snapshot.status,
    assignedUserRef: snapshot.assignedUserRef,
    internalDeadline: snapshot.internalDeadline,
    finalDeadline: snapshot.finalDeadline,
    notes: snapshot.notes,
    attributes: { ...snapshot.attributes },
  };
}
