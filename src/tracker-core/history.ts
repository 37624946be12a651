import type { EventLocation, Location, MovementKind } from '@shared/types';
import { isActive } from './grouping';
import { normalizeText } from './department-config';
import { compareEvents, latestSnapshotFor, resolveDisplayValues } from './snapshot';
import type {
  MovementEvent,
  ProcessInstance,
  SnapshotRecord,
  SnapshotValues,
} from './types';

// ---------------------------------------------------------------------------
// Public interface
// ---------------------------------------------------------------------------

export interface TimelineEntry {
  instanceId: string;
  caseNumberDisplay: string;
  kind: MovementKind;
  fromDepartment: EventLocation;
  toDepartment: EventLocation;
  actor: string;
  reason: string;
  occurredAt: Date;
  text: string;
  snapshot: SnapshotRecord | null;
  /** True when the ledger had no row for this entry. */
  synthesized: boolean;
}

export interface DepartmentLeg {
  department: Location;
  leftAt: Date;
  values: SnapshotValues;
}

const DEDUP_BUCKET_MS = 60_000;

// ---------------------------------------------------------------------------
// Text
// ---------------------------------------------------------------------------

function describe(
  display: string,
  kind: MovementKind,
  from: EventLocation,
  to: EventLocation,
  actor: string,
): string {
  if (to === 'CLOSED') return `${display} closed by ${actor}`;
  switch (kind) {
    case 'creation':
      return `${display} created in ${to} by ${actor}`;
    case 'transfer':
      return `${display} transferred from ${from} to ${to} by ${actor}`;
    case 'department_finalization':
      return `${display} finalized in ${from} and sent to ${to} by ${actor}`;
    case 'global_finalization':
      return `${display} closed by ${actor}`;
    case 'return_to_intake':
      return `${display} returned from ${from} to ${to} by ${actor}`;
    case 'reassignment':
      return `${display} reassigned by ${actor}`;
    case 'edit':
      return `${display} edited by ${actor}`;
    case 'status_change':
      return `${display} status changed by ${actor}`;
  }
}

function withReason(text: string, reason: string): string {
  return reason.trim() ? `${text}: ${reason.trim()}` : text;
}

// ---------------------------------------------------------------------------
// Timeline
// ---------------------------------------------------------------------------

interface SortableEntry {
  entry: TimelineEntry;
  order: number;
}

function fromEvent(instance: ProcessInstance, event: MovementEvent): SortableEntry {
  const text = withReason(
    describe(instance.caseNumberDisplay, event.kind, event.fromDepartment, event.toDepartment, event.actor),
    event.reason,
  );
  return {
    order: event.seq,
    entry: {
      instanceId: instance.id,
      caseNumberDisplay: instance.caseNumberDisplay,
      kind: event.kind,
      fromDepartment: event.fromDepartment,
      toDepartment: event.toDepartment,
      actor: event.actor,
      reason: event.reason,
      occurredAt: event.occurredAt,
      text,
      snapshot: event.snapshot,
      synthesized: false,
    },
  };
}

function synthesizedCreation(instance: ProcessInstance, firstEvent: MovementEvent | undefined): SortableEntry {
  const to = firstEvent ? firstEvent.fromDepartment : instance.currentDepartment;
  return {
    order: Number.MIN_SAFE_INTEGER,
    entry: {
      instanceId: instance.id,
      caseNumberDisplay: instance.caseNumberDisplay,
      kind: 'creation',
      fromDepartment: 'INTAKE',
      toDepartment: to,
      actor: 'system',
      reason: '',
      occurredAt: instance.createdAt,
      text: describe(instance.caseNumberDisplay, 'creation', 'INTAKE', to, 'system'),
      snapshot: null,
      synthesized: true,
    },
  };
}

function synthesizedClose(instance: ProcessInstance, closedAt: Date): SortableEntry {
  const actor = instance.closedBy ?? 'system';
  return {
    order: Number.MAX_SAFE_INTEGER,
    entry: {
      instanceId: instance.id,
      caseNumberDisplay: instance.caseNumberDisplay,
      kind: 'global_finalization',
      fromDepartment: instance.currentDepartment,
      toDepartment: 'CLOSED',
      actor,
      reason: '',
      occurredAt: closedAt,
      text: describe(instance.caseNumberDisplay, 'global_finalization', instance.currentDepartment, 'CLOSED', actor),
      snapshot: null,
      synthesized: true,
    },
  };
}

/**
 * Replays the ledger of every member of a group into one ordered narrative.
 * Legacy rows without a creation or closing event get one synthesized, and
 * entries of the same instance with the same text in the same minute are
 * reported once.
 */
export function buildTimeline(members: ProcessInstance[], events: MovementEvent[]): TimelineEntry[] {
  const rows: SortableEntry[] = [];

  for (const instance of members) {
    const own = events.filter((e) => e.instanceId === instance.id).sort(compareEvents);

    if (!own.some((e) => e.kind === 'creation')) {
      rows.push(synthesizedCreation(instance, own[0]));
    }
    for (const event of own) {
      rows.push(fromEvent(instance, event));
    }
    if (instance.closedAt !== null && !own.some((e) => e.kind === 'global_finalization')) {
      rows.push(synthesizedClose(instance, instance.closedAt));
    }
  }

  rows.sort((a, b) => {
    const byTime = a.entry.occurredAt.getTime() - b.entry.occurredAt.getTime();
    return byTime !== 0 ? byTime : a.order - b.order;
  });

  const seen = new Set<string>();
  const timeline: TimelineEntry[] = [];
  for (const { entry } of rows) {
    const bucket = Math.floor(entry.occurredAt.getTime() / DEDUP_BUCKET_MS);
    const key = `${entry.instanceId}|${normalizeText(entry.text)}|${bucket}`;
    if (seen.has(key)) continue;
    seen.add(key);
    timeline.push(entry);
  }
  return timeline;
}

// ---------------------------------------------------------------------------
// Department legs
// ---------------------------------------------------------------------------

/**
 * What the instance looked like in each department it has left, falling back
 * to live values for the department it still sits in.
 */
export function projectDepartmentLegs(instance: ProcessInstance, events: MovementEvent[]): DepartmentLeg[] {
  const own = events.filter((e) => e.instanceId === instance.id && e.snapshot).sort(compareEvents);
  const departments: Location[] = [];
  for (const event of own) {
    if (event.snapshot && !departments.includes(event.snapshot.department)) {
      departments.push(event.snapshot.department);
    }
  }

  return departments.map((department) => {
    const snapshot = latestSnapshotFor(own, department);
    return {
      department,
      leftAt: snapshot ? new Date(snapshot.capturedAt) : instance.updatedAt,
      values: resolveDisplayValues(instance, snapshot),
    };
  });
}

// ---------------------------------------------------------------------------
// Occupancy
// ---------------------------------------------------------------------------

/**
 * Active instances per location. Instances sent back for re-triage count
 * under INTAKE rather than the department they nominally sit in.
 */
export function departmentOccupancy(instances: ProcessInstance[]): Record<Location, number> {
  const counts: Record<Location, number> = {
    INTAKE: 0,
    GEPLAN: 0,
    DOP: 0,
    DPE: 0,
    GEOR: 0,
    GEFIN: 0,
    PROJUR: 0,
    OUTBOUND_REVIEW: 0,
  };
  for (const instance of instances) {
    if (!isActive(instance)) continue;
    const location: Location = instance.returnedForTriage ? 'INTAKE' : instance.currentDepartment;
    counts[location] += 1;
  }
  return counts;
}
