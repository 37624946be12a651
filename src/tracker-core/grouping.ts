import { DEPARTMENT_CODES } from '@shared/constants';
import type { DepartmentCode, Location } from '@shared/types';
import { isDepartmentCode } from './identifiers';
import type { MovementEvent, ProcessInstance } from './types';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * - existing: one key among the active instances
 * - conflict: active instances disagree; the caller must choose
 * - legacy: active instances exist but none carries a key
 * - new-cycle: only finalized history; a creation starts a fresh key
 * - fresh: the number has never been seen
 */
export type KeyResolution = 'existing' | 'conflict' | 'legacy' | 'new-cycle' | 'fresh';

export interface PrefillSuggestion {
  sourceInstanceId: string;
  subject: string;
  stakeholder: string;
  externalParty: string | null;
  coordinationUnit: string | null;
  team: string | null;
}

export interface GroupAnalysis {
  baseNumber: string;
  activeCount: number;
  finalizedCount: number;
  activeDepartments: Location[];
  relationalKey: string | null;
  keyResolution: KeyResolution;
  conflictingKeys: string[];
  prefill: PrefillSuggestion | null;
}

export const LOCATION_ORDER: readonly Location[] = ['INTAKE', ...DEPARTMENT_CODES, 'OUTBOUND_REVIEW'];

export function sortLocations(locations: Iterable<Location>): Location[] {
  return [...new Set(locations)].sort(
    (a, b) => LOCATION_ORDER.indexOf(a) - LOCATION_ORDER.indexOf(b),
  );
}

export function isActive(instance: ProcessInstance): boolean {
  return instance.closedAt === null;
}

function distinctKeys(instances: ProcessInstance[]): string[] {
  const keys = new Set<string>();
  for (const instance of instances) {
    if (instance.relationalKey) keys.add(instance.relationalKey);
  }
  return [...keys].sort();
}

// ---------------------------------------------------------------------------
// Membership
// ---------------------------------------------------------------------------

/**
 * With a key, members share it. Without one, only keyless instances match:
 * the legacy ungrouped bucket. Drop the keyless branch once every row has
 * been backfilled with an explicit key.
 */
export function belongsToSameGroup(
  instance: ProcessInstance,
  baseNumber: string,
  key?: string | null,
): boolean {
  if (instance.caseNumberBase !== baseNumber) return false;
  if (key) return instance.relationalKey === key;
  return instance.relationalKey === null;
}

export function groupMembers(
  instances: ProcessInstance[],
  baseNumber: string,
  key: string | null,
): ProcessInstance[] {
  return instances.filter((instance) => belongsToSameGroup(instance, baseNumber, key));
}

export function membersOf(instance: ProcessInstance, candidates: ProcessInstance[]): ProcessInstance[] {
  return groupMembers(candidates, instance.caseNumberBase, instance.relationalKey);
}

// ---------------------------------------------------------------------------
// Analysis
// ---------------------------------------------------------------------------

function mostRecent(instances: ProcessInstance[]): ProcessInstance | null {
  let latest: ProcessInstance | null = null;
  for (const instance of instances) {
    if (!latest || instance.updatedAt.getTime() > latest.updatedAt.getTime()) {
      latest = instance;
    }
  }
  return latest;
}

function toPrefill(instance: ProcessInstance | null): PrefillSuggestion | null {
  if (!instance) return null;
  return {
    sourceInstanceId: instance.id,
    subject: instance.subject,
    stakeholder: instance.stakeholder,
    externalParty: instance.externalParty,
    coordinationUnit: instance.coordinationUnit,
    team: instance.team,
  };
}

export function analyzeGroup(baseNumber: string, instances: ProcessInstance[]): GroupAnalysis {
  const sameBase = instances.filter((i) => i.caseNumberBase === baseNumber);
  const active = sameBase.filter(isActive);
  const finalized = sameBase.filter((i) => !isActive(i));

  let keyResolution: KeyResolution;
  let relationalKey: string | null = null;
  let conflictingKeys: string[] = [];

  if (active.length > 0) {
    const keys = distinctKeys(active);
    if (keys.length === 1) {
      keyResolution = 'existing';
      relationalKey = keys[0];
    } else if (keys.length > 1) {
      keyResolution = 'conflict';
      conflictingKeys = keys;
    } else {
      keyResolution = 'legacy';
    }
  } else if (finalized.length > 0) {
    keyResolution = 'new-cycle';
    const keys = distinctKeys(finalized);
    if (keys.length === 1) relationalKey = keys[0];
  } else {
    keyResolution = 'fresh';
  }

  const prefillPool =
    keyResolution === 'conflict' ? sameBase : groupMembers(sameBase, baseNumber, relationalKey);

  return {
    baseNumber,
    activeCount: active.length,
    finalizedCount: finalized.length,
    activeDepartments: sortLocations(active.map((i) => i.currentDepartment)),
    relationalKey,
    keyResolution,
    conflictingKeys,
    prefill: toPrefill(mostRecent(prefillPool.length > 0 ? prefillPool : sameBase)),
  };
}

// ---------------------------------------------------------------------------
// Keys
// ---------------------------------------------------------------------------

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** "<base>#<yyyyMMddHHmmssSSS>" in UTC. */
export function mintRelationalKey(baseNumber: string, now: Date): string {
  const stamp =
    `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}` +
    `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}` +
    pad(now.getUTCMilliseconds(), 3);
  return `${baseNumber}#${stamp}`;
}

interface KeyBackfillPlan {
  baseNumber: string;
  relationalKey: string;
  instanceIds: string[];
}

/** One minted key per base number for every keyless instance sharing it. */
export function planKeyBackfill(instances: ProcessInstance[], now: Date): KeyBackfillPlan[] {
  const byBase = new Map<string, string[]>();
  for (const instance of instances) {
    if (instance.relationalKey !== null) continue;
    const ids = byBase.get(instance.caseNumberBase) ?? [];
    ids.push(instance.id);
    byBase.set(instance.caseNumberBase, ids);
  }

  return [...byBase.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([baseNumber, instanceIds]) => ({
      baseNumber,
      relationalKey: mintRelationalKey(baseNumber, now),
      instanceIds,
    }));
}

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

/** The duplicate-active guard; pseudo-departments may hold several members. */
export function findActiveInDepartment(
  members: ProcessInstance[],
  department: Location,
  excludeId?: string,
): ProcessInstance | undefined {
  if (!isDepartmentCode(department)) return undefined;
  return members.find(
    (m) => isActive(m) && m.currentDepartment === department && m.id !== excludeId,
  );
}

export function groupHasHistoryIn(
  members: ProcessInstance[],
  events: MovementEvent[],
  department: DepartmentCode,
  excludeId?: string,
): boolean {
  if (findActiveInDepartment(members, department, excludeId)) return true;
  const memberIds = new Set(members.map((m) => m.id));
  return events.some(
    (e) =>
      memberIds.has(e.instanceId) &&
      (e.fromDepartment === department || e.toDepartment === department),
  );
}
