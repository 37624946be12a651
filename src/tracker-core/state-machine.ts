import { MANDATORY_FINALIZATION_FIELDS } from '@shared/constants';
import type { MovementKind, RejectionReason } from '@shared/types';
import type { AssigneeGrant } from './assignees';
import { isDepartmentCode } from './identifiers';
import type { ProcessInstance } from './types';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ProcessState = ProcessInstance['currentDepartment'] | 'CLOSED';
export type TransitionKind = Exclude<MovementKind, 'creation'>;

/** Concrete departments share one set of rules; pseudo-departments have their own. */
export type StateClass = 'department' | 'INTAKE' | 'OUTBOUND_REVIEW';

export interface TransitionContext {
  instance: ProcessInstance;
  /** Resolved grant of the target assignee, for reassignment. */
  assignee?: AssigneeGrant | null;
}

export interface GuardResult {
  guardName: string;
  passed: boolean;
  reason?: string;
  rejection?: RejectionReason;
}

export interface TransitionSuccess {
  ok: true;
  from: ProcessState;
  guardResults: GuardResult[];
}

export interface TransitionFailure {
  ok: false;
  rejection: RejectionReason;
  error: string;
  guardResults?: GuardResult[];
}

export type TransitionResult = TransitionSuccess | TransitionFailure;

// ---------------------------------------------------------------------------
// Transition Table
// ---------------------------------------------------------------------------

const OPEN_STATES: readonly StateClass[] = ['department', 'INTAKE', 'OUTBOUND_REVIEW'];

export const ALLOWED_FROM: Record<TransitionKind, readonly StateClass[]> = {
  transfer: ['department'],
  department_finalization: ['department'],
  global_finalization: ['OUTBOUND_REVIEW'],
  return_to_intake: ['OUTBOUND_REVIEW'],
  reassignment: OPEN_STATES,
  edit: OPEN_STATES,
  status_change: OPEN_STATES,
};

export function stateOf(instance: ProcessInstance): ProcessState {
  return instance.closedAt !== null ? 'CLOSED' : instance.currentDepartment;
}

export function classify(state: ProcessInstance['currentDepartment']): StateClass {
  return isDepartmentCode(state) ? 'department' : state;
}

// ---------------------------------------------------------------------------
// Guard Functions
// ---------------------------------------------------------------------------

type GuardFn = (ctx: TransitionContext) => GuardResult;

function isBlank(value: string | null): boolean {
  return value === null || value.trim() === '';
}

/**
 * A department may only hand a process on once coordination unit, team,
 * assignee and status are filled in.
 */
export function guardMandatoryFields(ctx: TransitionContext): GuardResult {
  const missing = MANDATORY_FINALIZATION_FIELDS.filter((field) => isBlank(ctx.instance[field]));

  if (missing.length === 0) {
    return { guardName: 'guardMandatoryFields', passed: true };
  }

  return {
    guardName: 'guardMandatoryFields',
    passed: false,
    reason: `Missing mandatory fields: ${missing.join(', ')}`,
    rejection: 'missing-mandatory-field',
  };
}

/**
 * The assignee must hold the current department grant and, where the
 * instance names them, the same coordination unit and team.
 */
export function guardAssigneeScope(ctx: TransitionContext): GuardResult {
  const { instance, assignee } = ctx;
  const fail = (reason: string): GuardResult => ({
    guardName: 'guardAssigneeScope',
    passed: false,
    reason,
    rejection: 'unauthorized-assignee',
  });

  if (!assignee) return fail('Assignee is not known to the directory');

  const department = instance.currentDepartment;
  if (isDepartmentCode(department) && !assignee.departments.includes(department)) {
    return fail(`${assignee.ref} holds no grant for ${department}`);
  }
  if (instance.coordinationUnit && !assignee.coordinationUnits.includes(instance.coordinationUnit)) {
    return fail(`${assignee.ref} is outside coordination unit ${instance.coordinationUnit}`);
  }
  if (instance.team && !assignee.teams.includes(instance.team)) {
    return fail(`${assignee.ref} is not on team ${instance.team}`);
  }

  return { guardName: 'guardAssigneeScope', passed: true };
}

/**
 * Map of kind -> guard functions that must ALL pass.
 */
export const GUARDS: Record<TransitionKind, GuardFn[]> = {
  transfer: [],
  department_finalization: [guardMandatoryFields],
  global_finalization: [],
  return_to_intake: [],
  reassignment: [guardAssigneeScope],
  edit: [],
  status_change: [],
};

export function checkGuards(kind: TransitionKind, ctx: TransitionContext): GuardResult[] {
  return GUARDS[kind].map((fn) => fn(ctx));
}

// ---------------------------------------------------------------------------
// Transition Check
// ---------------------------------------------------------------------------

/**
 * Pure check: is `kind` allowed from the instance's current state, and do
 * its guards pass? Persistence-dependent rules (duplicates, history) live in
 * the engine.
 */
export function checkTransition(kind: TransitionKind, ctx: TransitionContext): TransitionResult {
  const state = stateOf(ctx.instance);

  // 1. Terminal state
  if (state === 'CLOSED') {
    return {
      ok: false,
      rejection: 'already-closed',
      error: `${ctx.instance.caseNumberDisplay} is closed`,
    };
  }

  // 2. Transition table
  if (!ALLOWED_FROM[kind].includes(classify(state))) {
    return {
      ok: false,
      rejection: 'illegal-transition',
      error: `'${kind}' is not allowed from ${state}`,
    };
  }

  // 3. Guards
  const guardResults = checkGuards(kind, ctx);
  const failed = guardResults.find((g) => !g.passed);
  if (failed) {
    return {
      ok: false,
      rejection: failed.rejection ?? 'illegal-transition',
      error: failed.reason ?? `Guard ${failed.guardName} failed`,
      guardResults,
    };
  }

  return { ok: true, from: state, guardResults };
}
