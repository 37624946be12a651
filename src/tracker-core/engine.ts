import type { AttributeBag, AttributeValue, DepartmentCode, Location } from '@shared/types';
import type { AssigneeDirectory } from './assignees';
import { applyAttributeChanges, FIELD_KEY_PATTERN } from './attributes';
import type { CommandOf, CreateInstanceInput, DefineFieldInput, TransitionCommand } from './commands';
import type { DepartmentConfig, DepartmentDefinition } from './department-config';
import {
  ConflictError,
  errorForRejection,
  IllegalTransitionError,
  NotFoundError,
  ProcessError,
  ValidationError,
  type ProcessFailure,
} from './errors';
import {
  analyzeGroup,
  findActiveInDepartment,
  groupHasHistoryIn,
  groupMembers,
  isActive,
  membersOf,
  mintRelationalKey,
  planKeyBackfill,
  type GroupAnalysis,
} from './grouping';
import {
  buildTimeline,
  departmentOccupancy,
  projectDepartmentLegs,
  type DepartmentLeg,
  type TimelineEntry,
} from './history';
import {
  extractBaseCaseNumber,
  formatDisplayNumber,
  isDepartmentCode,
  normalizeDepartment,
  normalizeStatus,
} from './identifiers';
import { captureSnapshot, compareEvents, latestSnapshotFor, restoreFromSnapshot } from './snapshot';
import { checkTransition, guardAssigneeScope } from './state-machine';
import type { ProcessStore } from './store';
import type {
  DescriptiveFields,
  FieldDefinition,
  InstancePatch,
  NewProcessInstance,
  ProcessInstance,
  WorkflowFields,
} from './types';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type OperationResult<T> =
  | { ok: true; data: T; warnings: string[] }
  | { ok: false; error: ProcessFailure };

export interface EngineDeps {
  store: ProcessStore;
  config: DepartmentConfig;
  directory: AssigneeDirectory;
  clock?: () => Date;
  logger?: Pick<Console, 'warn' | 'error'>;
}

export interface InstanceView {
  instance: ProcessInstance;
  legs: DepartmentLeg[];
}

export interface DepartmentVocabulary {
  defaultDepartment: DepartmentCode;
  departments: DepartmentDefinition[];
  outboundReviewStatuses: string[];
}

export interface FieldDeletion {
  department: DepartmentCode;
  key: string;
  purgedInstances: number;
}

export interface KeyBackfillSummary {
  batches: number;
  groups: number;
  instances: number;
}

type Warn = (message: string) => void;

interface StepContext {
  tx: ProcessStore;
  instance: ProcessInstance;
  members: ProcessInstance[];
  now: Date;
  warn: Warn;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const NULLABLE_TRACKED_FIELDS = [
  'externalParty',
  'coordinationUnit',
  'team',
  'notes',
  'internalDeadline',
  'finalDeadline',
] as const;

const DESCRIPTIVE_FIELDS = ['subject', 'stakeholder', 'externalParty'] as const;

function blankWorkflow(): WorkflowFields {
  return {
    internalDeadline: null,
    finalDeadline: null,
    status: null,
    coordinationUnit: null,
    team: null,
    notes: null,
    attributes: {},
    assignedUserRef: null,
  };
}

function formatValue(value: AttributeValue | null | undefined): string {
  if (value === null || value === undefined || value === '') return '(empty)';
  return `"${String(value)}"`;
}

function diffLine(field: string, before: AttributeValue | null | undefined, after: AttributeValue | null | undefined): string {
  return `${field}: ${formatValue(before)} → ${formatValue(after)}`;
}

function attributeDiff(before: AttributeBag, after: AttributeBag): string[] {
  const keys = [...new Set([...Object.keys(before), ...Object.keys(after)])].sort();
  return keys
    .filter((key) => before[key] !== after[key])
    .map((key) => diffLine(`attributes.${key}`, before[key], after[key]));
}

function spawnFrom(
  source: ProcessInstance,
  department: DepartmentCode,
  now: Date,
  returnedForTriage: boolean,
): NewProcessInstance {
  return {
    caseNumberDisplay: formatDisplayNumber(department, source.caseNumberBase),
    caseNumberBase: source.caseNumberBase,
    relationalKey: source.relationalKey,
    currentDepartment: department,
    subject: source.subject,
    stakeholder: source.stakeholder,
    externalParty: source.externalParty,
    ...blankWorkflow(),
    returnedForTriage,
    closedAt: null,
    closedBy: null,
    createdAt: now,
    updatedAt: now,
  };
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

/**
 * Transactional orchestration of the movement state machine. Every public
 * operation runs in one store transaction and reports rejections as a typed
 * failure; storage faults roll back and propagate.
 */
export class ProcessEngine {
  private readonly store: ProcessStore;
  private readonly config: DepartmentConfig;
  private readonly directory: AssigneeDirectory;
  private readonly clock: () => Date;
  private readonly logger: Pick<Console, 'warn' | 'error'>;

  constructor(deps: EngineDeps) {
    this.store = deps.store;
    this.config = deps.config;
    this.directory = deps.directory;
    this.clock = deps.clock ?? (() => new Date());
    this.logger = deps.logger ?? console;
  }

  // --- Queries ---

  vocabulary(): DepartmentVocabulary {
    return {
      defaultDepartment: this.config.defaultDepartment,
      departments: this.config.departments,
      outboundReviewStatuses: this.config.outboundReview.statuses,
    };
  }

  inspect(caseNumber: string): Promise<OperationResult<GroupAnalysis>> {
    return this.run('inspect', async (tx) => {
      const base = this.requireBase(caseNumber);
      return analyzeGroup(base, await tx.listByBase(base));
    });
  }

  view(instanceId: string): Promise<OperationResult<InstanceView>> {
    return this.run('view', async (tx) => {
      const instance = await this.requireInstance(tx, instanceId);
      const events = await tx.listEvents([instance.id]);
      return { instance, legs: projectDepartmentLegs(instance, events) };
    });
  }

  timeline(instanceId: string): Promise<OperationResult<TimelineEntry[]>> {
    return this.run('timeline', async (tx) => {
      const instance = await this.requireInstance(tx, instanceId);
      const members = membersOf(instance, await tx.listByBase(instance.caseNumberBase));
      const events = await tx.listEvents(members.map((m) => m.id));
      return buildTimeline(members, events);
    });
  }

  occupancyByDepartment(): Promise<OperationResult<Record<Location, number>>> {
    return this.run('occupancyByDepartment', async (tx) => departmentOccupancy(await tx.listActive()));
  }

  // --- Creation ---

  createInstance(input: CreateInstanceInput): Promise<OperationResult<ProcessInstance>> {
    return this.run('createInstance', async (tx, warn) => {
      const base = this.requireBase(input.caseNumber);
      const department = normalizeDepartment(input.department, this.config);
      if (!department) {
        throw new ValidationError('invalid-department', `Unknown department '${input.department}'`);
      }
      const now = this.clock();

      await tx.lockCaseNumber(base);
      const siblings = await tx.listByBase(base);
      const analysis = analyzeGroup(base, siblings);

      let relationalKey: string | null = null;
      if (input.relationalKey) {
        if (!siblings.some((s) => s.relationalKey === input.relationalKey)) {
          throw new ValidationError(
            'relational-key-conflict',
            `Relational key '${input.relationalKey}' does not belong to ${base}`,
          );
        }
        relationalKey = input.relationalKey;
      } else if (input.newCycle) {
        relationalKey = mintRelationalKey(base, now);
      } else {
        switch (analysis.keyResolution) {
          case 'existing':
            relationalKey = analysis.relationalKey;
            break;
          case 'conflict':
            throw new ConflictError(
              'relational-key-conflict',
              `Active instances of ${base} disagree on relational key (${analysis.conflictingKeys.join(', ')}); supply one or start a new cycle`,
              analysis.activeDepartments,
            );
          case 'legacy':
            warn(`${base} joins its legacy ungrouped instances`);
            break;
          case 'new-cycle':
            relationalKey = mintRelationalKey(base, now);
            warn(`Earlier cycles of ${base} are closed; started ${relationalKey}`);
            break;
          case 'fresh':
            relationalKey = mintRelationalKey(base, now);
            break;
        }
      }

      const members = groupMembers(siblings, base, relationalKey);
      const duplicate = findActiveInDepartment(members, department);
      if (duplicate) {
        throw new ConflictError(
          'duplicate-active-department',
          `${duplicate.caseNumberDisplay} is already active in ${department}`,
          [department],
        );
      }

      const status = this.requireStatus(input.status, department);
      const attributes = await this.validateAttributes(tx, department, {}, input.attributes ?? {});

      const created = await tx.insertInstance({
        caseNumberDisplay: formatDisplayNumber(department, base),
        caseNumberBase: base,
        relationalKey,
        currentDepartment: department,
        subject: input.subject,
        stakeholder: input.stakeholder,
        externalParty: input.externalParty ?? null,
        internalDeadline: input.internalDeadline ?? null,
        finalDeadline: input.finalDeadline ?? null,
        status,
        coordinationUnit: input.coordinationUnit ?? null,
        team: input.team ?? null,
        notes: input.notes ?? null,
        attributes,
        assignedUserRef: input.assignedUserRef ?? null,
        returnedForTriage: false,
        closedAt: null,
        closedBy: null,
        createdAt: now,
        updatedAt: now,
      });

      if (created.assignedUserRef) {
        const grant = await this.directory.lookup(created.assignedUserRef);
        const scope = guardAssigneeScope({ instance: created, assignee: grant });
        if (!scope.passed) {
          throw new ValidationError('unauthorized-assignee', scope.reason ?? 'Assignee is out of scope');
        }
      }

      await tx.appendEvent({
        instanceId: created.id,
        kind: 'creation',
        fromDepartment: 'INTAKE',
        toDepartment: department,
        reason: input.reason ?? '',
        actor: input.actor,
        occurredAt: now,
        snapshot: null,
      });

      return created;
    });
  }

  // --- Transitions ---

  transition(instanceId: string, command: TransitionCommand): Promise<OperationResult<ProcessInstance[]>> {
    return this.run(`transition:${command.kind}`, async (tx, warn) => {
      // Only the base number is taken from this read; the lock comes first.
      const found = await this.requireInstance(tx, instanceId);
      await tx.lockCaseNumber(found.caseNumberBase);
      const instance = await this.requireInstance(tx, instanceId);
      const members = membersOf(instance, await tx.listByBase(instance.caseNumberBase));

      const assignee =
        command.kind === 'reassignment' ? await this.directory.lookup(command.assignee) : undefined;
      const check = checkTransition(command.kind, { instance, assignee });
      if (!check.ok) {
        throw errorForRejection(check.rejection, check.error);
      }

      const step: StepContext = { tx, instance, members, now: this.clock(), warn };
      switch (command.kind) {
        case 'transfer':
          return this.transfer(step, command);
        case 'department_finalization':
          return this.finalizeDepartment(step, command);
        case 'global_finalization':
          return this.closeGroup(step, command);
        case 'return_to_intake':
          return this.returnToIntake(step, command);
        case 'reassignment':
          return this.reassign(step, command);
        case 'edit':
          return this.edit(step, command);
        case 'status_change':
          return this.changeStatus(step, command);
      }
    });
  }

  private async transfer(
    { tx, instance, members, now, warn }: StepContext,
    command: CommandOf<'transfer'>,
  ): Promise<ProcessInstance[]> {
    const target = normalizeDepartment(command.to, this.config, { allowPseudo: true });
    if (!target || target === 'INTAKE') {
      throw new ValidationError('invalid-department', `'${command.to}' is not a transfer target`);
    }
    if (target === instance.currentDepartment) {
      throw new IllegalTransitionError('illegal-transition', `${instance.caseNumberDisplay} is already in ${target}`);
    }

    const duplicate = findActiveInDepartment(members, target, instance.id);
    if (duplicate) {
      throw new ConflictError(
        'duplicate-active-department',
        `${duplicate.caseNumberDisplay} is already active in ${target}`,
        [target],
      );
    }

    const events = await tx.listEvents(members.map((m) => m.id));
    const patch: InstancePatch = { currentDepartment: target, returnedForTriage: false, updatedAt: now };

    if (isDepartmentCode(target) && groupHasHistoryIn(members, events, target, instance.id)) {
      Object.assign(patch, blankWorkflow());
      warn(`${target} already handled this demand; workflow fields were reset`);
    } else {
      if (instance.status && !normalizeStatus(instance.status, target, this.config)) {
        patch.status = null;
      }
      const attributes = await this.retainDefined(tx, target, instance.attributes);
      if (attributes) patch.attributes = attributes;
    }

    const updated = await tx.updateInstance(instance.id, patch);
    await tx.appendEvent({
      instanceId: instance.id,
      kind: 'transfer',
      fromDepartment: instance.currentDepartment,
      toDepartment: target,
      reason: command.reason ?? '',
      actor: command.actor,
      occurredAt: now,
      snapshot: captureSnapshot(instance, now),
    });
    return [updated];
  }

  private async finalizeDepartment(
    { tx, instance, members, now, warn }: StepContext,
    command: CommandOf<'department_finalization'>,
  ): Promise<ProcessInstance[]> {
    const origin = instance.currentDepartment;
    let next: DepartmentCode | null = null;
    if (command.nextDepartment) {
      next = normalizeDepartment(command.nextDepartment, this.config);
      if (!next) {
        throw new ValidationError('invalid-department', `Unknown department '${command.nextDepartment}'`);
      }
    }
    const events = await tx.listEvents(members.map((m) => m.id));

    const patch: InstancePatch = {
      currentDepartment: 'OUTBOUND_REVIEW',
      returnedForTriage: false,
      updatedAt: now,
    };
    if (instance.status && !normalizeStatus(instance.status, 'OUTBOUND_REVIEW', this.config)) {
      patch.status = null;
    }
    const attributes = await this.retainDefined(tx, 'OUTBOUND_REVIEW', instance.attributes);
    if (attributes) patch.attributes = attributes;

    const updated = await tx.updateInstance(instance.id, patch);
    await tx.appendEvent({
      instanceId: instance.id,
      kind: 'department_finalization',
      fromDepartment: origin,
      toDepartment: 'OUTBOUND_REVIEW',
      reason: command.reason ?? '',
      actor: command.actor,
      occurredAt: now,
      snapshot: captureSnapshot(instance, now),
    });

    if (!next) return [updated];

    if (next === origin || groupHasHistoryIn(members, events, next, instance.id)) {
      warn(`${next} already handled this demand; no sibling was opened there`);
      return [updated];
    }

    const sibling = await tx.insertInstance(spawnFrom(instance, next, now, false));
    await tx.appendEvent({
      instanceId: sibling.id,
      kind: 'creation',
      fromDepartment: origin,
      toDepartment: next,
      reason: `Opened from ${instance.caseNumberDisplay}`,
      actor: command.actor,
      occurredAt: now,
      snapshot: null,
    });
    return [updated, sibling];
  }

  private async closeGroup(
    { tx, members, now }: StepContext,
    command: CommandOf<'global_finalization'>,
  ): Promise<ProcessInstance[]> {
    const open = members.filter((m) => isActive(m) && m.currentDepartment === 'OUTBOUND_REVIEW');
    const closed: ProcessInstance[] = [];
    for (const member of open) {
      closed.push(
        await tx.updateInstance(member.id, { closedAt: now, closedBy: command.actor, updatedAt: now }),
      );
      await tx.appendEvent({
        instanceId: member.id,
        kind: 'global_finalization',
        fromDepartment: 'OUTBOUND_REVIEW',
        toDepartment: 'CLOSED',
        reason: command.reason ?? '',
        actor: command.actor,
        occurredAt: now,
        snapshot: null,
      });
    }
    return closed;
  }

  private async returnToIntake(
    { tx, instance, members, now }: StepContext,
    command: CommandOf<'return_to_intake'>,
  ): Promise<ProcessInstance[]> {
    const events = (await tx.listEvents([instance.id])).sort(compareEvents);
    const arrival = events.filter((e) => e.toDepartment === 'OUTBOUND_REVIEW').pop();
    const origin = arrival?.fromDepartment;
    if (!origin || !isDepartmentCode(origin)) {
      throw new IllegalTransitionError(
        'illegal-transition',
        `No department on record sent ${instance.caseNumberDisplay} to OUTBOUND_REVIEW`,
      );
    }

    let target: DepartmentCode = origin;
    if (command.department) {
      const requested = normalizeDepartment(command.department, this.config);
      if (!requested) {
        throw new ValidationError('invalid-department', `Unknown department '${command.department}'`);
      }
      target = requested;
    }

    const duplicate = findActiveInDepartment(members, target, instance.id);
    if (duplicate) {
      throw new ConflictError(
        'duplicate-active-department',
        `${duplicate.caseNumberDisplay} is already active in ${target}`,
        [target],
      );
    }

    const event = {
      kind: 'return_to_intake' as const,
      fromDepartment: 'OUTBOUND_REVIEW' as const,
      toDepartment: target,
      reason: command.reason ?? '',
      actor: command.actor,
      occurredAt: now,
      snapshot: null,
    };

    if (target === origin) {
      const snapshot = latestSnapshotFor(events, origin);
      const updated = await tx.updateInstance(instance.id, {
        ...(snapshot ? restoreFromSnapshot(snapshot) : {}),
        currentDepartment: origin,
        returnedForTriage: true,
        updatedAt: now,
      });
      await tx.appendEvent({ instanceId: instance.id, ...event });
      return [updated];
    }

    const original = await tx.updateInstance(instance.id, { updatedAt: now });
    await tx.appendEvent({ instanceId: instance.id, ...event });
    const spawned = await tx.insertInstance(spawnFrom(instance, target, now, true));
    await tx.appendEvent({
      instanceId: spawned.id,
      ...event,
      kind: 'creation',
      reason: `Returned from ${instance.caseNumberDisplay}`,
    });
    return [original, spawned];
  }

  private async reassign(
    { tx, instance, now, warn }: StepContext,
    command: CommandOf<'reassignment'>,
  ): Promise<ProcessInstance[]> {
    if (instance.assignedUserRef === command.assignee) {
      warn(`${instance.caseNumberDisplay} is already assigned to ${command.assignee}`);
      return [instance];
    }
    const updated = await tx.updateInstance(instance.id, { assignedUserRef: command.assignee, updatedAt: now });
    await tx.appendEvent({
      instanceId: instance.id,
      kind: 'reassignment',
      fromDepartment: instance.currentDepartment,
      toDepartment: instance.currentDepartment,
      reason: command.reason?.trim() || diffLine('assignedUserRef', instance.assignedUserRef, command.assignee),
      actor: command.actor,
      occurredAt: now,
      snapshot: null,
    });
    return [updated];
  }

  private async edit(
    { tx, instance, members, now, warn }: StepContext,
    command: CommandOf<'edit'>,
  ): Promise<ProcessInstance[]> {
    const { changes } = command;
    const patch: InstancePatch = {};
    const diff: string[] = [];

    if (changes.subject !== undefined && changes.subject !== instance.subject) {
      diff.push(diffLine('subject', instance.subject, changes.subject));
      patch.subject = changes.subject;
    }
    if (changes.stakeholder !== undefined && changes.stakeholder !== instance.stakeholder) {
      diff.push(diffLine('stakeholder', instance.stakeholder, changes.stakeholder));
      patch.stakeholder = changes.stakeholder;
    }
    for (const field of NULLABLE_TRACKED_FIELDS) {
      const next = changes[field];
      if (next === undefined || next === instance[field]) continue;
      diff.push(diffLine(field, instance[field], next));
      patch[field] = next;
    }
    if (changes.attributes) {
      const attributes = await this.validateAttributes(
        tx,
        instance.currentDepartment,
        instance.attributes,
        changes.attributes,
      );
      const lines = attributeDiff(instance.attributes, attributes);
      if (lines.length > 0) {
        diff.push(...lines);
        patch.attributes = attributes;
      }
    }

    let statusLine: string | null = null;
    if (changes.status !== undefined) {
      const status = this.requireStatus(changes.status, instance.currentDepartment);
      if (status !== instance.status) {
        statusLine = diffLine('status', instance.status, status);
        patch.status = status;
        patch.returnedForTriage = false;
      }
    }

    if (diff.length === 0 && !statusLine) {
      warn(`No tracked field of ${instance.caseNumberDisplay} changed`);
      return [instance];
    }

    const updated = await tx.updateInstance(instance.id, { ...patch, updatedAt: now });
    const base = {
      instanceId: instance.id,
      fromDepartment: instance.currentDepartment,
      toDepartment: instance.currentDepartment,
      actor: command.actor,
      occurredAt: now,
      snapshot: null,
    };
    if (diff.length > 0) {
      await tx.appendEvent({ ...base, kind: 'edit', reason: diff.join('; ') });
    }
    if (statusLine) {
      await tx.appendEvent({ ...base, kind: 'status_change', reason: statusLine });
    }

    if (!command.propagateDescriptive) return [updated];

    const descriptive: Partial<DescriptiveFields> = {};
    if (patch.subject !== undefined) descriptive.subject = patch.subject;
    if (patch.stakeholder !== undefined) descriptive.stakeholder = patch.stakeholder;
    if (patch.externalParty !== undefined) descriptive.externalParty = patch.externalParty;
    const results = [updated];
    for (const member of members) {
      if (member.id === instance.id || !isActive(member)) continue;
      const lines = DESCRIPTIVE_FIELDS.filter(
        (field) => descriptive[field] !== undefined && descriptive[field] !== member[field],
      ).map((field) => diffLine(field, member[field], descriptive[field]));
      if (lines.length === 0) continue;

      results.push(await tx.updateInstance(member.id, { ...descriptive, updatedAt: now }));
      await tx.appendEvent({
        ...base,
        instanceId: member.id,
        fromDepartment: member.currentDepartment,
        toDepartment: member.currentDepartment,
        kind: 'edit',
        reason: `${lines.join('; ')} (from ${instance.caseNumberDisplay})`,
      });
    }
    return results;
  }

  private async changeStatus(
    { tx, instance, now, warn }: StepContext,
    command: CommandOf<'status_change'>,
  ): Promise<ProcessInstance[]> {
    const status = this.requireStatus(command.status, instance.currentDepartment);
    if (status === instance.status) {
      warn(`${instance.caseNumberDisplay} already has status ${formatValue(status)}`);
      return [instance];
    }
    const updated = await tx.updateInstance(instance.id, { status, returnedForTriage: false, updatedAt: now });
    await tx.appendEvent({
      instanceId: instance.id,
      kind: 'status_change',
      fromDepartment: instance.currentDepartment,
      toDepartment: instance.currentDepartment,
      reason: command.reason?.trim() || diffLine('status', instance.status, status),
      actor: command.actor,
      occurredAt: now,
      snapshot: null,
    });
    return [updated];
  }

  // --- Field definitions ---

  defineField(input: DefineFieldInput): Promise<OperationResult<FieldDefinition>> {
    return this.run('defineField', async (tx) => {
      const department = this.requireDepartment(input.department);
      if (!FIELD_KEY_PATTERN.test(input.key)) {
        throw new ValidationError('invalid-attribute', `Field key '${input.key}' must match ${FIELD_KEY_PATTERN.source}`);
      }
      const existing = await tx.listFieldDefinitions(department);
      if (existing.some((d) => d.key === input.key)) {
        throw new ConflictError('duplicate-field', `${department} already defines '${input.key}'`, [department]);
      }
      return tx.insertFieldDefinition({
        department,
        key: input.key,
        label: input.label,
        valueKind: input.valueKind,
      });
    });
  }

  listFields(department?: string): Promise<OperationResult<FieldDefinition[]>> {
    return this.run('listFields', async (tx) =>
      tx.listFieldDefinitions(department === undefined ? undefined : this.requireDepartment(department)),
    );
  }

  deleteField(departmentRaw: string, key: string): Promise<OperationResult<FieldDeletion>> {
    return this.run('deleteField', async (tx) => {
      const department = this.requireDepartment(departmentRaw);
      const deleted = await tx.deleteFieldDefinition(department, key);
      if (!deleted) {
        throw new NotFoundError('unknown-field', `${department} defines no field '${key}'`);
      }
      return { department, key, purgedInstances: await tx.purgeAttribute(department, key) };
    });
  }

  // --- Maintenance ---

  /**
   * Gives every keyless instance an explicit relational key, one key per base
   * number, committing each batch separately.
   */
  async backfillRelationalKeys(options: { batchSize?: number } = {}): Promise<OperationResult<KeyBackfillSummary>> {
    const batchSize = options.batchSize ?? 500;
    const summary: KeyBackfillSummary = { batches: 0, groups: 0, instances: 0 };

    for (;;) {
      const batch = await this.run('backfillRelationalKeys', async (tx) => {
        const seeds = await tx.listUnkeyed(batchSize);
        const keyless: ProcessInstance[] = [];
        for (const base of new Set(seeds.map((s) => s.caseNumberBase))) {
          await tx.lockCaseNumber(base);
          keyless.push(...(await tx.listByBase(base)).filter((i) => i.relationalKey === null));
        }
        const plans = planKeyBackfill(keyless, this.clock());
        for (const plan of plans) {
          for (const id of plan.instanceIds) {
            await tx.updateInstance(id, { relationalKey: plan.relationalKey });
          }
        }
        return plans;
      });
      if (!batch.ok) return batch;
      if (batch.data.length === 0) break;

      const instances = batch.data.reduce((sum, plan) => sum + plan.instanceIds.length, 0);
      summary.batches += 1;
      summary.groups += batch.data.length;
      summary.instances += instances;
      this.logger.warn(
        `[ENGINE] Backfill batch ${summary.batches}: ${batch.data.length} groups, ${instances} instances`,
      );
    }

    return { ok: true, data: summary, warnings: [] };
  }

  // --- Internals ---

  private async run<T>(
    operation: string,
    fn: (tx: ProcessStore, warn: Warn) => Promise<T>,
  ): Promise<OperationResult<T>> {
    const warnings: string[] = [];
    try {
      const data = await this.store.transaction((tx) => fn(tx, (message) => warnings.push(message)));
      return { ok: true, data, warnings };
    } catch (err) {
      if (err instanceof ProcessError) {
        return { ok: false, error: err.toFailure() };
      }
      this.logger.error(`[ENGINE] ${operation} failed:`, err);
      throw err;
    }
  }

  private requireBase(caseNumber: string): string {
    const base = extractBaseCaseNumber(caseNumber, this.config);
    if (!base) {
      throw new ValidationError('invalid-case-number', 'Case number is empty');
    }
    return base;
  }

  private requireDepartment(raw: string): DepartmentCode {
    const department = normalizeDepartment(raw, this.config);
    if (!department) {
      throw new ValidationError('invalid-department', `Unknown department '${raw}'`);
    }
    return department;
  }

  private async requireInstance(tx: ProcessStore, id: string): Promise<ProcessInstance> {
    const instance = await tx.findInstance(id);
    if (!instance) {
      throw new NotFoundError('unknown-instance', `Process ${id} not found`);
    }
    return instance;
  }

  private requireStatus(raw: string | null | undefined, location: Location): string | null {
    if (raw === null || raw === undefined) return null;
    const status = normalizeStatus(raw, location, this.config);
    if (!status) {
      throw new ValidationError('invalid-status', `'${raw}' is not a status of ${location}`, [location]);
    }
    return status;
  }

  /**
   * The bag with only the values `location` defines and accepts, or null when
   * every value already fits. The snapshot keeps what was dropped.
   */
  private async retainDefined(
    tx: ProcessStore,
    location: Location,
    attributes: AttributeBag,
  ): Promise<AttributeBag | null> {
    const entries = Object.entries(attributes);
    if (entries.length === 0) return null;
    const definitions = isDepartmentCode(location) ? await tx.listFieldDefinitions(location) : [];
    const kept = entries.filter(
      ([key, value]) => applyAttributeChanges({}, { [key]: value }, definitions).success,
    );
    return kept.length === entries.length ? null : Object.fromEntries(kept);
  }

  private async validateAttributes(
    tx: ProcessStore,
    location: Location,
    current: AttributeBag,
    changes: Record<string, AttributeValue | null>,
  ): Promise<AttributeBag> {
    if (Object.keys(changes).length === 0) return { ...current };
    const definitions = isDepartmentCode(location) ? await tx.listFieldDefinitions(location) : [];
    const result = applyAttributeChanges(current, changes, definitions);
    if (!result.success) {
      throw new ValidationError('invalid-attribute', result.error, [location]);
    }
    return result.data;
  }
}
