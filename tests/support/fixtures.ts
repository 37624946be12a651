import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { vi } from 'vitest';
import { createApp } from '@api/app';
import { assigneeFileSchema, createStaticDirectory } from '@core/assignees';
import type { CreateInstanceInput } from '@core/commands';
import { buildDepartmentConfig, departmentConfigSchema } from '@core/department-config';
import { ProcessEngine, type OperationResult } from '@core/engine';
import type { ProcessFailure } from '@core/errors';
import type { MovementEvent, ProcessInstance } from '@core/types';
import { MemoryProcessStore } from './memory-store';

const configDir = resolve(dirname(fileURLToPath(import.meta.url)), '../../config');

function readJson(name: string): unknown {
  return JSON.parse(readFileSync(resolve(configDir, name), 'utf-8'));
}

export const DEPARTMENTS_FILE = resolve(configDir, 'departments.json');

/** A fresh, mutable copy of the shipped department file. */
export function rawDepartments() {
  return departmentConfigSchema.parse(readJson('departments.json'));
}

export const departmentConfig = buildDepartmentConfig(readJson('departments.json'));
export const assigneeGrants = assigneeFileSchema.parse(readJson('assignees.json')).assignees;
export const directory = createStaticDirectory(assigneeGrants);

export const START = '2026-03-02T09:00:00.000Z';

export function manualClock(start = START) {
  let current = new Date(start);
  return {
    now: () => new Date(current.getTime()),
    advance(ms: number) {
      current = new Date(current.getTime() + ms);
    },
  };
}

export function makeEngine(store = new MemoryProcessStore()) {
  const clock = manualClock();
  const logger = { warn: vi.fn(), error: vi.fn() };
  const engine = new ProcessEngine({ store, config: departmentConfig, directory, clock: clock.now, logger });
  return { engine, store, clock, logger };
}

/** The API over a fresh in-memory engine, without request logging. */
export function makeApp() {
  const made = makeEngine();
  const app = createApp(made.engine, { clientUrl: 'http://localhost:5174', logRequests: false });
  return { app, ...made };
}

/** Creation input that already satisfies the finalization guard in GEPLAN. */
export function readyInput(overrides: Partial<CreateInstanceInput> = {}): CreateInstanceInput {
  return {
    caseNumber: '123',
    department: 'GEPLAN',
    actor: 'clerk-1',
    subject: 'Road resurfacing',
    stakeholder: 'City works',
    status: 'UNDER_REVIEW',
    coordinationUnit: 'COORD-NORTE',
    team: 'TEAM-A',
    assignedUserRef: 'planner-1',
    ...overrides,
  };
}

export function unwrap<T>(result: OperationResult<T>): T {
  if (!result.ok) {
    throw new Error(`Expected success, got ${result.error.reason}: ${result.error.message}`);
  }
  return result.data;
}

export function failureOf<T>(result: OperationResult<T>): ProcessFailure {
  if (result.ok) {
    throw new Error('Expected a rejected operation');
  }
  return result.error;
}

// --- Builders for the pure modules ---

export function makeInstance(overrides: Partial<ProcessInstance> = {}): ProcessInstance {
  return {
    id: 'inst-1',
    caseNumberDisplay: 'GEPLAN-123',
    caseNumberBase: '123',
    relationalKey: '123#20260302090000000',
    currentDepartment: 'GEPLAN',
    subject: 'Road resurfacing',
    stakeholder: 'City works',
    externalParty: null,
    internalDeadline: null,
    finalDeadline: null,
    status: null,
    coordinationUnit: null,
    team: null,
    notes: null,
    attributes: {},
    assignedUserRef: null,
    returnedForTriage: false,
    closedAt: null,
    closedBy: null,
    createdAt: new Date(START),
    updatedAt: new Date(START),
    ...overrides,
  };
}

export function makeEvent(overrides: Partial<MovementEvent> = {}): MovementEvent {
  return {
    id: 'evt-1',
    instanceId: 'inst-1',
    seq: 1,
    kind: 'creation',
    fromDepartment: 'INTAKE',
    toDepartment: 'GEPLAN',
    reason: '',
    actor: 'clerk-1',
    occurredAt: new Date(START),
    snapshot: null,
    ...overrides,
  };
}
