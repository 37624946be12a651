import { describe, it, expect } from 'vitest';
import { getTableName } from 'drizzle-orm';
import { getTableConfig } from 'drizzle-orm/pg-core';
import { processInstances } from '../../src/db/schema/process-instances';
import { departmentFieldDefinitions, movementEvents } from '@db/schema/index';

describe('process_instances schema', () => {
  it('exports the process_instances table', () => {
    expect(getTableName(processInstances)).toBe('process_instances');
  });

  it('keeps the relational key apart from the case number', () => {
    expect(processInstances.caseNumberBase.name).toBe('case_number_base');
    expect(processInstances.relationalKey.name).toBe('relational_key');
    expect(processInstances.relationalKey.notNull).toBe(false);
  });

  it('indexes group lookups and open instances', () => {
    const names = getTableConfig(processInstances).indexes.map((i) => i.config.name);
    expect(names).toEqual(['process_instances_group_idx', 'process_instances_open_idx']);
  });
});

describe('movement_events schema', () => {
  it('exports the movement_events table', () => {
    expect(getTableName(movementEvents)).toBe('movement_events');
  });

  it('references process_instances', () => {
    const [fk] = getTableConfig(movementEvents).foreignKeys;
    expect(getTableName(fk.reference().foreignTable)).toBe('process_instances');
  });

  it('has the replay columns', () => {
    const cols = Object.keys(movementEvents);
    expect(cols).toContain('seq');
    expect(cols).toContain('occurredAt');
    expect(cols).toContain('snapshot');
  });
});

describe('department_field_definitions schema', () => {
  it('is unique per department and key', () => {
    const [constraint] = getTableConfig(departmentFieldDefinitions).uniqueConstraints;
    expect(constraint.getName()).toBe('department_field_definitions_key_uq');
    expect(constraint.columns.map((c) => c.name)).toEqual(['department', 'key']);
  });
});
