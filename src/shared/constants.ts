export const API_PREFIX = '/api';

export const DEPARTMENT_CODES = [
  'GEPLAN',
  'DOP',
  'DPE',
  'GEOR',
  'GEFIN',
  'PROJUR',
] as const;

export const PSEUDO_DEPARTMENTS = ['INTAKE', 'OUTBOUND_REVIEW'] as const;

export const CLOSED_LOCATION = 'CLOSED' as const;

export const MOVEMENT_KINDS = [
  'creation',
  'transfer',
  'department_finalization',
  'global_finalization',
  'return_to_intake',
  'reassignment',
  'edit',
  'status_change',
] as const;

export const FIELD_VALUE_KINDS = ['text', 'number', 'date'] as const;

export const MANDATORY_FINALIZATION_FIELDS = [
  'coordinationUnit',
  'team',
  'assignedUserRef',
  'status',
] as const;

export const REJECTION_REASONS = [
  'duplicate-active-department',
  'missing-mandatory-field',
  'unauthorized-assignee',
  'already-closed',
  'illegal-transition',
  'invalid-department',
  'invalid-status',
  'invalid-attribute',
  'invalid-case-number',
  'relational-key-conflict',
  'unknown-instance',
  'unknown-field',
  'duplicate-field',
] as const;
