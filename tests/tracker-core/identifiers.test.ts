import { describe, it, expect } from 'vitest';
import {
  extractBaseCaseNumber,
  formatDisplayNumber,
  isDepartmentCode,
  normalizeDepartment,
  normalizeStatus,
} from '@core/identifiers';
import { departmentConfig as config } from '../support/fixtures';

describe('normalizeDepartment', () => {
  it('matches codes regardless of case and padding', () => {
    expect(normalizeDepartment('  geplan ', config)).toBe('GEPLAN');
    expect(normalizeDepartment('Projur', config)).toBe('PROJUR');
  });

  it('matches accented aliases', () => {
    expect(normalizeDepartment('Gerência de Planejamento', config)).toBe('GEPLAN');
    expect(normalizeDepartment('Procuradoria Jurídica', config)).toBe('PROJUR');
  });

  it('takes the earliest department embedded in a longer string', () => {
    expect(normalizeDepartment('GEPLAN - DOP', config)).toBe('GEPLAN');
    expect(normalizeDepartment('x - GEOR', config)).toBe('GEOR');
    expect(normalizeDepartment('Encaminhado para operações', config)).toBe('DOP');
  });

  it('only matches whole words', () => {
    expect(normalizeDepartment('GEPLANNING', config)).toBeNull();
  });

  it('maps intake synonyms to the default department', () => {
    expect(normalizeDepartment('Protocolo', config)).toBe('GEPLAN');
    expect(normalizeDepartment('INTAKE', config)).toBe('GEPLAN');
  });

  it('returns INTAKE when the caller allows pseudo-departments', () => {
    expect(normalizeDepartment('Recepção', config, { allowPseudo: true })).toBe('INTAKE');
  });

  it('drops outbound review unless pseudo-departments are allowed', () => {
    expect(normalizeDepartment('Saída', config)).toBeNull();
    expect(normalizeDepartment('Saída', config, { allowPseudo: true })).toBe('OUTBOUND_REVIEW');
    expect(normalizeDepartment('outbound review', config, { allowPseudo: true })).toBe('OUTBOUND_REVIEW');
    expect(normalizeDepartment('OUTBOUND_REVIEW', config, { allowPseudo: true })).toBe('OUTBOUND_REVIEW');
  });

  it('returns null for empty and unknown input', () => {
    expect(normalizeDepartment('', config)).toBeNull();
    expect(normalizeDepartment(null, config)).toBeNull();
    expect(normalizeDepartment('unknown dept', config)).toBeNull();
  });
});

describe('extractBaseCaseNumber', () => {
  it('strips a leading department prefix', () => {
    expect(extractBaseCaseNumber('GEPLAN-123', config)).toBe('123');
  });

  it('strips only the first of several prefixes', () => {
    expect(extractBaseCaseNumber('dop-geplan-7', config)).toBe('GEPLAN-7');
  });

  it('keeps hyphens that are part of the number', () => {
    expect(extractBaseCaseNumber('2024-15', config)).toBe('2024-15');
    expect(extractBaseCaseNumber('-123', config)).toBe('-123');
  });

  it('collapses whitespace and uppercases', () => {
    expect(extractBaseCaseNumber('  geplan-  45 ', config)).toBe('45');
    expect(extractBaseCaseNumber('abc   9', config)).toBe('ABC 9');
  });

  it('strips pseudo-department prefixes as well', () => {
    expect(extractBaseCaseNumber('PROTOCOLO-99', config)).toBe('99');
  });

  it('keeps a prefix with nothing after it', () => {
    expect(extractBaseCaseNumber('GEPLAN-', config)).toBe('GEPLAN-');
  });
});

describe('normalizeStatus', () => {
  it('accepts a status of the location in free form', () => {
    expect(normalizeStatus('under review', 'GEPLAN', config)).toBe('UNDER_REVIEW');
    expect(normalizeStatus('field inspection', 'DOP', config)).toBe('FIELD_INSPECTION');
    expect(normalizeStatus('READY_TO_CLOSE', 'OUTBOUND_REVIEW', config)).toBe('READY_TO_CLOSE');
  });

  it('rejects statuses of other departments', () => {
    expect(normalizeStatus('FIELD_INSPECTION', 'GEPLAN', config)).toBeNull();
    expect(normalizeStatus('UNDER_REVIEW', 'INTAKE', config)).toBeNull();
  });
});

describe('formatDisplayNumber / isDepartmentCode', () => {
  it('prefixes the department', () => {
    expect(formatDisplayNumber('DOP', '123')).toBe('DOP-123');
  });

  it('recognizes concrete departments only', () => {
    expect(isDepartmentCode('GEFIN')).toBe(true);
    expect(isDepartmentCode('INTAKE')).toBe(false);
    expect(isDepartmentCode('geplan')).toBe(false);
  });
});
