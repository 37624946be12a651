import { DEPARTMENT_CODES } from '@shared/constants';
import type { DepartmentCode, Location } from '@shared/types';
import { normalizeText, statusesFor, type DepartmentConfig } from './department-config';

export interface NormalizeDepartmentOptions {
  /** Return INTAKE / OUTBOUND_REVIEW instead of mapping or dropping them. */
  allowPseudo?: boolean;
}

export function isDepartmentCode(value: string): value is DepartmentCode {
  return (DEPARTMENT_CODES as readonly string[]).includes(value);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Finds the earliest whole-word occurrence of any known token inside a longer
 * string ("GEPLAN - DOP" -> GEPLAN). The longer token wins when two start at
 * the same position.
 */
function findEmbedded(text: string, config: DepartmentConfig): Location | null {
  let best: { index: number; length: number; location: Location } | null = null;

  for (const [token, location] of config.aliasIndex) {
    const pattern = new RegExp(`(^|[^A-Z0-9])${escapeRegExp(token)}(?=$|[^A-Z0-9])`);
    const match = pattern.exec(text);
    if (!match) continue;
    const index = match.index + match[1].length;
    if (
      !best ||
      index < best.index ||
      (index === best.index && token.length > best.length)
    ) {
      best = { index, length: token.length, location };
    }
  }

  return best ? best.location : null;
}

function applyPseudoPolicy(
  location: Location,
  config: DepartmentConfig,
  allowPseudo: boolean,
): Location | null {
  if (allowPseudo) return location;
  if (location === 'INTAKE') return config.defaultDepartment;
  if (location === 'OUTBOUND_REVIEW') return null;
  return location;
}

export function normalizeDepartment(
  raw: string | null | undefined,
  config: DepartmentConfig,
): DepartmentCode | null;
export function normalizeDepartment(
  raw: string | null | undefined,
  config: DepartmentConfig,
  options: NormalizeDepartmentOptions,
): Location | null;
export function normalizeDepartment(
  raw: string | null | undefined,
  config: DepartmentConfig,
  options: NormalizeDepartmentOptions = {},
): Location | null {
  if (!raw) return null;
  const text = normalizeText(raw);
  if (!text) return null;

  const allowPseudo = options.allowPseudo ?? false;
  const exact = config.aliasIndex.get(text) ?? config.aliasIndex.get(text.replace(/ /g, '_'));
  if (exact) return applyPseudoPolicy(exact, config, allowPseudo);

  const embedded = findEmbedded(text, config);
  return embedded ? applyPseudoPolicy(embedded, config, allowPseudo) : null;
}

/**
 * Strips one leading "DEPT-" prefix, and only when the prefix on its own is a
 * known location. Numbers such as "2024-15" keep their hyphen.
 */
export function extractBaseCaseNumber(raw: string, config: DepartmentConfig): string {
  const trimmed = raw.replace(/\s+/g, ' ').trim().toUpperCase();
  const hyphen = trimmed.indexOf('-');
  if (hyphen <= 0) return trimmed;

  const prefix = normalizeText(trimmed.slice(0, hyphen));
  const rest = trimmed.slice(hyphen + 1).trim();
  if (!rest) return trimmed;

  return config.aliasIndex.has(prefix) ? rest : trimmed;
}

export function formatDisplayNumber(department: Location, baseNumber: string): string {
  return `${department}-${baseNumber}`;
}

export function normalizeStatus(
  raw: string | null | undefined,
  location: Location,
  config: DepartmentConfig,
): string | null {
  if (!raw) return null;
  const candidate = normalizeText(raw).replace(/ /g, '_');
  return statusesFor(config, location).find((status) => status === candidate) ?? null;
}
