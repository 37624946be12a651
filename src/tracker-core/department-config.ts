import { readFile } from 'fs/promises';
import { z } from 'zod';
import { DEPARTMENT_CODES } from '@shared/constants';
import type { DepartmentCode, Location } from '@shared/types';

// --- Types ---

export interface DepartmentDefinition {
  code: DepartmentCode;
  label: string;
  aliases: string[];
  statuses: string[];
}

export interface DepartmentConfig {
  departments: DepartmentDefinition[];
  defaultDepartment: DepartmentCode;
  intakeSynonyms: string[];
  outboundReview: { synonyms: string[]; statuses: string[] };
  /** Normalized code, alias or synonym -> location. */
  aliasIndex: Map<string, Location>;
}

// --- Schema ---

const departmentSchema = z.object({
  code: z.enum(DEPARTMENT_CODES),
  label: z.string().min(1),
  aliases: z.array(z.string().min(1)).default([]),
  statuses: z.array(z.string().min(1)).min(1),
});

export const departmentConfigSchema = z
  .object({
    defaultDepartment: z.enum(DEPARTMENT_CODES),
    intakeSynonyms: z.array(z.string().min(1)).min(1),
    outboundReview: z.object({
      synonyms: z.array(z.string().min(1)).min(1),
      statuses: z.array(z.string().min(1)).min(1),
    }),
    departments: z.array(departmentSchema),
  })
  .superRefine((value, ctx) => {
    const seen = new Set(value.departments.map((d) => d.code));
    const missing = DEPARTMENT_CODES.filter((code) => !seen.has(code));
    if (missing.length > 0 || seen.size !== value.departments.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['departments'],
        message: `Every department must be listed exactly once (missing: ${missing.join(', ') || 'none'})`,
      });
    }
  });

// --- Builder ---

/** Accent-strips, uppercases and collapses whitespace. */
export function normalizeText(raw: string): string {
  return raw
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toUpperCase()
    .replace(/\s+/g, ' ')
    .trim();
}

function indexToken(index: Map<string, Location>, token: string, location: Location): void {
  const key = normalizeText(token);
  const existing = index.get(key);
  if (existing && existing !== location) {
    throw new Error(`Alias '${token}' is claimed by both ${existing} and ${location}`);
  }
  index.set(key, location);
}

export function buildDepartmentConfig(raw: unknown): DepartmentConfig {
  const parsed = departmentConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid department configuration: ${parsed.error.message}`);
  }
  const value = parsed.data;

  // Keep the fixed vocabulary order regardless of file order.
  const departments = [...value.departments].sort(
    (a, b) => DEPARTMENT_CODES.indexOf(a.code) - DEPARTMENT_CODES.indexOf(b.code),
  );

  const aliasIndex = new Map<string, Location>();
  for (const dept of departments) {
    indexToken(aliasIndex, dept.code, dept.code);
    for (const alias of dept.aliases) {
      indexToken(aliasIndex, alias, dept.code);
    }
  }
  indexToken(aliasIndex, 'INTAKE', 'INTAKE');
  for (const synonym of value.intakeSynonyms) {
    indexToken(aliasIndex, synonym, 'INTAKE');
  }
  indexToken(aliasIndex, 'OUTBOUND_REVIEW', 'OUTBOUND_REVIEW');
  for (const synonym of value.outboundReview.synonyms) {
    indexToken(aliasIndex, synonym, 'OUTBOUND_REVIEW');
  }

  return {
    departments,
    defaultDepartment: value.defaultDepartment,
    intakeSynonyms: value.intakeSynonyms,
    outboundReview: value.outboundReview,
    aliasIndex,
  };
}

// --- Loader ---

export async function loadDepartmentConfig(filePath: string): Promise<DepartmentConfig> {
  const raw = await readFile(filePath, 'utf-8');
  return buildDepartmentConfig(JSON.parse(raw));
}

export function statusesFor(config: DepartmentConfig, location: Location): string[] {
  if (location === 'OUTBOUND_REVIEW') return config.outboundReview.statuses;
  if (location === 'INTAKE') return [];
  return config.departments.find((d) => d.code === location)?.statuses ?? [];
}
