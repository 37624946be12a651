import { z } from 'zod';
import type { AttributeBag, AttributeValue, FieldValueKind } from '@shared/types';
import type { FieldDefinition } from './types';

export const FIELD_KEY_PATTERN = /^[a-z][a-z0-9_]*$/;

export const isoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date')
  .refine((value) => {
    const date = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(date.getTime()) && date.toISOString().startsWith(value);
  }, 'Not a calendar date');

const valueSchemas: Record<FieldValueKind, z.ZodType<AttributeValue>> = {
  text: z.string().trim().min(1),
  number: z.number().finite(),
  date: isoDateSchema,
};

export type AttributeValidationResult =
  | { success: true; data: AttributeBag }
  | { success: false; error: string };

/**
 * Merges `changes` into `current`, validating each written key against the
 * definitions of the department the instance is in. A null value removes the
 * key.
 */
export function applyAttributeChanges(
  current: AttributeBag,
  changes: Record<string, AttributeValue | null>,
  definitions: FieldDefinition[],
): AttributeValidationResult {
  const byKey = new Map(definitions.map((d) => [d.key, d]));
  const next: AttributeBag = { ...current };

  for (const [key, value] of Object.entries(changes)) {
    if (value === null) {
      delete next[key];
      continue;
    }
    const definition = byKey.get(key);
    if (!definition) {
      return { success: false, error: `Unknown attribute '${key}'` };
    }
    const result = valueSchemas[definition.valueKind].safeParse(value);
    if (!result.success) {
      return {
        success: false,
        error: `Attribute '${key}' must be a ${definition.valueKind}: ${result.error.issues[0]?.message ?? 'invalid value'}`,
      };
    }
    next[key] = result.data;
  }

  return { success: true, data: next };
}
