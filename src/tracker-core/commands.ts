import { z } from 'zod';
import { FIELD_VALUE_KINDS } from '@shared/constants';
import { isoDateSchema } from './attributes';

// ---------------------------------------------------------------------------
// Shared pieces
// ---------------------------------------------------------------------------

const requiredText = z.string().trim().min(1);
const nullableText = requiredText.nullable();
const nullableDate = isoDateSchema.nullable();

export const attributeValueSchema = z.union([z.string(), z.number()]);

const actorFields = {
  actor: requiredText,
  reason: z.string().optional(),
};

// ---------------------------------------------------------------------------
// Creation
// ---------------------------------------------------------------------------

export const createInstanceSchema = z.object({
  caseNumber: requiredText,
  department: requiredText,
  actor: requiredText,
  reason: z.string().optional(),
  subject: requiredText,
  stakeholder: requiredText,
  externalParty: nullableText.optional(),
  /** Join this existing cycle instead of the resolved one. */
  relationalKey: nullableText.optional(),
  /** Start a new cycle even when an active one exists. */
  newCycle: z.boolean().optional(),
  status: nullableText.optional(),
  coordinationUnit: nullableText.optional(),
  team: nullableText.optional(),
  notes: nullableText.optional(),
  assignedUserRef: nullableText.optional(),
  internalDeadline: nullableDate.optional(),
  finalDeadline: nullableDate.optional(),
  attributes: z.record(attributeValueSchema).optional(),
});

export type CreateInstanceInput = z.infer<typeof createInstanceSchema>;

// ---------------------------------------------------------------------------
// Transitions
// ---------------------------------------------------------------------------

export const editChangesSchema = z
  .object({
    subject: requiredText.optional(),
    stakeholder: requiredText.optional(),
    externalParty: nullableText.optional(),
    status: nullableText.optional(),
    coordinationUnit: nullableText.optional(),
    team: nullableText.optional(),
    notes: nullableText.optional(),
    internalDeadline: nullableDate.optional(),
    finalDeadline: nullableDate.optional(),
    attributes: z.record(attributeValueSchema.nullable()).optional(),
  })
  .strict();

export const transitionCommandSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('transfer'), to: requiredText, ...actorFields }),
  z.object({
    kind: z.literal('department_finalization'),
    nextDepartment: requiredText.optional(),
    ...actorFields,
  }),
  z.object({ kind: z.literal('global_finalization'), ...actorFields }),
  z.object({
    kind: z.literal('return_to_intake'),
    department: requiredText.optional(),
    ...actorFields,
  }),
  z.object({ kind: z.literal('reassignment'), assignee: requiredText, ...actorFields }),
  z.object({
    kind: z.literal('edit'),
    changes: editChangesSchema,
    propagateDescriptive: z.boolean().optional(),
    ...actorFields,
  }),
  z.object({ kind: z.literal('status_change'), status: nullableText, ...actorFields }),
]);

export type TransitionCommand = z.infer<typeof transitionCommandSchema>;
export type CommandOf<K extends TransitionCommand['kind']> = Extract<TransitionCommand, { kind: K }>;

// ---------------------------------------------------------------------------
// Field definitions
// ---------------------------------------------------------------------------

export const defineFieldSchema = z.object({
  key: requiredText,
  label: requiredText,
  valueKind: z.enum(FIELD_VALUE_KINDS),
});

export type DefineFieldInput = z.infer<typeof defineFieldSchema> & { department: string };
