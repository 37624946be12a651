import { readFile } from 'fs/promises';
import { z } from 'zod';
import { DEPARTMENT_CODES } from '@shared/constants';
import type { DepartmentCode } from '@shared/types';

export interface AssigneeGrant {
  ref: string;
  departments: DepartmentCode[];
  coordinationUnits: string[];
  teams: string[];
}

/** Port to whatever owns people and permissions. */
export interface AssigneeDirectory {
  lookup(ref: string): Promise<AssigneeGrant | null>;
}

const grantSchema = z.object({
  ref: z.string().min(1),
  departments: z.array(z.enum(DEPARTMENT_CODES)),
  coordinationUnits: z.array(z.string()).default([]),
  teams: z.array(z.string()).default([]),
});

export const assigneeFileSchema = z.object({ assignees: z.array(grantSchema) });

export function createStaticDirectory(grants: AssigneeGrant[]): AssigneeDirectory {
  const byRef = new Map(grants.map((g) => [g.ref, g]));
  return {
    async lookup(ref) {
      return byRef.get(ref) ?? null;
    },
  };
}

export async function loadAssigneeDirectory(filePath: string): Promise<AssigneeDirectory> {
  const raw = await readFile(filePath, 'utf-8');
  const parsed = assigneeFileSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Invalid assignee file ${filePath}: ${parsed.error.message}`);
  }
  return createStaticDirectory(parsed.data.assignees);
}
