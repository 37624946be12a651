import { pgTable, uuid, text, date, boolean, jsonb, timestamp, index } from 'drizzle-orm/pg-core';
import type { AttributeBag, Location } from '@shared/types';

export const processInstances = pgTable(
  'process_instances',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    caseNumberDisplay: text('case_number_display').notNull(),
    caseNumberBase: text('case_number_base').notNull(),
    relationalKey: text('relational_key'),
    currentDepartment: text('current_department').$type<Location>().notNull(),
    subject: text('subject').notNull(),
    stakeholder: text('stakeholder').notNull(),
    externalParty: text('external_party'),
    internalDeadline: date('internal_deadline', { mode: 'string' }),
    finalDeadline: date('final_deadline', { mode: 'string' }),
    status: text('status'),
    coordinationUnit: text('coordination_unit'),
    team: text('team'),
    notes: text('notes'),
    attributes: jsonb('attributes').$type<AttributeBag>().notNull().default({}),
    assignedUserRef: text('assigned_user_ref'),
    returnedForTriage: boolean('returned_for_triage').notNull().default(false),
    closedAt: timestamp('closed_at', { withTimezone: true }),
    closedBy: text('closed_by'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('process_instances_group_idx').on(table.caseNumberBase, table.relationalKey),
    index('process_instances_open_idx').on(table.closedAt, table.currentDepartment),
  ],
);
