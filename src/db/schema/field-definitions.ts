import { pgTable, uuid, text, timestamp, unique } from 'drizzle-orm/pg-core';
import type { DepartmentCode, FieldValueKind } from '@shared/types';

export const departmentFieldDefinitions = pgTable(
  'department_field_definitions',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    department: text('department').$type<DepartmentCode>().notNull(),
    key: text('key').notNull(),
    label: text('label').notNull(),
    valueKind: text('value_kind').$type<FieldValueKind>().notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [unique('department_field_definitions_key_uq').on(table.department, table.key)],
);
