import { pgTable, uuid, text, serial, jsonb, timestamp, index } from 'drizzle-orm/pg-core';
import type { EventLocation, MovementKind } from '@shared/types';
import type { SnapshotRecord } from '@core/types';
import { processInstances } from './process-instances';

export const movementEvents = pgTable(
  'movement_events',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    instanceId: uuid('instance_id')
      .notNull()
      .references(() => processInstances.id, { onDelete: 'cascade' }),
    seq: serial('seq').notNull(),
    kind: text('kind').$type<MovementKind>().notNull(),
    fromDepartment: text('from_department').$type<EventLocation>().notNull(),
    toDepartment: text('to_department').$type<EventLocation>().notNull(),
    reason: text('reason').notNull().default(''),
    actor: text('actor').notNull(),
    occurredAt: timestamp('occurred_at', { withTimezone: true }).notNull().defaultNow(),
    snapshot: jsonb('snapshot').$type<SnapshotRecord>(),
  },
  (table) => [index('movement_events_replay_idx').on(table.instanceId, table.occurredAt, table.seq)],
);
