import 'dotenv/config';
import { createStaticDirectory } from '@core/assignees';
import { loadDepartmentConfig } from '@core/department-config';
import { ProcessEngine } from '@core/engine';
import { createDatabase, DEFAULT_DATABASE_URL } from './connection';
import { DrizzleProcessStore } from './drizzle-store';

// Assigns explicit relational keys to every legacy ungrouped instance, one
// committed transaction per batch. Usage: backfill-relational-keys [batchSize]

async function main() {
  const batchSize = parseInt(process.argv[2] || '500', 10);
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new Error(`Batch size must be a positive integer, got '${process.argv[2]}'`);
  }

  const { db, pool } = createDatabase(process.env.DATABASE_URL || DEFAULT_DATABASE_URL);
  try {
    const engine = new ProcessEngine({
      store: new DrizzleProcessStore(db),
      config: await loadDepartmentConfig(process.env.DEPARTMENTS_FILE || 'config/departments.json'),
      directory: createStaticDirectory([]),
    });

    const result = await engine.backfillRelationalKeys({ batchSize });
    if (!result.ok) {
      throw new Error(`${result.error.reason}: ${result.error.message}`);
    }
    const { batches, groups, instances } = result.data;
    console.warn(`[BACKFILL] Done: ${instances} instances in ${groups} groups over ${batches} batches`);
  } finally {
    await pool.end();
  }
}

main().catch((err) => {
  console.error('[BACKFILL] Failed:', err);
  process.exit(1);
});
