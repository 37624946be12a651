import 'dotenv/config';
import { migrate } from 'drizzle-orm/node-postgres/migrator';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { createDatabase, DEFAULT_DATABASE_URL } from './connection';

const __dirname = dirname(fileURLToPath(import.meta.url));

async function main() {
  const { db, pool } = createDatabase(process.env.DATABASE_URL || DEFAULT_DATABASE_URL);

  console.warn('[DB] Running migrations...');
  await migrate(db, { migrationsFolder: join(__dirname, 'migrations') });
  console.warn('[DB] Migrations completed');

  await pool.end();
}

main().catch((err) => {
  console.error('[DB] Migration failed:', err);
  process.exit(1);
});
