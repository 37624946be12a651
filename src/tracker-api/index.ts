import { createServer } from 'http';
import { API_PREFIX } from '@shared/constants';
import { loadAssigneeDirectory } from '@core/assignees';
import { loadDepartmentConfig } from '@core/department-config';
import { ProcessEngine } from '@core/engine';
import { createDatabase } from '@db/connection';
import { DrizzleProcessStore } from '@db/drizzle-store';
import { config } from './config';
import { createApp } from './app';

async function start() {
  const departments = await loadDepartmentConfig(config.departmentsFile);
  console.warn(
    `[CONFIG] Loaded ${departments.departments.length} departments (${departments.aliasIndex.size} aliases)`,
  );
  const directory = await loadAssigneeDirectory(config.assigneesFile);
  console.warn(`[CONFIG] Loaded assignee grants from ${config.assigneesFile}`);

  const { db, pool } = createDatabase(config.database.url);
  const engine = new ProcessEngine({ store: new DrizzleProcessStore(db), config: departments, directory });
  const server = createServer(createApp(engine, { clientUrl: config.clientUrl, logRequests: config.isDev }));

  function shutdown(signal: string) {
    console.warn(`[SERVER] ${signal} received, shutting down`);
    server.close(() => {
      pool.end().then(
        () => process.exit(0),
        (err) => {
          console.error('[SERVER] Pool shutdown failed:', err);
          process.exit(1);
        },
      );
    });
    setTimeout(() => process.exit(1), 5000).unref();
  }

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  server.listen(config.port, () => {
    console.warn(`[SERVER] Process movement tracker API on port ${config.port}`);
    console.warn(`[SERVER] Health: http://localhost:${config.port}${API_PREFIX}/health`);
  });
}

start().catch((err) => {
  console.error('[SERVER] Failed to start:', err);
  process.exit(1);
});
