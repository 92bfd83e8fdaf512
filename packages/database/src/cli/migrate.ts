import { createLogger } from '@shopsense/logger';

import { closePool, createDbPool } from '../db.js';
import { loadMigrations, runMigrations } from '../migrate.js';

const logger = createLogger({ service: 'db-migrate', env: 'development', level: 'info' });

async function run(): Promise<void> {
  const databaseUrl = process.env['DATABASE_URL'];
  if (!databaseUrl) {
    throw new Error('Missing DATABASE_URL');
  }

  const pool = createDbPool({ connectionString: databaseUrl, poolSize: 1 });
  try {
    const applied = await runMigrations({ pool, logger, migrations: await loadMigrations() });
    logger.info({ applied: applied.length }, 'Migrations complete');
  } finally {
    await closePool(pool);
  }
}

void run().catch((error: unknown) => {
  logger.fatal({ error }, 'Migration failed');
  process.exitCode = 1;
});
