import fs from 'fs';
import path from 'path';
import { closePool, getPool } from '../infrastructure/db';
import { logger } from '../infrastructure/logger';

// Same depth from src/db and dist/db.
const SCHEMA_PATH = path.resolve(__dirname, '..', '..', 'sql', 'schema.sql');

async function migrate() {
  logger.info({ event: 'db.migrate.start', schema: SCHEMA_PATH }, 'Running database migrations');
  const sql = fs.readFileSync(SCHEMA_PATH, 'utf-8');

  try {
    await getPool().query(sql);
    logger.info({ event: 'db.migrate.done', tables: ['pipeline_runs', 'user_notifications'] }, 'Migration complete');
  } catch (error) {
    logger.error({ event: 'db.migrate.failed', error: error instanceof Error ? error.message : String(error) }, 'Migration failed');
    process.exitCode = 1;
  } finally {
    await closePool();
  }
}

void migrate();
