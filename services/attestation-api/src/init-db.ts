/**
 * One-time database schema setup (run when starting from scratch).
 * Runs schema/init.sql to create the registry and fraud case tables.
 */

import fs from 'fs';
import path from 'path';
import { Pool } from 'pg';
import { config, logger } from '@attestation/shared';

const pool = new Pool({
  connectionString: config.databaseUrl,
});

// Beside the sources when run from src/, in the source tree when run from dist/
function resolveSchemaPath(): string {
  const candidates = [
    path.join(__dirname, 'schema', 'init.sql'),
    path.join(process.cwd(), 'services', 'attestation-api', 'src', 'schema', 'init.sql'),
    path.join(process.cwd(), 'src', 'schema', 'init.sql'),
  ];
  const found = candidates.find((candidate) => fs.existsSync(candidate));
  if (!found) {
    throw new Error(`init.sql not found (looked in ${candidates.join(', ')})`);
  }
  return found;
}

async function runInitSchema(): Promise<void> {
  const client = await pool.connect();

  try {
    logger.info('Running database schema (init.sql)');

    const schemaPath = resolveSchemaPath();
    const sql = fs.readFileSync(schemaPath, 'utf-8');
    await client.query(sql);

    logger.info('Database schema complete');
  } catch (error) {
    logger.error('Schema init failed', error);
    throw error;
  } finally {
    client.release();
    await pool.end();
  }
}

runInitSchema()
  .then(() => process.exit(0))
  .catch(() => process.exit(1));
