/**
 * Database Migration Runner
 *
 * Runs the SQL files in migrations/ in name order.
 */

import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { config, logger } from '@docintake/shared';
import { createPool } from './lib/db';

const pool = createPool(config.databaseUrl);

/** Next to the compiled file when copied there, otherwise the source tree */
function findMigrationsDir(): string {
  const candidates = [
    path.join(__dirname, 'migrations'),
    path.resolve(__dirname, '../../../../services/web-api/src/migrations'),
  ];
  const found = candidates.find((dir) => fs.existsSync(dir));
  if (!found) {
    throw new Error(`Migrations directory not found (tried ${candidates.join(', ')})`);
  }
  return found;
}

async function runMigrations(): Promise<void> {
  const client = await pool.connect();

  try {
    logger.info('Running database migrations');

    const migrationsDir = findMigrationsDir();
    const migrationFiles = fs.readdirSync(migrationsDir)
      .filter(f => f.endsWith('.sql'))
      .sort();

    for (const file of migrationFiles) {
      logger.info('Running migration', { file });

      const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf-8');
      await client.query(sql);

      logger.info('Migration complete', { file });
    }

    logger.info('All migrations complete');
  } catch (error) {
    logger.error('Migration failed', error);
    throw error;
  } finally {
    client.release();
    await pool.end();
  }
}

runMigrations()
  .then(() => process.exit(0))
  .catch(() => process.exit(1));
