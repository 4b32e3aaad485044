import type { PoolClient } from 'pg';
import { pool } from './connection';
import { migrations } from './migrations';
import type { Migration } from './migrations/types';
import { logger, errorMessage } from '../../utils/logging';

// Create migrations table if not exists
const createMigrationsTable = async () => {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS migrations (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) UNIQUE NOT NULL,
      executed_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
    )
  `);
};

const isMigrationExecuted = async (name: string): Promise<boolean> => {
  const result = await pool.query<{ id: number }>(
    'SELECT id FROM migrations WHERE name = $1',
    [name]
  );
  return result.rows.length > 0;
};

// Bookkeeping goes through the same client so it commits or rolls back with the migration
const markMigrationExecuted = async (client: PoolClient, name: string) => {
  await client.query(
    'INSERT INTO migrations (name) VALUES ($1)',
    [name]
  );
};

const runMigration = async (name: string, migration: Migration) => {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await migration.up(client);
    await markMigrationExecuted(client, name);
    await client.query('COMMIT');
    logger.info(`Migration ${name} executed successfully`);
  } catch (error) {
    await client.query('ROLLBACK');
    logger.error(`Migration ${name} failed`, { error: errorMessage(error) });
    throw error;
  } finally {
    client.release();
  }
};

const rollbackMigration = async (name: string, migration: Migration) => {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await migration.down(client);
    await client.query('DELETE FROM migrations WHERE name = $1', [name]);
    await client.query('COMMIT');
    logger.info(`Migration ${name} rolled back successfully`);
  } catch (error) {
    await client.query('ROLLBACK');
    logger.error(`Migration ${name} rollback failed`, { error: errorMessage(error) });
    throw error;
  } finally {
    client.release();
  }
};

// Run all pending migrations
export const migrate = async () => {
  try {
    logger.info('Starting database migrations...');

    await createMigrationsTable();

    logger.info(`Found ${migrations.length} migration files`);

    for (const { name, migration } of migrations) {
      if (await isMigrationExecuted(name)) {
        logger.info(`Migration ${name} already executed, skipping...`);
        continue;
      }

      await runMigration(name, migration);
    }

    logger.info('All migrations completed successfully!');
  } catch (error) {
    logger.error('Migration error', { error: errorMessage(error) });
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
};

// Rollback last migration
export const rollback = async () => {
  try {
    logger.info('Rolling back last migration...');

    await createMigrationsTable();

    const result = await pool.query<{ name: string }>(
      'SELECT name FROM migrations ORDER BY executed_at DESC, id DESC LIMIT 1'
    );

    if (result.rows.length === 0) {
      logger.info('No migrations to rollback');
      return;
    }

    const lastMigrationName = result.rows[0].name;
    const migrationInfo = migrations.find(m => m.name === lastMigrationName);

    if (!migrationInfo) {
      logger.error(`Migration ${lastMigrationName} not found in migrations list`);
      return;
    }

    await rollbackMigration(lastMigrationName, migrationInfo.migration);
    logger.info('Rollback completed successfully!');
  } catch (error) {
    logger.error('Rollback error', { error: errorMessage(error) });
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
};

// Run if called directly
if (require.main === module) {
  const command = process.argv[2];

  const run = command === 'rollback' ? rollback : migrate;
  void run();
}
