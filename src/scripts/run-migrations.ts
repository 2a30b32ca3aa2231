/**
 * Database Migration Runner
 *
 * Applies the node-pg-migrate migrations against the configured database.
 * Run after a build: `node dist/src/scripts/run-migrations.js`.
 */

import * as path from 'path';
import runner from 'node-pg-migrate';
import { loadEnvironmentConfig, validateEnvironmentConfig } from '../config/environment';
import { log, LogLevel } from '../utils/logger';
import { errorMessage } from '../utils/fs-errors';

interface MigrationResult {
  success: boolean;
  message: string;
  applied: string[];
  error?: string;
}

/**
 * Run pending migrations
 */
export async function runMigrations(direction: 'up' | 'down' = 'up'): Promise<MigrationResult> {
  const config = loadEnvironmentConfig();

  try {
    validateEnvironmentConfig(config);

    const migrations = await runner({
      databaseUrl: {
        host: config.dbHost,
        port: config.dbPort,
        database: config.dbName,
        user: config.dbUser,
        password: config.dbPassword,
        ssl: config.dbSsl ? { rejectUnauthorized: false } : undefined,
      },
      dir: path.join(__dirname, '..', '..', 'migrations'),
      direction,
      migrationsTable: 'pgmigrations',
      count: direction === 'down' ? 1 : Infinity,
      log: (message: string) => log(LogLevel.INFO, message, { operation: 'MIGRATION' }),
    });

    const applied = migrations.map((migration) => migration.name);
    log(LogLevel.INFO, 'Migrations completed', { direction, applied_count: applied.length });

    return { success: true, message: 'Migrations completed successfully', applied };
  } catch (error) {
    log(LogLevel.ERROR, 'Migration failed', { direction, error: errorMessage(error) });

    return {
      success: false,
      message: 'Migration failed',
      applied: [],
      error: errorMessage(error),
    };
  }
}

if (require.main === module) {
  runMigrations(process.argv[2] === 'down' ? 'down' : 'up')
    .then((result) => {
      process.exitCode = result.success ? 0 : 1;
    })
    .catch((error: unknown) => {
      log(LogLevel.ERROR, 'Migration runner crashed', { error: errorMessage(error) });
      process.exitCode = 1;
    });
}
