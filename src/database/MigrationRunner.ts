import { DatabaseConnection, Migration } from '../types/database.js';
import { InitialSchemaMigration } from './migrations/20261019_001_initial_schema.js';
import { logger } from '../middleware/logging.js';
import { DatabaseError, ErrorCode } from '../errors/index.js';
import { getErrorMessage, toError } from '../utils/errorHandling.js';

interface MigrationRecord {
  version: string;
}

/**
 * Migration Runner
 *
 * Applies each migration inside its own transaction and records it in the
 * `migrations` table. New schema changes get a new dated migration class
 * appended to the list below.
 */
export class MigrationRunner {
  private db: DatabaseConnection;
  private migrations: Migration[];

  constructor(db: DatabaseConnection) {
    this.db = db;

    this.migrations = [
      {
        version: InitialSchemaMigration.version,
        name: InitialSchemaMigration.migrationName,
        up: InitialSchemaMigration.up,
        down: InitialSchemaMigration.down,
      },
    ];
  }

  async ensureMigrationTable(): Promise<void> {
    await this.db.execute(`
      CREATE TABLE IF NOT EXISTS migrations (
        version VARCHAR(255) PRIMARY KEY,
        name VARCHAR(255) NOT NULL,
        executed_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `);
  }

  async getExecutedMigrations(): Promise<string[]> {
    const results = await this.db.query<MigrationRecord>(
      'SELECT version FROM migrations ORDER BY version'
    );
    return results.map(row => row.version);
  }

  async migrate(): Promise<void> {
    await this.ensureMigrationTable();
    const executedMigrations = await this.getExecutedMigrations();

    for (const migration of this.migrations) {
      if (executedMigrations.includes(migration.version)) {
        continue;
      }

      logger.info(`Running migration: ${migration.version} - ${migration.name}`);

      try {
        await this.db.beginTransaction();
        await migration.up(this.db);
        await this.db.execute('INSERT INTO migrations (version, name) VALUES (?, ?)', [
          migration.version,
          migration.name,
        ]);
        await this.db.commit();

        logger.info(`Migration completed: ${migration.version}`);
      } catch (error) {
        await this.db.rollback();
        throw new DatabaseError(
          `Migration failed: ${migration.version} - ${getErrorMessage(error)}`,
          ErrorCode.DATABASE_QUERY_FAILED,
          false,
          { service: 'MigrationRunner', operation: 'migrate' },
          toError(error)
        );
      }
    }
  }

  async rollback(targetVersion?: string): Promise<void> {
    await this.ensureMigrationTable();
    const executedMigrations = await this.getExecutedMigrations();

    // Newest first
    const migrationsToRollback = this.migrations
      .filter(migration => executedMigrations.includes(migration.version))
      .reverse();

    for (const migration of migrationsToRollback) {
      if (targetVersion && migration.version <= targetVersion) {
        break;
      }

      logger.info(`Rolling back migration: ${migration.version} - ${migration.name}`);

      try {
        await this.db.beginTransaction();
        await migration.down(this.db);
        await this.db.execute('DELETE FROM migrations WHERE version = ?', [migration.version]);
        await this.db.commit();

        logger.info(`Rollback completed: ${migration.version}`);
      } catch (error) {
        await this.db.rollback();
        throw new DatabaseError(
          `Rollback failed: ${migration.version} - ${getErrorMessage(error)}`,
          ErrorCode.DATABASE_QUERY_FAILED,
          false,
          { service: 'MigrationRunner', operation: 'rollback' },
          toError(error)
        );
      }
    }
  }

  async status(): Promise<Array<{ version: string; name: string; executed: boolean }>> {
    await this.ensureMigrationTable();
    const executedMigrations = await this.getExecutedMigrations();

    return this.migrations.map(migration => ({
      version: migration.version,
      name: migration.name,
      executed: executedMigrations.includes(migration.version),
    }));
  }
}
