import { DatabaseConnection, MigrationInterface } from '../types/database.js';
import { InitialSchemaMigration } from './migrations/20261018_001_initial_schema.js';
import { logger } from '../utils/logging.js';
import { DatabaseError, ErrorCode } from '../errors/index.js';
import { getErrorMessage, toError } from '../utils/errorHandling.js';

interface MigrationRecord {
  version: string;
}

/**
 * Migration Runner
 *
 * Applies migrations in version order, each inside its own transaction,
 * and records them in the migrations table.
 */
export class MigrationRunner {
  private db: DatabaseConnection;
  private migrations: MigrationInterface[];

  constructor(db: DatabaseConnection, migrations: MigrationInterface[] = [InitialSchemaMigration]) {
    this.db = db;
    this.migrations = [...migrations].sort((a, b) => a.version.localeCompare(b.version));
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

      logger.info('Running migration', {
        service: 'MigrationRunner',
        operation: 'migrate',
        version: migration.version,
        name: migration.migrationName,
      });

      try {
        await this.db.beginTransaction();
        await migration.up(this.db);
        await this.db.execute('INSERT INTO migrations (version, name) VALUES (?, ?)', [
          migration.version,
          migration.migrationName,
        ]);
        await this.db.commit();
      } catch (error) {
        await this.db.rollback();
        throw new DatabaseError(
          `Migration failed: ${migration.version} - ${getErrorMessage(error)}`,
          ErrorCode.DATABASE_MIGRATION_FAILED,
          false,
          { service: 'MigrationRunner', operation: 'migrate', metadata: { version: migration.version } },
          toError(error)
        );
      }
    }
  }

  async rollback(targetVersion?: string): Promise<void> {
    await this.ensureMigrationTable();
    const executedMigrations = await this.getExecutedMigrations();

    const migrationsToRollback = this.migrations
      .filter(migration => executedMigrations.includes(migration.version))
      .reverse();

    for (const migration of migrationsToRollback) {
      if (targetVersion && migration.version <= targetVersion) {
        break;
      }

      logger.info('Rolling back migration', {
        service: 'MigrationRunner',
        operation: 'rollback',
        version: migration.version,
      });

      try {
        await this.db.beginTransaction();
        await migration.down(this.db);
        await this.db.execute('DELETE FROM migrations WHERE version = ?', [migration.version]);
        await this.db.commit();
      } catch (error) {
        await this.db.rollback();
        throw new DatabaseError(
          `Rollback failed: ${migration.version} - ${getErrorMessage(error)}`,
          ErrorCode.DATABASE_MIGRATION_FAILED,
          false,
          { service: 'MigrationRunner', operation: 'rollback', metadata: { version: migration.version } },
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
      name: migration.migrationName,
      executed: executedMigrations.includes(migration.version),
    }));
  }
}
