import { DatabaseManager } from '../../src/database/DatabaseManager.js';
import { MigrationRunner } from '../../src/database/MigrationRunner.js';
import { DatabaseConnection } from '../../src/types/database.js';

/**
 * Test Database Utilities
 *
 * In-memory SQLite database with the full schema applied.
 */
export class TestDatabase {
  readonly manager: DatabaseManager;

  constructor() {
    this.manager = new DatabaseManager({
      type: 'sqlite3',
      database: 'test',
      filename: ':memory:',
    });
  }

  async create(): Promise<DatabaseConnection> {
    await this.manager.connect();
    const connection = this.manager.getConnection();
    await new MigrationRunner(connection).migrate();
    return connection;
  }

  getConnection(): DatabaseConnection {
    return this.manager.getConnection();
  }

  async destroy(): Promise<void> {
    await this.manager.disconnect();
  }
}

export async function createTestDatabase(): Promise<TestDatabase> {
  const testDb = new TestDatabase();
  await testDb.create();
  return testDb;
}
