import { DatabaseConnection } from '../types/database.js';
import { DatabaseConfig } from '../config/types.js';
import { SqliteConnection } from './connections/SqliteConnection.js';
import { logger } from '../utils/logging.js';
import { DatabaseError, ErrorCode } from '../errors/index.js';

export class DatabaseManager {
  private connection: DatabaseConnection | null = null;
  private config: DatabaseConfig;

  constructor(config: DatabaseConfig) {
    this.config = config;
  }

  async connect(): Promise<void> {
    if (this.connection) {
      return;
    }

    const connection = new SqliteConnection(this.config);
    await connection.connect();
    this.connection = connection;

    logger.info('Database connected', {
      service: 'DatabaseManager',
      operation: 'connect',
      filename: this.config.filename,
    });
  }

  async disconnect(): Promise<void> {
    if (this.connection) {
      await this.connection.close();
      this.connection = null;
    }
  }

  getConnection(): DatabaseConnection {
    if (!this.connection) {
      throw new DatabaseError(
        'Database not connected. Call connect() first.',
        ErrorCode.DATABASE_CONNECTION_FAILED,
        false,
        {
          service: 'DatabaseManager',
          operation: 'getConnection'
        }
      );
    }
    return this.connection;
  }

  isConnected(): boolean {
    return this.connection !== null;
  }
}
