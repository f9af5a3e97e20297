import { DatabaseConfig } from '../config/types.js';
import { DatabaseConnection, ExecuteResult, SqlParam } from '../types/database.js';
import { SqliteConnection } from './connections/SqliteConnection.js';
import { logger } from '../middleware/logging.js';
import { DatabaseError, ErrorCode } from '../errors/index.js';
import { getErrorMessage } from '../utils/errorHandling.js';

export class DatabaseManager {
  private connection: DatabaseConnection | null = null;
  private config: DatabaseConfig;
  // Tail of the statement queue; every read, write and transaction chains onto it
  private queue: Promise<void> = Promise.resolve();

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
          operation: 'getConnection',
        }
      );
    }
    return this.connection;
  }

  /**
   * Reads wait for any open transaction too: on the shared connection they
   * would otherwise see its uncommitted rows.
   */
  async query<T>(sql: string, params?: SqlParam[]): Promise<T[]> {
    const connection = this.getConnection();
    return this.exclusive(() => connection.query<T>(sql, params));
  }

  async get<T>(sql: string, params?: SqlParam[]): Promise<T | undefined> {
    const connection = this.getConnection();
    return this.exclusive(() => connection.get<T>(sql, params));
  }

  /**
   * Standalone write. Queued behind any open transaction so it is never
   * committed or rolled back as part of another request's work.
   */
  async execute(sql: string, params?: SqlParam[]): Promise<ExecuteResult> {
    const connection = this.getConnection();
    return this.exclusive(() => connection.execute(sql, params));
  }

  /**
   * Run callback inside BEGIN IMMEDIATE ... COMMIT, rolling back on error.
   *
   * All requests share one SQLite connection, so transactions are serialized:
   * the callback must use the connection it is given, never this manager,
   * or it will wait on itself.
   */
  async transaction<T>(callback: (connection: DatabaseConnection) => Promise<T>): Promise<T> {
    const connection = this.getConnection();

    return this.exclusive(async () => {
      await connection.beginTransaction();
      try {
        const result = await callback(connection);
        await connection.commit();
        return result;
      } catch (error) {
        try {
          await connection.rollback();
        } catch (rollbackError) {
          logger.error('Transaction rollback failed', {
            error: getErrorMessage(rollbackError),
            originalError: getErrorMessage(error),
          });
        }
        throw error;
      }
    });
  }

  private exclusive<T>(work: () => Promise<T>): Promise<T> {
    const result = this.queue.then(work);
    // Keep the queue alive whatever the outcome; the caller still sees the rejection
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  isConnected(): boolean {
    return this.connection !== null;
  }
}
