import sqlite3 from 'sqlite3';
import path from 'path';
import fs from 'fs';
import { DatabaseConfig } from '../../config/types.js';
import { DatabaseConnection, ExecuteResult, SqlParam } from '../../types/database.js';
import {
  DatabaseError,
  DuplicateKeyError,
  ForeignKeyViolationError,
  ErrorCode,
} from '../../errors/index.js';
import { toError } from '../../utils/errorHandling.js';

const IN_MEMORY = ':memory:';

export class SqliteConnection implements DatabaseConnection {
  private db: sqlite3.Database | null = null;
  private config: DatabaseConfig;

  constructor(config: DatabaseConfig) {
    this.config = config;
  }

  async connect(): Promise<void> {
    const dbPath = this.config.filename;

    if (dbPath !== IN_MEMORY) {
      const dir = path.dirname(dbPath);
      try {
        fs.mkdirSync(dir, { recursive: true });
      } catch (err) {
        throw new DatabaseError(
          `Failed to create database directory: ${dir}`,
          ErrorCode.DATABASE_CONNECTION_FAILED,
          false,
          { service: 'SqliteConnection', operation: 'connect', metadata: { dir } },
          toError(err)
        );
      }
    }

    const db = await new Promise<sqlite3.Database>((resolve, reject) => {
      const handle = new sqlite3.Database(dbPath, err => {
        if (err) {
          reject(
            new DatabaseError(
              `Failed to connect to SQLite database: ${err.message}`,
              ErrorCode.DATABASE_CONNECTION_FAILED,
              true,
              {
                service: 'SqliteConnection',
                operation: 'connect',
                metadata: { dbPath },
              },
              err
            )
          );
        } else {
          resolve(handle);
        }
      });
    });

    this.db = db;
    // Cascades on lists, items and episodes depend on this
    await this.execute('PRAGMA foreign_keys = ON');
  }

  private requireDb(operation: string): sqlite3.Database {
    if (!this.db) {
      throw new DatabaseError(
        'Database not connected',
        ErrorCode.DATABASE_CONNECTION_FAILED,
        false,
        { service: 'SqliteConnection', operation }
      );
    }
    return this.db;
  }

  async query<T>(sql: string, params: SqlParam[] = []): Promise<T[]> {
    const db = this.requireDb('query');

    return new Promise((resolve, reject) => {
      db.all(sql, params, (err, rows) => {
        if (err) {
          reject(this.convertDatabaseError(err, sql, 'query'));
        } else {
          resolve(rows as T[]);
        }
      });
    });
  }

  async get<T>(sql: string, params: SqlParam[] = []): Promise<T | undefined> {
    const db = this.requireDb('get');

    return new Promise((resolve, reject) => {
      db.get(sql, params, (err, row) => {
        if (err) {
          reject(this.convertDatabaseError(err, sql, 'get'));
        } else {
          resolve(row as T | undefined);
        }
      });
    });
  }

  async execute(sql: string, params: SqlParam[] = []): Promise<ExecuteResult> {
    const db = this.requireDb('execute');
    const convert = (err: Error) => this.convertDatabaseError(err, sql, 'execute');

    return new Promise((resolve, reject) => {
      db.run(sql, params, function (err) {
        if (err) {
          reject(convert(err));
        } else {
          // 'this' is the statement context, providing changes and lastID
          resolve({
            affectedRows: this.changes,
            insertId: this.lastID,
          });
        }
      });
    });
  }

  async close(): Promise<void> {
    const db = this.db;
    if (!db) {
      return;
    }

    return new Promise((resolve, reject) => {
      db.close(err => {
        if (err) {
          reject(
            new DatabaseError(
              `Failed to close database: ${err.message}`,
              ErrorCode.DATABASE_CONNECTION_FAILED,
              false,
              { service: 'SqliteConnection', operation: 'close' },
              err
            )
          );
        } else {
          this.db = null;
          resolve();
        }
      });
    });
  }

  async beginTransaction(): Promise<void> {
    // Take the write lock up front so read-then-write sequences stay isolated
    await this.execute('BEGIN IMMEDIATE TRANSACTION');
  }

  async commit(): Promise<void> {
    await this.execute('COMMIT');
  }

  async rollback(): Promise<void> {
    await this.execute('ROLLBACK');
  }

  /**
   * Convert SQLite errors to ApplicationError types
   */
  private convertDatabaseError(error: Error, sql: string, operation: string): Error {
    const errorMessage = error.message.toLowerCase();
    const context = {
      service: 'SqliteConnection',
      operation,
      metadata: { sql, sqliteError: error.message },
    };

    // UNIQUE constraint failed: list_items.list_id, list_items.media_id
    if (errorMessage.includes('unique constraint')) {
      const match = error.message.match(/UNIQUE constraint failed: (\w+)\.([\w., ]+)/i);
      const table = match?.[1] ?? 'unknown';
      const key = match?.[2] ?? 'unknown';
      return new DuplicateKeyError(table, key, error.message, context);
    }

    if (errorMessage.includes('foreign key constraint')) {
      return new ForeignKeyViolationError('foreign_key', error.message, context);
    }

    return new DatabaseError(
      `Database ${operation} failed: ${error.message}`,
      ErrorCode.DATABASE_QUERY_FAILED,
      false,
      context,
      error
    );
  }
}
