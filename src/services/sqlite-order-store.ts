/**
 * SQLite Order Store
 * Single-connection store; transactions run one at a time with BEGIN IMMEDIATE
 */

import sqlite3 from 'sqlite3';
import { Logger } from '../utils/logger';
import { ConfigurationError, ErrorHandler, errorCode } from '../utils/error-handler';
import type { SQLiteConfig } from '../utils/config';
import type { OrderStore, StoreTransaction } from './order-store';
import { SqlTransaction } from './sql-transaction';
import { type RunResult, type SqlParam, type SqlRow, readNumber } from './sql-rows';

const SCHEMA_VERSION = 1;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS accounts (
    username TEXT NOT NULL PRIMARY KEY,
    password_sha256 TEXT NOT NULL,
    first_name TEXT NOT NULL DEFAULT '',
    last_name TEXT NOT NULL DEFAULT '',
    address TEXT NOT NULL DEFAULT '',
    card_number TEXT NOT NULL DEFAULT '',
    card_expiry TEXT NOT NULL DEFAULT '',
    card_code TEXT NOT NULL DEFAULT ''
  );

  CREATE TABLE IF NOT EXISTS restaurants (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    owner TEXT NOT NULL REFERENCES accounts (username) ON DELETE RESTRICT,
    name TEXT NOT NULL,
    deleted INTEGER NOT NULL DEFAULT 0 CHECK (deleted IN (0, 1))
  );

  CREATE TABLE IF NOT EXISTS menu_items (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    restaurant_id INTEGER NOT NULL REFERENCES restaurants (id) ON DELETE RESTRICT,
    name TEXT NOT NULL,
    price INTEGER NOT NULL CHECK (price >= 0),
    deleted INTEGER NOT NULL DEFAULT 0 CHECK (deleted IN (0, 1))
  );

  CREATE TABLE IF NOT EXISTS restaurant_employees (
    restaurant_id INTEGER NOT NULL REFERENCES restaurants (id) ON DELETE RESTRICT,
    username TEXT NOT NULL REFERENCES accounts (username) ON DELETE CASCADE,
    PRIMARY KEY (restaurant_id, username)
  );

  CREATE TABLE IF NOT EXISTS orders (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    restaurant_id INTEGER NOT NULL REFERENCES restaurants (id) ON DELETE RESTRICT,
    username TEXT NOT NULL REFERENCES accounts (username) ON DELETE RESTRICT,
    created_at TEXT NOT NULL,
    address TEXT NOT NULL DEFAULT '',
    total INTEGER NOT NULL DEFAULT 0,
    status TEXT NOT NULL DEFAULT 'PENDING'
      CHECK (status IN ('PENDING', 'PAID', 'CANCELLED', 'ACCEPTED', 'DELIVERED'))
  );

  CREATE TABLE IF NOT EXISTS order_items (
    order_id INTEGER NOT NULL REFERENCES orders (id) ON DELETE RESTRICT,
    item_id INTEGER NOT NULL REFERENCES menu_items (id) ON DELETE RESTRICT,
    quantity INTEGER NOT NULL DEFAULT 0 CHECK (quantity >= 0),
    PRIMARY KEY (order_id, item_id)
  );

  CREATE INDEX IF NOT EXISTS idx_orders_restaurant_status ON orders (restaurant_id, status);
  CREATE INDEX IF NOT EXISTS idx_orders_username ON orders (username);
  CREATE INDEX IF NOT EXISTS idx_menu_items_restaurant ON menu_items (restaurant_id);
`;

class SQLiteTransaction extends SqlTransaction {
  protected readonly lockClause = '';
  protected readonly greatestFunction = 'MAX';
  private open = true;

  constructor(private db: sqlite3.Database) {
    super();
  }

  finish(): void {
    this.open = false;
  }

  private ensureOpen(): void {
    if (!this.open) {
      throw new Error('Transaction handle used after its transaction ended');
    }
  }

  protected all(sql: string, params: SqlParam[] = []): Promise<SqlRow[]> {
    this.ensureOpen();
    return new Promise((resolve, reject) => {
      this.db.all(sql, params, (err: Error | null, rows: SqlRow[]) => {
        if (err) {
          reject(err);
        } else {
          resolve(rows);
        }
      });
    });
  }

  protected run(sql: string, params: SqlParam[] = []): Promise<RunResult> {
    this.ensureOpen();
    return new Promise((resolve, reject) => {
      this.db.run(sql, params, function (this: sqlite3.RunResult, err: Error | null) {
        if (err) {
          reject(err);
        } else {
          resolve({ changes: this.changes, lastInsertId: this.lastID });
        }
      });
    });
  }

  protected ignoreDuplicate(keyColumns: string[]): string {
    return `ON CONFLICT (${keyColumns.join(', ')}) DO NOTHING`;
  }

  protected isDuplicateKeyError(error: unknown): boolean {
    return errorCode(error) === 'SQLITE_CONSTRAINT'
      && error instanceof Error
      && /UNIQUE|PRIMARY KEY/.test(error.message);
  }
}

export class SQLiteOrderStore implements OrderStore {
  public readonly kind = 'sqlite';
  private db: sqlite3.Database | null = null;
  private logger: Logger;
  private errorHandler: ErrorHandler;
  private queue: Promise<void> = Promise.resolve();
  private isInitialized = false;

  constructor(private config: SQLiteConfig) {
    this.logger = new Logger('SQLiteOrderStore');
    this.errorHandler = new ErrorHandler('SQLiteOrderStore');
  }

  /**
   * Open the database file and create tables
   */
  async initialize(): Promise<void> {
    if (this.isInitialized) return;

    this.logger.info(`Opening SQLite database ${this.config.databasePath}`);
    const db = await new Promise<sqlite3.Database>((resolve, reject) => {
      const handle = new sqlite3.Database(this.config.databasePath, (err: Error | null) => {
        if (err) {
          reject(err);
        } else {
          resolve(handle);
        }
      });
    });
    db.configure('busyTimeout', this.config.busyTimeoutMs);
    this.db = db;

    await this.exec('PRAGMA foreign_keys = ON');
    await this.exec(SCHEMA);
    await this.checkSchemaVersion();

    this.isInitialized = true;
    this.logger.info('SQLite database initialized successfully');
  }

  private async checkSchemaVersion(): Promise<void> {
    const version = await new Promise<number>((resolve, reject) => {
      this.connection().get('PRAGMA user_version', (err: Error | null, row: SqlRow) => {
        if (err) {
          reject(err);
        } else {
          resolve(readNumber(row, 'user_version'));
        }
      });
    });

    if (version === 0) {
      await this.exec(`PRAGMA user_version = ${SCHEMA_VERSION}`);
    } else if (version !== SCHEMA_VERSION) {
      throw new ConfigurationError(`Incorrect database version ${version}; please (re)initialize the database`);
    }
  }

  async withTransaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    return this.serialize(async () => {
      const tx = new SQLiteTransaction(this.connection());
      try {
        await this.exec('BEGIN IMMEDIATE');
      } catch (error) {
        throw this.errorHandler.normalizeStoreError(error, 'BEGIN');
      }

      try {
        const result = await work(tx);
        await this.exec('COMMIT');
        return result;
      } catch (error) {
        await this.rollback();
        throw this.errorHandler.normalizeStoreError(error, 'transaction');
      } finally {
        tx.finish();
      }
    });
  }

  async close(): Promise<void> {
    const db = this.db;
    if (!db) return;

    await this.queue;
    await new Promise<void>((resolve, reject) => {
      db.close((err: Error | null) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
    this.db = null;
    this.isInitialized = false;
    this.logger.info('SQLite database connection closed');
  }

  /**
   * Queue `work` behind every transaction already started on this connection
   */
  private serialize<T>(work: () => Promise<T>): Promise<T> {
    const result = this.queue.then(work);
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private async rollback(): Promise<void> {
    try {
      await this.exec('ROLLBACK');
    } catch (error) {
      this.logger.error('Rollback failed:', error);
    }
  }

  private connection(): sqlite3.Database {
    if (!this.db) throw new Error('Database not connected');
    return this.db;
  }

  private exec(sql: string): Promise<void> {
    const db = this.connection();
    return new Promise((resolve, reject) => {
      db.exec(sql, (err: Error | null) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }
}

export default SQLiteOrderStore;
