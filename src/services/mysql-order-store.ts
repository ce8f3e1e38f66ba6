/**
 * MySQL Order Store
 * Pooled connections; the order row is locked with SELECT ... FOR UPDATE
 */

import mysql from 'mysql2/promise';
import type { Pool, PoolConnection, ResultSetHeader, RowDataPacket } from 'mysql2/promise';
import { Logger } from '../utils/logger';
import { ConfigurationError, ErrorHandler, errorCode } from '../utils/error-handler';
import type { MySQLConfig } from '../utils/config';
import type { OrderStore, StoreTransaction } from './order-store';
import { SqlTransaction } from './sql-transaction';
import { type RunResult, type SqlParam, type SqlRow, readNumber } from './sql-rows';

const SCHEMA_VERSION = 1;

const SCHEMA: string[] = [
  `CREATE TABLE IF NOT EXISTS accounts (
    username VARCHAR(24) NOT NULL PRIMARY KEY,
    password_sha256 CHAR(64) NOT NULL,
    first_name VARCHAR(100) NOT NULL DEFAULT '',
    last_name VARCHAR(100) NOT NULL DEFAULT '',
    address VARCHAR(500) NOT NULL DEFAULT '',
    card_number VARCHAR(32) NOT NULL DEFAULT '',
    card_expiry VARCHAR(5) NOT NULL DEFAULT '',
    card_code VARCHAR(3) NOT NULL DEFAULT ''
  ) ENGINE=InnoDB`,
  `CREATE TABLE IF NOT EXISTS restaurants (
    id INT NOT NULL AUTO_INCREMENT PRIMARY KEY,
    owner VARCHAR(24) NOT NULL,
    name VARCHAR(100) NOT NULL,
    deleted TINYINT(1) NOT NULL DEFAULT 0,
    CONSTRAINT fk_restaurants_owner FOREIGN KEY (owner) REFERENCES accounts (username) ON DELETE RESTRICT
  ) ENGINE=InnoDB`,
  `CREATE TABLE IF NOT EXISTS menu_items (
    id INT NOT NULL AUTO_INCREMENT PRIMARY KEY,
    restaurant_id INT NOT NULL,
    name VARCHAR(100) NOT NULL,
    price INT NOT NULL,
    deleted TINYINT(1) NOT NULL DEFAULT 0,
    CONSTRAINT chk_menu_items_price CHECK (price >= 0),
    CONSTRAINT fk_menu_items_restaurant FOREIGN KEY (restaurant_id) REFERENCES restaurants (id) ON DELETE RESTRICT
  ) ENGINE=InnoDB`,
  `CREATE TABLE IF NOT EXISTS restaurant_employees (
    restaurant_id INT NOT NULL,
    username VARCHAR(24) NOT NULL,
    PRIMARY KEY (restaurant_id, username),
    CONSTRAINT fk_employees_restaurant FOREIGN KEY (restaurant_id) REFERENCES restaurants (id) ON DELETE RESTRICT,
    CONSTRAINT fk_employees_account FOREIGN KEY (username) REFERENCES accounts (username) ON DELETE CASCADE
  ) ENGINE=InnoDB`,
  `CREATE TABLE IF NOT EXISTS orders (
    id INT NOT NULL AUTO_INCREMENT PRIMARY KEY,
    restaurant_id INT NOT NULL,
    username VARCHAR(24) NOT NULL,
    created_at VARCHAR(32) NOT NULL,
    address VARCHAR(500) NOT NULL DEFAULT '',
    total INT NOT NULL DEFAULT 0,
    status ENUM('PENDING', 'PAID', 'CANCELLED', 'ACCEPTED', 'DELIVERED') NOT NULL DEFAULT 'PENDING',
    INDEX idx_orders_restaurant_status (restaurant_id, status),
    INDEX idx_orders_username (username),
    CONSTRAINT fk_orders_restaurant FOREIGN KEY (restaurant_id) REFERENCES restaurants (id) ON DELETE RESTRICT,
    CONSTRAINT fk_orders_account FOREIGN KEY (username) REFERENCES accounts (username) ON DELETE RESTRICT
  ) ENGINE=InnoDB`,
  `CREATE TABLE IF NOT EXISTS order_items (
    order_id INT NOT NULL,
    item_id INT NOT NULL,
    quantity INT NOT NULL DEFAULT 0,
    PRIMARY KEY (order_id, item_id),
    CONSTRAINT chk_order_items_quantity CHECK (quantity >= 0),
    CONSTRAINT fk_order_items_order FOREIGN KEY (order_id) REFERENCES orders (id) ON DELETE RESTRICT,
    CONSTRAINT fk_order_items_item FOREIGN KEY (item_id) REFERENCES menu_items (id) ON DELETE RESTRICT
  ) ENGINE=InnoDB`,
  `CREATE TABLE IF NOT EXISTS schema_version (
    version INT NOT NULL
  ) ENGINE=InnoDB`
];

class MySQLTransaction extends SqlTransaction {
  protected readonly lockClause = 'FOR UPDATE';
  protected readonly greatestFunction = 'GREATEST';
  private open = true;

  constructor(private connection: PoolConnection) {
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

  protected async all(sql: string, params: SqlParam[] = []): Promise<SqlRow[]> {
    this.ensureOpen();
    const [rows] = await this.connection.query<RowDataPacket[]>(sql, params);
    return rows;
  }

  protected async run(sql: string, params: SqlParam[] = []): Promise<RunResult> {
    this.ensureOpen();
    const [result] = await this.connection.query<ResultSetHeader>(sql, params);
    return { changes: result.affectedRows, lastInsertId: result.insertId };
  }

  protected ignoreDuplicate(keyColumns: string[]): string {
    const column = keyColumns[0];
    return `ON DUPLICATE KEY UPDATE ${column} = ${column}`;
  }

  protected isDuplicateKeyError(error: unknown): boolean {
    return errorCode(error) === 'ER_DUP_ENTRY';
  }
}

export class MySQLOrderStore implements OrderStore {
  public readonly kind = 'mysql';
  private pool: Pool | null = null;
  private logger: Logger;
  private errorHandler: ErrorHandler;

  constructor(private config: MySQLConfig) {
    this.logger = new Logger('MySQLOrderStore');
    this.errorHandler = new ErrorHandler('MySQLOrderStore');
  }

  /**
   * Initialize the connection pool and create tables
   */
  async initialize(): Promise<void> {
    if (this.pool) return;

    this.logger.info('Connecting to MySQL database...', {
      host: this.config.host,
      port: this.config.port,
      database: this.config.database,
      user: this.config.user
    });

    const pool = mysql.createPool({
      host: this.config.host,
      port: this.config.port,
      user: this.config.user,
      password: this.config.password,
      database: this.config.database,
      connectionLimit: this.config.connectionLimit,
      waitForConnections: true
    });

    try {
      const connection = await pool.getConnection();
      try {
        await connection.ping();
        for (const statement of SCHEMA) {
          await connection.query(statement);
        }
        await this.checkSchemaVersion(connection);
      } finally {
        connection.release();
      }
    } catch (error) {
      this.logger.error('Failed to initialize MySQL database:', error);
      await pool.end();
      throw error;
    }

    this.pool = pool;
    this.logger.info('Successfully connected to MySQL database');
  }

  private async checkSchemaVersion(connection: PoolConnection): Promise<void> {
    const [rows] = await connection.query<RowDataPacket[]>('SELECT version FROM schema_version');
    if (rows.length === 0) {
      await connection.query('INSERT INTO schema_version (version) VALUES (?)', [SCHEMA_VERSION]);
      return;
    }

    const version = readNumber(rows[0], 'version');
    if (version !== SCHEMA_VERSION) {
      throw new ConfigurationError(`Incorrect database version ${version}; please (re)initialize the database`);
    }
  }

  async withTransaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    const connection = await this.connectionPool().getConnection();
    const tx = new MySQLTransaction(connection);

    try {
      await connection.query('SET SESSION innodb_lock_wait_timeout = ?', [this.config.lockWaitTimeoutSeconds]);
      await connection.beginTransaction();
    } catch (error) {
      tx.finish();
      connection.release();
      throw this.errorHandler.normalizeStoreError(error, 'START TRANSACTION');
    }

    try {
      const result = await work(tx);
      await connection.commit();
      return result;
    } catch (error) {
      await this.rollback(connection);
      throw this.errorHandler.normalizeStoreError(error, 'transaction');
    } finally {
      tx.finish();
      connection.release();
    }
  }

  private async rollback(connection: PoolConnection): Promise<void> {
    try {
      await connection.rollback();
    } catch (error) {
      this.logger.error('Rollback failed:', error);
    }
  }

  private connectionPool(): Pool {
    if (!this.pool) throw new Error('Database not connected');
    return this.pool;
  }

  /**
   * Close the connection pool
   */
  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      this.logger.info('MySQL database connection pool closed');
    }
  }
}

export default MySQLOrderStore;
