/**
 * Configuration management for the order engine
 */

import dotenv from 'dotenv';
import { ConfigurationError } from './error-handler';
import { Logger, type LogLevel, isLogLevel } from './logger';

// Load environment variables
dotenv.config();

export type StoreType = 'sqlite' | 'mysql';

export interface SQLiteConfig {
  databasePath: string;
  busyTimeoutMs: number;
}

export interface MySQLConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  connectionLimit: number;
  lockWaitTimeoutSeconds: number;
}

export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private storeType: StoreType;
  private logLevel: LogLevel;

  private constructor() {
    this.storeType = this.loadStoreType();
    this.logLevel = this.loadLogLevel();
    Logger.setLevel(this.logLevel);
  }

  public static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  /**
   * Drop the cached instance so the next getInstance() re-reads process.env
   */
  public static reset(): void {
    ConfigManager.instance = undefined;
  }

  private loadStoreType(): StoreType {
    const dbType = (process.env.DB_TYPE || 'sqlite').toLowerCase();
    if (dbType !== 'sqlite' && dbType !== 'mysql') {
      throw new ConfigurationError(`Unsupported DB_TYPE "${process.env.DB_TYPE}" (expected sqlite or mysql)`);
    }
    return dbType;
  }

  private loadLogLevel(): LogLevel {
    const level = (process.env.LOG_LEVEL || 'info').toLowerCase();
    if (!isLogLevel(level)) {
      throw new ConfigurationError(`Unsupported LOG_LEVEL "${process.env.LOG_LEVEL}"`);
    }
    return level;
  }

  private readInteger(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw === '') return fallback;

    const value = parseInt(raw, 10);
    if (isNaN(value) || value < 0) {
      throw new ConfigurationError(`Environment variable ${name} must be a non-negative integer, got "${raw}"`);
    }
    return value;
  }

  public getStoreType(): StoreType {
    return this.storeType;
  }

  public getLogLevel(): LogLevel {
    return this.logLevel;
  }

  public getLockWaitTimeoutSeconds(): number {
    return this.readInteger('LOCK_WAIT_TIMEOUT_SECONDS', 5);
  }

  public getSQLiteConfig(): SQLiteConfig {
    return {
      databasePath: process.env.DATABASE_PATH || './restaurant.db',
      busyTimeoutMs: this.getLockWaitTimeoutSeconds() * 1000
    };
  }

  public getMySQLConfig(): MySQLConfig {
    return {
      host: process.env.DB_HOST || 'localhost',
      port: this.readInteger('DB_PORT', 3306),
      user: process.env.DB_USER || 'root',
      password: process.env.DB_PASSWORD || '',
      database: process.env.DB_NAME || 'restaurant_orders',
      connectionLimit: this.readInteger('DB_POOL_SIZE', 10),
      lockWaitTimeoutSeconds: this.getLockWaitTimeoutSeconds()
    };
  }

  public validateConfig(): boolean {
    const logger = new Logger('ConfigManager');
    try {
      if (this.storeType === 'mysql') {
        this.getMySQLConfig();
      } else {
        this.getSQLiteConfig();
      }
      return true;
    } catch (error) {
      logger.error('Configuration validation failed:', error);
      return false;
    }
  }
}
