/**
 * Error handling utilities for the order engine and its stores
 */

import { Logger } from './logger';

const RETRYABLE_STORE_CODES = [
  'SQLITE_BUSY',
  'SQLITE_LOCKED',
  'ER_LOCK_WAIT_TIMEOUT',
  'ER_LOCK_DEADLOCK'
];

/**
 * Read the driver error code (sqlite3 and mysql2 both set `code`)
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export class ErrorHandler {
  private logger: Logger;

  constructor(service: string) {
    this.logger = new Logger(service);
  }

  /**
   * Log a store or engine error with a description of its category
   */
  handleError(error: unknown, context?: string): void {
    const errorContext = context ? `[${context}] ` : '';

    if (error instanceof OrderIntegrityError) {
      this.logger.error(`${errorContext}Data integrity fault on order ${error.orderId}: ${error.message}`);
      return;
    }

    switch (errorCode(error)) {
      case 'SQLITE_BUSY':
      case 'SQLITE_LOCKED':
        this.logger.error(`${errorContext}SQLite database is busy`);
        break;
      case 'ER_LOCK_WAIT_TIMEOUT':
        this.logger.error(`${errorContext}Timed out waiting for a row lock`);
        break;
      case 'ER_LOCK_DEADLOCK':
        this.logger.error(`${errorContext}Deadlock detected, transaction rolled back`);
        break;
      case 'SQLITE_CONSTRAINT':
      case 'ER_NO_REFERENCED_ROW_2':
      case 'ER_DUP_ENTRY':
        this.logger.error(`${errorContext}Constraint violation`, error);
        break;
      case 'ECONNREFUSED':
        this.logger.error(`${errorContext}Database connection refused`);
        break;
      default:
        this.logger.error(`${errorContext}Unexpected error`, error);
    }
  }

  /**
   * Check if an error is retryable by the caller
   */
  isRetryableError(error: unknown): boolean {
    if (error instanceof StoreBusyError) return true;
    const code = errorCode(error);
    return code !== undefined && RETRYABLE_STORE_CODES.includes(code);
  }

  /**
   * Replace lock/busy driver errors with StoreBusyError; everything else is rethrown untouched
   */
  normalizeStoreError(error: unknown, context: string): unknown {
    if (error instanceof StoreBusyError) return error;
    if (this.isRetryableError(error)) {
      this.handleError(error, context);
      return new StoreBusyError(`${context}: storage is busy, try again`, errorCode(error), error);
    }
    return error;
  }

  /**
   * Wrap async operations with error logging
   */
  async withErrorHandling<T>(operation: () => Promise<T>, context?: string): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      this.handleError(error, context);
      throw error;
    }
  }
}

/**
 * Custom error classes for specific scenarios
 */

/**
 * An order row carries a status outside the known set. Never converted into a refusal.
 */
export class OrderIntegrityError extends Error {
  constructor(message: string, public readonly orderId: number, public readonly status: string) {
    super(message);
    this.name = 'OrderIntegrityError';
  }
}

export class StoreBusyError extends Error {
  public readonly code?: string;

  constructor(message: string, code?: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StoreBusyError';
    this.code = code;
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends Error {
  constructor(message: string, public readonly field?: string) {
    super(message);
    this.name = 'ValidationError';
  }
}
