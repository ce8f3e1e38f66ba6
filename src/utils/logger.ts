/**
 * Service-tagged console logger
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

export class Logger {
  private static threshold: LogLevel = Logger.levelFromEnv();
  private service: string;

  constructor(service: string) {
    this.service = service;
  }

  /**
   * Change the minimum level for every logger in the process
   */
  static setLevel(level: LogLevel): void {
    Logger.threshold = level;
  }

  private static levelFromEnv(): LogLevel {
    const level = (process.env.LOG_LEVEL || 'info').toLowerCase();
    return isLogLevel(level) ? level : 'info';
  }

  debug(message: string, ...meta: unknown[]): void {
    this.write('debug', message, meta);
  }

  info(message: string, ...meta: unknown[]): void {
    this.write('info', message, meta);
  }

  warn(message: string, ...meta: unknown[]): void {
    this.write('warn', message, meta);
  }

  error(message: string, ...meta: unknown[]): void {
    this.write('error', message, meta);
  }

  private write(level: LogLevel, message: string, meta: unknown[]): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[Logger.threshold]) return;

    const prefix = `${chalk.gray(new Date().toISOString())} ${this.colorLevel(level)} ${chalk.cyan(`[${this.service}]`)}`;
    const line = `${prefix} ${message}`;
    const extra = meta.map(item => this.formatMeta(item));

    if (level === 'error') {
      console.error(line, ...extra);
    } else if (level === 'warn') {
      console.warn(line, ...extra);
    } else {
      console.log(line, ...extra);
    }
  }

  private colorLevel(level: LogLevel): string {
    const label = level.toUpperCase().padEnd(5);
    switch (level) {
      case 'debug':
        return chalk.magenta(label);
      case 'info':
        return chalk.green(label);
      case 'warn':
        return chalk.yellow(label);
      case 'error':
        return chalk.red(label);
    }
  }

  private formatMeta(item: unknown): unknown {
    if (item instanceof Error) {
      return item.stack || `${item.name}: ${item.message}`;
    }
    if (item !== null && typeof item === 'object') {
      return JSON.stringify(item);
    }
    return item;
  }
}
