/**
 * Column readers for untyped driver rows
 */

export type SqlRow = Record<string, unknown>;
export type SqlParam = string | number | null;

export interface RunResult {
  changes: number;
  lastInsertId: number;
}

function column(row: SqlRow, name: string): unknown {
  if (!(name in row)) {
    throw new Error(`Column ${name} missing from result row`);
  }
  return row[name];
}

export function readNumber(row: SqlRow, name: string): number {
  const value = column(row, name);
  if (typeof value === 'number') return value;
  // mysql2 returns BIGINT/DECIMAL aggregates as strings
  if (typeof value === 'string' && value.trim() !== '' && !isNaN(Number(value))) return Number(value);
  if (typeof value === 'bigint') return Number(value);
  throw new Error(`Column ${name} is not numeric`);
}

export function readNullableNumber(row: SqlRow, name: string): number | null {
  return column(row, name) === null ? null : readNumber(row, name);
}

export function readString(row: SqlRow, name: string): string {
  const value = column(row, name);
  if (typeof value === 'string') return value;
  if (value instanceof Date) return value.toISOString();
  throw new Error(`Column ${name} is not text`);
}

export function readNullableString(row: SqlRow, name: string): string | null {
  return column(row, name) === null ? null : readString(row, name);
}

/**
 * Both backends keep flags as 0/1 integers
 */
export function readBoolean(row: SqlRow, name: string): boolean {
  const value = column(row, name);
  if (typeof value === 'boolean') return value;
  return readNumber(row, name) !== 0;
}

export function readNullableBoolean(row: SqlRow, name: string): boolean | null {
  return column(row, name) === null ? null : readBoolean(row, name);
}
