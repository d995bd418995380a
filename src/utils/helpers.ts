import type { CellValue } from '../types/sheets.js';

/**
 * Coerce an arbitrary JSON value into something a sheet cell can hold.
 * null/undefined become empty strings; objects and arrays become JSON text.
 */
export function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return JSON.stringify(value);
}

/**
 * Check if a value is a plain (non-array) object
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Split a list into consecutive chunks of at most `size` items
 */
export function chunk<T>(items: T[], size: number): T[][] {
  if (size <= 0) {
    throw new RangeError(`Chunk size must be positive, got ${size}`);
  }
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Quote a sheet title for use in A1 notation (`'My Sheet'!A1`)
 */
export function quoteSheetTitle(title: string): string {
  return `'${title.replace(/'/g, "''")}'`;
}

export function a1Range(title: string, cell?: string): string {
  const quoted = quoteSheetTitle(title);
  return cell ? `${quoted}!${cell}` : quoted;
}

/**
 * DD-MM-YYYY, used in log file names
 */
export function formatLogDate(date: Date): string {
  const day = String(date.getDate()).padStart(2, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  return `${day}-${month}-${date.getFullYear()}`;
}

/**
 * Parse a positive integer, returning null if invalid
 */
export function parsePositiveInt(value: string): number | null {
  if (!/^\d+$/.test(value.trim())) {
    return null;
  }
  const num = parseInt(value, 10);
  return num > 0 ? num : null;
}

/**
 * Check if a string represents a truthy value
 */
export function isTruthy(value: string): boolean {
  const lower = value.toLowerCase().trim();
  return ['yes', 'true', '1', 'y', 'on'].includes(lower);
}
