import { logger } from '../utils/logger.js';
import { isPlainObject, toCellValue } from '../utils/helpers.js';
import {
  FILTERED_COLUMNS,
  FLATTENED_LEADING_COLUMNS,
} from '../types/sheets.js';
import type { CellValue, FilteredRow, FlattenedRecord, SheetRow } from '../types/sheets.js';
import type { CosmeticRecord } from '../types/cosmetics.js';

// Separator between entries of a repeated group (packages, shades) inside one cell
export const GROUP_SEPARATOR = ', ';

const KEY_SEPARATOR = '_';

// A record without these cannot be identified in the sheet and is skipped
const REQUIRED_FIELDS = ['notificationCode'] as const;

export interface SkippedRecord {
  index: number;
  reason: string;
}

export interface MappingResult {
  filtered: {
    header: string[];
    rows: FilteredRow[];
  };
  flattened: {
    header: string[];
    rows: SheetRow[];
  };
  skipped: SkippedRecord[];
}

export function toFilteredRow(record: CosmeticRecord): FilteredRow {
  const [heb, eng, code, track, rp, manufacturer, importer] = FILTERED_COLUMNS.map((column) =>
    toCellValue(record[column])
  );
  return [heb, eng, code, track, rp, manufacturer, importer];
}

/**
 * "packageName quantity measurementDesc" per entry, joined with GROUP_SEPARATOR.
 * Plain string entries are used as-is; entries with nothing to show are dropped.
 */
export function formatPackages(value: unknown): string {
  if (!Array.isArray(value)) {
    return '';
  }

  const formatted: string[] = [];
  for (const entry of value) {
    if (typeof entry === 'string') {
      if (entry.trim()) formatted.push(entry.trim());
      continue;
    }
    if (!isPlainObject(entry)) continue;

    const text = [entry.packageName, entry.quantity, entry.measurementDesc]
      .map((part) => String(toCellValue(part)))
      .join(' ')
      .replace(/\s+/g, ' ')
      .trim();
    if (text) formatted.push(text);
  }

  return formatted.join(GROUP_SEPARATOR);
}

export function formatShades(value: unknown): string {
  if (!Array.isArray(value)) {
    return '';
  }

  const names: string[] = [];
  for (const entry of value) {
    const name = typeof entry === 'string' ? entry : isPlainObject(entry) ? entry.shadeName : undefined;
    if (typeof name === 'string' && name.trim()) {
      names.push(name.trim());
    }
  }

  return names.join(GROUP_SEPARATOR);
}

/**
 * Flatten one record into `key → cell`. Nested objects become `parent_child`
 * keys, packages and shades become delimited text, other arrays become JSON.
 */
export function flattenRecord(record: CosmeticRecord, parentKey: string = ''): FlattenedRecord {
  const flat: FlattenedRecord = {};

  for (const [key, value] of Object.entries(record)) {
    const flatKey = parentKey ? `${parentKey}${KEY_SEPARATOR}${key}` : key;

    if (!parentKey && key === 'packages') {
      flat[flatKey] = formatPackages(value);
    } else if (!parentKey && key === 'shades') {
      flat[flatKey] = formatShades(value);
    } else if (isPlainObject(value)) {
      Object.assign(flat, flattenRecord(value, flatKey));
    } else {
      flat[flatKey] = toCellValue(value);
    }
  }

  // Both groups always get a cell, even when the API omits them
  if (!parentKey) {
    flat.packages ??= '';
    flat.shades ??= '';
  }

  return flat;
}

/**
 * Leading columns first, then every other key in first-seen order across all records
 */
export function buildFlattenedHeader(records: FlattenedRecord[]): string[] {
  const header: string[] = [...FLATTENED_LEADING_COLUMNS];
  const seen = new Set<string>(header);

  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!seen.has(key)) {
        seen.add(key);
        header.push(key);
      }
    }
  }

  for (const group of ['packages', 'shades']) {
    if (!seen.has(group)) header.push(group);
  }

  return header;
}

export function toFlattenedRow(record: FlattenedRecord, header: string[]): SheetRow {
  return header.map((column): CellValue => record[column] ?? '');
}

function validateRecord(value: unknown): { record: CosmeticRecord } | { reason: string } {
  if (!isPlainObject(value)) {
    const kind = value === null ? 'null' : Array.isArray(value) ? 'array' : typeof value;
    return { reason: `expected an object, got ${kind}` };
  }
  for (const field of REQUIRED_FIELDS) {
    const fieldValue = value[field];
    if (fieldValue === undefined || fieldValue === null || fieldValue === '') {
      return { reason: `missing required field ${field}` };
    }
  }
  return { record: value };
}

/**
 * Map fetched items to both sheet shapes, preserving order.
 * Malformed items are logged and skipped, never fatal.
 */
export function mapRecords(items: readonly unknown[]): MappingResult {
  const filteredRows: FilteredRow[] = [];
  const flattenedRecords: FlattenedRecord[] = [];
  const skipped: SkippedRecord[] = [];

  items.forEach((item, index) => {
    const result = validateRecord(item);
    if ('reason' in result) {
      logger.warn({ index, reason: result.reason }, 'Skipping malformed record');
      skipped.push({ index, reason: result.reason });
      return;
    }
    filteredRows.push(toFilteredRow(result.record));
    flattenedRecords.push(flattenRecord(result.record));
  });

  const flattenedHeader = buildFlattenedHeader(flattenedRecords);

  return {
    filtered: {
      header: [...FILTERED_COLUMNS],
      rows: filteredRows,
    },
    flattened: {
      header: flattenedHeader,
      rows: flattenedRecords.map((record) => toFlattenedRow(record, flattenedHeader)),
    },
    skipped,
  };
}
