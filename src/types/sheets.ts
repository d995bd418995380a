// Row and cell shapes written to Google Sheets

export type CellValue = string | number | boolean;

export type SheetRow = CellValue[];

// Column order of the filtered sheet
export const FILTERED_COLUMNS = [
  'nameCosmeticHeb',
  'nameCosmeticEng',
  'notificationCode',
  'importTrack',
  'rpCorporation',
  'manufacturer',
  'importer',
] as const;

export type FilteredColumn = (typeof FILTERED_COLUMNS)[number];

// Always exactly seven cells, one per FILTERED_COLUMNS entry
export type FilteredRow = [CellValue, CellValue, CellValue, CellValue, CellValue, CellValue, CellValue];

// Leading columns of the flattened sheet, before every other record field
export const FLATTENED_LEADING_COLUMNS = [
  'notificationCode',
  'importTrack',
  'rpCorporation',
  'manufacturer',
  'importer',
] as const;

export type FlattenedRecord = Record<string, CellValue>;

export interface SheetPayload {
  title: string;
  header: string[];
  rows: SheetRow[];
}

export type SheetWriteResult =
  | { sheet: string; status: 'written'; rowsWritten: number }
  | { sheet: string; status: 'failed'; error: string; code: string }
  | { sheet: string; status: 'skipped'; rowsPrepared: number };

export interface SpreadsheetInfo {
  title: string;
  sheets: string[];
}
