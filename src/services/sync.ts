import { logger } from '../utils/logger.js';
import { describeError, toAppError } from '../utils/errors.js';
import { mapRecords } from './mapper.js';
import type { SkippedRecord } from './mapper.js';
import type { RecordFetcher } from './registry.js';
import type { SheetWriter } from './sheets.js';
import type { SheetPayload, SheetWriteResult } from '../types/sheets.js';

export interface SyncDependencies {
  fetcher: RecordFetcher;
  writer?: SheetWriter;
  sheetNames: {
    filtered: string;
    flattened: string;
  };
}

export interface UpdateOptions {
  // Fetch only the first page with this many records
  sampleSize?: number;
  dryRun?: boolean;
}

export interface UpdateReport {
  fetched: number;
  skipped: SkippedRecord[];
  sheets: SheetWriteResult[];
  success: boolean;
  durationMs: number;
}

export interface ConnectivityReport {
  registry: { ok: true; totalRows: number; sampleSize: number } | { ok: false; error: string };
  spreadsheet?: { ok: true; title: string; sheets: string[] } | { ok: false; error: string };
  ok: boolean;
}

const PROBE_SIZE = 5;

/**
 * Write one sheet; a failure is recorded in the result instead of thrown,
 * so the other sheet is still attempted and reported.
 */
async function writeSheet(writer: SheetWriter, payload: SheetPayload): Promise<SheetWriteResult> {
  try {
    const rowsWritten = await writer.replaceSheet(payload.title, payload.header, payload.rows);
    return { sheet: payload.title, status: 'written', rowsWritten };
  } catch (error) {
    const appError = toAppError(error, 'write', 'SHEET_WRITE_FAILED', { sheet: payload.title });
    logger.error(
      {
        sheet: payload.title,
        stage: appError.stage,
        code: appError.code,
        message: appError.message,
      },
      'Sheet write failed'
    );
    return { sheet: payload.title, status: 'failed', error: appError.message, code: appError.code };
  }
}

/**
 * Fetch → map → write both sheets. A fetch failure propagates before any write.
 */
export async function runUpdate(
  deps: SyncDependencies,
  options: UpdateOptions = {}
): Promise<UpdateReport> {
  const startTime = Date.now();
  const { sampleSize, dryRun = false } = options;

  logger.info({ sampleSize, dryRun }, 'Starting sheet update');

  const records =
    sampleSize !== undefined
      ? (await deps.fetcher.fetchSample(sampleSize)).records
      : await deps.fetcher.fetchAll();

  const mapped = mapRecords(records);
  if (mapped.skipped.length > 0) {
    logger.warn(
      {
        skipped: mapped.skipped.length,
        fetched: records.length,
      },
      'Some records were skipped'
    );
  }

  const payloads: SheetPayload[] = [
    { title: deps.sheetNames.filtered, header: mapped.filtered.header, rows: mapped.filtered.rows },
    { title: deps.sheetNames.flattened, header: mapped.flattened.header, rows: mapped.flattened.rows },
  ];

  const sheets: SheetWriteResult[] = [];
  if (dryRun || !deps.writer) {
    logger.info('Dry run - not writing to sheets');
    for (const payload of payloads) {
      sheets.push({ sheet: payload.title, status: 'skipped', rowsPrepared: payload.rows.length });
    }
  } else {
    for (const payload of payloads) {
      sheets.push(await writeSheet(deps.writer, payload));
    }
  }

  const report: UpdateReport = {
    fetched: records.length,
    skipped: mapped.skipped,
    sheets,
    success: sheets.every((result) => result.status !== 'failed'),
    durationMs: Date.now() - startTime,
  };

  logger.info(
    {
      fetched: report.fetched,
      skipped: report.skipped.length,
      success: report.success,
      durationMs: report.durationMs,
    },
    'Sheet update finished'
  );

  return report;
}

/**
 * Probe the registry and, if a writer is configured, the spreadsheet. Writes nothing.
 */
export async function runConnectivityTest(deps: SyncDependencies): Promise<ConnectivityReport> {
  let registry: ConnectivityReport['registry'];
  try {
    const page = await deps.fetcher.fetchSample(PROBE_SIZE);
    registry = { ok: true, totalRows: page.totalRows, sampleSize: page.records.length };
  } catch (error) {
    registry = { ok: false, error: describeError(error) };
  }

  let spreadsheet: ConnectivityReport['spreadsheet'];
  if (deps.writer) {
    try {
      const info = await deps.writer.verifyAccess();
      spreadsheet = { ok: true, title: info.title, sheets: info.sheets };
    } catch (error) {
      spreadsheet = { ok: false, error: describeError(error) };
    }
  }

  const ok = registry.ok && (spreadsheet === undefined || spreadsheet.ok);
  logger.info({ registry: registry.ok, spreadsheet: spreadsheet?.ok, ok }, 'Connectivity test finished');

  return { registry, spreadsheet, ok };
}
