import { describe, test, expect, vi, afterEach } from 'vitest';
import { run } from '../run.js';
import type { ServiceFactory } from '../run.js';
import { USAGE } from '../args.js';
import { createError } from '../../utils/errors.js';
import type { RecordFetcher } from '../../services/registry.js';
import type { SheetWriter } from '../../services/sheets.js';
import { FakeFetcher, FakeWriter, record } from '../../services/__tests__/fakes.js';

// ── Test helpers ──

const BASE_ENV = { LOG_TO_FILE: 'false' };
const WRITE_ENV = { ...BASE_ENV, SPREADSHEET_ID: 'test-spreadsheet' };

function servicesFrom(fetcher: RecordFetcher, writer?: SheetWriter): ServiceFactory {
  return (config) => ({ fetcher, writer, sheetNames: config.sheets });
}

function captureOutput(): () => string[] {
  const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  return () => spy.mock.calls.map(([line]) => String(line));
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('run (update mode)', () => {
  test('requires a spreadsheet id and fetches nothing without one', async () => {
    captureOutput();
    const fetcher = new FakeFetcher([record('N-1')]);
    const writer = new FakeWriter();

    const code = await run([], BASE_ENV, servicesFrom(fetcher, writer));

    expect(code).toBe(1);
    expect(fetcher.fetchAllCalls).toBe(0);
    expect(writer.calls).toEqual([]);
  });

  test('allows a dry run without a spreadsheet id', async () => {
    const output = captureOutput();
    const writer = new FakeWriter();

    const code = await run(['--dry-run'], BASE_ENV, servicesFrom(new FakeFetcher([record('N-1'), record('N-2')]), writer));

    expect(code).toBe(0);
    expect(writer.calls).toEqual([]);
    expect(output()).toContain('  Sheet1_Filtered: 2 rows prepared');
    expect(output()).toContain('\n(Dry run - no changes written to sheets)');
  });

  test('exits 0 and prints a summary after writing both sheets', async () => {
    const output = captureOutput();
    const writer = new FakeWriter();

    const code = await run([], WRITE_ENV, servicesFrom(new FakeFetcher([record('N-1'), record('N-2')]), writer));

    expect(code).toBe(0);
    expect(writer.calls).toEqual(['Sheet1_Filtered', 'Sheet2_AllColumns']);
    expect(output()).toContain('  Records fetched: 2');
    expect(output()).toContain('  Records skipped: 0');
    expect(output()).toContain('  Sheet2_AllColumns: 2 rows written');
  });

  test('exits 1 when one sheet fails to write', async () => {
    const output = captureOutput();
    const writer = new FakeWriter();
    writer.failOn.add('Sheet1_Filtered');

    const code = await run([], WRITE_ENV, servicesFrom(new FakeFetcher([record('N-1')]), writer));

    expect(code).toBe(1);
    expect(output()).toContain('  Sheet1_Filtered: FAILED (SHEET_WRITE_FAILED) Quota exceeded');
    expect(output()).toContain('  Sheet2_AllColumns: 1 rows written');
  });

  test('exits 1 without writing when the fetch fails', async () => {
    captureOutput();
    const writer = new FakeWriter();
    const fetcher = new FakeFetcher([], createError('Registry returned HTTP 503 (page 2)', 'fetch', 'HTTP_ERROR'));

    const code = await run([], WRITE_ENV, servicesFrom(fetcher, writer));

    expect(code).toBe(1);
    expect(writer.calls).toEqual([]);
  });

  test('exits 1 on invalid configuration before building services', async () => {
    captureOutput();
    const makeServices = vi.fn(servicesFrom(new FakeFetcher([])));

    const code = await run([], { ...WRITE_ENV, REGISTRY_PAGE_SIZE: 'lots' }, makeServices);

    expect(code).toBe(1);
    expect(makeServices).not.toHaveBeenCalled();
  });
});

describe('run (test mode)', () => {
  test('exits 0 when the registry and spreadsheet are reachable', async () => {
    const output = captureOutput();
    const fetcher = new FakeFetcher([record('N-1'), record('N-2'), record('N-3')]);

    const code = await run(['test'], WRITE_ENV, servicesFrom(fetcher, new FakeWriter()));

    expect(code).toBe(0);
    expect(output()).toContain('  Registry: OK (3 records available)');
    expect(output()).toContain('  Spreadsheet: OK ("Registry Export", tabs: Sheet1_Filtered, Sheet2_AllColumns)');
  });

  test('exits 1 when the registry cannot be reached', async () => {
    const output = captureOutput();
    const fetcher = new FakeFetcher([], new Error('Could not reach registry (page 1): socket hang up'));
    const writer = new FakeWriter();

    const code = await run(['--mode=test'], WRITE_ENV, servicesFrom(fetcher, writer));

    expect(code).toBe(1);
    expect(output()).toContain('  Registry: FAILED - Could not reach registry (page 1): socket hang up');
    expect(writer.calls).toEqual([]);
  });

  test('exits 1 when the spreadsheet cannot be opened', async () => {
    captureOutput();
    const writer = new FakeWriter();
    writer.accessError = new Error('The caller does not have permission');

    const code = await run(['test'], WRITE_ENV, servicesFrom(new FakeFetcher([record('N-1')]), writer));

    expect(code).toBe(1);
  });
});

describe('run (arguments)', () => {
  test('prints usage for --help', async () => {
    const output = captureOutput();

    expect(await run(['--help'], BASE_ENV)).toBe(0);
    expect(output()).toEqual([USAGE]);
  });

  test('exits 1 on an unknown mode', async () => {
    captureOutput();

    expect(await run(['--mode=full'], BASE_ENV)).toBe(1);
  });
});
