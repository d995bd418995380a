import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { describe, test, expect, afterAll } from 'vitest';
import { configureLogger, logFilePath, logger } from '../logger.js';

const logDir = mkdtempSync(path.join(tmpdir(), 'registry-sync-logs-'));

afterAll(() => {
  rmSync(logDir, { recursive: true, force: true });
});

describe('logger', () => {
  test('names log files by day', () => {
    expect(logFilePath('logs', new Date(2024, 2, 7))).toBe(path.join('logs', 'automation-07-03-2024.log'));
  });

  test('keeps the silent level under test', () => {
    expect(configureLogger({ level: 'debug', dir: logDir, toFile: false })).toBeUndefined();
    expect(logger.level).toBe('silent');
  });

  test('appends entries to the dated log file once, however often it is configured', () => {
    const day = new Date(2024, 2, 7);
    const nestedDir = path.join(logDir, 'nested');

    const first = configureLogger({ level: 'info', dir: nestedDir, toFile: true }, day);
    const second = configureLogger({ level: 'info', dir: nestedDir, toFile: true }, day);
    expect(first).toBe(path.join(nestedDir, 'automation-07-03-2024.log'));
    expect(second).toBe(first);

    logger.level = 'info';
    try {
      logger.info({ sheet: 'Sheet1_Filtered' }, 'Replaced sheet contents');
    } finally {
      logger.level = 'silent';
    }

    const lines = readFileSync(path.join(nestedDir, 'automation-07-03-2024.log'), 'utf8').trim().split('\n');
    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0]);
    expect(entry).toMatchObject({ level: 30, sheet: 'Sheet1_Filtered', msg: 'Replaced sheet contents' });
  });
});
