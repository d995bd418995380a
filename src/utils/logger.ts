import path from 'node:path';
import pino from 'pino';
import type { Logger } from 'pino';
import { formatLogDate } from './helpers.js';

export interface LoggerOptions {
  level: string;
  dir: string;
  toFile: boolean;
}

// The test runner only ever gets the silent level; file output still attaches
const silenced = process.env.NODE_ENV === 'test';

// Streams pass everything through; the logger's own level does the filtering
const streams = pino.multistream([{ level: 'trace', stream: process.stdout }]);

export const logger: Logger = pino(
  {
    // LOG_LEVEL is applied by configureLogger once config has validated it
    level: silenced ? 'silent' : 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  streams
);

export function logFilePath(dir: string, now: Date = new Date()): string {
  return path.join(dir, `automation-${formatLogDate(now)}.log`);
}

const attachedFiles = new Set<string>();

/**
 * Apply runtime logging settings. With `toFile`, every entry is also appended to
 * `<dir>/automation-DD-MM-YYYY.log`. Returns that path, or undefined when no file is written.
 */
export function configureLogger(options: LoggerOptions, now: Date = new Date()): string | undefined {
  logger.level = silenced ? 'silent' : options.level;

  if (!options.toFile) {
    return undefined;
  }

  const filename = logFilePath(options.dir, now);
  if (!attachedFiles.has(filename)) {
    streams.add({ level: 'trace', stream: pino.destination({ dest: filename, mkdir: true, sync: true }) });
    attachedFiles.add(filename);
  }
  return filename;
}
