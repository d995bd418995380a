import { createError } from '../utils/errors.js';
import { parsePositiveInt } from '../utils/helpers.js';

export type RunMode = 'update' | 'test';

export interface CliOptions {
  mode: RunMode;
  dryRun: boolean;
  // Set when only the first page should be fetched
  sampleSize?: number;
  help: boolean;
}

export const DEFAULT_SAMPLE_SIZE = 10;

export const USAGE = `
Usage: npm run sync -- [options]

Options:
  --mode=update|test   update: fetch and rewrite both sheets (default)
                       test: check registry and spreadsheet access, write nothing
  test                 Same as --mode=test
  --sample[=<number>]  Fetch only the first page (default: ${DEFAULT_SAMPLE_SIZE} records)
  --dry-run            Fetch and map, but don't write to Google Sheets
  --help               Show this help message

Examples:
  npm run sync
  npm run sync -- test
  npm run sync -- --sample=25 --dry-run
`;

function flagValue(args: string[], name: string): string | undefined {
  return args.find((a) => a.startsWith(`--${name}=`))?.split('=')[1];
}

export function parseArgs(args: string[]): CliOptions {
  const modeArg = flagValue(args, 'mode') ?? (args.includes('test') ? 'test' : 'update');
  if (modeArg !== 'update' && modeArg !== 'test') {
    throw createError(`Unknown mode "${modeArg}" (expected update or test)`, 'config', 'INVALID_ARGUMENT');
  }

  let sampleSize: number | undefined;
  const sampleArg = flagValue(args, 'sample');
  if (sampleArg !== undefined) {
    const parsed = parsePositiveInt(sampleArg);
    if (parsed === null) {
      throw createError(`--sample must be a positive integer, got "${sampleArg}"`, 'config', 'INVALID_ARGUMENT');
    }
    sampleSize = parsed;
  } else if (args.includes('--sample')) {
    sampleSize = DEFAULT_SAMPLE_SIZE;
  }

  return {
    mode: modeArg,
    dryRun: args.includes('--dry-run'),
    sampleSize,
    help: args.includes('--help'),
  };
}
