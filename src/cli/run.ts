import { createServices, runConnectivityTest, runUpdate } from '../services/index.js';
import type { SyncDependencies } from '../services/sync.js';
import { USAGE, parseArgs } from './args.js';
import type { CliOptions } from './args.js';
import { loadConfig } from '../utils/config.js';
import type { AppConfig } from '../utils/config.js';
import { describeError, isAppError } from '../utils/errors.js';
import { configureLogger, logger } from '../utils/logger.js';

export type ServiceFactory = (config: AppConfig) => SyncDependencies;

async function runTestMode(config: AppConfig, makeServices: ServiceFactory): Promise<boolean> {
  const report = await runConnectivityTest(makeServices(config));

  console.log('\nConnectivity Test:');
  if (report.registry.ok) {
    console.log(`  Registry: OK (${report.registry.totalRows} records available)`);
  } else {
    console.log(`  Registry: FAILED - ${report.registry.error}`);
  }
  if (!report.spreadsheet) {
    console.log('  Spreadsheet: not checked (SPREADSHEET_ID not set)');
  } else if (report.spreadsheet.ok) {
    console.log(`  Spreadsheet: OK ("${report.spreadsheet.title}", tabs: ${report.spreadsheet.sheets.join(', ')})`);
  } else {
    console.log(`  Spreadsheet: FAILED - ${report.spreadsheet.error}`);
  }

  return report.ok;
}

async function runUpdateMode(
  config: AppConfig,
  options: CliOptions,
  makeServices: ServiceFactory
): Promise<boolean> {
  if (!options.dryRun && !config.google.spreadsheetId) {
    logger.error('SPREADSHEET_ID is required to write sheets (use --dry-run to skip writing)');
    return false;
  }

  const report = await runUpdate(makeServices(config), {
    sampleSize: options.sampleSize,
    dryRun: options.dryRun,
  });

  console.log('\nUpdate Results:');
  console.log(`  Records fetched: ${report.fetched}`);
  console.log(`  Records skipped: ${report.skipped.length}`);
  for (const result of report.sheets) {
    if (result.status === 'written') {
      console.log(`  ${result.sheet}: ${result.rowsWritten} rows written`);
    } else if (result.status === 'skipped') {
      console.log(`  ${result.sheet}: ${result.rowsPrepared} rows prepared`);
    } else {
      console.log(`  ${result.sheet}: FAILED (${result.code}) ${result.error}`);
    }
  }
  console.log(`  Duration: ${(report.durationMs / 1000).toFixed(1)}s`);

  if (options.dryRun) {
    console.log('\n(Dry run - no changes written to sheets)');
  }

  return report.success;
}

/**
 * Run one invocation and return the process exit code.
 * Every failure is logged here; nothing is thrown.
 */
export async function run(
  argv: string[],
  env: Record<string, string | undefined> = process.env,
  makeServices: ServiceFactory = createServices
): Promise<number> {
  try {
    const options = parseArgs(argv);
    if (options.help) {
      console.log(USAGE);
      return 0;
    }

    const config = loadConfig(env);
    configureLogger(config.logging);

    logger.info(
      {
        mode: options.mode,
        dryRun: options.dryRun,
        sampleSize: options.sampleSize,
      },
      'Running registry sync...'
    );

    const ok =
      options.mode === 'test'
        ? await runTestMode(config, makeServices)
        : await runUpdateMode(config, options, makeServices);
    return ok ? 0 : 1;
  } catch (error) {
    logger.error(
      {
        stage: isAppError(error) ? error.stage : undefined,
        code: isAppError(error) ? error.code : undefined,
        message: describeError(error),
      },
      'Registry sync failed'
    );
    return 1;
  }
}
