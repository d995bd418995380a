import type { AppConfig } from '../utils/config.js';
import { RegistryService } from './registry.js';
import { SheetsService } from './sheets.js';
import type { SyncDependencies } from './sync.js';

export { runUpdate, runConnectivityTest } from './sync.js';

/**
 * Build the concrete registry and Sheets clients from config.
 * Without a spreadsheet id there is no writer.
 */
export function createServices(config: AppConfig): SyncDependencies {
  const fetcher = new RegistryService({
    apiUrl: config.registry.apiUrl,
    pageSize: config.registry.pageSize,
    timeoutMs: config.registry.timeoutMs,
    filter: config.registry.filter,
  });

  const writer = config.google.spreadsheetId
    ? new SheetsService({
        spreadsheetId: config.google.spreadsheetId,
        credentials: config.google.credentials,
      })
    : undefined;

  return {
    fetcher,
    writer,
    sheetNames: config.sheets,
  };
}
