import { access } from 'node:fs/promises';
import { google } from 'googleapis';
import type { sheets_v4 } from 'googleapis';
import type { GoogleCredentials } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import { createError, toAppError } from '../utils/errors.js';
import { a1Range, chunk } from '../utils/helpers.js';
import type { SheetRow, SpreadsheetInfo } from '../types/sheets.js';

const SCOPES = ['https://www.googleapis.com/auth/spreadsheets'];

// Rows per values.update call
export const WRITE_BATCH_SIZE = 5000;

export interface SheetWriter {
  replaceSheet(title: string, header: string[], rows: SheetRow[]): Promise<number>;
  verifyAccess(): Promise<SpreadsheetInfo>;
}

export interface SheetsOptions {
  spreadsheetId: string;
  credentials: GoogleCredentials;
}

export class SheetsService implements SheetWriter {
  private sheets: sheets_v4.Sheets;
  private spreadsheetId: string;
  private credentials: GoogleCredentials;

  constructor(options: SheetsOptions) {
    const { credentials } = options;
    const auth =
      credentials.kind === 'file'
        ? new google.auth.JWT({ keyFile: credentials.path, scopes: SCOPES })
        : new google.auth.JWT({ email: credentials.email, key: credentials.privateKey, scopes: SCOPES });

    this.sheets = google.sheets({ version: 'v4', auth });
    this.spreadsheetId = options.spreadsheetId;
    this.credentials = credentials;
  }

  /**
   * Clear the whole tab and write header + rows from A1.
   * Creates the tab first if the spreadsheet does not have it.
   * Returns the number of data rows written (header excluded). Failures are
   * thrown as SHEET_WRITE_FAILED for the caller to log.
   */
  async replaceSheet(title: string, header: string[], rows: SheetRow[]): Promise<number> {
    await this.assertCredentials();

    try {
      await this.ensureSheet(title);

      await this.sheets.spreadsheets.values.clear({
        spreadsheetId: this.spreadsheetId,
        range: a1Range(title),
      });

      const allRows: SheetRow[] = [header, ...rows];
      const batches = chunk(allRows, WRITE_BATCH_SIZE);
      for (const [i, batch] of batches.entries()) {
        const startRow = i * WRITE_BATCH_SIZE + 1;
        await this.sheets.spreadsheets.values.update({
          spreadsheetId: this.spreadsheetId,
          range: a1Range(title, `A${startRow}`),
          valueInputOption: 'RAW',
          requestBody: { values: batch },
        });
        logger.debug({ sheet: title, batch: i + 1, of: batches.length }, 'Wrote batch');
      }

      logger.info({ sheet: title, rows: rows.length }, 'Replaced sheet contents');
      return rows.length;
    } catch (error) {
      throw toAppError(error, 'write', 'SHEET_WRITE_FAILED', { sheet: title });
    }
  }

  /**
   * Read spreadsheet metadata; proves the credential can reach the document
   */
  async verifyAccess(): Promise<SpreadsheetInfo> {
    await this.assertCredentials();

    try {
      const info = await this.readSpreadsheetInfo();
      logger.info({ title: info.title, sheets: info.sheets.length }, 'Spreadsheet reachable');
      return info;
    } catch (error) {
      logger.error({ err: error, spreadsheetId: this.spreadsheetId }, 'Failed to open spreadsheet');
      throw toAppError(error, 'write', 'SPREADSHEET_UNREACHABLE', {
        spreadsheetId: this.spreadsheetId,
      });
    }
  }

  private async readSpreadsheetInfo(): Promise<SpreadsheetInfo> {
    const response = await this.sheets.spreadsheets.get({
      spreadsheetId: this.spreadsheetId,
      fields: 'properties.title,sheets.properties.title',
    });

    return {
      title: response.data.properties?.title || '',
      sheets: (response.data.sheets || [])
        .map((sheet) => sheet.properties?.title || '')
        .filter((title) => title.length > 0),
    };
  }

  private async ensureSheet(title: string): Promise<void> {
    const { sheets } = await this.readSpreadsheetInfo();
    if (sheets.includes(title)) {
      return;
    }

    logger.info({ sheet: title }, 'Creating missing sheet tab');
    await this.sheets.spreadsheets.batchUpdate({
      spreadsheetId: this.spreadsheetId,
      requestBody: {
        requests: [{ addSheet: { properties: { title } } }],
      },
    });
  }

  private async assertCredentials(): Promise<void> {
    if (this.credentials.kind !== 'file') {
      return;
    }
    try {
      await access(this.credentials.path);
    } catch {
      throw createError(
        `Service-account key file not found: ${this.credentials.path}. ` +
          'Create a service account with the Google Sheets API enabled, download its JSON key, ' +
          'save it at this path (or set GOOGLE_CREDENTIALS_FILE / GOOGLE_CREDENTIALS_JSON) ' +
          'and share the spreadsheet with the service account email.',
        'config',
        'CREDENTIALS_NOT_FOUND',
        { path: this.credentials.path }
      );
    }
  }
}
