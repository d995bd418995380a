import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { logger } from '../utils/logger.js';
import { createError, isAppError } from '../utils/errors.js';
import type { AppError } from '../utils/errors.js';
import type {
  RegistryEnvelope,
  RegistryFilter,
  RegistryPage,
  RegistryPageRequest,
} from '../types/cosmetics.js';

export interface RecordFetcher {
  fetchAll(): Promise<unknown[]>;
  fetchSample(size: number): Promise<RegistryPage>;
}

export interface RegistryOptions {
  apiUrl: string;
  pageSize: number;
  timeoutMs: number;
  filter?: RegistryFilter;
}

/**
 * Client for the cosmetics notification registry.
 * Pages through `GetCosmetics` and returns the records in server order.
 */
export class RegistryService implements RecordFetcher {
  private client: AxiosInstance;
  private apiUrl: string;
  private pageSize: number;
  private filter: RegistryFilter;

  constructor(options: RegistryOptions) {
    this.apiUrl = options.apiUrl;
    this.pageSize = options.pageSize;
    this.filter = options.filter ?? {};
    this.client = axios.create({
      headers: {
        'Content-Type': 'application/json',
      },
      timeout: options.timeoutMs,
    });
  }

  /**
   * Fetch every page. Throws on the first failing page; nothing partial is returned.
   */
  async fetchAll(): Promise<unknown[]> {
    logger.info({ endpoint: this.apiUrl }, 'Fetching registry records (all pages)');

    const firstPage = await this.fetchPage(1, this.pageSize);
    if (firstPage.totalRows === 0) {
      logger.warn({ endpoint: this.apiUrl }, 'Registry returned no records');
      return firstPage.records;
    }

    const totalPages = Math.ceil(firstPage.totalRows / firstPage.maxResults);
    logger.info({ totalRows: firstPage.totalRows, totalPages }, 'Registry pagination');

    const records = [...firstPage.records];
    for (let page = 2; page <= totalPages; page++) {
      logger.debug(`Fetching page ${page}/${totalPages}`);
      const next = await this.fetchPage(page, this.pageSize);
      records.push(...next.records);
    }

    if (records.length !== firstPage.totalRows) {
      logger.warn(
        { fetched: records.length, totalRows: firstPage.totalRows },
        'Fetched record count differs from reported total'
      );
    }

    logger.info({ count: records.length }, 'Fetched registry records');
    return records;
  }

  /**
   * First page only, `size` records
   */
  async fetchSample(size: number): Promise<RegistryPage> {
    logger.info({ endpoint: this.apiUrl, size }, 'Fetching registry sample');
    return this.fetchPage(1, size);
  }

  async fetchPage(pageNumber: number, maxResult: number): Promise<RegistryPage> {
    const payload: RegistryPageRequest = {
      isDescending: false,
      maxResult,
      pageNumber,
      ...this.filter,
    };

    try {
      const response = await this.client.post<RegistryEnvelope>(this.apiUrl, payload);
      return this.parseEnvelope(response.data, pageNumber, maxResult);
    } catch (error) {
      throw this.toFetchError(error, pageNumber);
    }
  }

  private parseEnvelope(
    envelope: RegistryEnvelope | null | undefined,
    pageNumber: number,
    requestedSize: number
  ): RegistryPage {
    const body = envelope?.returnObject;
    if (!body || !Array.isArray(body.cosmeticsList)) {
      throw createError(
        'Registry response is missing returnObject.cosmeticsList',
        'fetch',
        'MALFORMED_RESPONSE',
        { endpoint: this.apiUrl, pageNumber }
      );
    }

    const reportedMax = body.maxResults;
    return {
      records: body.cosmeticsList,
      totalRows: typeof body.totalRows === 'number' ? body.totalRows : 0,
      maxResults: typeof reportedMax === 'number' && reportedMax > 0 ? reportedMax : requestedSize,
    };
  }

  private toFetchError(error: unknown, pageNumber: number): AppError {
    if (isAppError(error)) {
      logger.error({ ...error.details, message: error.message }, 'Registry request failed');
      return error;
    }

    const details: Record<string, unknown> = { endpoint: this.apiUrl, pageNumber };
    let appError: AppError;

    if (axios.isAxiosError(error)) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        appError = createError(`Registry request timed out (page ${pageNumber})`, 'fetch', 'TIMEOUT', {
          ...details,
          code: error.code,
        });
      } else if (!error.response) {
        appError = createError(
          `Could not reach registry (page ${pageNumber}): ${error.message}`,
          'fetch',
          'NETWORK_ERROR',
          details
        );
      } else {
        const status = error.response.status;
        appError = createError(
          `Registry returned HTTP ${status} (page ${pageNumber})`,
          'fetch',
          'HTTP_ERROR',
          { ...details, status }
        );
      }
    } else {
      const message = error instanceof Error ? error.message : String(error);
      appError = createError(`Registry request failed (page ${pageNumber}): ${message}`, 'fetch', 'UNKNOWN', details);
    }

    logger.error({ ...appError.details, message: appError.message }, 'Registry request failed');
    return appError;
  }
}
