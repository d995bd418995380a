// Wire types for the cosmetics notification registry API

/**
 * One notification as returned in `returnObject.cosmeticsList`.
 *
 * Fields the sheets rely on: nameCosmeticHeb, nameCosmeticEng, notificationCode,
 * importTrack, rpCorporation, manufacturer, importer, packages (objects with
 * packageName / quantity / measurementDesc, or plain strings) and shades (objects
 * with shadeName, or plain strings). The API sends many more, all of which are kept.
 */
export type CosmeticRecord = Record<string, unknown>;

// Optional server-side filter sent with every page request
export interface RegistryFilter {
  businessNotificationItemId?: number;
  businessTypeNotificationId?: number;
}

export interface RegistryPageRequest extends RegistryFilter {
  isDescending: boolean;
  maxResult: number;
  pageNumber: number;
}

export interface RegistryEnvelope {
  returnObject?: {
    cosmeticsList?: unknown[];
    totalRows?: number;
    maxResults?: number;
  } | null;
  [key: string]: unknown;
}

// `records` are unvalidated list items; the row mapper decides which are usable
export interface RegistryPage {
  records: unknown[];
  totalRows: number;
  maxResults: number;
}
