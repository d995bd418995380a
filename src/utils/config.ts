import pino from 'pino';
import type { RegistryFilter } from '../types/cosmetics.js';
import { createError } from './errors.js';
import { isTruthy, parsePositiveInt } from './helpers.js';

type Env = Record<string, string | undefined>;

export const DEFAULT_REGISTRY_URL = 'https://registries.health.gov.il/api/Cosmetics/GetCosmetics';

export type GoogleCredentials =
  | { kind: 'file'; path: string }
  | { kind: 'key'; email: string; privateKey: string };

export interface AppConfig {
  registry: {
    apiUrl: string;
    pageSize: number;
    timeoutMs: number;
    filter: RegistryFilter;
  };
  google: {
    spreadsheetId: string | undefined;
    credentials: GoogleCredentials;
  };
  sheets: {
    filtered: string;
    flattened: string;
  };
  logging: {
    level: string;
    dir: string;
    toFile: boolean;
  };
}

function requireEnv(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw createError(`Missing required environment variable: ${name}`, 'config', 'MISSING_ENV', {
      name,
    });
  }
  return value;
}

function optionalEnv(env: Env, name: string, defaultValue: string): string {
  return env[name] || defaultValue;
}

function positiveIntEnv(env: Env, name: string, defaultValue: number): number {
  const raw = env[name];
  if (!raw) {
    return defaultValue;
  }
  const value = parsePositiveInt(raw);
  if (value === null) {
    throw createError(`${name} must be a positive integer, got "${raw}"`, 'config', 'INVALID_ENV', {
      name,
    });
  }
  return value;
}

function optionalIntEnv(env: Env, name: string): number | undefined {
  return env[name] ? positiveIntEnv(env, name, 0) : undefined;
}

function logLevelEnv(env: Env): string {
  const level = optionalEnv(env, 'LOG_LEVEL', 'info');
  const known = [...Object.keys(pino.levels.values), 'silent'];
  if (!known.includes(level)) {
    throw createError(`LOG_LEVEL must be a pino level name, got "${level}"`, 'config', 'INVALID_ENV', {
      name: 'LOG_LEVEL',
    });
  }
  return level;
}

/**
 * Resolve service-account credentials. An injected JSON secret wins over an
 * email/key pair, which wins over the key file.
 */
function resolveCredentials(env: Env): GoogleCredentials {
  const json = env.GOOGLE_CREDENTIALS_JSON;
  if (json) {
    return parseCredentialsJson(json);
  }

  if (env.GOOGLE_SERVICE_ACCOUNT_EMAIL || env.GOOGLE_PRIVATE_KEY) {
    return {
      kind: 'key',
      email: requireEnv(env, 'GOOGLE_SERVICE_ACCOUNT_EMAIL'),
      privateKey: requireEnv(env, 'GOOGLE_PRIVATE_KEY').replace(/\\n/g, '\n'),
    };
  }

  return { kind: 'file', path: optionalEnv(env, 'GOOGLE_CREDENTIALS_FILE', 'credentials.json') };
}

export function parseCredentialsJson(json: string): GoogleCredentials {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    throw createError('GOOGLE_CREDENTIALS_JSON is not valid JSON', 'config', 'INVALID_CREDENTIALS');
  }

  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'client_email' in parsed &&
    typeof parsed.client_email === 'string' &&
    'private_key' in parsed &&
    typeof parsed.private_key === 'string'
  ) {
    return { kind: 'key', email: parsed.client_email, privateKey: parsed.private_key };
  }

  throw createError(
    'GOOGLE_CREDENTIALS_JSON must contain client_email and private_key',
    'config',
    'INVALID_CREDENTIALS'
  );
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    // Registry API
    registry: {
      apiUrl: optionalEnv(env, 'REGISTRY_API_URL', DEFAULT_REGISTRY_URL),
      pageSize: positiveIntEnv(env, 'REGISTRY_PAGE_SIZE', 100),
      timeoutMs: positiveIntEnv(env, 'REGISTRY_TIMEOUT_MS', 60000),
      filter: {
        businessNotificationItemId: optionalIntEnv(env, 'REGISTRY_NOTIFICATION_ITEM_ID'),
        businessTypeNotificationId: optionalIntEnv(env, 'REGISTRY_NOTIFICATION_TYPE_ID'),
      },
    },

    // Google Sheets
    google: {
      spreadsheetId: env.SPREADSHEET_ID || undefined,
      credentials: resolveCredentials(env),
    },
    sheets: {
      filtered: optionalEnv(env, 'FILTERED_SHEET_NAME', 'Sheet1_Filtered'),
      flattened: optionalEnv(env, 'FLATTENED_SHEET_NAME', 'Sheet2_AllColumns'),
    },

    // Logging
    logging: {
      level: logLevelEnv(env),
      dir: optionalEnv(env, 'LOG_DIR', 'logs'),
      toFile: isTruthy(optionalEnv(env, 'LOG_TO_FILE', 'true')),
    },
  };
}
