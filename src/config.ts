import { resolveZone } from './schedule/dates.js';
import { stripWrappingQuotes } from './utils/text.js';

export const DEFAULT_COLLECTIONS_URL = 'https://app.bathnes.gov.uk/webforms/waste/collectionday/';

export interface CollectionsConfig {
  postcode: string;
  addressLine: string;
  timezone: string;
  /** Set when TIMEZONE was not a valid zone and the default was used instead. */
  invalidTimezone?: string;
  collectionsUrl: string;
  dbPath: string;
  logDir: string;
  reportsDir: string;
  debug: boolean;
  headless: boolean;
}

export interface ConfigOverrides {
  postcode?: string;
  addressLine?: string;
  debug?: boolean;
}

type Env = Record<string, string | undefined>;

function readEnv(env: Env, key: string, fallback = ''): string {
  const raw = env[key];
  if (raw === undefined) {
    return fallback;
  }
  const value = stripWrappingQuotes(raw);
  return value || fallback;
}

function readFlag(env: Env, key: string, fallback: boolean): boolean {
  const value = readEnv(env, key).toLowerCase();
  if (!value) {
    return fallback;
  }
  return ['true', '1', 'yes', 'on'].includes(value);
}

export function loadConfig(env: Env = process.env, overrides: ConfigOverrides = {}): CollectionsConfig {
  const postcode = overrides.postcode?.trim() || readEnv(env, 'POSTCODE');
  const addressLine = overrides.addressLine?.trim() || readEnv(env, 'ADDRESS_LINE');

  const missing: string[] = [];
  if (!postcode) {
    missing.push('POSTCODE');
  }
  if (!addressLine) {
    missing.push('ADDRESS_LINE');
  }
  if (missing.length > 0) {
    throw new Error(`Missing required environment variables: ${missing.join(', ')}`);
  }

  const requestedZone = readEnv(env, 'TIMEZONE', 'Europe/London');
  const { zone, fallback } = resolveZone(requestedZone);

  const config: CollectionsConfig = {
    postcode,
    addressLine,
    timezone: zone,
    collectionsUrl: readEnv(env, 'COLLECTIONS_URL', DEFAULT_COLLECTIONS_URL),
    dbPath: readEnv(env, 'DB_PATH', 'data/collections.sqlite'),
    logDir: readEnv(env, 'LOG_DIR', 'logs'),
    reportsDir: readEnv(env, 'REPORTS_DIR', 'reports'),
    debug: overrides.debug ?? readFlag(env, 'DEBUG', false),
    headless: readFlag(env, 'HEADLESS', true),
  };
  if (fallback) {
    config.invalidTimezone = requestedZone;
  }
  return config;
}
