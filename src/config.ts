import { TimeRange } from './domain/models.js';
import { parseClock } from './domain/timeRange.js';

export interface AppConfig {
  port: number;
  host: string;
  nodeEnv: string;
  logLevel: string;
  corsOrigin: string[] | true;
  apiBaseUrl?: string;
  apiTitle: string;
  apiVersion: string;
  // unset: no persistent store, every call is served by the in-memory fallback
  databaseUrl?: string;
  dbPoolSize: number;
  storeTimeoutMs: number;
  runMigrations: boolean;
  // load the bundled sample data into the database at startup; existing rows are kept
  seedDatabase: boolean;
  currency: string;
  maxLineQuantity: number;
  openingHours: TimeRange;
}

// digits only: '2000ms' and '1.5' are errors
function intFrom(value: string | undefined, fallback: number, name: string): number {
  const raw = value === undefined ? String(fallback) : value.trim();
  const parsed = /^\d+$/.test(raw) ? Number(raw) : Number.NaN;
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer, got '${value}'`);
  }
  return parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const openingHours = {
    start: parseClock(env.SERVICE_OPEN_TIME || '09:00'),
    end: parseClock(env.SERVICE_CLOSE_TIME || '18:00'),
  };
  if (openingHours.end <= openingHours.start) {
    throw new Error('SERVICE_CLOSE_TIME must be after SERVICE_OPEN_TIME');
  }

  return {
    port: intFrom(env.PORT, 3000, 'PORT'),
    host: env.HOST || '0.0.0.0',
    nodeEnv: env.NODE_ENV || 'development',
    logLevel: env.LOG_LEVEL || 'info',
    corsOrigin: env.CORS_ORIGIN ? env.CORS_ORIGIN.split(',') : true,
    apiBaseUrl: env.API_BASE_URL || undefined,
    apiTitle: env.API_TITLE || 'Retail Assistant Tools API',
    apiVersion: env.API_VERSION || '1.0.0',
    databaseUrl: env.DATABASE_URL || undefined,
    dbPoolSize: intFrom(env.DB_POOL_SIZE, 10, 'DB_POOL_SIZE'),
    storeTimeoutMs: intFrom(env.STORE_TIMEOUT_MS, 2000, 'STORE_TIMEOUT_MS'),
    runMigrations: env.RUN_MIGRATIONS === 'true',
    seedDatabase: env.SEED_DATABASE === 'true',
    currency: env.CURRENCY || 'USD',
    maxLineQuantity: intFrom(env.MAX_LINE_QUANTITY, 99, 'MAX_LINE_QUANTITY'),
    openingHours,
  };
}
