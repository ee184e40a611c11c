import { createLogger } from './logger';
import { HOUR_MS } from './timestamps';

const logger = createLogger('Config');

export interface AppConfig {
  dataDir: string;
  port: number;
  host: string;
  frontendUrl?: string;
  fullSyncIntervalMs: number;
  reconcileBatchSize: number;
  tickIntervalMs: number;
  playRetentionDays: number;
  catalogFile: string;
}

export const DEFAULT_CONFIG: AppConfig = {
  dataDir: './data',
  port: 3001,
  host: '127.0.0.1',
  fullSyncIntervalMs: 4 * HOUR_MS,
  reconcileBatchSize: 100,
  tickIntervalMs: 1000,
  playRetentionDays: 365,
  catalogFile: 'catalog/library.json',
};

/**
 * Read a positive number from the environment, falling back to the default
 * (with a warning) when the value is missing or malformed.
 */
function readPositiveNumber(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    logger.warn(`Ignoring invalid ${name}="${raw}", using ${fallback}`);
    return fallback;
  }
  return value;
}

/**
 * Build the application config from environment variables.
 * dotenv has already populated process.env by the time the server calls this.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fullSyncHours = readPositiveNumber(
    env,
    'FULL_SYNC_INTERVAL_HOURS',
    DEFAULT_CONFIG.fullSyncIntervalMs / HOUR_MS
  );

  return {
    dataDir: env.DATA_DIR || DEFAULT_CONFIG.dataDir,
    port: Math.floor(
      readPositiveNumber(
        env,
        env.BACKEND_PORT ? 'BACKEND_PORT' : 'PORT',
        DEFAULT_CONFIG.port
      )
    ),
    host: env.HOST || DEFAULT_CONFIG.host,
    frontendUrl: env.FRONTEND_URL || undefined,
    fullSyncIntervalMs: fullSyncHours * HOUR_MS,
    reconcileBatchSize: Math.max(
      1,
      Math.floor(
        readPositiveNumber(
          env,
          'RECONCILE_BATCH_SIZE',
          DEFAULT_CONFIG.reconcileBatchSize
        )
      )
    ),
    tickIntervalMs: readPositiveNumber(
      env,
      'TICK_INTERVAL_MS',
      DEFAULT_CONFIG.tickIntervalMs
    ),
    playRetentionDays: readPositiveNumber(
      env,
      'PLAY_RETENTION_DAYS',
      DEFAULT_CONFIG.playRetentionDays
    ),
    catalogFile: env.CATALOG_FILE || DEFAULT_CONFIG.catalogFile,
  };
}
