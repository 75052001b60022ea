/**
 * Application configuration
 * Loaded from environment variables with sensible defaults
 */

function parseList(value: string | undefined): string[] {
  return (value || '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export const config = {
  // Server
  server: {
    port: parseInt(process.env.PORT || '3000', 10),
    host: process.env.HOST || '0.0.0.0',
  },

  // Environment
  env: process.env.NODE_ENV || 'development',
  isDev: process.env.NODE_ENV !== 'production',
  isProd: process.env.NODE_ENV === 'production',

  // Logging
  log: {
    level: process.env.LOG_LEVEL || 'debug',
  },

  // Host authentication (disabled when unset)
  auth: {
    engineApiKey: process.env.ENGINE_API_KEY || '',
  },

  // Callers allowed to invoke admin tools
  access: {
    adminCallerIds: parseList(process.env.ADMIN_CALLER_IDS),
  },

  // Session context
  session: {
    historyCapacity: parseInt(process.env.SESSION_HISTORY_CAPACITY || '10', 10),
    idleTimeoutMs: parseInt(process.env.SESSION_IDLE_TIMEOUT_MS || String(30 * 60 * 1000), 10),
    sweepIntervalMs: parseInt(process.env.SESSION_SWEEP_INTERVAL_MS || '60000', 10),
  },

  // Aggregation cache
  cache: {
    ttlMs: parseInt(process.env.CACHE_TTL_MS || String(5 * 60 * 1000), 10),
    maxEntries: parseInt(process.env.CACHE_MAX_ENTRIES || '500', 10),
    retryLoaderOnce: process.env.CACHE_RETRY_LOADER !== 'false',
  },

  // Rate & access gate
  rateLimit: {
    maxCalls: parseInt(process.env.RATE_LIMIT_MAX_CALLS || '20', 10),
    windowMs: parseInt(process.env.RATE_LIMIT_WINDOW_MS || '60000', 10),
  },

  // Per-step execution timeouts (ms)
  timeouts: {
    cacheFetchMs: 10000,
    documentSearchMs: 5000,
    exportAssemblyMs: 15000,
  },

  // Exports
  exports: {
    maxRows: parseInt(process.env.EXPORT_MAX_ROWS || '50000', 10),
    handleTtlMs: 15 * 60 * 1000,
  },

  // Sensor data backend (REST when a URL is configured, fixtures otherwise)
  sensorApi: {
    url: process.env.SENSOR_API_URL || '',
    key: process.env.SENSOR_API_KEY || '',
    requestTimeoutMs: parseInt(process.env.SENSOR_API_TIMEOUT_MS || '8000', 10),
  },

  // Bundled data files, relative to the backend package root
  data: {
    sensorReadingsPath: process.env.SENSOR_FIXTURE_PATH || 'data/sensor-readings.json',
    documentsPath: process.env.DOCUMENTS_FIXTURE_PATH || 'data/documents.json',
  },
} as const;

export type Config = typeof config;
