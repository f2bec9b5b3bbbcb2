import dotenv from "dotenv";

dotenv.config();

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  if (value.toLowerCase() === "true") {
    return true;
  }
  if (value.toLowerCase() === "false") {
    return false;
  }
  return fallback;
}

export const config = {
  port: parseNumber(process.env.PORT, 3010),
  serviceName: process.env.SERVICE_NAME ?? "governance-service",
  logLevel: process.env.LOG_LEVEL ?? "info",
  useInMemoryStore: process.env.USE_INMEMORY_STORE === "true",
  telemetryEnabled: parseBoolean(process.env.TELEMETRY_ENABLED, false),
  policies: {
    seedDefaults: parseBoolean(process.env.SEED_DEFAULT_POLICIES, false),
    defaultsPath: process.env.DEFAULT_POLICIES_PATH
  },
  scanner: {
    enabled: parseBoolean(process.env.SCANNER_ENABLED, true),
    intervalMs: parseNumber(process.env.SCANNER_INTERVAL_MS, 60 * 60 * 1000),
    batchSize: parseNumber(process.env.SCAN_BATCH_SIZE, 200)
  },
  retention: {
    enabled: parseBoolean(process.env.PURGE_ENABLED, false),
    intervalMs: parseNumber(process.env.PURGE_INTERVAL_MS, 24 * 60 * 60 * 1000),
    retentionDays: parseNumber(process.env.RETENTION_DAYS, 365),
    dryRun: parseBoolean(process.env.PURGE_DRY_RUN, true),
    batchSize: parseNumber(process.env.PURGE_BATCH_SIZE, 500)
  },
  db: {
    host: process.env.DB_HOST ?? "localhost",
    port: parseNumber(process.env.DB_PORT, 5432),
    user: process.env.DB_USER ?? "governance",
    password: process.env.DB_PASSWORD ?? "governance",
    database: process.env.DB_NAME ?? "governance",
    poolMax: parseNumber(process.env.DB_POOL_MAX, 10),
    connectionTimeoutMs: parseNumber(process.env.DB_CONNECTION_TIMEOUT_MS, 5000)
  },
  quota: {
    lockConnections: parseNumber(process.env.QUOTA_LOCK_CONNECTIONS, 4)
  }
};
