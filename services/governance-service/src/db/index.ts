import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { Pool } from "pg";
import type { PoolClient } from "pg";
import { config } from "../config";
import { logger } from "../logger";

let pool: Pool | null = null;

export function getDb(): Pool {
  if (!pool) {
    pool = new Pool({
      host: config.db.host,
      port: config.db.port,
      user: config.db.user,
      password: config.db.password,
      database: config.db.database,
      max: config.db.poolMax,
      connectionTimeoutMillis: config.db.connectionTimeoutMs
    });
  }
  return pool;
}

export async function closeDb(): Promise<void> {
  if (!pool) {
    return;
  }
  await pool.end();
  pool = null;
}

export async function withTransaction<T>(db: Pool, work: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await db.connect();
  try {
    await client.query("BEGIN");
    const result = await work(client);
    await client.query("COMMIT");
    return result;
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  } finally {
    client.release();
  }
}

function resolveMigrationPath(file: string): string {
  // tsc does not copy .sql files, so a build under dist/ reads them from the sources
  const candidates = [
    join(__dirname, "migrations", file),
    join(process.cwd(), "src", "db", "migrations", file),
    join(process.cwd(), "services", "governance-service", "src", "db", "migrations", file)
  ];
  return candidates.find((candidate) => existsSync(candidate)) ?? candidates[0];
}

export async function migrate(): Promise<void> {
  if (config.useInMemoryStore) {
    logger.warn("USE_INMEMORY_STORE set; skipping migrations");
    return;
  }
  const sql = readFileSync(resolveMigrationPath("001_init.sql"), "utf8");
  await getDb().query(sql);
  logger.info("Database migrations applied");
}

export function isUniqueViolation(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "23505";
}
