import pg from "pg";
import type { Pool as PoolType, PoolClient } from "pg";
import { config } from "../config/index.js";
import { logInfo } from "../observability/logger.js";
import { type HealthReport, toHealthError, withRetries } from "./retry.js";

export interface PostgresSingleton {
  pool: PoolType;
  healthCheck: () => Promise<HealthReport>;
}

const STARTUP_RETRIES = 3;
const STARTUP_RETRY_DELAY_MS = 250;
const CONNECT_TIMEOUT_MS = 5000;

let singleton: PostgresSingleton | null = null;
let initPromise: Promise<PostgresSingleton> | null = null;

export const isPostgresConfigured = (): boolean => Boolean(config.POSTGRES_URL);

async function initialize(): Promise<PostgresSingleton> {
  const connectionString = config.POSTGRES_URL;
  if (!connectionString) {
    throw new Error("POSTGRES_URL is not configured; use the in-memory law registry instead.");
  }

  const pool = new pg.Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: CONNECT_TIMEOUT_MS
  });

  await withRetries(
    async () => {
      await pool.query("SELECT 1");
    },
    { attempts: STARTUP_RETRIES, delayMs: STARTUP_RETRY_DELAY_MS }
  );

  logInfo("clients.postgres.initialized", {});

  return {
    pool,
    async healthCheck() {
      try {
        await pool.query("SELECT 1");
        return { status: "ok" };
      } catch (error) {
        return toHealthError(error);
      }
    }
  };
}

export async function getPostgresClient(): Promise<PostgresSingleton> {
  if (singleton) {
    return singleton;
  }

  if (!initPromise) {
    initPromise = initialize().catch((error: unknown) => {
      initPromise = null;
      throw error;
    });
  }

  singleton = await initPromise;
  return singleton;
}

export async function shutdownPostgresClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  await singleton.pool.end();
  singleton = null;
  initPromise = null;
  logInfo("clients.postgres.shutdown", {});
}

export async function withTransaction<T>(operation: (client: PoolClient) => Promise<T>): Promise<T> {
  const { pool } = await getPostgresClient();
  const client = await pool.connect();

  try {
    await client.query("BEGIN");
    const result = await operation(client);
    await client.query("COMMIT");
    return result;
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  } finally {
    client.release();
  }
}

export function resetPostgresClientForTests(): void {
  singleton = null;
  initPromise = null;
}
