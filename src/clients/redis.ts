import { Redis } from "ioredis";
import { config } from "../config/index.js";
import { logInfo } from "../observability/logger.js";
import { type HealthReport, toHealthError, withRetries } from "./retry.js";

export interface RedisSingleton {
  client: Redis;
  healthCheck: () => Promise<HealthReport>;
}

const CONNECT_TIMEOUT_MS = 5000;
const STARTUP_RETRIES = 3;
const STARTUP_RETRY_DELAY_MS = 250;

let singleton: RedisSingleton | null = null;
let initPromise: Promise<RedisSingleton> | null = null;

export const isRedisConfigured = (): boolean => Boolean(config.REDIS_URL);

// Masks the password before the URL is logged.
export function redactRedisUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.password) {
      parsed.password = "***";
    }
    return parsed.toString();
  } catch {
    return url.replace(/:[^:@]+@/, ":***@");
  }
}

async function initialize(): Promise<RedisSingleton> {
  const url = config.REDIS_URL;
  if (!url) {
    throw new Error("REDIS_URL is not configured; use the in-memory session store instead.");
  }

  const client = new Redis(url, {
    lazyConnect: true,
    connectTimeout: CONNECT_TIMEOUT_MS,
    maxRetriesPerRequest: 3
  });

  await withRetries(
    async () => {
      if (client.status === "wait" || client.status === "end") {
        await client.connect();
      }
      await client.ping();
    },
    { attempts: STARTUP_RETRIES, delayMs: STARTUP_RETRY_DELAY_MS }
  );

  logInfo("clients.redis.initialized", {}, { url: redactRedisUrl(url) });

  return {
    client,
    async healthCheck() {
      try {
        await client.ping();
        return { status: "ok" };
      } catch (error) {
        return toHealthError(error);
      }
    }
  };
}

export async function getRedisClient(): Promise<RedisSingleton> {
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

export async function shutdownRedisClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  await singleton.client.quit();
  singleton = null;
  initPromise = null;
  logInfo("clients.redis.shutdown", {});
}

export function resetRedisClientForTests(): void {
  singleton = null;
  initPromise = null;
}
