import { QdrantClient } from "@qdrant/js-client-rest";
import { config } from "../config/index.js";
import { logInfo } from "../observability/logger.js";
import { type HealthReport, toHealthError, withRetries } from "./retry.js";

export interface QdrantSingleton {
  client: QdrantClient;
  healthCheck: () => Promise<HealthReport>;
}

const REQUEST_TIMEOUT_MS = 10000;
const REQUEST_RETRIES = 3;
const REQUEST_RETRY_DELAY_MS = 250;

let singleton: QdrantSingleton | null = null;
let initPromise: Promise<QdrantSingleton> | null = null;

export const isQdrantConfigured = (): boolean => Boolean(config.QDRANT_URL);

async function initialize(): Promise<QdrantSingleton> {
  const url = config.QDRANT_URL;
  if (!url) {
    throw new Error("QDRANT_URL is not configured; use the local vector index instead.");
  }

  const client = new QdrantClient({
    url,
    apiKey: config.QDRANT_API_KEY,
    timeout: REQUEST_TIMEOUT_MS
  });

  await withRetries(
    async () => {
      await client.getCollections();
    },
    { attempts: REQUEST_RETRIES, delayMs: REQUEST_RETRY_DELAY_MS }
  );

  logInfo("clients.qdrant.initialized", {}, { url });

  return {
    client,
    async healthCheck() {
      try {
        await client.getCollections();
        return { status: "ok" };
      } catch (error) {
        return toHealthError(error);
      }
    }
  };
}

export async function getQdrantClient(): Promise<QdrantSingleton> {
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

export async function shutdownQdrantClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  singleton = null;
  initPromise = null;
  logInfo("clients.qdrant.shutdown", {});
}

export function resetQdrantClientForTests(): void {
  singleton = null;
  initPromise = null;
}
