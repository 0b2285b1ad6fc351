import OpenAI from "openai";
import { config } from "../config/index.js";
import { logInfo } from "../observability/logger.js";
import { type HealthReport, toHealthError, withRetries, withTimeout } from "./retry.js";

export interface OpenAISingleton {
  client: OpenAI;
  healthCheck: () => Promise<HealthReport>;
}

const REQUEST_TIMEOUT_MS = 30000;
const HEALTH_TIMEOUT_MS = 7000;
const REQUEST_RETRIES = 2;
const REQUEST_RETRY_DELAY_MS = 300;

let singleton: OpenAISingleton | null = null;

function initialize(): OpenAISingleton {
  const client = new OpenAI({
    apiKey: config.OPENAI_API_KEY,
    maxRetries: REQUEST_RETRIES,
    timeout: REQUEST_TIMEOUT_MS
  });

  logInfo("clients.openai.initialized", {});

  return {
    client,
    async healthCheck() {
      try {
        await withRetries(
          async () =>
            withTimeout(async (signal) => {
              await client.models.retrieve(config.OPENAI_MODEL, { signal });
            }, HEALTH_TIMEOUT_MS),
          { attempts: REQUEST_RETRIES, delayMs: REQUEST_RETRY_DELAY_MS }
        );
        return { status: "ok" };
      } catch (error) {
        return toHealthError(error);
      }
    }
  };
}

export async function getOpenAIClient(): Promise<OpenAISingleton> {
  if (!singleton) {
    singleton = initialize();
  }

  return singleton;
}

export async function shutdownOpenAIClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  singleton = null;
  logInfo("clients.openai.shutdown", {});
}

export function resetOpenAIClientForTests(): void {
  singleton = null;
}
