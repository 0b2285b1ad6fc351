import { config } from "../config/index.js";
import { logError, logInfo } from "../observability/logger.js";
import type { HealthReport } from "./retry.js";

let processHooksRegistered = false;

type HealthCheckedClient = { healthCheck: () => Promise<HealthReport> };

export interface ClientLifecycleModules {
  getOpenAIClient: () => Promise<HealthCheckedClient>;
  shutdownOpenAIClient: () => Promise<void>;
  getPostgresClient?: () => Promise<HealthCheckedClient>;
  shutdownPostgresClient?: () => Promise<void>;
  getQdrantClient?: () => Promise<HealthCheckedClient>;
  shutdownQdrantClient?: () => Promise<void>;
  getRedisClient?: () => Promise<HealthCheckedClient>;
  shutdownRedisClient?: () => Promise<void>;
}

// Only the backends named in the environment are loaded.
async function getClientModules(): Promise<ClientLifecycleModules> {
  const openaiModule = await import("./openai.js");
  const modules: ClientLifecycleModules = {
    getOpenAIClient: openaiModule.getOpenAIClient,
    shutdownOpenAIClient: openaiModule.shutdownOpenAIClient
  };

  if (config.POSTGRES_URL) {
    const postgresModule = await import("./postgres.js");
    modules.getPostgresClient = postgresModule.getPostgresClient;
    modules.shutdownPostgresClient = postgresModule.shutdownPostgresClient;
  }
  if (config.QDRANT_URL) {
    const qdrantModule = await import("./qdrant.js");
    modules.getQdrantClient = qdrantModule.getQdrantClient;
    modules.shutdownQdrantClient = qdrantModule.shutdownQdrantClient;
  }
  if (config.REDIS_URL) {
    const redisModule = await import("./redis.js");
    modules.getRedisClient = redisModule.getRedisClient;
    modules.shutdownRedisClient = redisModule.shutdownRedisClient;
  }

  return modules;
}

export async function shutdownAllClients(
  loadClientModules: () => Promise<ClientLifecycleModules> = getClientModules
): Promise<void> {
  const clients = await loadClientModules();
  logInfo("lifecycle.shutdown.start", {});
  const results = await Promise.allSettled([
    clients.shutdownQdrantClient?.(),
    clients.shutdownRedisClient?.(),
    clients.shutdownOpenAIClient(),
    clients.shutdownPostgresClient?.()
  ]);
  for (const result of results) {
    if (result.status === "rejected") {
      logError("lifecycle.shutdown.failed", {}, {
        error: result.reason instanceof Error ? result.reason.message : String(result.reason)
      });
    }
  }
}

export interface ClientLifecycleOptions {
  loadClientModules?: () => Promise<ClientLifecycleModules>;
  registerProcessSignals?: boolean;
  exit?: (code: number) => never | void;
}

export interface ClientLifecycleHandle {
  health: Record<string, HealthReport>;
  shutdown: () => Promise<void>;
}

/**
 * Initializes and health-checks every configured infrastructure client, and
 * closes them on SIGINT/SIGTERM.
 */
export async function startClientLifecycle(options?: ClientLifecycleOptions): Promise<ClientLifecycleHandle> {
  const loadClientModules = options?.loadClientModules ?? getClientModules;
  const shouldRegisterProcessSignals = options?.registerProcessSignals ?? true;
  const exit = options?.exit ?? ((code: number) => process.exit(code));
  const clients = await loadClientModules();

  const checks: Array<[string, (() => Promise<HealthCheckedClient>) | undefined]> = [
    ["openai", clients.getOpenAIClient],
    ["postgres", clients.getPostgresClient],
    ["qdrant", clients.getQdrantClient],
    ["redis", clients.getRedisClient]
  ];
  const health: Record<string, HealthReport> = {};
  await Promise.all(
    checks.map(async ([name, getClient]) => {
      if (!getClient) {
        return;
      }
      const client = await getClient();
      health[name] = await client.healthCheck();
    })
  );
  logInfo("lifecycle.clients.ready", {}, { health });

  if (shouldRegisterProcessSignals && !processHooksRegistered) {
    processHooksRegistered = true;
    const handleSignal = (signal: NodeJS.Signals): void => {
      logInfo("lifecycle.process.signal", {}, { signal });
      shutdownAllClients(loadClientModules)
        .then(() => exit(0))
        .catch((error: unknown) => {
          logError("lifecycle.shutdown.failed", {}, {
            error: error instanceof Error ? error.message : String(error)
          });
          exit(1);
        });
    };

    process.once("SIGINT", handleSignal);
    process.once("SIGTERM", handleSignal);
  }

  return {
    health,
    shutdown: () => shutdownAllClients(loadClientModules)
  };
}

export function resetClientLifecycleStateForTests(): void {
  processHooksRegistered = false;
}
