export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryPolicy {
  attempts: number;
  delayMs: number;
}

/** Retries with linear backoff and rethrows the last error. */
export async function withRetries<T>(operation: () => Promise<T>, policy: RetryPolicy): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.attempts; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;
      if (attempt < policy.attempts) {
        await delay(policy.delayMs * attempt);
      }
    }
  }

  throw lastError;
}

export async function withTimeout<T>(operation: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  const timeoutHandle = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await operation(controller.signal);
  } finally {
    clearTimeout(timeoutHandle);
  }
}

export type HealthStatus = "ok" | "error";

export interface HealthReport {
  status: HealthStatus;
  details?: string;
}

export const toHealthError = (error: unknown): HealthReport => ({
  status: "error",
  details: error instanceof Error ? error.message : "unknown error"
});
