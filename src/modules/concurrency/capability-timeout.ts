import { CapabilityTimeout, RequestCancelled } from "../errors.js";

export interface CapabilityCallOptions {
  capability: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Runs one external capability call with its own deadline. The operation gets a
 * signal that aborts on timeout or when the caller's signal aborts.
 */
export async function withCapabilityTimeout<T>(
  options: CapabilityCallOptions,
  operation: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  if (options.signal?.aborted) {
    throw new RequestCancelled(`${options.capability} call cancelled before start`);
  }

  const controller = new AbortController();
  let timeoutHandle: ReturnType<typeof setTimeout> | undefined;
  let onParentAbort: (() => void) | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      controller.abort();
      reject(new CapabilityTimeout(options.capability, options.timeoutMs));
    }, options.timeoutMs);

    if (options.signal) {
      const parent = options.signal;
      onParentAbort = () => {
        controller.abort();
        reject(new RequestCancelled(`${options.capability} call cancelled`));
      };
      parent.addEventListener("abort", onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } finally {
    clearTimeout(timeoutHandle);
    if (onParentAbort && options.signal) {
      options.signal.removeEventListener("abort", onParentAbort);
    }
  }
}
