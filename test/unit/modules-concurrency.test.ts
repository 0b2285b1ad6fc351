import { afterEach, describe, expect, it, vi } from "vitest";
import { withCapabilityTimeout } from "../../src/modules/concurrency/capability-timeout.js";
import { CountryGate } from "../../src/modules/concurrency/country-gate.js";
import { KeyedMutex } from "../../src/modules/concurrency/keyed-mutex.js";
import { CapabilityTimeout, RequestCancelled } from "../../src/modules/errors.js";

const deferred = <T = void>() => {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((done) => {
    resolve = done;
  });
  return { promise, resolve };
};

const flush = async (): Promise<void> => {
  for (let i = 0; i < 10; i += 1) {
    await Promise.resolve();
  }
};

describe("modules/concurrency/keyed-mutex", () => {
  it("runs calls for one key in arrival order", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive("s1", async () => {
      events.push("first:start");
      await gate.promise;
      events.push("first:end");
    });
    const second = mutex.runExclusive("s1", async () => {
      events.push("second");
    });
    await flush();

    expect(events).toEqual(["first:start"]);
    expect(mutex.isLocked("s1")).toBe(true);

    gate.resolve();
    await Promise.all([first, second]);

    expect(events).toEqual(["first:start", "first:end", "second"]);
    expect(mutex.size).toBe(0);
  });

  it("does not hold other keys", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const held = mutex.runExclusive("s1", () => gate.promise);

    await expect(mutex.runExclusive("s2", async () => "done")).resolves.toBe("done");

    gate.resolve();
    await held;
  });

  it("releases the key when the operation throws", async () => {
    const mutex = new KeyedMutex();

    await expect(mutex.runExclusive("s1", async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    await expect(mutex.runExclusive("s1", async () => 1)).resolves.toBe(1);
    expect(mutex.isLocked("s1")).toBe(false);
  });
});

describe("modules/concurrency/country-gate", () => {
  it("lets a reset of one country run while another country is being read", async () => {
    const gate = new CountryGate();
    const reading = deferred();
    const reader = gate.runShared("egypt", () => reading.promise);

    await expect(gate.runExclusive("jordan", async () => "reset")).resolves.toBe("reset");
    expect(gate.inspect("egypt")).toEqual({ readers: 1, writer: false, waiting: 0 });

    reading.resolve();
    await reader;
    expect(gate.inspect("egypt")).toEqual({ readers: 0, writer: false, waiting: 0 });
  });

  it("makes readers that arrive after a queued writer wait for it", async () => {
    const gate = new CountryGate();
    const events: string[] = [];
    const firstRead = deferred();

    const reader = gate.runShared("egypt", async () => {
      events.push("read-1:start");
      await firstRead.promise;
      events.push("read-1:end");
    });
    const writer = gate.runExclusive("egypt", async () => {
      events.push("reset");
    });
    const lateReader = gate.runShared("egypt", async () => {
      events.push("read-2");
    });
    await flush();

    expect(events).toEqual(["read-1:start"]);
    expect(gate.inspect("egypt")).toEqual({ readers: 1, writer: false, waiting: 2 });

    firstRead.resolve();
    await Promise.all([reader, writer, lateReader]);

    expect(events).toEqual(["read-1:start", "read-1:end", "reset", "read-2"]);
  });

  it("lets readers of one country overlap", async () => {
    const gate = new CountryGate();
    const release = deferred();
    const readers = [gate.runShared("egypt", () => release.promise), gate.runShared("egypt", () => release.promise)];
    await flush();

    expect(gate.inspect("egypt").readers).toBe(2);

    release.resolve();
    await Promise.all(readers);
  });
});

describe("modules/concurrency/capability-timeout", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns the operation result within the deadline", async () => {
    await expect(withCapabilityTimeout({ capability: "embedder", timeoutMs: 1000 }, async () => 42)).resolves.toBe(42);
  });

  it("rejects with CapabilityTimeout and aborts the call at the deadline", async () => {
    vi.useFakeTimers();
    let callSignal: AbortSignal | undefined;

    const pending = withCapabilityTimeout({ capability: "reranker", timeoutMs: 50 }, (signal) => {
      callSignal = signal;
      return new Promise<never>(() => undefined);
    });
    const assertion = expect(pending).rejects.toMatchObject({
      name: "CapabilityTimeout",
      capability: "reranker",
      timeoutMs: 50,
      message: "reranker did not respond within 50ms"
    });
    await vi.advanceTimersByTimeAsync(50);

    await assertion;
    expect(callSignal?.aborted).toBe(true);
  });

  it("rejects with RequestCancelled when the caller aborts", async () => {
    const controller = new AbortController();

    const pending = withCapabilityTimeout(
      { capability: "generator", timeoutMs: 10_000, signal: controller.signal },
      () => new Promise<never>(() => undefined)
    );
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(RequestCancelled);
  });

  it("does not start the call when the caller already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const operation = vi.fn(async () => 1);

    await expect(
      withCapabilityTimeout({ capability: "embedder", timeoutMs: 10, signal: controller.signal }, operation)
    ).rejects.toBeInstanceOf(RequestCancelled);
    expect(operation).not.toHaveBeenCalled();
  });

  it("keeps the timeout error distinct from cancellation", () => {
    expect(new CapabilityTimeout("embedder", 5)).not.toBeInstanceOf(RequestCancelled);
  });
});
