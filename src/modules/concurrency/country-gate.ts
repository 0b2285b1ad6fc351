type LockMode = "shared" | "exclusive";

interface Waiter {
  mode: LockMode;
  grant: () => void;
}

class ReadWriteLock {
  private activeReaders = 0;
  private writerActive = false;
  private readonly waiters: Waiter[] = [];

  acquire(mode: LockMode): Promise<void> {
    if (this.canGrantImmediately(mode)) {
      this.take(mode);
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push({
        mode,
        grant: () => {
          this.take(mode);
          resolve();
        }
      });
    });
  }

  release(mode: LockMode): void {
    if (mode === "exclusive") {
      this.writerActive = false;
    } else {
      this.activeReaders = Math.max(0, this.activeReaders - 1);
    }
    this.drain();
  }

  get idle(): boolean {
    return this.activeReaders === 0 && !this.writerActive && this.waiters.length === 0;
  }

  get state(): { readers: number; writer: boolean; waiting: number } {
    return { readers: this.activeReaders, writer: this.writerActive, waiting: this.waiters.length };
  }

  // A queued writer blocks new readers so resets are not starved.
  private canGrantImmediately(mode: LockMode): boolean {
    if (this.writerActive || this.waiters.length > 0) {
      return false;
    }
    return mode === "shared" || this.activeReaders === 0;
  }

  private take(mode: LockMode): void {
    if (mode === "exclusive") {
      this.writerActive = true;
    } else {
      this.activeReaders += 1;
    }
  }

  private drain(): void {
    while (this.waiters.length > 0 && !this.writerActive) {
      const head = this.waiters[0];
      if (head.mode === "exclusive") {
        if (this.activeReaders > 0) {
          return;
        }
        this.waiters.shift();
        head.grant();
        return;
      }
      this.waiters.shift();
      head.grant();
    }
  }
}

/**
 * Per-country reader/writer gate. Ingestion and query retrieval hold the shared
 * side; reset and delete hold the exclusive side. Countries never block each other.
 */
export class CountryGate {
  private readonly locks = new Map<string, ReadWriteLock>();

  runShared<T>(country: string, operation: () => Promise<T>): Promise<T> {
    return this.run(country, "shared", operation);
  }

  runExclusive<T>(country: string, operation: () => Promise<T>): Promise<T> {
    return this.run(country, "exclusive", operation);
  }

  inspect(country: string): { readers: number; writer: boolean; waiting: number } {
    return this.locks.get(country)?.state ?? { readers: 0, writer: false, waiting: 0 };
  }

  private async run<T>(country: string, mode: LockMode, operation: () => Promise<T>): Promise<T> {
    const lock = this.lockFor(country);
    await lock.acquire(mode);
    try {
      return await operation();
    } finally {
      lock.release(mode);
      if (lock.idle) {
        this.locks.delete(country);
      }
    }
  }

  private lockFor(country: string): ReadWriteLock {
    const existing = this.locks.get(country);
    if (existing) {
      return existing;
    }
    const created = new ReadWriteLock();
    this.locks.set(country, created);
    return created;
  }
}
