/**
 * Reader/writer lock for the in-process index.
 *
 * Readers share the lock; a writer holds it exclusively. Writer-preferring:
 * once a writer is queued, new readers wait behind it so searches never
 * observe a half-applied mutation and writers are not starved.
 *
 * @example
 * ```typescript
 * const lock = new ReadWriteLock()
 * const hits = await lock.read(() => engine.evaluate(query))
 * await lock.write(async () => {
 *   await repository.saveSlot(target)
 *   index.addEntry(target.name, entry)
 * })
 * ```
 */

interface Waiter {
  mode: "read" | "write";
  resolve: () => void;
}

export class ReadWriteLock {
  private activeReaders = 0;
  private writerActive = false;
  private queue: Waiter[] = [];

  /** Run fn while holding a shared (read) lock */
  async read<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire("read");
    try {
      return await fn();
    } finally {
      this.release("read");
    }
  }

  /** Run fn while holding the exclusive (write) lock */
  async write<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire("write");
    try {
      return await fn();
    } finally {
      this.release("write");
    }
  }

  get state(): { readers: number; writer: boolean; queued: number } {
    return {
      readers: this.activeReaders,
      writer: this.writerActive,
      queued: this.queue.length,
    };
  }

  private acquire(mode: "read" | "write"): Promise<void> {
    if (this.canGrant(mode)) {
      this.grant(mode);
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.queue.push({ mode, resolve });
    });
  }

  private canGrant(mode: "read" | "write"): boolean {
    if (this.writerActive) return false;
    if (mode === "write") return this.activeReaders === 0 && this.queue.length === 0;
    // A queued writer blocks new readers
    return !this.queue.some((w) => w.mode === "write");
  }

  private grant(mode: "read" | "write"): void {
    if (mode === "write") {
      this.writerActive = true;
    } else {
      this.activeReaders++;
    }
  }

  private release(mode: "read" | "write"): void {
    if (mode === "write") {
      this.writerActive = false;
    } else {
      this.activeReaders--;
    }
    this.drain();
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const head = this.queue[0];
      if (head.mode === "write") {
        if (this.writerActive || this.activeReaders > 0) return;
        this.queue.shift();
        this.writerActive = true;
        head.resolve();
        return;
      }
      if (this.writerActive) return;
      this.queue.shift();
      this.activeReaders++;
      head.resolve();
    }
  }
}
