type Release = () => void;

export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    let release: Release = () => {};
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => next);

    await previous;
    try {
      return await task();
    } finally {
      release();
    }
  }
}

interface Waiter {
  mode: "read" | "write";
  grant: Release;
}

/**
 * Many concurrent readers or a single writer. Waiters are served in arrival
 * order, so a queued writer is not starved by readers that come after it.
 */
export class ReadWriteLock {
  private activeReaders = 0;

  private writing = false;

  private readonly queue: Waiter[] = [];

  async withRead<T>(task: () => Promise<T> | T): Promise<T> {
    await this.acquire("read");
    try {
      return await task();
    } finally {
      this.activeReaders -= 1;
      this.drain();
    }
  }

  async withWrite<T>(task: () => Promise<T> | T): Promise<T> {
    await this.acquire("write");
    try {
      return await task();
    } finally {
      this.writing = false;
      this.drain();
    }
  }

  get readers(): number {
    return this.activeReaders;
  }

  get isWriting(): boolean {
    return this.writing;
  }

  private acquire(mode: "read" | "write"): Promise<void> {
    if (this.queue.length === 0 && this.canGrant(mode)) {
      this.take(mode);
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.queue.push({ mode, grant: resolve });
    });
  }

  private canGrant(mode: "read" | "write"): boolean {
    if (mode === "read") {
      return !this.writing;
    }
    return !this.writing && this.activeReaders === 0;
  }

  private take(mode: "read" | "write"): void {
    if (mode === "read") {
      this.activeReaders += 1;
    } else {
      this.writing = true;
    }
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const head = this.queue[0];
      if (!this.canGrant(head.mode)) {
        return;
      }
      this.queue.shift();
      this.take(head.mode);
      head.grant();
      if (head.mode === "write") {
        return;
      }
    }
  }
}
