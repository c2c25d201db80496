/**
 * Promise-based reader/writer lock. Readers share the lock; a writer holds it
 * alone. Waiting writers go before readers that arrive after them.
 */

type Waiter = { readonly write: boolean; readonly resolve: () => void };

export class RwLock {
  private readers = 0;
  private writing = false;
  private readonly queue: Waiter[] = [];

  private grant(): void {
    while (this.queue.length > 0 && !this.writing) {
      const next = this.queue[0];
      if (!next) {
        return;
      }
      if (next.write) {
        if (this.readers > 0) {
          return;
        }
        this.queue.shift();
        this.writing = true;
        next.resolve();
        return;
      }
      this.queue.shift();
      this.readers += 1;
      next.resolve();
    }
  }

  private acquire(write: boolean): Promise<void> {
    return new Promise<void>((resolve) => {
      this.queue.push({ write, resolve });
      this.grant();
    });
  }

  private release(write: boolean): void {
    if (write) {
      this.writing = false;
    } else {
      this.readers -= 1;
    }
    this.grant();
  }

  async read<T>(task: () => Promise<T> | T): Promise<T> {
    await this.acquire(false);
    try {
      return await task();
    } finally {
      this.release(false);
    }
  }

  async write<T>(task: () => Promise<T> | T): Promise<T> {
    await this.acquire(true);
    try {
      return await task();
    } finally {
      this.release(true);
    }
  }

  get state(): { readonly readers: number; readonly writing: boolean; readonly waiting: number } {
    return { readers: this.readers, writing: this.writing, waiting: this.queue.length };
  }
}
