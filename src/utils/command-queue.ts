/**
 * Bounded single-consumer queue. Commands run one at a time in submission
 * order; senders beyond the capacity wait for a slot.
 */

interface QueuedCommand<C, R> {
  readonly command: C;
  readonly resolve: (response: R) => void;
  readonly reject: (error: unknown) => void;
}

export class CommandQueue<C, R> {
  private readonly queue: Array<QueuedCommand<C, R>> = [];
  private readonly waiting: Array<QueuedCommand<C, R>> = [];
  private running = false;

  constructor(
    private readonly handler: (command: C) => Promise<R>,
    public readonly capacity = 64,
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  /** Resolves with the handler's response once `command` has been processed. */
  send(command: C): Promise<R> {
    return new Promise<R>((resolve, reject) => {
      const entry: QueuedCommand<C, R> = { command, resolve, reject };
      if (this.queue.length < this.capacity && this.waiting.length === 0) {
        this.queue.push(entry);
      } else {
        this.waiting.push(entry);
      }
      void this.drain();
    });
  }

  /** Commands queued, and senders waiting for a slot. */
  get pending(): { readonly queued: number; readonly waiting: number } {
    return { queued: this.queue.length, waiting: this.waiting.length };
  }

  private async drain(): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;
    try {
      let entry = this.queue.shift();
      while (entry) {
        const admitted = this.waiting.shift();
        if (admitted) {
          this.queue.push(admitted);
        }
        try {
          entry.resolve(await this.handler(entry.command));
        } catch (error) {
          entry.reject(error);
        }
        entry = this.queue.shift();
      }
    } finally {
      this.running = false;
    }
  }
}
