import { describe, it, expect } from 'vitest';
import { CommandQueue } from '../src/utils/command-queue.js';
import { RwLock } from '../src/utils/rw-lock.js';

interface Gate {
  readonly opened: Promise<void>;
  open(): void;
}

function gate(): Gate {
  let open = (): void => {};
  const opened = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { opened, open };
}

describe('CommandQueue', () => {
  it('should process commands one at a time in order', async () => {
    const log: string[] = [];
    const queue = new CommandQueue<number, number>(async (command) => {
      log.push(`start ${command}`);
      await Promise.resolve();
      log.push(`end ${command}`);
      return command * 2;
    });

    const results = await Promise.all([queue.send(1), queue.send(2), queue.send(3)]);

    expect(results).toEqual([2, 4, 6]);
    expect(log).toEqual(['start 1', 'end 1', 'start 2', 'end 2', 'start 3', 'end 3']);
  });

  it('should make senders beyond the capacity wait', async () => {
    const first = gate();
    const queue = new CommandQueue<string, string>(async (command) => {
      if (command === 'a') {
        await first.opened;
      }
      return command;
    }, 1);

    const sent = [queue.send('a'), queue.send('b'), queue.send('c')];

    expect(queue.pending).toEqual({ queued: 1, waiting: 1 });
    first.open();
    expect(await Promise.all(sent)).toEqual(['a', 'b', 'c']);
    expect(queue.pending).toEqual({ queued: 0, waiting: 0 });
  });

  it('should reject only the command whose handler failed', async () => {
    const queue = new CommandQueue<number, number>(async (command) => {
      if (command === 2) {
        throw new Error('boom');
      }
      return command;
    });

    const results = await Promise.allSettled([queue.send(1), queue.send(2), queue.send(3)]);

    expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected', 'fulfilled']);
  });

  it('should refuse a capacity below one', () => {
    expect(() => new CommandQueue<number, number>(async (command) => command, 0)).toThrow(RangeError);
  });
});

describe('RwLock', () => {
  it('should let readers share the lock', async () => {
    const lock = new RwLock();
    const held = gate();

    const first = lock.read(() => held.opened);
    const second = lock.read(() => 'second');

    expect(lock.state).toEqual({ readers: 2, writing: false, waiting: 0 });
    expect(await second).toBe('second');
    held.open();
    await first;
    expect(lock.state).toEqual({ readers: 0, writing: false, waiting: 0 });
  });

  it('should run a waiting writer before readers that came after it', async () => {
    const lock = new RwLock();
    const held = gate();
    const log: string[] = [];

    const reader = lock.read(async () => {
      await held.opened;
      log.push('first reader');
    });
    const writer = lock.write(() => {
      log.push('writer');
    });
    const late = lock.read(() => {
      log.push('late reader');
    });

    expect(lock.state).toEqual({ readers: 1, writing: false, waiting: 2 });
    held.open();
    await Promise.all([reader, writer, late]);
    expect(log).toEqual(['first reader', 'writer', 'late reader']);
  });

  it('should release the lock when a task throws', async () => {
    const lock = new RwLock();

    await expect(lock.write(() => {
      throw new Error('failed');
    })).rejects.toThrow('failed');
    expect(await lock.read(() => 'after')).toBe('after');
  });
});
