/**
 * One FIFO lock per key. Tasks sharing a key run one after another, tasks on
 * different keys never wait for each other. Locks only exist while in use.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}

/**
 * Single lock built on KeyedMutex, for state that only needs one key.
 */
export class Mutex {
  private readonly keyed = new KeyedMutex();

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    return this.keyed.runExclusive('', task);
  }
}

/** Shared by every repository in the process, so one file always maps to one lock. */
export const archiveFileLocks = new KeyedMutex();
