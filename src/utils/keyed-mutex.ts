interface LockEntry {
  tail: Promise<void>;
  refs: number;
}

/**
 * Per-key mutual exclusion for async work.
 *
 * Callers for the same key run one at a time in arrival order; different keys never wait on
 * each other. An entry lives only while it has a holder or waiters.
 */
export class KeyedMutex {
  private readonly locks = new Map<string, LockEntry>();

  async runExclusive<T>(key: string, work: () => Promise<T>): Promise<T> {
    const entry = this.locks.get(key) ?? this.createEntry(key);

    entry.refs += 1;
    const previous = entry.tail;

    let release: () => void = () => undefined;
    entry.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    try {
      await previous;
      return await work();
    } finally {
      release();
      entry.refs -= 1;
      if (entry.refs === 0) {
        this.locks.delete(key);
      }
    }
  }

  private createEntry(key: string): LockEntry {
    const entry: LockEntry = { tail: Promise.resolve(), refs: 0 };
    this.locks.set(key, entry);
    return entry;
  }

  /** Number of keys with a holder or waiters. */
  get size(): number {
    return this.locks.size;
  }

  isLocked(key: string): boolean {
    return this.locks.has(key);
  }
}
