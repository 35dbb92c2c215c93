/**
 * In-process keyed lock.
 * Writes acquire the key of every lineage chain they touch (its root id);
 * writes on disjoint chains proceed in parallel. Keys are taken in sorted
 * order so two multi-key writers cannot deadlock. It only orders writers in
 * this process; the chain guard checked at commit covers the others.
 */

export class ChainLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(keys: string[], task: () => Promise<T>): Promise<T> {
    const ordered = [...new Set(keys)].sort();
    const releases: Array<() => void> = [];

    try {
      for (const key of ordered) {
        releases.push(await this.acquire(key));
      }
      return await task();
    } finally {
      for (const release of releases.reverse()) {
        release();
      }
    }
  }

  /** Keys currently held or awaited. */
  get activeKeys(): string[] {
    return [...this.tails.keys()];
  }

  private async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => held);
    this.tails.set(key, tail);

    await previous;

    return () => {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }
}
