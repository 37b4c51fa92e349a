// serializes async work per key; different keys never wait on each other
export class KeyedMutex {
  private tails: Map<string, Promise<void>> = new Map();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      // last one out cleans up so idle keys don't pile up
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  // Utility for testing
  getPendingKeyCount(): number {
    return this.tails.size;
  }
}
