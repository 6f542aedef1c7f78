/**
 * Serializes async work per key. Work queued under the same key runs one at a
 * time in arrival order; different keys never wait on each other.
 * Not reentrant: work must not queue itself under its own key.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  get pendingKeys(): number {
    return this.tails.size;
  }

  async runExclusive<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await work();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
