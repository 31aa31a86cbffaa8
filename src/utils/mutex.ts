// Utilities: Keyed mutual exclusion
// Work submitted under the same key runs strictly one after another; different keys never wait on each other.

export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(work);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /**
   * Resolves once everything queued so far, under every key, has settled.
   */
  async drain(): Promise<void> {
    await Promise.all(Array.from(this.tails.values()));
  }
}
