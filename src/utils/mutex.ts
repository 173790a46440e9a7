/**
 * Per-key promise mutex.
 *
 * Operations on the same key run one at a time in arrival order; different
 * keys never wait for each other.
 */
export class KeyedMutex {
  private locks = new Map<string, Promise<void>>();

  /**
   * Execute a function while holding the lock for `key`
   *
   * @returns Result of the function
   */
  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    // Wait for previous operation to complete
    let currentLock = this.locks.get(key);
    while (currentLock) {
      await currentLock;
      currentLock = this.locks.get(key);
    }

    const result = (async () => {
      try {
        return await fn();
      } finally {
        this.locks.delete(key);
      }
    })();

    this.locks.set(
      key,
      result.then(
        () => undefined,
        () => undefined,
      ),
    );
    return result;
  }

  isLocked(key: string): boolean {
    return this.locks.has(key);
  }
}
