/**
 * Per-key serialization. Work queued under one key runs strictly one after
 * another; different keys never wait on each other.
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  run<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve();
    const result = prev.then(fn);
    const tail = result.then(() => undefined, () => undefined);
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });
    return result;
  }

  /** Keys with work queued or running. */
  get pending(): number {
    return this.tails.size;
  }
}
