/**
 * Serializes async work per key. Tasks for one key run one at a time in the
 * order they were queued; tasks for different keys never wait on each other.
 */
export class KeyedQueue {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, action: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(action);
    // The caller observes failures through `result`; the tail only tracks completion.
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });
    return result;
  }

  pending(key: string) {
    return this.tails.has(key);
  }
}
