/**
 * Singleflight
 * Collapses concurrent calls for the same key into one in-flight task
 */

export class Singleflight<T> {
  private readonly inFlight = new Map<string, Promise<T>>();

  /**
   * Run `task` for the key unless one is already running, in which case the
   * caller shares its promise. The marker is cleared once the task settles,
   * whether it resolved or rejected.
   */
  do(key: string, task: () => Promise<T>): { promise: Promise<T>; shared: boolean } {
    const pending = this.inFlight.get(key);
    if (pending) {
      return { promise: pending, shared: true };
    }

    const promise = Promise.resolve()
      .then(task)
      .finally(() => {
        this.inFlight.delete(key);
      });
    this.inFlight.set(key, promise);
    return { promise, shared: false };
  }

  has(key: string): boolean {
    return this.inFlight.has(key);
  }

  size(): number {
    return this.inFlight.size;
  }
}
