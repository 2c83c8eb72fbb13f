/**
 * Keyed single-flight: concurrent callers for the same key share one in-flight
 * operation and its result. Entries are created lazily and removed as soon as
 * the operation settles, so the map only ever holds keys that are in flight.
 */
export class SingleFlight<T> {
  private readonly inFlight = new Map<string, Promise<T>>();

  run(key: string, operation: () => Promise<T>): Promise<T> {
    const existing = this.inFlight.get(key);
    if (existing) return existing;

    const pending = Promise.resolve()
      .then(operation)
      .finally(() => {
        if (this.inFlight.get(key) === pending) this.inFlight.delete(key);
      });
    this.inFlight.set(key, pending);
    return pending;
  }

  isInFlight(key: string): boolean {
    return this.inFlight.has(key);
  }

  get size(): number {
    return this.inFlight.size;
  }
}
