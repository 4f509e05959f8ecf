/**
 * Deduplicates concurrent work per key: a caller arriving while a run for the
 * same key is in flight receives that run's promise. The key is released as
 * soon as the run settles, so later calls start fresh.
 */
export class SingleFlight<K, V> {
  private readonly pending = new Map<K, Promise<V>>();

  run(key: K, task: () => Promise<V>): Promise<V> {
    const existing = this.pending.get(key);
    if (existing) {
      return existing;
    }
    const promise = task().finally(() => {
      this.pending.delete(key);
    });
    this.pending.set(key, promise);
    return promise;
  }

  isInFlight(key: K): boolean {
    return this.pending.has(key);
  }

  get size(): number {
    return this.pending.size;
  }
}
