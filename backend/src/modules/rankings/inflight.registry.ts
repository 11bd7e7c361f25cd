/**
 * IN-FLIGHT REGISTRY
 * ==================
 * Single-flight per key: the first caller starts the work, later callers
 * get the same promise until the work settles.
 */

export interface InflightTask<V> {
  /** What callers await. */
  result: Promise<V>;
  /** Settles once the underlying work is done; may come after `result`. */
  settled: Promise<unknown>;
}

export class InflightRegistry<K, V> {
  private inflight = new Map<K, Promise<V>>();

  has(key: K): boolean {
    return this.inflight.has(key);
  }

  /**
   * Join the running task for key, or start one with `start`. The key is
   * held until the task's `settled` promise settles.
   */
  run(key: K, start: () => InflightTask<V>): Promise<V> {
    const existing = this.inflight.get(key);
    if (existing) return existing;

    const { result, settled } = start();
    this.inflight.set(key, result);

    const release = () => {
      if (this.inflight.get(key) === result) this.inflight.delete(key);
    };
    void settled.then(release, release);

    return result;
  }
}
