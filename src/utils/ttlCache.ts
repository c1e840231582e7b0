import { performance } from 'perf_hooks';

/** Milliseconds from a monotonic source. */
export type Clock = () => number;

export const monotonicClock: Clock = () => performance.now();

interface CacheSlot<V> {
  value: V;
  expiresAt: number;
}

/**
 * Read-mostly cache whose entries expire a fixed time after they were stored.
 *
 * Expiry is measured on a monotonic clock so wall-clock adjustments never
 * extend or cut short an entry's lifetime. A miss runs the loader; callers
 * racing on the same miss each run it and the last write wins, which is safe
 * as long as the loader is a pure function of the underlying store.
 */
export class TtlCache<V> {
  private slots = new Map<string, CacheSlot<V>>();
  private generation = 0;

  constructor(
    private readonly ttlMs: number,
    private readonly clock: Clock = monotonicClock,
  ) {
    if (!(ttlMs > 0)) {
      throw new Error(`TTL must be positive, got ${ttlMs}`);
    }
  }

  get(key: string): V | undefined {
    const slot = this.slots.get(key);
    if (!slot) return undefined;
    if (this.clock() >= slot.expiresAt) {
      this.slots.delete(key);
      return undefined;
    }
    return slot.value;
  }

  set(key: string, value: V): void {
    this.slots.set(key, { value, expiresAt: this.clock() + this.ttlMs });
  }

  async getOrLoad(key: string, loader: () => Promise<V>): Promise<{ value: V; hit: boolean }> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return { value: cached, hit: true };
    }

    const generation = this.generation;
    const value = await loader();
    // An invalidate() during the load means the value may predate the change
    if (generation === this.generation) {
      this.set(key, value);
    }
    return { value, hit: false };
  }

  invalidate(): void {
    this.generation++;
    this.slots.clear();
  }

  get size(): number {
    return this.slots.size;
  }
}
