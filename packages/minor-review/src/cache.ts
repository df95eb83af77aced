import { MINOR_REVIEW } from '@safeguard/shared';

interface Slot<T> {
  value: T;
  storedAt: number;
}

/**
 * Single-slot value cache with a time-to-live and manual invalidation.
 * Each owner holds its own instance; nothing here is process-global.
 */
export class TtlCache<T> {
  private slot: Slot<T> | null = null;
  private generation = 0;

  constructor(
    private readonly ttlMs: number = MINOR_REVIEW.REVIEWER_CACHE_TTL_MS,
    private readonly clock: () => number = Date.now,
  ) {}

  get(): T | undefined {
    if (!this.slot) return undefined;
    if (this.clock() - this.slot.storedAt >= this.ttlMs) return undefined;
    return this.slot.value;
  }

  set(value: T): void {
    this.slot = { value, storedAt: this.clock() };
  }

  invalidate(): void {
    this.slot = null;
    this.generation++;
  }

  /**
   * Return the cached value, or load and store a fresh one. A load that
   * straddles an invalidate() is returned to its caller but not cached.
   */
  async getOrLoad(load: () => Promise<T>): Promise<T> {
    const cached = this.get();
    if (cached !== undefined) return cached;

    const startedAt = this.generation;
    const value = await load();
    if (startedAt === this.generation) {
      this.set(value);
    }
    return value;
  }
}
