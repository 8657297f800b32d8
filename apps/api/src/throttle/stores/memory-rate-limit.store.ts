import type { RateLimitHit, RateLimitStore } from './rate-limit-store.interface';

type Entry = {
  windowStart: number;
  windowMs: number;
  count: number;
};

/** Entries are swept once the map grows past this many keys. */
const SWEEP_THRESHOLD = 10_000;

/**
 * In-process fixed-window store for single-instance deployments and tests.
 *
 * `hit` never awaits between reading and writing an entry, so on Node's
 * single thread each increment is atomic. Counters are not shared between
 * processes; use the Redis store when running more than one instance.
 */
export class MemoryRateLimitStore implements RateLimitStore {
  private readonly entries = new Map<string, Entry>();

  constructor(private readonly now: () => number = Date.now) {}

  async hit(key: string, windowMs: number): Promise<RateLimitHit> {
    const now = this.now();

    if (this.entries.size > SWEEP_THRESHOLD) {
      this.sweep(now);
    }

    let entry = this.entries.get(key);
    if (!entry || now - entry.windowStart >= entry.windowMs) {
      entry = { windowStart: now, windowMs, count: 0 };
      this.entries.set(key, entry);
    }

    entry.count += 1;

    return {
      count: entry.count,
      resetInMs: entry.windowStart + entry.windowMs - now,
    };
  }

  private sweep(now: number): void {
    for (const [key, entry] of this.entries) {
      if (now - entry.windowStart >= entry.windowMs) {
        this.entries.delete(key);
      }
    }
  }
}
