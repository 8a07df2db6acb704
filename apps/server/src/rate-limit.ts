export interface RateLimiter {
  allow(clientIdentity: string): boolean;
}

/**
 * Per-client sliding window. Only admitted requests are recorded, so a client
 * that keeps hammering while limited does not push its own recovery further
 * out.
 *
 * The identity map is kept in least-recently-used order and capped at
 * `maxClients`; the least recently seen client is dropped first.
 */
export class SlidingWindowRateLimiter implements RateLimiter {
  private hits = new Map<string, number[]>();

  constructor(
    private readonly maxPerWindow: number,
    private readonly windowMs: number,
    private readonly maxClients = 10_000
  ) {
    if (maxClients < 1) throw new RangeError("maxClients must be at least 1");
  }

  allow(key: string, now = Date.now()): boolean {
    const list = this.hits.get(key) ?? [];
    const floor = now - this.windowMs;
    const next = list.filter((ts) => ts > floor);
    this.touch(key, next);

    if (next.length >= this.maxPerWindow) return false;

    next.push(now);
    return true;
  }

  /** Drops clients with nothing left in their window. Returns how many were removed. */
  sweep(now = Date.now()): number {
    const floor = now - this.windowMs;
    let removed = 0;
    for (const [key, list] of this.hits) {
      if (!list.some((ts) => ts > floor)) {
        this.hits.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this.hits.size;
  }

  private touch(key: string, list: number[]) {
    this.hits.delete(key);
    this.hits.set(key, list);
    if (this.hits.size <= this.maxClients) return;

    const oldest = this.hits.keys().next();
    if (!oldest.done) this.hits.delete(oldest.value);
  }
}
