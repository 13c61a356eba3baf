export interface RateLimit {
  /** Requests that may go out back to back from an idle start. */
  burst: number;
  /** Sustained requests per second once the burst is spent. */
  perSecond: number;
}

export interface RateLimiter {
  /** Resolves once the caller may send. */
  acquire(): Promise<void>;
}

/**
 * Hands out send slots spaced `1 / perSecond` apart, letting up to `burst`
 * of them fall due at once. Each caller reserves its own slot before
 * waiting, so concurrent callers queue in call order.
 */
export class SlotRateLimiter implements RateLimiter {
  private readonly spacingMs: number;
  private readonly toleranceMs: number;
  private readonly clock: () => number;
  // When the next slot would fall due if no burst were allowed.
  private nextSlotAt: number = 0;

  constructor(limit: RateLimit, clock: () => number = () => Date.now()) {
    if (limit.burst < 1 || limit.perSecond <= 0) {
      throw new RangeError(`Invalid rate limit: burst ${limit.burst}, ${limit.perSecond}/s`);
    }
    this.spacingMs = 1000 / limit.perSecond;
    this.toleranceMs = (limit.burst - 1) * this.spacingMs;
    this.clock = clock;
  }

  /** Claims the next slot and returns how many milliseconds until it is due. */
  reserve(): number {
    const now = this.clock();
    const slot = Math.max(this.nextSlotAt, now);
    this.nextSlotAt = slot + this.spacingMs;
    return Math.max(0, Math.ceil(slot - this.toleranceMs - now));
  }

  async acquire(): Promise<void> {
    const delayMs = this.reserve();
    if (delayMs > 0) {
      await new Promise<void>((resolve) => setTimeout(resolve, delayMs));
    }
  }

  /** Slots that could be taken right now without waiting. */
  remaining(): number {
    const now = this.clock();
    const backlogMs = Math.max(this.nextSlotAt, now) - now;
    const free = Math.floor((this.toleranceMs - backlogMs) / this.spacingMs) + 1;
    return Math.max(0, free);
  }

  reset(): void {
    this.nextSlotAt = 0;
  }
}

/**
 * Limiters keyed by endpoint class. Known classes get their own limit,
 * anything else shares the fallback limit under its own key.
 */
export class EndpointRateLimiter {
  private limits: Readonly<Record<string, RateLimit>>;
  private fallback: RateLimit;
  private limiters: Map<string, SlotRateLimiter> = new Map();

  constructor(limits: Readonly<Record<string, RateLimit>>, fallback: RateLimit) {
    this.limits = limits;
    this.fallback = fallback;
  }

  for(endpointClass: string): RateLimiter {
    let limiter = this.limiters.get(endpointClass);
    if (!limiter) {
      limiter = new SlotRateLimiter(this.limits[endpointClass] ?? this.fallback);
      this.limiters.set(endpointClass, limiter);
    }
    return limiter;
  }
}
