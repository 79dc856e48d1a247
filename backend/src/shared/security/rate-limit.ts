/**
 * backend/src/shared/security/rate-limit.ts
 *
 * WHY:
 * - Public auth endpoints are brute-force targets:
 *   - login: 5 / 15min per email, 20 / 15min per IP
 *   - register: 10 / hour per IP
 *   - token refresh: 30 / 15min per IP
 * - Counts in a CounterStore: Redis when configured, process memory otherwise.
 *
 * HOW TO USE:
 * - const limiter = new RateLimiter(store, { prefix: "rl" })
 * - await limiter.hitOrThrow({ key: "login:ip:1.2.3.4", limit: 20, windowSeconds: 900 })
 *
 * RULES:
 * - Count-then-check, never check-then-count: of two concurrent hits on the last slot,
 *   exactly one gets a count above the limit.
 * - retryAfterSeconds is what is LEFT of the window, not the window length.
 * - `disabled: true` skips everything (tests). NODE_ENV is never read here.
 */

import type { CounterStore } from '../cache/counter-store';

export class RateLimitError extends Error {
  constructor(
    public readonly key: string,
    public readonly limit: number,
    public readonly retryAfterSeconds: number,
  ) {
    super('Rate limit exceeded');
    this.name = 'RateLimitError';
  }
}

export type RateLimitRule = { limit: number; windowSeconds: number };

export class RateLimiter {
  constructor(
    private readonly store: CounterStore,
    private readonly opts: { prefix?: string; disabled?: boolean } = {},
  ) {}

  private buildKey(key: string): string {
    return this.opts.prefix ? `${this.opts.prefix}:${key}` : key;
  }

  async hitOrThrow(input: { key: string } & RateLimitRule): Promise<void> {
    if (this.opts.disabled) return;

    const fullKey = this.buildKey(input.key);
    const { count, resetInSeconds } = await this.store.hit(fullKey, input.windowSeconds);

    if (count > input.limit) {
      throw new RateLimitError(fullKey, input.limit, resetInSeconds);
    }
  }

  /** e.g. the per-email login counter after a successful login. */
  async reset(key: string): Promise<void> {
    if (this.opts.disabled) return;
    await this.store.reset(this.buildKey(key));
  }
}
