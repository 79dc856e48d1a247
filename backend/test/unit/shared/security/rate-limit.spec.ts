import { describe, it, expect } from 'vitest';

import { InMemCounterStore } from '../../../../src/shared/cache/inmem-counter-store';
import { RateLimitError, RateLimiter } from '../../../../src/shared/security/rate-limit';

describe('RateLimiter (in-memory counters)', () => {
  function setup() {
    let nowMs = 1_000_000;
    const store = new InMemCounterStore(() => nowMs);
    const limiter = new RateLimiter(store, { prefix: 'rl' });
    return {
      store,
      limiter,
      advance: (ms: number) => {
        nowMs += ms;
      },
    };
  }

  const rule = { key: 'login:ip:10.0.0.1', limit: 2, windowSeconds: 60 };

  it('allows up to the limit, then rejects with the seconds left in the window', async () => {
    const { limiter, advance } = setup();

    await limiter.hitOrThrow(rule);
    advance(15_000);
    await limiter.hitOrThrow(rule);

    advance(5_000);
    const err = await limiter.hitOrThrow(rule).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RateLimitError);
    expect(err).toMatchObject({ key: 'rl:login:ip:10.0.0.1', limit: 2, retryAfterSeconds: 40 });
  });

  it('opens a fresh window once the old one closes', async () => {
    const { limiter, advance } = setup();

    await limiter.hitOrThrow(rule);
    await limiter.hitOrThrow(rule);
    advance(60_000);

    await expect(limiter.hitOrThrow(rule)).resolves.toBeUndefined();
  });

  it('reset() clears the counter', async () => {
    const { limiter } = setup();

    await limiter.hitOrThrow(rule);
    await limiter.hitOrThrow(rule);
    await limiter.reset(rule.key);

    await expect(limiter.hitOrThrow(rule)).resolves.toBeUndefined();
  });

  it('counts keys independently', async () => {
    const { store } = setup();

    await store.hit('a', 60);
    await store.hit('a', 60);

    expect(await store.hit('b', 60)).toEqual({ count: 1, resetInSeconds: 60 });
    expect(await store.hit('a', 60)).toEqual({ count: 3, resetInSeconds: 60 });
  });

  it('does nothing when disabled', async () => {
    const store = new InMemCounterStore();
    const limiter = new RateLimiter(store, { disabled: true });

    for (let i = 0; i < 5; i++) await limiter.hitOrThrow({ ...rule, limit: 1 });

    expect(await store.hit('login:ip:10.0.0.1', 60)).toEqual({ count: 1, resetInSeconds: 60 });
  });
});
