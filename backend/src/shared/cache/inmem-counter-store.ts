/**
 * backend/src/shared/cache/inmem-counter-store.ts
 *
 * Per-process counters for tests and single-process dev (REDIS_URL unset).
 * Expired windows are dropped lazily on the next hit for the same key.
 */

import type { CounterStore, WindowHit } from './counter-store';

type Window = { count: number; closesAtMs: number };

export class InMemCounterStore implements CounterStore {
  private readonly windows = new Map<string, Window>();

  constructor(private readonly now: () => number = Date.now) {}

  hit(key: string, windowSeconds: number): Promise<WindowHit> {
    const nowMs = this.now();

    let window = this.windows.get(key);
    if (!window || window.closesAtMs <= nowMs) {
      window = { count: 0, closesAtMs: nowMs + windowSeconds * 1000 };
      this.windows.set(key, window);
    }

    window.count += 1;

    return Promise.resolve({
      count: window.count,
      resetInSeconds: Math.max(1, Math.ceil((window.closesAtMs - nowMs) / 1000)),
    });
  }

  reset(key: string): Promise<void> {
    this.windows.delete(key);
    return Promise.resolve();
  }

  close(): Promise<void> {
    this.windows.clear();
    return Promise.resolve();
  }
}
