/**
 * backend/src/shared/cache/counter-store.ts
 *
 * WHY:
 * - Rate limiting is the only thing that needs state shared between API processes,
 *   and all it needs is fixed-window counters.
 *
 * HOW TO USE:
 * - const { count, resetInSeconds } = await store.hit('rl:login:ip:1.2.3.4', 900)
 * - store.reset(key) drops a window early (e.g. after a successful login).
 */

export type WindowHit = {
  /** Hits in the current window, this one included. */
  count: number;
  /** Seconds until the window closes (>= 1). */
  resetInSeconds: number;
};

export interface CounterStore {
  /**
   * Atomically counts a hit. The first hit opens the window; later hits never extend it.
   */
  hit(key: string, windowSeconds: number): Promise<WindowHit>;
  reset(key: string): Promise<void>;
  close(): Promise<void>;
}
