/**
 * backend/src/shared/cache/redis-counter-store.ts
 *
 * WHY:
 * - With REDIS_URL set, every API process counts against the same windows.
 *
 * IMPORTANT:
 * - INCR, EXPIRE NX and TTL go in one MULTI: a crash between INCR and EXPIRE cannot
 *   leave a counter that never expires. EXPIRE NX needs Redis 7+.
 * - The client type is derived from createClient() instead of importing RedisClientType,
 *   whose generics differ between @redis/client releases.
 *
 * LOGGING:
 * - Connection errors fire outside any request, so the global logger is used directly.
 */

import { createClient } from 'redis';

import { logger } from '../logger/logger';
import type { CounterStore, WindowHit } from './counter-store';

type RedisClient = ReturnType<typeof createClient>;

function toInteger(reply: unknown): number {
  const value = typeof reply === 'number' ? reply : Number(reply);
  if (!Number.isFinite(value)) {
    throw new Error(`counter-store: unexpected redis reply ${String(reply)}`);
  }
  return value;
}

export class RedisCounterStore implements CounterStore {
  private constructor(private readonly client: RedisClient) {}

  static async connect(redisUrl: string): Promise<RedisCounterStore> {
    const client = createClient({ url: redisUrl });

    client.on('error', (err: Error) => {
      logger.error('counter_store.redis_client_error', {
        flow: 'redis',
        message: err.message,
        stack: err.stack,
      });
    });

    await client.connect();
    return new RedisCounterStore(client);
  }

  async hit(key: string, windowSeconds: number): Promise<WindowHit> {
    const [count, , ttl] = await this.client
      .multi()
      .incr(key)
      .expire(key, windowSeconds, 'NX')
      .ttl(key)
      .exec();

    const ttlSeconds = toInteger(ttl);

    return {
      count: toInteger(count),
      // -1/-2 only if the key vanished between commands: treat as a full window
      resetInSeconds: ttlSeconds > 0 ? ttlSeconds : windowSeconds,
    };
  }

  async reset(key: string): Promise<void> {
    await this.client.del(key);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}
