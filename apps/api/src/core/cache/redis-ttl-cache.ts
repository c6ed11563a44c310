import type { Redis } from 'ioredis';

import type { TtlCache } from './ttl-cache.js';

export class RedisTtlCache implements TtlCache {
  constructor(
    private readonly redis: Redis,
    private readonly prefix = 'mailhost:',
  ) {}

  async get(key: string): Promise<string | null> {
    return this.redis.get(this.prefix + key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    if (ttlSeconds <= 0) {
      await this.delete(key);
      return;
    }
    await this.redis.set(this.prefix + key, value, 'EX', Math.ceil(ttlSeconds));
  }

  // GETDEL needs Redis 6.2+
  async take(key: string): Promise<string | null> {
    return this.redis.getdel(this.prefix + key);
  }

  async delete(key: string): Promise<void> {
    await this.redis.del(this.prefix + key);
  }
}
