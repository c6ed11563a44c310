import { Redis, type RedisOptions } from 'ioredis';

import { logger } from '../core/logger/index.js';

const baseOptions: RedisOptions = {
  maxRetriesPerRequest: null, // Required for BullMQ
  enableReadyCheck: true,
  retryStrategy: (times: number) => {
    if (times > 10) {
      return null;
    }
    return Math.min(times * 100, 3000);
  },
  reconnectOnError: (err: Error) => ['READONLY', 'ECONNRESET', 'ETIMEDOUT'].some((code) => err.message.includes(code)),
};

let redisInstance: Redis | null = null;

export function createRedisConnection(url: string): Redis {
  const connection = new Redis(url, baseOptions);

  connection.on('connect', () => {
    logger.info('Redis connected');
  });
  connection.on('error', (err: Error) => {
    logger.error({ err }, 'Redis connection error');
  });

  return connection;
}

export function getRedis(url: string): Redis {
  if (!redisInstance) {
    redisInstance = createRedisConnection(url);
  }
  return redisInstance;
}

export async function closeRedis() {
  if (redisInstance) {
    await redisInstance.quit();
    redisInstance = null;
  }
}
