import { createClient } from 'redis';
import { env } from './env';
import { logger } from '../utils/logger';

export const redis = createClient({ url: env.REDIS_URL });

redis.on('error', (err: Error) => {
  logger.error('Redis error', { error: err.message });
});

redis.on('ready', () => {
  logger.info('Redis ready', { url: env.REDIS_URL.replace(/\/\/[^@]*@/, '//***@') });
});

/** String keys with a TTL, the only shape of data the web process keeps in Redis. */
export interface ExpiringKeyValue {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  del(key: string): Promise<void>;
}

export const redisKeyValue: ExpiringKeyValue = {
  get: (key) => redis.get(key),
  set: async (key, value, ttlSeconds) => {
    await redis.set(key, value, { EX: ttlSeconds });
  },
  del: async (key) => {
    await redis.del(key);
  },
};

export async function connectRedis(): Promise<void> {
  if (!redis.isOpen) {
    await redis.connect();
  }
}

export async function disconnectRedis(): Promise<void> {
  if (redis.isOpen) {
    await redis.quit();
  }
}

export async function checkRedisHealth(): Promise<{ status: 'healthy' | 'unhealthy'; error?: string }> {
  try {
    await redis.ping();
    return { status: 'healthy' };
  } catch (error: unknown) {
    return { status: 'unhealthy', error: error instanceof Error ? error.message : String(error) };
  }
}
