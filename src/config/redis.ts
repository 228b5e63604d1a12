import Redis from 'ioredis';
import { config } from './index';
import { logger } from '../utils/logger';

let redisClient: Redis | null = null;

/**
 * Shared connection for the maintenance queue, its job schedulers and the worker.
 */
export async function initializeRedis(): Promise<Redis> {
  if (redisClient) {
    return redisClient;
  }

  redisClient = new Redis({
    host: config.redis.host,
    port: config.redis.port,
    password: config.redis.password,
    db: config.redis.db,
    maxRetriesPerRequest: null, // BullMQ workers block on Redis and must not time out
    retryStrategy: (times) => Math.min(times * 50, 2000),
  });

  redisClient.on('ready', () => {
    logger.info('Redis client ready', { host: config.redis.host, db: config.redis.db });
  });

  redisClient.on('error', (err) => {
    logger.error('Redis connection error:', err);
  });

  return redisClient;
}

export function getRedisClient(): Redis {
  if (!redisClient) {
    throw new Error('Redis client not initialized. Call initializeRedis() first.');
  }
  return redisClient;
}

export async function closeRedis(): Promise<void> {
  if (redisClient) {
    await redisClient.quit();
    redisClient = null;
    logger.info('Redis connection closed');
  }
}
