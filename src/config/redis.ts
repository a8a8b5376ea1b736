import { createClient } from 'redis';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export type RedisClient = ReturnType<typeof createClient>;

export function createRedisClient(url: string): RedisClient {
  const client = createClient({ url });

  client.on('error', (err: Error) => {
    logger.error('Redis error', { error: err.message });
  });

  client.on('connect', () => {
    logger.info('Redis connected');
  });

  return client;
}

export async function connectRedis(client: RedisClient): Promise<void> {
  if (!client.isOpen) {
    await client.connect();
  }
}

export async function checkRedisHealth(client: RedisClient): Promise<{ status: string; error?: string }> {
  try {
    await client.ping();
    return { status: 'healthy' };
  } catch (error) {
    return { status: 'unhealthy', error: errorMessage(error) };
  }
}
