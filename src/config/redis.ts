import Redis from 'ioredis';
import { config } from './index';

export interface RedisConnectionConfig {
  host: string;
  port: number;
  password?: string;
  maxRetriesPerRequest: null;
}

export function getRedisConfig(): RedisConnectionConfig {
  return {
    host: config.redis.host,
    port: config.redis.port,
    password: config.redis.password,
    maxRetriesPerRequest: null, // required by BullMQ
  };
}

let sharedClient: Redis | null = null;

/**
 * Lazily created client for schedule locks. BullMQ keeps its own connections.
 */
export function getRedisClient(): Redis {
  if (!sharedClient) {
    sharedClient = new Redis(getRedisConfig());
    sharedClient.on('error', (err) => {
      console.error('[Redis] Connection error:', err.message);
    });
  }
  return sharedClient;
}

