import { Redis as IORedis, type Redis, type RedisOptions } from 'ioredis';

export type RedisConnection = Redis;

export type CreateRedisConnectionOptions = Readonly<{
  redisUrl: string;
  redisOptions?: RedisOptions;
}>;

const BASE_OPTIONS = {
  enableReadyCheck: true,
  connectTimeout: 10_000,
  retryStrategy: (times: number) => Math.min(times * 50, 2_000),
  // Required by BullMQ for blocking connections.
  maxRetriesPerRequest: null,
} satisfies RedisOptions;

export function createRedisConnection(options: CreateRedisConnectionOptions): RedisConnection {
  const { redisUrl, redisOptions } = options;
  return new IORedis(redisUrl, {
    ...BASE_OPTIONS,
    ...redisOptions,
  });
}

/**
 * Connection options for BullMQ, which creates its own ioredis clients.
 */
export function redisConnectionOptions(redisUrl: string): RedisOptions {
  const url = new URL(redisUrl);
  if (url.protocol !== 'redis:' && url.protocol !== 'rediss:') {
    throw new Error(`Invalid URL protocol for REDIS_URL: ${url.protocol}`);
  }

  const dbPath = url.pathname.replace(/^\//, '');
  const db = dbPath ? Number(dbPath) : 0;
  if (!Number.isInteger(db) || db < 0) {
    throw new Error(`Invalid REDIS_URL database index: ${dbPath}`);
  }

  return {
    ...BASE_OPTIONS,
    host: url.hostname,
    port: url.port ? Number(url.port) : 6379,
    db,
    ...(url.username ? { username: decodeURIComponent(url.username) } : {}),
    ...(url.password ? { password: decodeURIComponent(url.password) } : {}),
    ...(url.protocol === 'rediss:' ? { tls: {} } : {}),
  };
}
