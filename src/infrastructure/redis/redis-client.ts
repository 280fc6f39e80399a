import { Redis } from 'ioredis';
import type { Logger } from 'pino';

// Must stay above the blocking read time of RedisTopicQueue.poll
const DEFAULT_COMMAND_TIMEOUT_MS = 10_000;
const MAX_RETRIES_PER_REQUEST = 3;

export interface RedisClientOptions {
  commandTimeoutMs?: number | undefined;
}

/**
 * Opens an ioredis connection.
 *
 * Every command is bounded by `commandTimeoutMs`, so a server that stops
 * answering fails the call instead of stalling teardown.
 */
export async function connectRedis(redisUrl: string, log: Logger, opts: RedisClientOptions = {}): Promise<Redis> {
  const redis = new Redis(redisUrl, {
    maxRetriesPerRequest: MAX_RETRIES_PER_REQUEST,
    commandTimeout: opts.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS,
    enableReadyCheck: true,
    lazyConnect: true,
  });

  await redis.connect();
  log.info('Redis connected');
  return redis;
}

/** Closes the connection, dropping it when QUIT fails. Never throws. */
export async function disconnectRedis(redis: Redis, log: Logger): Promise<void> {
  try {
    await redis.quit();
    log.info('Redis disconnected');
  } catch (err: unknown) {
    log.warn({ err }, 'Failed to close Redis connection, dropping it');
    redis.disconnect();
  }
}
