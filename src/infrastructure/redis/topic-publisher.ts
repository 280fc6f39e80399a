import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import { topicSubscribersKey } from './redis-queue.js';

// Approximate cap on entries kept per subscriber stream
const DEFAULT_MAX_LEN = 1000;

export interface PublishOptions {
  maxLen?: number | undefined;
}

/**
 * Appends a raw event to the stream of every queue subscribed to `topic`.
 *
 * Uses `XADD` with auto-generated IDs. The body is stored verbatim in the
 * `body` field; queues decode it on their side. Each stream is trimmed to
 * about `maxLen` entries, so a queue whose listener died without
 * unsubscribing stops growing.
 *
 * @returns The number of queues the event was delivered to.
 */
export async function publishToTopic(
  redis: Redis,
  topic: string,
  body: string,
  log: Logger,
  opts: PublishOptions = {},
): Promise<number> {
  const maxLen = opts.maxLen ?? DEFAULT_MAX_LEN;
  const streams = await redis.smembers(topicSubscribersKey(topic));

  for (const stream of streams) {
    const entryId = await redis.xadd(stream, 'MAXLEN', '~', maxLen, '*', 'body', body);
    log.debug({ topic, stream, entry_id: entryId }, 'Published event to queue');
  }

  log.info({ topic, subscribers: streams.length }, 'Published event to topic');
  return streams.length;
}
