import type { Redis } from 'ioredis';
import type { EventChannel, RawItem } from '../../domain/index.js';

// How long one poll blocks waiting for new items (ms)
const DEFAULT_BLOCK_MS = 5000;
// Max items read per poll
const DEFAULT_BATCH_SIZE = 10;

export interface RedisTopicQueueOptions {
  /** Queue name; becomes the consumer group and part of the stream key. */
  name: string;
  /** Topic whose events are fanned out to this queue. */
  topic: string;
  consumer?: string | undefined;
  blockMs?: number | undefined;
  batchSize?: number | undefined;
}

export function queueStreamKey(name: string): string {
  return `queue:${name}`;
}

export function topicSubscribersKey(topic: string): string {
  return `topic:${topic}:subscribers`;
}

/**
 * Event channel backed by a Redis Stream.
 *
 * A topic is a Redis set of subscriber stream keys. Publishers append to
 * every stream in the set (see publishToTopic); subscribing adds this
 * queue's stream to the set.
 *
 * Items are read through a consumer group so an acknowledged entry is
 * never delivered again. Acknowledging also removes the entry from the
 * stream.
 */
export class RedisTopicQueue implements EventChannel {
  readonly name: string;
  readonly topic: string;
  readonly streamKey: string;
  private readonly consumer: string;
  private readonly blockMs: number;
  private readonly batchSize: number;

  constructor(
    private readonly redis: Redis,
    opts: RedisTopicQueueOptions,
  ) {
    this.name = opts.name;
    this.topic = opts.topic;
    this.streamKey = queueStreamKey(opts.name);
    this.consumer = opts.consumer ?? 'listener';
    this.blockMs = opts.blockMs ?? DEFAULT_BLOCK_MS;
    this.batchSize = opts.batchSize ?? DEFAULT_BATCH_SIZE;
  }

  /**
   * Creates the stream and its consumer group.
   *
   * Start ID "$": only events published after creation are delivered.
   * BUSYGROUP (group already exists, e.g. after a crash) is not an error.
   */
  async create(): Promise<void> {
    try {
      await this.redis.xgroup('CREATE', this.streamKey, this.name, '$', 'MKSTREAM');
    } catch (err: unknown) {
      if (err instanceof Error && err.message.includes('BUSYGROUP')) return;
      throw err;
    }
  }

  async subscribe(): Promise<void> {
    await this.redis.sadd(topicSubscribersKey(this.topic), this.streamKey);
  }

  /**
   * XREADGROUP with BLOCK. A timeout with no new entries yields an empty batch.
   *
   * The blocking read cannot be cancelled; the signal is only checked
   * before it is issued.
   */
  async poll(signal: AbortSignal): Promise<RawItem[]> {
    if (signal.aborted) return [];

    const reply: unknown = await this.redis.xreadgroup(
      'GROUP', this.name, this.consumer,
      'COUNT', this.batchSize,
      'BLOCK', this.blockMs,
      'STREAMS', this.streamKey,
      '>',
    );

    return parseReadGroupReply(reply);
  }

  async acknowledge(_signal: AbortSignal, id: string): Promise<void> {
    await this.redis.xack(this.streamKey, this.name, id);
    await this.redis.xdel(this.streamKey, id);
  }

  async unsubscribe(): Promise<void> {
    await this.redis.srem(topicSubscribersKey(this.topic), this.streamKey);
  }

  async delete(): Promise<void> {
    await this.redis.del(this.streamKey);
  }
}

/**
 * Flattens an XREADGROUP reply into items.
 *
 * Reply shape: null | [[streamKey, [[entryId, [field, value, ...]], ...]], ...].
 * Entries without a `body` field are returned with an empty body so they
 * are still acknowledged and then rejected by the decoder.
 */
export function parseReadGroupReply(reply: unknown): RawItem[] {
  if (!Array.isArray(reply)) return [];

  const items: RawItem[] = [];
  for (const stream of reply) {
    if (!Array.isArray(stream)) continue;
    const entries: unknown = stream[1];
    if (!Array.isArray(entries)) continue;

    for (const entry of entries) {
      if (!Array.isArray(entry)) continue;
      const id: unknown = entry[0];
      const fields: unknown = entry[1];
      if (typeof id !== 'string') continue;

      items.push({ id, body: Array.isArray(fields) ? fieldValue(fields, 'body') : '' });
    }
  }
  return items;
}

function fieldValue(fields: unknown[], name: string): string {
  for (let i = 0; i + 1 < fields.length; i += 2) {
    const value: unknown = fields[i + 1];
    if (fields[i] === name && typeof value === 'string') {
      return value;
    }
  }
  return '';
}
