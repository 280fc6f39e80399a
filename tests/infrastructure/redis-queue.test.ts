import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Redis } from 'ioredis';
import { RedisTopicQueue, parseReadGroupReply } from '../../src/infrastructure/redis/redis-queue.js';
import { publishToTopic } from '../../src/infrastructure/redis/topic-publisher.js';
import { fakeLogger } from '../helpers.js';

/** Redis stand-in: only the commands the queue issues. */
function fakeRedis() {
  return {
    xgroup: vi.fn().mockResolvedValue('OK'),
    xreadgroup: vi.fn().mockResolvedValue(null),
    xack: vi.fn().mockResolvedValue(1),
    xdel: vi.fn().mockResolvedValue(1),
    xadd: vi.fn().mockResolvedValue('1-0'),
    sadd: vi.fn().mockResolvedValue(1),
    srem: vi.fn().mockResolvedValue(1),
    smembers: vi.fn().mockResolvedValue([]),
    del: vi.fn().mockResolvedValue(1),
  };
}

describe('RedisTopicQueue', () => {
  let redis: ReturnType<typeof fakeRedis>;
  let queue: RedisTopicQueue;
  const signal = new AbortController().signal;

  beforeEach(() => {
    redis = fakeRedis();
    queue = new RedisTopicQueue(redis as unknown as Redis, { name: 'q1', topic: 't1' });
  });

  it('creates the stream and consumer group from the current tail', async () => {
    await queue.create();

    expect(redis.xgroup).toHaveBeenCalledWith('CREATE', 'queue:q1', 'q1', '$', 'MKSTREAM');
  });

  it('treats an existing consumer group as created', async () => {
    redis.xgroup.mockRejectedValueOnce(new Error('BUSYGROUP Consumer Group name already exists'));

    await expect(queue.create()).resolves.toBeUndefined();
  });

  it('rethrows other create failures', async () => {
    const failure = new Error('NOAUTH Authentication required');
    redis.xgroup.mockRejectedValueOnce(failure);

    await expect(queue.create()).rejects.toBe(failure);
  });

  it('subscribes and unsubscribes through the topic set', async () => {
    await queue.subscribe();
    await queue.unsubscribe();

    expect(redis.sadd).toHaveBeenCalledWith('topic:t1:subscribers', 'queue:q1');
    expect(redis.srem).toHaveBeenCalledWith('topic:t1:subscribers', 'queue:q1');
  });

  it('deletes its stream', async () => {
    await queue.delete();

    expect(redis.del).toHaveBeenCalledWith('queue:q1');
  });

  it('polls with a blocking group read', async () => {
    redis.xreadgroup.mockResolvedValueOnce([
      ['queue:q1', [['1-0', ['body', '{"Type":"Notification"}']]]],
    ]);

    const items = await queue.poll(signal);

    expect(redis.xreadgroup).toHaveBeenCalledWith(
      'GROUP', 'q1', 'listener',
      'COUNT', 10,
      'BLOCK', 5000,
      'STREAMS', 'queue:q1',
      '>',
    );
    expect(items).toEqual([{ id: '1-0', body: '{"Type":"Notification"}' }]);
  });

  it('uses the configured batch size, block time and consumer', async () => {
    const custom = new RedisTopicQueue(redis as unknown as Redis, {
      name: 'q2',
      topic: 't1',
      consumer: 'c7',
      blockMs: 250,
      batchSize: 3,
    });

    await custom.poll(signal);

    expect(redis.xreadgroup).toHaveBeenCalledWith(
      'GROUP', 'q2', 'c7',
      'COUNT', 3,
      'BLOCK', 250,
      'STREAMS', 'queue:q2',
      '>',
    );
  });

  it('returns an empty batch on a read timeout', async () => {
    await expect(queue.poll(signal)).resolves.toEqual([]);
  });

  it('does not read once the signal is aborted', async () => {
    const ac = new AbortController();
    ac.abort();

    await expect(queue.poll(ac.signal)).resolves.toEqual([]);
    expect(redis.xreadgroup).not.toHaveBeenCalled();
  });

  it('acknowledges and removes an entry', async () => {
    await queue.acknowledge(signal, '1-0');

    expect(redis.xack).toHaveBeenCalledWith('queue:q1', 'q1', '1-0');
    expect(redis.xdel).toHaveBeenCalledWith('queue:q1', '1-0');
  });
});

describe('parseReadGroupReply', () => {
  it('flattens entries across streams in order', () => {
    const reply = [
      ['queue:a', [['1-0', ['body', 'first']], ['2-0', ['body', 'second']]]],
      ['queue:b', [['3-0', ['body', 'third']]]],
    ];

    expect(parseReadGroupReply(reply)).toEqual([
      { id: '1-0', body: 'first' },
      { id: '2-0', body: 'second' },
      { id: '3-0', body: 'third' },
    ]);
  });

  it('picks the body field among others', () => {
    const reply = [['queue:a', [['1-0', ['source', 'relay', 'body', 'payload']]]]];

    expect(parseReadGroupReply(reply)).toEqual([{ id: '1-0', body: 'payload' }]);
  });

  it('keeps entries without a body so they can be acknowledged', () => {
    const reply = [['queue:a', [['1-0', ['other', 'x']], ['2-0', null]]]];

    expect(parseReadGroupReply(reply)).toEqual([
      { id: '1-0', body: '' },
      { id: '2-0', body: '' },
    ]);
  });

  it('returns nothing for a null reply', () => {
    expect(parseReadGroupReply(null)).toEqual([]);
  });
});

describe('publishToTopic', () => {
  it('appends the body to every subscribed queue', async () => {
    const redis = fakeRedis();
    redis.smembers.mockResolvedValueOnce(['queue:a', 'queue:b']);
    const log = fakeLogger();

    const count = await publishToTopic(redis as unknown as Redis, 't1', '{"Type":"Notification"}', log);

    expect(count).toBe(2);
    expect(redis.smembers).toHaveBeenCalledWith('topic:t1:subscribers');
    expect(redis.xadd).toHaveBeenNthCalledWith(1, 'queue:a', 'MAXLEN', '~', 1000, '*', 'body', '{"Type":"Notification"}');
    expect(redis.xadd).toHaveBeenNthCalledWith(2, 'queue:b', 'MAXLEN', '~', 1000, '*', 'body', '{"Type":"Notification"}');
    expect(log.info).toHaveBeenCalledWith({ topic: 't1', subscribers: 2 }, 'Published event to topic');
  });

  it('caps the length of every subscriber stream', async () => {
    const redis = fakeRedis();
    redis.smembers.mockResolvedValueOnce(['queue:stale']);

    await publishToTopic(redis as unknown as Redis, 't1', '{}', fakeLogger(), { maxLen: 50 });

    expect(redis.xadd).toHaveBeenCalledWith('queue:stale', 'MAXLEN', '~', 50, '*', 'body', '{}');
  });

  it('publishes to nobody when the topic has no subscribers', async () => {
    const redis = fakeRedis();

    await expect(publishToTopic(redis as unknown as Redis, 't1', '{}', fakeLogger())).resolves.toBe(0);
    expect(redis.xadd).not.toHaveBeenCalled();
  });
});
