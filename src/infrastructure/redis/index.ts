export { RedisTopicQueue, parseReadGroupReply, queueStreamKey, topicSubscribersKey } from './redis-queue.js';
export type { RedisTopicQueueOptions } from './redis-queue.js';
export { publishToTopic } from './topic-publisher.js';
export { connectRedis, disconnectRedis } from './redis-client.js';
