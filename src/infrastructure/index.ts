export { RedisTopicQueue, parseReadGroupReply, queueStreamKey, topicSubscribersKey } from './redis/index.js';
export { publishToTopic, connectRedis, disconnectRedis } from './redis/index.js';
export type { RedisTopicQueueOptions } from './redis/index.js';
export { AutoScalingControlPlane, InstanceMetadataClient } from './aws/index.js';
export type { AutoScalingControlPlaneOptions, InstanceMetadataClientOptions } from './aws/index.js';
export { ScriptHandler } from './handler/index.js';
export { loadConfig, configSchema } from './config.js';
export type { CliFlags, Config } from './config.js';
