#!/usr/bin/env node
import { readFile } from 'node:fs/promises';
import { Command } from 'commander';
import { pino } from 'pino';
import type { Redis } from 'ioredis';

import { ConfigError } from './domain/index.js';
import type { Listener } from './domain/index.js';
import { AutoscalingListener, Daemon, SpotListener, handleNotice, settleWithin } from './application/index.js';
import {
  AutoScalingControlPlane,
  InstanceMetadataClient,
  RedisTopicQueue,
  ScriptHandler,
  connectRedis,
  disconnectRedis,
  loadConfig,
  publishToTopic,
} from './infrastructure/index.js';
import type { CliFlags, Config } from './infrastructure/index.js';

// Upper bound on listener teardown once the run is over
const TEARDOWN_TIMEOUT_MS = 15_000;

/**
 * lifecycle-watch entry point.
 *
 * `run` waits for a termination notice for this instance (lifecycle hook
 * events from a Redis topic, spot interruptions from instance metadata),
 * runs the handler once and exits. SIGINT / SIGTERM stop the wait.
 */
const program = new Command();

program
  .name('lifecycle-watch')
  .description('Run a handler when this instance is about to be terminated')
  .version('0.1.0');

program
  .command('run', { isDefault: true })
  .description('Wait for a termination notice and run the handler')
  .option('--instance-id <id>', 'instance to watch (default: read from instance metadata)')
  .option('--topic <name>', 'lifecycle event topic; enables the autoscaling listener')
  .option('--handler <path>', 'executable run with <transition> <instance-id> [termination-time]')
  .option('--no-spot', 'do not poll instance metadata for spot interruptions')
  .option('--heartbeat-interval <ms>', 'lifecycle action heartbeat interval in milliseconds')
  .option('--spot-interval <ms>', 'spot interruption polling interval in milliseconds')
  .option('--redis-url <url>', 'Redis connection URL')
  .option('--region <region>', 'AWS region of the scaling group')
  .option('--log-level <level>', 'pino log level')
  .action(async (flags: CliFlags) => {
    process.exitCode = await run(flags);
  });

program
  .command('publish')
  .description('Publish a raw event from a file to every queue subscribed to a topic')
  .argument('<file>', 'file holding the raw event body')
  .requiredOption('--topic <name>', 'topic to publish to')
  .option('--redis-url <url>', 'Redis connection URL')
  .action(async (file: string, flags: { topic: string; redisUrl?: string }) => {
    const log = pino({ level: process.env['LOG_LEVEL'] ?? 'info' });
    const body = await readFile(file, 'utf-8');
    const redis = await connectRedis(flags.redisUrl ?? process.env['REDIS_URL'] ?? 'redis://localhost:6379', log);
    try {
      await publishToTopic(redis, flags.topic, body, log);
    } finally {
      await disconnectRedis(redis, log);
    }
  });

async function run(flags: CliFlags): Promise<number> {
  let config: Config;
  try {
    config = loadConfig(flags);
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      return 1;
    }
    throw err;
  }

  const log = pino({ level: config.logLevel });

  // Abort controller for graceful shutdown
  const ac = new AbortController();
  const shutdown = (signal: NodeJS.Signals): void => {
    log.info({ signal }, 'Shutting down...');
    ac.abort();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  let redis: Redis | null = null;
  let controlPlane: AutoScalingControlPlane | null = null;

  try {
    const metadata = new InstanceMetadataClient();
    const instanceId = config.instanceId ?? (await metadata.instanceId());

    const listeners: Listener[] = [];
    if (config.spot) {
      listeners.push(new SpotListener({ instanceId, metadata, intervalMs: config.spotIntervalMs }));
    }
    if (config.topic !== undefined) {
      redis = await connectRedis(config.redisUrl, log);
      controlPlane = new AutoScalingControlPlane({ region: config.region });
      listeners.push(
        new AutoscalingListener({
          instanceId,
          channel: new RedisTopicQueue(redis, { name: `lifecycle-watch-${instanceId}`, topic: config.topic }),
          controlPlane,
          heartbeatIntervalMs: config.heartbeatIntervalMs,
        }),
      );
    }
    if (listeners.length === 0) {
      throw new ConfigError(['listeners: none enabled, set --topic or drop --no-spot']);
    }

    const daemon = new Daemon(listeners, log);
    log.info(
      { instance_id: instanceId, listeners: listeners.map((l) => l.type()) },
      'Waiting for termination notice',
    );

    const notice = await daemon.start(ac.signal);
    let exitCode = 0;

    if (notice === null) {
      log.info('Stopped without a termination notice');
    } else {
      const noticeLog = log.child({ notice: notice.kind });
      const handler = new ScriptHandler(config.handler, noticeLog);
      const startedAt = Date.now();

      noticeLog.info('Executing handler');
      try {
        await handleNotice(ac.signal, handler, notice, noticeLog);
        noticeLog.info({ duration_ms: Date.now() - startedAt }, 'Handler finished successfully');
      } catch (err: unknown) {
        noticeLog.error({ err, duration_ms: Date.now() - startedAt }, 'Handler failed');
        exitCode = 1;
      }
    }

    if (!(await settleWithin(daemon.stopped(), TEARDOWN_TIMEOUT_MS))) {
      log.warn({ timeout_ms: TEARDOWN_TIMEOUT_MS }, 'Listeners did not stop in time, closing connections');
    }
    return exitCode;
  } catch (err: unknown) {
    log.fatal({ err }, 'lifecycle-watch failed');
    return 1;
  } finally {
    process.off('SIGINT', shutdown);
    process.off('SIGTERM', shutdown);
    controlPlane?.destroy();
    if (redis !== null) {
      await disconnectRedis(redis, log);
    }
  }
}

program.parseAsync().catch((err: unknown) => {
  console.error('Fatal:', err);
  process.exit(1);
});
