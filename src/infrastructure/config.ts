import { z } from 'zod';
import { ConfigError } from '../domain/index.js';

/** Options as they come from the command line. All optional; env fills the gaps. */
export interface CliFlags {
  instanceId?: string | undefined;
  topic?: string | undefined;
  handler?: string | undefined;
  spot?: boolean | undefined;
  heartbeatInterval?: string | undefined;
  spotInterval?: string | undefined;
  redisUrl?: string | undefined;
  region?: string | undefined;
  logLevel?: string | undefined;
}

export const configSchema = z.object({
  /** Discovered from instance metadata when absent. */
  instanceId: z.string().min(1).optional(),
  /** Lifecycle event topic. Without it the autoscaling listener is off. */
  topic: z.string().min(1).optional(),
  handler: z.string({ required_error: 'is required (--handler or LIFECYCLE_HANDLER)' }).min(1),
  spot: z.boolean(),
  heartbeatIntervalMs: z.coerce.number().int().positive().default(10_000),
  spotIntervalMs: z.coerce.number().int().positive().default(5_000),
  redisUrl: z.string().url().default('redis://localhost:6379'),
  region: z.string().min(1).optional(),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type Config = z.infer<typeof configSchema>;

/** First value that is set and not blank. */
function firstSet(...values: Array<string | undefined>): string | undefined {
  return values.find((v) => v !== undefined && v.trim() !== '');
}

function envFlag(value: string | undefined): boolean {
  return value === 'true' || value === '1';
}

/**
 * Builds the run configuration. Command-line flags win over environment
 * variables, which win over defaults.
 *
 * @throws ConfigError listing every invalid or missing setting.
 */
export function loadConfig(flags: CliFlags = {}, env: NodeJS.ProcessEnv = process.env): Config {
  const candidate = {
    instanceId: firstSet(flags.instanceId, env['LIFECYCLE_INSTANCE_ID']),
    topic: firstSet(flags.topic, env['LIFECYCLE_TOPIC']),
    handler: firstSet(flags.handler, env['LIFECYCLE_HANDLER']),
    spot: flags.spot === false ? false : !envFlag(env['LIFECYCLE_NO_SPOT']),
    heartbeatIntervalMs: firstSet(flags.heartbeatInterval, env['LIFECYCLE_HEARTBEAT_INTERVAL_MS']),
    spotIntervalMs: firstSet(flags.spotInterval, env['LIFECYCLE_SPOT_INTERVAL_MS']),
    redisUrl: firstSet(flags.redisUrl, env['REDIS_URL']),
    region: firstSet(flags.region, env['AWS_REGION']),
    logLevel: firstSet(flags.logLevel, env['LOG_LEVEL']),
  };

  const parsed = configSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return parsed.data;
}
