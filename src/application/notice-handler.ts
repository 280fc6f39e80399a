import type { Logger } from 'pino';
import { toActionRef } from '../domain/index.js';
import type {
  AutoscalingTerminationNotice,
  Handler,
  LifecycleActionRef,
  LifecycleControlPlane,
  TerminationNotice,
} from '../domain/index.js';
import { assertNever } from './assert-never.js';

/**
 * Runs the handler for one termination notice.
 *
 * The handler's own outcome is the outcome of this call. For lifecycle
 * hook notices the action is kept alive with heartbeats while the handler
 * runs, and completed with CONTINUE afterwards, whether the handler
 * succeeded or not.
 */
export async function handleNotice(
  signal: AbortSignal,
  handler: Handler,
  notice: TerminationNotice,
  log: Logger,
): Promise<void> {
  switch (notice.kind) {
    case 'autoscaling':
      return handleAutoscalingNotice(signal, handler, notice, log);
    case 'spot':
      return handler.execute(signal, notice.transition, notice.instanceId, notice.terminationTime);
    default:
      return assertNever(notice);
  }
}

async function handleAutoscalingNotice(
  signal: AbortSignal,
  handler: Handler,
  notice: AutoscalingTerminationNotice,
  log: Logger,
): Promise<void> {
  const ref = toActionRef(notice.message);
  const heartbeat = startHeartbeat(notice.controlPlane, ref, notice.heartbeatIntervalMs, log);

  try {
    await handler.execute(signal, notice.message.transition, notice.message.instanceId);
  } finally {
    // No heartbeat may land after the completion call
    await heartbeat.stop();

    try {
      await notice.controlPlane.completeAction({ ...ref, result: 'CONTINUE' });
      log.info('Lifecycle action completed successfully');
    } catch (err: unknown) {
      log.error({ err }, 'Failed to complete lifecycle action');
    }
  }
}

interface HeartbeatHandle {
  stop: () => Promise<void>;
}

function startHeartbeat(
  controlPlane: LifecycleControlPlane,
  ref: LifecycleActionRef,
  intervalMs: number,
  log: Logger,
): HeartbeatHandle {
  let inFlight: Promise<void> | null = null;

  const timer = setInterval(() => {
    if (inFlight !== null) {
      log.debug('Previous heartbeat still in flight, skipping');
      return;
    }

    log.debug('Sending heartbeat');
    inFlight = controlPlane
      .recordHeartbeat(ref)
      .catch((err: unknown) => {
        log.warn({ err }, 'Failed to send heartbeat');
      })
      .finally(() => {
        inFlight = null;
      });
  }, intervalMs);

  return {
    stop: async () => {
      clearInterval(timer);
      if (inFlight !== null) {
        await inFlight;
      }
    },
  };
}
