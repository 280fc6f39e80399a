import type { Logger } from 'pino';
import { SetupError } from '../domain/index.js';
import type {
  AutoscalingTerminationNotice,
  EventChannel,
  LifecycleControlPlane,
  Listener,
  NoticeSink,
  RawItem,
} from '../domain/index.js';
import { decodeEnvelope, decodeMessage } from './envelope-schema.js';
import { matchTermination } from './termination-filter.js';
import { sleep } from './sleep.js';

// Pause after a failed poll before the next attempt
const DEFAULT_POLL_ERROR_BACKOFF_MS = 1000;

export interface AutoscalingListenerOptions {
  instanceId: string;
  channel: EventChannel;
  controlPlane: LifecycleControlPlane;
  heartbeatIntervalMs: number;
  pollErrorBackoffMs?: number | undefined;
}

/**
 * Listens for lifecycle hook events on a queue subscribed to the
 * scaling group's notification topic.
 *
 * Lifecycle of one run:
 *   1. create + subscribe the channel (failure → SetupError, nothing polled)
 *   2. poll until a termination event for this instance arrives or the
 *      signal aborts
 *   3. unsubscribe + delete the channel, whatever the exit path
 *
 * Every item is acknowledged before it is decoded. An item that fails to
 * decode is gone for good rather than redelivered forever.
 *
 * At most one notice is sent per run.
 */
export class AutoscalingListener implements Listener {
  private readonly instanceId: string;
  private readonly channel: EventChannel;
  private readonly controlPlane: LifecycleControlPlane;
  private readonly heartbeatIntervalMs: number;
  private readonly pollErrorBackoffMs: number;

  constructor(opts: AutoscalingListenerOptions) {
    this.instanceId = opts.instanceId;
    this.channel = opts.channel;
    this.controlPlane = opts.controlPlane;
    this.heartbeatIntervalMs = opts.heartbeatIntervalMs;
    this.pollErrorBackoffMs = opts.pollErrorBackoffMs ?? DEFAULT_POLL_ERROR_BACKOFF_MS;
  }

  type(): 'autoscaling' {
    return 'autoscaling';
  }

  async start(signal: AbortSignal, notices: NoticeSink, log: Logger): Promise<void> {
    await this.acquire(log);
    try {
      await this.pollUntilMatch(signal, notices, log);
    } finally {
      await this.release(log);
    }
  }

  private async acquire(log: Logger): Promise<void> {
    log.debug('Creating event channel');
    try {
      await this.channel.create();
    } catch (err: unknown) {
      throw new SetupError('Failed to create event channel', { cause: err });
    }

    log.debug('Subscribing event channel to topic');
    try {
      await this.channel.subscribe();
    } catch (err: unknown) {
      await this.deleteChannel(log);
      throw new SetupError('Failed to subscribe event channel to topic', { cause: err });
    }
  }

  private async pollUntilMatch(signal: AbortSignal, notices: NoticeSink, log: Logger): Promise<void> {
    while (!signal.aborted) {
      log.debug('Polling event channel');

      let items: RawItem[];
      try {
        items = await this.channel.poll(signal);
      } catch (err: unknown) {
        log.warn({ err }, 'Failed to poll event channel');
        await sleep(this.pollErrorBackoffMs, signal);
        continue;
      }

      for (const item of items) {
        const notice = await this.inspect(signal, item, log);
        if (notice === null) continue;

        if (notices.send(notice)) {
          log.info(
            { instance_id: notice.message.instanceId, group: notice.message.groupName, hook: notice.message.hookName },
            'Received termination notice',
          );
        } else {
          log.warn('Another termination notice was already received, dropping this one');
        }
        return;
      }
    }
  }

  /**
   * Acknowledge → decode envelope → decode message → filter.
   * Returns the notice for a matching item, null for anything else.
   */
  private async inspect(
    signal: AbortSignal,
    item: RawItem,
    log: Logger,
  ): Promise<AutoscalingTerminationNotice | null> {
    try {
      await this.channel.acknowledge(signal, item.id);
    } catch (err: unknown) {
      log.warn({ err, item_id: item.id }, 'Failed to acknowledge item');
    }

    const envelope = decodeEnvelope(item.body);
    if (!envelope.ok) {
      log.error({ err: envelope.error, item_id: item.id }, 'Failed to decode envelope');
      return null;
    }

    log.debug(
      { type: envelope.value.type, subject: envelope.value.subject, item_id: item.id },
      'Received an event',
    );

    const message = decodeMessage(envelope.value.message);
    if (!message.ok) {
      log.error({ err: message.error, item_id: item.id }, 'Failed to decode lifecycle message');
      return null;
    }

    const verdict = matchTermination(message.value, this.instanceId);
    if (!verdict.accepted) {
      if (verdict.reason === 'instance-mismatch') {
        log.debug({ target: message.value.instanceId }, 'Skipping lifecycle event, does not match instance id');
      } else {
        log.debug({ transition: message.value.transition }, 'Skipping lifecycle event, not a termination notice');
      }
      return null;
    }

    return {
      kind: 'autoscaling',
      message: message.value,
      heartbeatIntervalMs: this.heartbeatIntervalMs,
      controlPlane: this.controlPlane,
    };
  }

  private async release(log: Logger): Promise<void> {
    log.debug('Unsubscribing event channel from topic');
    try {
      await this.channel.unsubscribe();
    } catch (err: unknown) {
      log.error({ err }, 'Failed to unsubscribe event channel from topic');
    }
    await this.deleteChannel(log);
  }

  private async deleteChannel(log: Logger): Promise<void> {
    log.debug('Deleting event channel');
    try {
      await this.channel.delete();
    } catch (err: unknown) {
      log.error({ err }, 'Failed to delete event channel');
    }
  }
}
