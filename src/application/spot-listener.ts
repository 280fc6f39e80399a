import type { Logger } from 'pino';
import { SetupError, SPOT_TERMINATION_TRANSITION } from '../domain/index.js';
import type { InstanceMetadata, Listener, NoticeSink } from '../domain/index.js';
import { timestampSchema } from './envelope-schema.js';
import { sleep } from './sleep.js';

export interface SpotListenerOptions {
  instanceId: string;
  metadata: InstanceMetadata;
  intervalMs: number;
}

/**
 * Polls instance metadata for a spot interruption.
 *
 * The metadata service answers 404 until an interruption is scheduled,
 * then returns the termination time. No lifecycle action is involved.
 */
export class SpotListener implements Listener {
  constructor(private readonly opts: SpotListenerOptions) {}

  type(): 'spot' {
    return 'spot';
  }

  async start(signal: AbortSignal, notices: NoticeSink, log: Logger): Promise<void> {
    let available: boolean;
    try {
      available = await this.opts.metadata.available();
    } catch (err: unknown) {
      throw new SetupError('Instance metadata is not available', { cause: err });
    }
    if (!available) {
      throw new SetupError('Instance metadata is not available');
    }

    for (;;) {
      await sleep(this.opts.intervalMs, signal);
      if (signal.aborted) return;

      log.debug('Polling instance metadata for spot termination notices');

      let terminationTime: string | null;
      try {
        terminationTime = await this.opts.metadata.spotTerminationTime();
      } catch (err: unknown) {
        log.warn({ err }, 'Failed to get spot termination time');
        continue;
      }

      if (terminationTime === null) continue;

      if (terminationTime === '') {
        log.error('Empty spot termination time from instance metadata');
        continue;
      }

      if (!timestampSchema.safeParse(terminationTime).success) {
        log.error({ termination_time: terminationTime }, 'Failed to parse spot termination time');
        continue;
      }

      const sent = notices.send({
        kind: 'spot',
        instanceId: this.opts.instanceId,
        transition: SPOT_TERMINATION_TRANSITION,
        terminationTime,
      });

      if (sent) {
        log.info({ termination_time: terminationTime }, 'Received spot termination notice');
      } else {
        log.warn('Another termination notice was already received, dropping this one');
      }
      return;
    }
  }
}
