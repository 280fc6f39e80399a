import type { Logger } from 'pino';
import type { Listener, TerminationNotice } from '../domain/index.js';
import { NoticeChannel } from './notice-channel.js';

/**
 * Runs every configured listener until the first termination notice.
 *
 * `start()` resolves with that notice as soon as it arrives; the other
 * listeners are aborted and release their resources in the background.
 * `stopped()` resolves once every listener has returned.
 *
 * A listener that fails to start aborts the whole run and its error is
 * rethrown by `start()`, unless a notice was already received.
 */
export class Daemon {
  private running: Promise<void> = Promise.resolve();

  constructor(
    private readonly listeners: readonly Listener[],
    private readonly log: Logger,
  ) {}

  async start(signal: AbortSignal): Promise<TerminationNotice | null> {
    const ac = new AbortController();
    const abort = (): void => ac.abort();
    signal.addEventListener('abort', abort, { once: true });
    if (signal.aborted) ac.abort();

    const notices = new NoticeChannel();
    const failures: unknown[] = [];

    const runs = this.listeners.map(async (listener) => {
      const log = this.log.child({ listener: listener.type() });
      log.info('Starting listener');
      try {
        await listener.start(ac.signal, notices, log);
        log.info('Stopped listener');
      } catch (err: unknown) {
        log.error({ err }, 'Listener failed');
        failures.push(err);
        ac.abort();
        notices.close();
      }
    });

    this.running = Promise.all(runs).then(() => {
      notices.close();
      signal.removeEventListener('abort', abort);
    });

    const notice = await notices.receive();
    ac.abort();

    if (notice !== null) return notice;

    await this.running;
    if (failures.length > 0) {
      throw failures[0];
    }
    return null;
  }

  /** Resolves once every listener of the last run has returned. */
  stopped(): Promise<void> {
    return this.running;
  }
}
