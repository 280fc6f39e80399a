import { spawn } from 'node:child_process';
import type { Logger } from 'pino';
import { HandlerExitError } from '../../domain/index.js';
import type { Handler } from '../../domain/index.js';

/**
 * Runs the operator's executable with the notice details as arguments:
 *
 *   <path> <transition> <instance-id> [extra...]
 *
 * stdio and environment are inherited. Aborting the signal kills the
 * process, which then surfaces as a HandlerExitError.
 */
export class ScriptHandler implements Handler {
  constructor(
    private readonly path: string,
    private readonly log: Logger,
  ) {}

  execute(signal: AbortSignal, transition: string, instanceId: string, ...extra: string[]): Promise<void> {
    const args = [transition, instanceId, ...extra];
    this.log.debug({ path: this.path, args }, 'Running handler');

    return new Promise((resolve, reject) => {
      const child = spawn(this.path, args, { stdio: 'inherit', signal });

      // With a signal set, an abort is reported through 'error' and then 'exit'
      child.once('error', (err: Error) => {
        if (err.name === 'AbortError') return;
        reject(err);
      });

      child.once('exit', (code: number | null, exitSignal: NodeJS.Signals | null) => {
        if (code === 0) {
          resolve();
          return;
        }
        reject(new HandlerExitError(code, exitSignal));
      });
    });
  }
}
