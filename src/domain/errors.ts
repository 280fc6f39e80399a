/** Listener could not acquire its event source. Fatal for the run. */
export class SetupError extends Error {
  override readonly name = 'SetupError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export type DecodeLayer = 'envelope' | 'message';

/** A received item could not be decoded at the given layer. The item is skipped. */
export class DecodeError extends Error {
  override readonly name = 'DecodeError';

  constructor(
    readonly layer: DecodeLayer,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** The handler program ended with a non-zero exit code or was killed. */
export class HandlerExitError extends Error {
  override readonly name = 'HandlerExitError';

  constructor(
    readonly exitCode: number | null,
    readonly exitSignal: NodeJS.Signals | null,
  ) {
    super(
      exitSignal !== null
        ? `handler terminated by signal ${exitSignal}`
        : `handler exited with code ${String(exitCode)}`,
    );
  }
}

export class ConfigError extends Error {
  override readonly name = 'ConfigError';

  constructor(readonly issues: readonly string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
  }
}
