import { vi } from 'vitest';
import type { Logger } from 'pino';
import type {
  EventChannel,
  LifecycleActionRef,
  LifecycleActionResult,
  LifecycleControlPlane,
  LifecycleMessage,
  RawItem,
} from '../src/domain/index.js';

/** Minimal fake logger. `child()` returns the same logger so calls stay visible. */
export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as Logger & typeof log;
}

export const TERMINATING = 'autoscaling:EC2_INSTANCE_TERMINATING';

/** Lifecycle message in wire format with sensible defaults. */
export function wireMessage(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    Time: '2026-03-01T12:00:00.000Z',
    AutoScalingGroupName: 'g',
    EC2InstanceId: 'i-1',
    LifecycleActionToken: 't',
    LifecycleTransition: TERMINATING,
    LifecycleHookName: 'h',
    ...overrides,
  };
}

/** Wraps a wire message in a notification envelope. */
export function envelopeBody(message: Record<string, unknown> = wireMessage()): string {
  return JSON.stringify({
    Type: 'Notification',
    Subject: 'x',
    Time: '2026-03-01T12:00:01.000Z',
    Message: JSON.stringify(message),
  });
}

export function lifecycleMessage(overrides: Partial<LifecycleMessage> = {}): LifecycleMessage {
  return {
    time: '2026-03-01T12:00:00.000Z',
    groupName: 'g',
    instanceId: 'i-1',
    actionToken: 't',
    transition: TERMINATING,
    hookName: 'h',
    ...overrides,
  };
}

type ChannelStep = 'create' | 'subscribe' | 'acknowledge' | 'unsubscribe' | 'delete';

/**
 * In-memory event channel.
 *
 * Each poll hands out the next scripted batch (or throws it, when it is an
 * Error). Once the script runs out `onExhausted` fires and polls return [].
 * `calls` records every operation in order.
 */
export class FakeChannel implements EventChannel {
  readonly calls: string[] = [];
  readonly acknowledged: string[] = [];
  readonly failures: Partial<Record<ChannelStep, Error>> = {};
  pollCount = 0;
  onExhausted: () => void = () => {};

  constructor(private readonly batches: Array<RawItem[] | Error> = []) {}

  async create(): Promise<void> {
    this.step('create');
  }

  async subscribe(): Promise<void> {
    this.step('subscribe');
  }

  async poll(_signal: AbortSignal): Promise<RawItem[]> {
    this.calls.push('poll');
    this.pollCount++;
    const next = this.batches.shift();
    if (next === undefined) {
      this.onExhausted();
      return [];
    }
    if (next instanceof Error) throw next;
    return next;
  }

  async acknowledge(_signal: AbortSignal, id: string): Promise<void> {
    this.calls.push(`ack:${id}`);
    this.acknowledged.push(id);
    const failure = this.failures.acknowledge;
    if (failure) throw failure;
  }

  async unsubscribe(): Promise<void> {
    this.step('unsubscribe');
  }

  async delete(): Promise<void> {
    this.step('delete');
  }

  private step(name: ChannelStep): void {
    this.calls.push(name);
    const failure = this.failures[name];
    if (failure) throw failure;
  }
}

type CompleteArgs = LifecycleActionRef & { readonly result: LifecycleActionResult };

/** Control plane whose calls are vi.fn() spies, resolving by default. */
export function fakeControlPlane() {
  return {
    recordHeartbeat: vi.fn<(ref: LifecycleActionRef) => Promise<void>>().mockResolvedValue(undefined),
    completeAction: vi.fn<(args: CompleteArgs) => Promise<void>>().mockResolvedValue(undefined),
  } satisfies LifecycleControlPlane;
}
