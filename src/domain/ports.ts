import type { Logger } from 'pino';
import type { LifecycleActionRef, LifecycleActionResult } from './lifecycle.js';
import type { NoticeKind, TerminationNotice } from './notice.js';

/** One undecoded item as delivered by an event channel. */
export interface RawItem {
  readonly id: string;
  readonly body: string;
}

/**
 * Durable queue subscribed to a topic of lifecycle events.
 *
 * `create` and `subscribe` acquire the resources, `unsubscribe` and
 * `delete` release them. `poll` may block up to its own bounded wait.
 */
export interface EventChannel {
  create(): Promise<void>;
  subscribe(): Promise<void>;
  poll(signal: AbortSignal): Promise<RawItem[]>;
  acknowledge(signal: AbortSignal, id: string): Promise<void>;
  unsubscribe(): Promise<void>;
  delete(): Promise<void>;
}

/**
 * Receiving end of the listener hand-off. Holds a single notice:
 * `send` returns false once the slot is taken or closed.
 */
export interface NoticeSink {
  send(notice: TerminationNotice): boolean;
}

export interface LifecycleControlPlane {
  recordHeartbeat(ref: LifecycleActionRef): Promise<void>;
  completeAction(ref: LifecycleActionRef & { readonly result: LifecycleActionResult }): Promise<void>;
}

/** The operator's program, run once per termination notice. */
export interface Handler {
  execute(signal: AbortSignal, transition: string, instanceId: string, ...extra: string[]): Promise<void>;
}

/**
 * A source of termination notices.
 *
 * `start` resolves once a notice was sent or the signal was aborted,
 * and rejects with a SetupError when its source cannot be acquired.
 */
export interface Listener {
  type(): NoticeKind;
  start(signal: AbortSignal, notices: NoticeSink, log: Logger): Promise<void>;
}

export interface InstanceMetadata {
  available(): Promise<boolean>;
  instanceId(): Promise<string>;
  /** Announced termination time, or null while no interruption is scheduled. */
  spotTerminationTime(): Promise<string | null>;
}
