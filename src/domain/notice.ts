import type { LifecycleMessage } from './lifecycle.js';
import type { LifecycleControlPlane } from './ports.js';

export type NoticeKind = TerminationNotice['kind'];

/**
 * Termination announced through a lifecycle hook.
 * The control plane waits for a completion call before terminating.
 */
export interface AutoscalingTerminationNotice {
  readonly kind: 'autoscaling';
  readonly message: LifecycleMessage;
  readonly heartbeatIntervalMs: number;
  readonly controlPlane: LifecycleControlPlane;
}

/**
 * Spot interruption read from instance metadata.
 * There is no lifecycle action behind it, so nothing to heartbeat or complete.
 */
export interface SpotTerminationNotice {
  readonly kind: 'spot';
  readonly instanceId: string;
  readonly transition: string;
  readonly terminationTime: string; // ISO-8601
}

export type TerminationNotice = AutoscalingTerminationNotice | SpotTerminationNotice;
