import { TERMINATING_TRANSITION } from '../domain/index.js';
import type { LifecycleMessage } from '../domain/index.js';

export type FilterVerdict =
  | { readonly accepted: true }
  | { readonly accepted: false; readonly reason: 'instance-mismatch' | 'not-terminating' };

/**
 * Accepts a lifecycle event only if it announces the termination of
 * `instanceId`. The shared topic also carries events for other instances
 * and other transitions; those are rejected, which is not an error.
 */
export function matchTermination(message: LifecycleMessage, instanceId: string): FilterVerdict {
  if (message.instanceId !== instanceId) {
    return { accepted: false, reason: 'instance-mismatch' };
  }
  if (message.transition !== TERMINATING_TRANSITION) {
    return { accepted: false, reason: 'not-terminating' };
  }
  return { accepted: true };
}
