/**
 * Lifecycle event types as they arrive from the fleet control plane.
 *
 * These types carry no framework dependencies.
 */

/** Transition announced when a scaling group starts removing an instance. */
export const TERMINATING_TRANSITION = 'autoscaling:EC2_INSTANCE_TERMINATING';

/** Transition passed to the handler for a spot interruption. */
export const SPOT_TERMINATION_TRANSITION = 'ec2:SPOT_INSTANCE_TERMINATION';

/**
 * Outer transport wrapper. `message` still holds the encoded inner event.
 */
export interface Envelope {
  readonly type: string;
  readonly subject: string;
  readonly time?: string | undefined; // ISO-8601
  readonly message: string;
}

/**
 * Lifecycle hook event for a single instance.
 *
 * `groupName`, `hookName`, `instanceId` and `actionToken` identify the
 * pending lifecycle action in heartbeat and completion calls.
 */
export interface LifecycleMessage {
  readonly time?: string | undefined; // ISO-8601
  readonly groupName: string;
  readonly instanceId: string;
  readonly actionToken: string;
  readonly transition: string;
  readonly hookName: string;
}

/** Identifies one pending lifecycle action on the control plane. */
export interface LifecycleActionRef {
  readonly groupName: string;
  readonly hookName: string;
  readonly instanceId: string;
  readonly actionToken: string;
}

/** Termination always proceeds once the handler has run. */
export type LifecycleActionResult = 'CONTINUE';

export function toActionRef(message: LifecycleMessage): LifecycleActionRef {
  return {
    groupName: message.groupName,
    hookName: message.hookName,
    instanceId: message.instanceId,
    actionToken: message.actionToken,
  };
}
