import {
  AutoScalingClient,
  CompleteLifecycleActionCommand,
  RecordLifecycleActionHeartbeatCommand,
} from '@aws-sdk/client-auto-scaling';
import type {
  LifecycleActionRef,
  LifecycleActionResult,
  LifecycleControlPlane,
} from '../../domain/index.js';

export interface AutoScalingControlPlaneOptions {
  region?: string | undefined;
  /** Pre-built client, mainly for tests. */
  client?: AutoScalingClient | undefined;
}

/**
 * Lifecycle action calls against the EC2 Auto Scaling API.
 *
 * Credentials come from the SDK default provider chain (environment,
 * shared config, instance profile).
 */
export class AutoScalingControlPlane implements LifecycleControlPlane {
  private readonly client: AutoScalingClient;

  constructor(opts: AutoScalingControlPlaneOptions = {}) {
    this.client = opts.client ?? new AutoScalingClient(opts.region !== undefined ? { region: opts.region } : {});
  }

  async recordHeartbeat(ref: LifecycleActionRef): Promise<void> {
    await this.client.send(
      new RecordLifecycleActionHeartbeatCommand({
        AutoScalingGroupName: ref.groupName,
        LifecycleHookName: ref.hookName,
        InstanceId: ref.instanceId,
        LifecycleActionToken: ref.actionToken,
      }),
    );
  }

  async completeAction(ref: LifecycleActionRef & { readonly result: LifecycleActionResult }): Promise<void> {
    await this.client.send(
      new CompleteLifecycleActionCommand({
        AutoScalingGroupName: ref.groupName,
        LifecycleHookName: ref.hookName,
        InstanceId: ref.instanceId,
        LifecycleActionToken: ref.actionToken,
        LifecycleActionResult: ref.result,
      }),
    );
  }

  destroy(): void {
    this.client.destroy();
  }
}
