export { AutoScalingControlPlane } from './autoscaling-control-plane.js';
export type { AutoScalingControlPlaneOptions } from './autoscaling-control-plane.js';
export { InstanceMetadataClient } from './instance-metadata.js';
export type { InstanceMetadataClientOptions } from './instance-metadata.js';
