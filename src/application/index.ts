export { decodeEnvelope, decodeMessage, envelopeSchema, lifecycleMessageSchema, timestampSchema } from './envelope-schema.js';
export type { DecodeResult } from './envelope-schema.js';
export { matchTermination } from './termination-filter.js';
export type { FilterVerdict } from './termination-filter.js';
export { NoticeChannel } from './notice-channel.js';
export { AutoscalingListener } from './autoscaling-listener.js';
export type { AutoscalingListenerOptions } from './autoscaling-listener.js';
export { SpotListener } from './spot-listener.js';
export type { SpotListenerOptions } from './spot-listener.js';
export { handleNotice } from './notice-handler.js';
export { Daemon } from './daemon.js';
export { sleep, settleWithin } from './sleep.js';
