export * from './lifecycle.js';
export type * from './notice.js';
export type * from './ports.js';
export * from './errors.js';
