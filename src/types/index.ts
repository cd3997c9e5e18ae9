export type * from './fetch.js';
export type * from './network.js';
export type * from './session.js';
export type * from './har.js';
