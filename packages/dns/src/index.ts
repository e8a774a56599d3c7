export * from './codes.js';
export * from './config.js';
export * from './constants.js';
export * from './dns-server.js';
export * from './errors.js';
export * from './header.js';
export * from './message.js';
export * from './name.js';
export * from './question.js';
export * from './record.js';
export * from './resolver.js';
export * from './udp.js';

export type * from './types.js';
