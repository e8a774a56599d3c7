export * from './ipv4.js';
export * from './util.js';
