export * from './config.js';
export * from './event-log.js';
export * from './kv.js';
export * from './memory.js';
export * from './paths.js';
