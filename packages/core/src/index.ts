export * from './crypto/index.js';
export * from './identity/index.js';
export * from './logger.js';
export * from './protocol/index.js';
export * from './storage/index.js';
