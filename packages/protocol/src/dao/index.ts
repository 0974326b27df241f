export * from './action.js';
export * from './clock.js';
export * from './config.js';
export * from './custody.js';
export * from './errors.js';
export * from './events.js';
export * from './governance.js';
export * from './ids.js';
export * from './proposal.js';
export * from './quorum.js';
export * from './receipt.js';
export * from './state.js';
export * from './store.js';
export * from './types.js';
export * from './witness.js';
