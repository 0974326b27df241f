export * from './dao/index.js';
