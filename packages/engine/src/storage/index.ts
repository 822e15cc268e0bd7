export * from './types.js';
export * from './memory-workflow-store.js';
