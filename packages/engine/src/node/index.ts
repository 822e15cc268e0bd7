export * from './node.js';
export * from './bytes.js';
