/**
 * Workflow Module
 *
 * - Graph construction with local cycle detection (workflow.ts)
 * - Sequential, conditional and parallel execution (executor.ts)
 * - DOT export (dot-export.ts)
 *
 * @module @flowgraph/engine/workflow
 */

export * from './types.js';
export * from './condition.js';
export * from './executor.js';
export * from './workflow.js';
export * from './dot-export.js';
