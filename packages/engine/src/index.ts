/**
 * flowgraph - Workflow Engine
 *
 * In-process DAG workflow engine:
 *
 * - Nodes wrapping byte-in, byte-out actions
 * - Sequential, conditional and parallel (fan-out/aggregate) edges
 * - Depth-first execution with a barrier at every fan-out
 * - DOT export and a workflow store for the request server
 *
 * @module @flowgraph/engine
 */

export * from './node/index.js';
export * from './workflow/index.js';
export * from './storage/index.js';
