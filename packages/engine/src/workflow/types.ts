/**
 * Workflow Types
 *
 * @module @flowgraph/engine/workflow/types
 */

import type { Logger } from '@flowgraph/core';
import type { Node } from '../node/index.js';

/**
 * Directed edge between two nodes. Only the two edges leaving a
 * conditional node carry a label.
 */
export interface Edge {
  from: Node;
  to: Node;
  label?: 'true' | 'false';
}

/**
 * Workflow construction options
 */
export interface WorkflowOptions {
  /** Logger for execution events (defaults to the shared logger) */
  logger?: Logger;
}
