/**
 * Workflow Storage Interface
 *
 * Registry that the request server resolves workflows from.
 *
 * @module @flowgraph/engine/storage/types
 */

import type { Workflow } from '../workflow/index.js';

export interface WorkflowStore {
  /**
   * Store a workflow under its name, replacing any previous entry
   */
  save(workflow: Workflow): Promise<void>;

  /**
   * Get a workflow by name
   *
   * @throws WorkflowNotFoundError - nothing is stored under `name`
   */
  get(name: string): Promise<Workflow>;

  has(name: string): Promise<boolean>;

  /**
   * Stored workflow names, in insertion order
   */
  list(): Promise<string[]>;
}
