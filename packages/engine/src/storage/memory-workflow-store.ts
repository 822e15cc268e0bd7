/**
 * In-Memory Workflow Store
 *
 * No eviction and no versioning; data is lost on restart.
 *
 * @module @flowgraph/engine/storage/memory-workflow-store
 */

import { WorkflowNotFoundError } from '@flowgraph/core';
import type { Workflow } from '../workflow/index.js';
import type { WorkflowStore } from './types.js';

/**
 * @example
 * ```typescript
 * const store = new InMemoryWorkflowStore();
 * await store.save(workflow);
 * const same = await store.get('add-user');
 * ```
 */
export class InMemoryWorkflowStore implements WorkflowStore {
  private workflows: Map<string, Workflow> = new Map();

  async save(workflow: Workflow): Promise<void> {
    this.workflows.set(workflow.getName(), workflow);
  }

  async get(name: string): Promise<Workflow> {
    const workflow = this.workflows.get(name);
    if (!workflow) {
      throw new WorkflowNotFoundError(name);
    }
    return workflow;
  }

  async has(name: string): Promise<boolean> {
    return this.workflows.has(name);
  }

  async list(): Promise<string[]> {
    return [...this.workflows.keys()];
  }

  /**
   * Clear all data (for testing)
   */
  clear(): void {
    this.workflows.clear();
  }
}
