/**
 * Workflow Executor
 *
 * Threads a payload through a built workflow graph. Every node goes through
 * the same two steps: invoke its action, then settle its output according
 * to the node's kind.
 *
 * - plain: successors run in list order, depth-first, each fed the previous
 *   result
 * - conditional: the output picks `next[0]` (true) or `next[1]` (false), and
 *   the chosen branch receives the payload that entered the condition
 * - parallel: branches run concurrently on the output, the aggregate runs
 *   once all of them have settled, then the aggregate is settled in turn
 *
 * @module @flowgraph/engine/workflow/executor
 */

import { ExecutionError, StructuralError, type Logger } from '@flowgraph/core';
import { EMPTY_BYTES, fromBytes, type Node, type NodeParams } from '../node/index.js';
import { parseBoolean } from './condition.js';

export class WorkflowExecutor {
  private readonly workflowName: string;
  private readonly logger: Logger;

  constructor(workflowName: string, logger: Logger) {
    this.workflowName = workflowName;
    this.logger = logger;
  }

  /**
   * Run a node and everything downstream of it
   *
   * @returns The result of the last node on the path taken
   */
  async run(node: Node, input: Uint8Array): Promise<Uint8Array> {
    const output = await this.invoke(node, { data: input });
    return this.settle(node, output, input);
  }

  // ===========================================================================
  // Dispatch
  // ===========================================================================

  /**
   * @param output - What the node's action returned
   * @param data - The value bound to `data` when the action ran
   */
  private async settle(node: Node, output: Uint8Array, data: Uint8Array): Promise<Uint8Array> {
    switch (node.kind) {
      case 'conditional':
        return this.route(node, output, data);
      case 'parallel':
        return this.fanOut(node, output);
      case 'plain': {
        let result = output;
        for (const successor of node.next) {
          result = await this.run(successor, result);
        }
        return result;
      }
    }
  }

  private async route(node: Node, output: Uint8Array, data: Uint8Array): Promise<Uint8Array> {
    const text = fromBytes(output);
    let decision = parseBoolean(text);
    if (decision === undefined) {
      this.logger.debug('Condition output is not a boolean literal, taking false branch', {
        nodeKey: node.key,
        output: text,
      });
      decision = false;
    }

    const target = decision ? node.next[0] : node.next[1];
    if (!target) {
      throw new StructuralError(
        `conditional node '${node.key}' has no ${decision ? 'true' : 'false'} branch`,
        { nodeKey: node.key }
      );
    }

    this.logger.debug('Condition evaluated', { nodeKey: node.key, branch: decision, target: target.key });
    return this.run(target, data);
  }

  private async fanOut(node: Node, shared: Uint8Array): Promise<Uint8Array> {
    const aggregate = node.aggregate;
    if (!aggregate) {
      throw new StructuralError(`parallel node '${node.key}' has no aggregate node`, {
        nodeKey: node.key,
      });
    }

    // Barrier: every branch settles before the aggregate runs
    const results = await Promise.all(
      node.next.map(async (branch): Promise<[string, Uint8Array]> => [
        branch.key,
        await this.invokeBranch(branch, shared),
      ])
    );

    const params: NodeParams = { ...Object.fromEntries(results), data: shared };
    const output = await this.invoke(aggregate, params);
    return this.settle(aggregate, output, shared);
  }

  // ===========================================================================
  // Invocation
  // ===========================================================================

  private async invoke(node: Node, params: NodeParams): Promise<Uint8Array> {
    this.logger.debug('Invoking node', { nodeKey: node.key, kind: node.kind });
    try {
      return await node.trigger(params);
    } catch (error) {
      throw new ExecutionError(node.key, error, { workflow: this.workflowName });
    }
  }

  /**
   * A failed branch contributes an empty result instead of failing the
   * aggregate step.
   */
  private async invokeBranch(branch: Node, shared: Uint8Array): Promise<Uint8Array> {
    this.logger.debug('Invoking parallel branch', { nodeKey: branch.key });
    try {
      return await branch.trigger({ data: shared });
    } catch (error) {
      this.logger.warn('Parallel branch failed, continuing with empty result', {
        nodeKey: branch.key,
        error: { message: error instanceof Error ? error.message : String(error) },
      });
      return EMPTY_BYTES;
    }
  }
}
