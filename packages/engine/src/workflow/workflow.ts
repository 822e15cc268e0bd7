/**
 * Workflow
 *
 * Graph builder and execution entry point. A workflow is built once through
 * edge-construction calls, then executed any number of times.
 *
 * Every construction call validates before it mutates: a rejected call
 * leaves nodes, adjacency, predecessors and root exactly as they were.
 * Calls are synchronous, so one call never interleaves with another.
 *
 * Cycle detection is local. An edge is rejected when it points at the root
 * or when its source is already a recorded predecessor of its target; longer
 * cycles through unrelated nodes are not traced.
 *
 * @module @flowgraph/engine/workflow
 */

import { randomUUID } from 'crypto';
import {
  CycleError,
  StructuralError,
  ValidationError,
  deriveContext,
  getLogger,
  runWithContext,
  type Logger,
} from '@flowgraph/core';
import type { BranchMarker, Node, NodeKind } from '../node/index.js';
import { toBytes } from '../node/index.js';
import { WorkflowExecutor } from './executor.js';
import { exportDot } from './dot-export.js';
import type { Edge, WorkflowOptions } from './types.js';

/**
 * Key every action receives its input under; aggregates also get one key
 * per branch, so no branch may use it.
 */
export const DATA_KEY = 'data';

/**
 * @example
 * ```typescript
 * const workflow = new Workflow('add-user');
 * workflow.addNode(input, validate, save, reject);
 * workflow.addConditionalEdge(input, validate, save, reject);
 * const result = await workflow.execute(toBytes('alice'));
 * ```
 */
export class Workflow {
  private readonly name: string;
  private root?: Node;
  private readonly availableNodes = new Map<string, Node>();
  private readonly adjacency = new Map<string, Map<string, Edge>>();
  private readonly destinations = new Map<string, Node[]>();
  private readonly logger: Logger;
  private readonly executor: WorkflowExecutor;

  constructor(name: string, options: WorkflowOptions = {}) {
    this.name = name;
    this.logger = (options.logger ?? getLogger()).child({ component: 'workflow' });
    this.executor = new WorkflowExecutor(name, this.logger);
  }

  getName(): string {
    return this.name;
  }

  getRoot(): Node | undefined {
    return this.root;
  }

  /**
   * Registered nodes, in registration order
   */
  getNodes(): Node[] {
    return [...this.availableNodes.values()];
  }

  /**
   * All edges, grouped by source in insertion order
   */
  getEdges(): Edge[] {
    const edges: Edge[] = [];
    for (const group of this.adjacency.values()) {
      edges.push(...group.values());
    }
    return edges;
  }

  /**
   * Recorded predecessors of a node (the cycle-detection index)
   */
  getPredecessors(key: string): Node[] {
    return [...(this.destinations.get(key) ?? [])];
  }

  // ===========================================================================
  // Construction
  // ===========================================================================

  /**
   * Register nodes so edges may reference them. A node registered under an
   * existing key replaces the previous one.
   */
  addNode(...nodes: Node[]): void {
    for (const node of nodes) {
      this.availableNodes.set(node.key, node);
    }
  }

  /**
   * Sequential edge. Only one plain edge may leave a node.
   *
   * @throws ValidationError - a node is not registered
   * @throws CycleError - `to` is the root, `from` already precedes `to`, or `from` is `to`
   * @throws StructuralError - `from` already has outgoing edges
   */
  addEdge(from: Node, to: Node): void {
    this.requireRegistered(from, to);
    this.assertNoBackEdge(to, from);
    this.assertDistinct(from, to);

    if (this.adjacency.has(from.key)) {
      throw new StructuralError(
        `node '${from.key}' already has outgoing edges, use addParallelEdge() or addConditionalEdge()`,
        { nodeKey: from.key }
      );
    }

    this.assignRoot(from);
    from.appendNext(to);
    this.adjacency.set(from.key, new Map([[to.key, { from, to }]]));
    this.recordPredecessor(to, from);
  }

  /**
   * Conditional edge: `from` feeds `condition`, whose output selects
   * `trueNode` or `falseNode`.
   *
   * @throws ValidationError - a node is not registered
   * @throws CycleError - a branch or the condition would point back at `from` or the root
   * @throws StructuralError - a node already holds a conflicting role
   */
  addConditionalEdge(from: Node, condition: Node, trueNode: Node, falseNode: Node): void {
    this.requireRegistered(from, condition, trueNode, falseNode);
    this.assertNoBackEdge(trueNode, from);
    this.assertNoBackEdge(falseNode, from);
    this.assertNoBackEdge(condition, from);
    this.assertDistinct(from, condition);
    this.assertDistinct(from, trueNode);
    this.assertDistinct(from, falseNode);
    this.assertDistinct(condition, trueNode);
    this.assertDistinct(condition, falseNode);

    if (trueNode.key === falseNode.key) {
      throw new StructuralError(
        `node '${trueNode.key}' cannot be both the true and the false branch`,
        { nodeKey: trueNode.key }
      );
    }
    this.assertCanTakeKind(condition, 'conditional');
    this.assertCanTakeBranch(trueNode, 'true');
    this.assertCanTakeBranch(falseNode, 'false');

    this.assignRoot(from);
    condition.assignKind('conditional');
    trueNode.assignBranch('true');
    falseNode.assignBranch('false');

    condition.replaceNext([trueNode, falseNode]);
    from.appendNext(condition);

    this.groupOf(from).set(condition.key, { from, to: condition });
    this.adjacency.set(
      condition.key,
      new Map<string, Edge>([
        [trueNode.key, { from: condition, to: trueNode, label: 'true' }],
        [falseNode.key, { from: condition, to: falseNode, label: 'false' }],
      ])
    );
    this.recordPredecessor(trueNode, from);
    this.recordPredecessor(falseNode, from);
  }

  /**
   * Parallel edge: `from`'s output fans out to every branch, and
   * `aggregate` receives all branch results keyed by branch name plus
   * `from`'s output under `data`.
   *
   * @throws ValidationError - a node is not registered, no branch is given, or a branch key is reserved or repeated
   * @throws CycleError - the aggregate or a branch would close a cycle
   * @throws StructuralError - `from` already holds a conflicting role
   */
  addParallelEdge(from: Node, aggregate: Node, ...branches: Node[]): void {
    if (branches.length === 0) {
      throw new ValidationError(`parallel edge from '${from.key}' needs at least one branch`);
    }
    this.requireRegistered(from, aggregate, ...branches);

    const seen = new Set<string>();
    for (const branch of branches) {
      if (branch.key === DATA_KEY) {
        throw new ValidationError(`branch key '${DATA_KEY}' is reserved for the aggregate input`);
      }
      if (seen.has(branch.key)) {
        throw new ValidationError(`branch '${branch.key}' is listed more than once`);
      }
      seen.add(branch.key);
    }

    this.assertNoBackEdge(aggregate, from);
    this.assertDistinct(from, aggregate);
    for (const branch of branches) {
      this.assertNoBackEdge(branch, from);
      this.assertNoBackEdge(aggregate, branch);
      this.assertDistinct(from, branch);
      this.assertDistinct(branch, aggregate);
    }
    this.assertCanTakeKind(from, 'parallel');

    this.assignRoot(from);
    from.assignKind('parallel');

    const group = this.groupOf(from);
    for (const branch of branches) {
      group.set(branch.key, { from, to: branch });
      this.adjacency.set(branch.key, new Map([[aggregate.key, { from: branch, to: aggregate }]]));
      this.recordPredecessor(branch, from);
      this.recordPredecessor(aggregate, branch);
    }

    from.replaceNext(branches);
    from.setAggregate(aggregate);
    this.recordPredecessor(aggregate, from);
  }

  // ===========================================================================
  // Execution
  // ===========================================================================

  /**
   * Run the workflow from its root
   *
   * @throws StructuralError - no edge has been added yet
   * @throws ExecutionError - a node action failed
   */
  async execute(payload: Uint8Array): Promise<Uint8Array> {
    const root = this.root;
    if (!root) {
      throw new StructuralError(`workflow '${this.name}' has no root, add an edge first`);
    }

    const ctx = deriveContext('engine', { workflow: this.name, executionId: randomUUID() });
    return runWithContext(ctx, async () => {
      const startedAt = Date.now();
      this.logger.info('Workflow started', { eventName: 'workflow.start', root: root.key });

      try {
        const result = await this.executor.run(root, payload);
        this.logger.executionEnd(this.name, true, Date.now() - startedAt, {
          resultBytes: result.byteLength,
        });
        return result;
      } catch (error) {
        this.logger.executionEnd(this.name, false, Date.now() - startedAt, {
          error: { message: error instanceof Error ? error.message : String(error) },
        });
        throw error;
      }
    });
  }

  /**
   * Graph description in DOT format, as UTF-8 bytes
   */
  export(): Uint8Array {
    return toBytes(exportDot(this));
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private requireRegistered(...nodes: Node[]): void {
    const missing = nodes.filter(node => this.availableNodes.get(node.key) !== node);
    if (missing.length > 0) {
      throw new ValidationError(
        'one or more nodes are not registered, use addNode() to register the node',
        { context: { workflow: this.name, missing: missing.map(node => node.key) } }
      );
    }
  }

  private assertNoBackEdge(to: Node, from: Node): void {
    if (this.root && to.key === this.root.key) {
      throw new CycleError(from.key, this.root.key);
    }

    const predecessors = this.destinations.get(to.key);
    if (predecessors?.some(node => node.key === from.key)) {
      throw new CycleError(from.key, to.key);
    }
  }

  private assertDistinct(from: Node, to: Node): void {
    if (from.key === to.key) {
      throw new CycleError(from.key, to.key);
    }
  }

  private assertCanTakeKind(node: Node, kind: Exclude<NodeKind, 'plain'>): void {
    if (!node.canTakeKind(kind)) {
      throw new StructuralError(
        `node '${node.key}' is already a ${node.kind} node and cannot become ${kind}`,
        { nodeKey: node.key }
      );
    }
  }

  private assertCanTakeBranch(node: Node, marker: BranchMarker): void {
    if (!node.canTakeBranch(marker)) {
      throw new StructuralError(
        `node '${node.key}' is already on the ${node.branch} branch and cannot move to ${marker}`,
        { nodeKey: node.key }
      );
    }
  }

  private assignRoot(node: Node): void {
    if (!this.root) {
      this.root = node;
    }
  }

  private groupOf(node: Node): Map<string, Edge> {
    let group = this.adjacency.get(node.key);
    if (!group) {
      group = new Map();
      this.adjacency.set(node.key, group);
    }
    return group;
  }

  private recordPredecessor(to: Node, from: Node): void {
    const predecessors = this.destinations.get(to.key);
    if (predecessors) {
      predecessors.push(from);
    } else {
      this.destinations.set(to.key, [from]);
    }
  }
}

/**
 * Create a workflow
 */
export function createWorkflow(name: string, options?: WorkflowOptions): Workflow {
  return new Workflow(name, options);
}
