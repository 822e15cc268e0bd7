/**
 * Workflow Node
 *
 * A named unit of computation wrapping a user-supplied action. Nodes are
 * created by the caller and shared with the workflows they are registered
 * in; edge construction assigns their role and successors.
 *
 * @module @flowgraph/engine/node
 */

import { StructuralError } from '@flowgraph/core';

// =============================================================================
// Types
// =============================================================================

/**
 * Keyed input of a node action. `data` is always present; aggregate nodes
 * also receive one entry per parallel branch, keyed by branch name.
 */
export type NodeParams = { data: Uint8Array } & Record<string, Uint8Array>;

/**
 * User-supplied node action. Failure is a thrown error or a rejected promise.
 */
export type NodeAction = (params: NodeParams) => Uint8Array | Promise<Uint8Array>;

/**
 * How the engine dispatches a node
 */
export type NodeKind = 'plain' | 'conditional' | 'parallel';

/**
 * Which side of a conditional a node sits on
 */
export type BranchMarker = 'true' | 'false';

/**
 * Combined role, used for display
 */
export type NodeRole = 'plain' | 'conditional' | 'true-branch' | 'false-branch' | 'parallel-source';

// =============================================================================
// Node
// =============================================================================

/**
 * @example
 * ```typescript
 * const greet = new Node('greet', ({ data }) => toBytes(`hello ${fromBytes(data)}`));
 * const out = await greet.trigger({ data: toBytes('world') });
 * ```
 */
export class Node {
  readonly key: string;
  private readonly action: NodeAction;
  private nodeKind: NodeKind = 'plain';
  private branchMarker?: BranchMarker;
  private successors: Node[] = [];
  private aggregateNode?: Node;

  constructor(key: string, action: NodeAction) {
    this.key = key;
    this.action = action;
  }

  get kind(): NodeKind {
    return this.nodeKind;
  }

  get branch(): BranchMarker | undefined {
    return this.branchMarker;
  }

  get next(): readonly Node[] {
    return this.successors;
  }

  get aggregate(): Node | undefined {
    return this.aggregateNode;
  }

  /**
   * Display role. A node can carry a branch marker and be a parallel source
   * at once; the marker wins here.
   */
  get role(): NodeRole {
    if (this.nodeKind === 'conditional') return 'conditional';
    if (this.branchMarker === 'true') return 'true-branch';
    if (this.branchMarker === 'false') return 'false-branch';
    if (this.nodeKind === 'parallel') return 'parallel-source';
    return 'plain';
  }

  /**
   * Run the node's own action, outside of any workflow
   */
  async trigger(params: NodeParams): Promise<Uint8Array> {
    return this.action(params);
  }

  // ===========================================================================
  // Role assignment (used by Workflow during edge construction)
  // ===========================================================================

  /** @internal */
  canTakeKind(kind: Exclude<NodeKind, 'plain'>): boolean {
    return this.nodeKind === 'plain' || this.nodeKind === kind;
  }

  /** @internal */
  canTakeBranch(marker: BranchMarker): boolean {
    return this.branchMarker === undefined || this.branchMarker === marker;
  }

  /** @internal */
  assignKind(kind: Exclude<NodeKind, 'plain'>): void {
    if (!this.canTakeKind(kind)) {
      throw new StructuralError(
        `node '${this.key}' is already a ${this.nodeKind} node and cannot become ${kind}`,
        { nodeKey: this.key }
      );
    }
    this.nodeKind = kind;
  }

  /** @internal */
  assignBranch(marker: BranchMarker): void {
    if (!this.canTakeBranch(marker)) {
      throw new StructuralError(
        `node '${this.key}' is already on the ${this.branchMarker} branch and cannot move to ${marker}`,
        { nodeKey: this.key }
      );
    }
    this.branchMarker = marker;
  }

  /** @internal */
  appendNext(node: Node): void {
    this.successors.push(node);
  }

  /** @internal */
  replaceNext(nodes: readonly Node[]): void {
    this.successors = [...nodes];
  }

  /** @internal */
  setAggregate(node: Node): void {
    this.aggregateNode = node;
  }
}

/**
 * Create a node
 */
export function createNode(key: string, action: NodeAction): Node {
  return new Node(key, action);
}
