/**
 * DecoratedTree - arena storage for one compiled unit.
 *
 * Nodes are stored in pre-order in a flat array and refer to each other by
 * NodeIndex. Child lists are kept in flow order (the order control visits
 * them), and each node remembers its position in its parent's list, so
 * previous/next sibling lookups are O(1) without back-pointers.
 *
 * Invariants checked on construction:
 *   - nodes[i].index === i
 *   - node 0 is the only Root and the only node without a parent
 *   - every child lists its parent correctly, and appears under one parent only
 */

import type {
  DecoratedNode,
  NodeIndex,
  NodeKind,
  NodeOfKind,
  RootNode,
  SourceRange,
} from '@forkcov/types';
import { isNodeKind } from '@forkcov/types';
import { TreeShapeError } from '../errors/ForkcovError.js';
import type { SourceText } from './SourceText.js';

/**
 * Children of a node in the order control flows through them.
 */
export function childrenInFlowOrder(node: DecoratedNode): NodeIndex[] {
  switch (node.kind) {
    case 'Root':
      return present(node.body);
    case 'Sequence':
      return [...node.statements];
    case 'Expression':
    case 'Interrupt':
      return [...node.children];
    case 'EmptyBody':
      return [];
    case 'Conditional':
      return [node.condition, node.whenTruthy, node.whenFalsy];
    case 'Dispatch':
      return [...present(node.subject), ...node.arms, node.elseBranch];
    case 'DispatchArm':
      return [...node.patterns, node.body];
    case 'ShortCircuit':
      return [node.left, node.right];
    case 'SafeNavigationCall':
      return [node.receiver, ...node.arguments];
    case 'Loop':
      return node.test === 'post' ? [node.body, node.condition] : [node.condition, node.body];
    case 'TryHandler':
      return [...present(node.protectedBody), ...node.arms, ...present(node.elseClause)];
    case 'HandlerArm':
      return [...present(node.exceptions), ...present(node.assignment), ...present(node.body)];
    case 'ElseClause':
      return present(node.body);
    case 'FinallyBlock':
      return [...present(node.body), ...present(node.finallyBody)];
    default:
      return assertNever(node);
  }
}

function present(index: NodeIndex | null): NodeIndex[] {
  return index === null ? [] : [index];
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled node kind: ${JSON.stringify(value)}`);
}

export class DecoratedTree {
  readonly source: SourceText | null;
  private readonly nodes: readonly DecoratedNode[];
  private readonly childLists: readonly (readonly NodeIndex[])[];
  /** Position of each node inside its parent's child list (-1 for the root) */
  private readonly positions: readonly number[];

  constructor(nodes: readonly DecoratedNode[], source: SourceText | null = null) {
    this.nodes = nodes;
    this.source = source;

    const root = nodes[0];
    if (!root || root.kind !== 'Root' || root.parent !== null) {
      throw new TreeShapeError('Tree must start with a Root node without parent', 'ERR_TREE_SHAPE');
    }

    const positions = new Array<number>(nodes.length).fill(-1);
    const seen = new Array<boolean>(nodes.length).fill(false);
    const childLists: NodeIndex[][] = [];

    nodes.forEach((node, i) => {
      if (node.index !== i) {
        throw new TreeShapeError(`Node stored at ${i} claims index ${node.index}`, 'ERR_TREE_SHAPE', {
          nodeIndex: node.index,
          nodeKind: node.kind,
        });
      }
      if (i > 0 && (node.parent === null || node.kind === 'Root')) {
        throw new TreeShapeError('Only the first node may be a Root', 'ERR_TREE_SHAPE', {
          nodeIndex: node.index,
          nodeKind: node.kind,
        });
      }

      const children = childrenInFlowOrder(node);
      children.forEach((childIndex, position) => {
        const child = nodes[childIndex];
        if (!child || child.parent !== node.index || seen[childIndex]) {
          throw new TreeShapeError(`Child ${childIndex} is not owned by node ${i}`, 'ERR_TREE_SHAPE', {
            nodeIndex: node.index,
            nodeKind: node.kind,
            child: childIndex,
          });
        }
        seen[childIndex] = true;
        positions[childIndex] = position;
      });
      childLists.push(children);
    });

    const orphan = seen.findIndex((owned, i) => i > 0 && !owned);
    if (orphan !== -1) {
      throw new TreeShapeError(`Node ${orphan} is not reachable from the root`, 'ERR_TREE_SHAPE', {
        nodeIndex: nodes[orphan].index,
      });
    }

    this.childLists = childLists;
    this.positions = positions;
  }

  get size(): number {
    return this.nodes.length;
  }

  get root(): RootNode {
    return this.nodeOfKind(this.nodes[0].index, 'Root');
  }

  node(index: NodeIndex): DecoratedNode {
    const node = this.nodes[index];
    if (!node) {
      throw new TreeShapeError(`No node at index ${index}`, 'ERR_TREE_SHAPE', { nodeIndex: index });
    }
    return node;
  }

  /**
   * Node at `index`, which the caller's own invariants say must be of `kind`.
   */
  nodeOfKind<K extends NodeKind>(index: NodeIndex, kind: K): NodeOfKind<K> {
    const node = this.node(index);
    if (!isNodeKind(node, kind)) {
      throw new TreeShapeError(`Expected ${kind} at index ${index}, found ${node.kind}`, 'ERR_UNEXPECTED_KIND', {
        nodeIndex: index,
        nodeKind: node.kind,
        expected: kind,
      });
    }
    return node;
  }

  /**
   * Source range of a node that must have one (anything but a bare EmptyBody).
   */
  rangeOf(index: NodeIndex): SourceRange {
    const node = this.node(index);
    if (node.range === null) {
      throw new TreeShapeError(`Node ${index} has no source range`, 'ERR_MISSING_CHILD', {
        nodeIndex: index,
        nodeKind: node.kind,
      });
    }
    return node.range;
  }

  children(index: NodeIndex): readonly NodeIndex[] {
    return this.childLists[this.node(index).index];
  }

  parentOf(index: NodeIndex): DecoratedNode | null {
    const parent = this.node(index).parent;
    return parent === null ? null : this.node(parent);
  }

  previousSibling(index: NodeIndex): NodeIndex | null {
    const node = this.node(index);
    if (node.parent === null) return null;
    const position = this.positions[index];
    return position > 0 ? this.childLists[node.parent][position - 1] : null;
  }

  nextSibling(index: NodeIndex): NodeIndex | null {
    const node = this.node(index);
    if (node.parent === null) return null;
    const siblings = this.childLists[node.parent];
    const position = this.positions[index];
    return position + 1 < siblings.length ? siblings[position + 1] : null;
  }

  /**
   * Parents before children, children in flow order.
   */
  *preorder(): Generator<DecoratedNode> {
    const stack: NodeIndex[] = [this.nodes[0].index];
    while (stack.length > 0) {
      const index = stack.pop();
      if (index === undefined) break;
      yield this.nodes[index];
      const children = this.childLists[index];
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push(children[i]);
      }
    }
  }

  /**
   * Children before parents.
   */
  *postorder(): Generator<DecoratedNode> {
    const stack: Array<{ index: NodeIndex; expanded: boolean }> = [{ index: this.nodes[0].index, expanded: false }];
    while (stack.length > 0) {
      const frame = stack.pop();
      if (frame === undefined) break;
      if (frame.expanded) {
        yield this.nodes[frame.index];
        continue;
      }
      stack.push({ index: frame.index, expanded: true });
      const children = this.childLists[frame.index];
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push({ index: children[i], expanded: false });
      }
    }
  }
}
