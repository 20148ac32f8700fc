/**
 * FlowCountModel - execution counts derived from raw tracker hits
 *
 * Three metrics per node:
 *
 * - flowEntryCount: times control reached the node
 * - flowCompletionCount: times control left it normally (no raise/return/break)
 * - executionCount: times the node's own work ran; usually entry, but for
 *   branching kinds it is how often the decision was actually taken
 *
 * By default the first child in flow order is entered as often as its parent,
 * and every later child as often as its previous sibling completed. Kinds that
 * split or repeat flow override the entry of some children from their
 * trackers.
 *
 * Every value is memoised for the lifetime of the model, so one model is one
 * pass over one set of counters.
 */

import type {
  CounterStore,
  DecoratedNode,
  NodeIndex,
  NodeKind,
  TrackerId,
} from '@forkcov/types';
import { CountInvariantError, TreeShapeError } from '../errors/ForkcovError.js';
import { assertNever, type DecoratedTree } from '../tree/DecoratedTree.js';

type Metric = 'executionCount' | 'flowEntryCount' | 'flowCompletionCount';

/** Entry of these kinds is a heuristic, so completion may exceed it */
const UNBOUNDED_ENTRY: ReadonlySet<NodeKind> = new Set<NodeKind>(['HandlerArm', 'DispatchArm']);

export class FlowCountModel {
  readonly tree: DecoratedTree;
  private readonly counters: CounterStore;
  private readonly memo: Record<Metric, Map<NodeIndex, number>> = {
    executionCount: new Map(),
    flowEntryCount: new Map(),
    flowCompletionCount: new Map(),
  };

  constructor(tree: DecoratedTree, counters: CounterStore) {
    this.tree = tree;
    this.counters = counters;
  }

  /**
   * Computes every node's counts children-first. Afterwards each sibling
   * chain is memoised, so no later query recurses deeper than the tree.
   */
  precompute(): void {
    for (const node of this.tree.postorder()) {
      this.flowCompletionCount(node.index);
      this.executionCount(node.index);
    }
  }

  hits(tracker: TrackerId): number {
    return this.counters.hits(tracker);
  }

  executionCount(index: NodeIndex): number {
    return this.memoised('executionCount', index, node => this.computeExecutionCount(node));
  }

  flowEntryCount(index: NodeIndex): number {
    return this.memoised('flowEntryCount', index, node => this.computeEntryCount(node));
  }

  flowCompletionCount(index: NodeIndex): number {
    const completion = this.memoised('flowCompletionCount', index, node => this.computeCompletionCount(node));
    const node = this.tree.node(index);
    if (!UNBOUNDED_ENTRY.has(node.kind)) {
      const entry = this.flowEntryCount(index);
      if (completion > entry) {
        throw new CountInvariantError(
          `${node.kind} at index ${index} completed ${completion} times but was entered ${entry} times`,
          'ERR_COMPLETION_EXCEEDS_ENTRY',
          { nodeIndex: index, nodeKind: node.kind, entry, completion },
          'Counters do not match the tree they were recorded against',
        );
      }
    }
    return completion;
  }

  /**
   * Estimated number of raises reaching a handler arm: raises out of the
   * protected body for the first arm, raises its predecessor did not catch for
   * later ones. Diagnostic only; the arm's own tracker decides its counts.
   */
  handlerGroupEntryCount(armIndex: NodeIndex): number {
    const arm = this.tree.nodeOfKind(armIndex, 'HandlerArm');
    const owner = this.requireParent(arm);
    const previous = this.tree.previousSibling(armIndex);

    if (previous === null) {
      return this.flowEntryCount(owner);
    }
    const previousNode = this.tree.node(previous);
    if (previousNode.kind !== 'HandlerArm') {
      return this.checked(
        this.flowEntryCount(previous) - this.flowCompletionCount(previous),
        armIndex,
        'flowEntryCount',
      );
    }
    const reaching = previousNode.exceptions === null
      ? this.flowEntryCount(previous)
      : this.flowCompletionCount(previousNode.exceptions);
    return this.checked(reaching - this.executionCount(previous), armIndex, 'flowEntryCount');
  }

  /** Evaluations of a short-circuit where the right operand was skipped */
  shortCircuitedCount(index: NodeIndex): number {
    const node = this.tree.nodeOfKind(index, 'ShortCircuit');
    return this.checked(
      this.flowCompletionCount(node.left) - this.flowEntryCount(node.right),
      index,
      'executionCount',
    );
  }

  // === ENTRY ===

  private computeEntryCount(node: DecoratedNode): number {
    if (node.kind === 'Root') {
      return this.hits(node.trackers.entered);
    }
    const parent = this.tree.node(this.requireParent(node));
    return this.childEntryOverride(parent, node.index) ?? this.defaultEntry(node.index, parent.index);
  }

  private defaultEntry(index: NodeIndex, parent: NodeIndex): number {
    const previous = this.tree.previousSibling(index);
    return previous === null ? this.flowEntryCount(parent) : this.flowCompletionCount(previous);
  }

  /**
   * Entry of `child` as decided by its parent's kind, or null to fall back to
   * the default sibling chain.
   */
  private childEntryOverride(parent: DecoratedNode, child: NodeIndex): number | null {
    switch (parent.kind) {
      case 'Root':
      case 'Sequence':
      case 'Expression':
      case 'Interrupt':
      case 'EmptyBody':
      case 'ElseClause':
        return null;
      case 'Conditional':
        if (child === parent.whenTruthy) {
          return this.hits(parent.trackers.truthy);
        }
        if (child === parent.whenFalsy) {
          return this.flowCompletionCount(parent.condition) - this.hits(parent.trackers.truthy);
        }
        return null;
      case 'Dispatch': {
        if (child === parent.elseBranch) {
          return this.hits(parent.trackers.else);
        }
        const position = parent.arms.indexOf(child);
        if (position === 0) {
          return parent.subject === null
            ? this.flowEntryCount(parent.index)
            : this.flowCompletionCount(parent.subject);
        }
        if (position > 0) {
          const previousArm = this.tree.nodeOfKind(parent.arms[position - 1], 'DispatchArm');
          return this.flowEntryCount(previousArm.index) - this.hits(previousArm.trackers.body);
        }
        return null;
      }
      case 'DispatchArm':
        return child === parent.body ? this.hits(parent.trackers.body) : null;
      case 'ShortCircuit':
        return child === parent.right ? this.hits(parent.trackers.right) : null;
      case 'SafeNavigationCall':
        return child === parent.arguments[0] ? this.hits(parent.trackers.call) : null;
      case 'Loop':
        if (child === parent.body) {
          return this.hits(parent.trackers.body);
        }
        // Every body run ends in another test unless it breaks or raises, so
        // `next` counts as a pass through the body
        if (child === parent.condition) {
          return parent.test === 'pre'
            ? this.flowEntryCount(parent.index) + this.hits(parent.trackers.body)
            : this.hits(parent.trackers.body);
        }
        return null;
      case 'TryHandler':
        if (child === parent.protectedBody) {
          return this.flowEntryCount(parent.index);
        }
        if (child === parent.elseClause) {
          return this.executionCount(parent.index);
        }
        return this.handlerGroupEntryCount(child);
      case 'HandlerArm':
        return child === parent.assignment || child === parent.body
          ? this.hits(parent.trackers.enteredBody)
          : null;
      case 'FinallyBlock':
        if (child === parent.finallyBody) {
          return parent.body === null ? this.flowEntryCount(parent.index) : this.flowEntryCount(parent.body);
        }
        return null;
      default:
        return assertNever(parent);
    }
  }

  // === EXECUTION ===

  private computeExecutionCount(node: DecoratedNode): number {
    switch (node.kind) {
      case 'Conditional':
        return this.flowCompletionCount(node.condition);
      case 'Dispatch':
        return node.subject === null ? this.flowEntryCount(node.index) : this.flowCompletionCount(node.subject);
      case 'ShortCircuit':
        return this.flowCompletionCount(node.left);
      case 'SafeNavigationCall':
        return this.flowCompletionCount(node.receiver);
      case 'HandlerArm':
        return this.hits(node.trackers.enteredBody);
      case 'TryHandler':
        return node.protectedBody === null
          ? this.flowEntryCount(node.index)
          : this.flowCompletionCount(node.protectedBody);
      case 'Root':
      case 'Sequence':
      case 'Expression':
      case 'Interrupt':
      case 'EmptyBody':
      case 'DispatchArm':
      case 'Loop':
      case 'ElseClause':
      case 'FinallyBlock':
        return this.flowEntryCount(node.index);
      default:
        return assertNever(node);
    }
  }

  // === COMPLETION ===

  private computeCompletionCount(node: DecoratedNode): number {
    switch (node.kind) {
      case 'Root':
        return node.body === null ? this.flowEntryCount(node.index) : this.flowCompletionCount(node.body);
      case 'Sequence':
        return this.lastCompletion(node.statements) ?? this.flowEntryCount(node.index);
      case 'Expression':
        if (node.trackers.completion !== undefined) {
          return this.hits(node.trackers.completion);
        }
        return this.lastCompletion(node.children) ?? this.flowEntryCount(node.index);
      case 'Interrupt':
        return 0;
      case 'EmptyBody':
        return this.flowEntryCount(node.index);
      case 'Conditional':
        return this.flowCompletionCount(node.whenTruthy) + this.flowCompletionCount(node.whenFalsy);
      case 'Dispatch':
        return node.arms.reduce(
          (sum, arm) => sum + this.flowCompletionCount(arm),
          this.flowCompletionCount(node.elseBranch),
        );
      case 'DispatchArm':
        return this.flowCompletionCount(node.body);
      case 'ShortCircuit':
        return this.flowCompletionCount(node.right) + this.shortCircuitedCount(node.index);
      case 'SafeNavigationCall': {
        const called = node.trackers.completion !== undefined
          ? this.hits(node.trackers.completion)
          : this.lastCompletion(node.arguments) ?? this.hits(node.trackers.call);
        return this.hits(node.trackers.skip) + called;
      }
      case 'Loop':
        if (node.trackers.completion !== undefined) {
          return this.hits(node.trackers.completion);
        }
        // Falsy tests, plus one per break: a breaking run was counted as a
        // test that never happened. Post-test loops run the body once before
        // the first check.
        return node.test === 'pre'
          ? this.flowCompletionCount(node.condition) - this.hits(node.trackers.body)
          : this.flowCompletionCount(node.condition) - (this.hits(node.trackers.body) - this.flowEntryCount(node.index));
      case 'TryHandler':
        if (node.protectedBody === null) {
          return this.flowEntryCount(node.index);
        }
        return node.arms.reduce(
          (sum, arm) => sum + this.flowCompletionCount(arm),
          this.flowCompletionCount(node.elseClause ?? node.protectedBody),
        );
      case 'HandlerArm':
        return node.body === null ? this.executionCount(node.index) : this.flowCompletionCount(node.body);
      case 'ElseClause':
        return node.body === null ? this.flowEntryCount(node.index) : this.flowCompletionCount(node.body);
      case 'FinallyBlock':
        if (node.body !== null) return this.flowCompletionCount(node.body);
        if (node.finallyBody !== null) return this.flowCompletionCount(node.finallyBody);
        return this.flowEntryCount(node.index);
      default:
        return assertNever(node);
    }
  }

  private lastCompletion(children: readonly NodeIndex[]): number | null {
    const last = children.at(-1);
    return last === undefined ? null : this.flowCompletionCount(last);
  }

  // === HELPERS ===

  private memoised(metric: Metric, index: NodeIndex, compute: (node: DecoratedNode) => number): number {
    const table = this.memo[metric];
    const cached = table.get(index);
    if (cached !== undefined) return cached;

    const value = this.checked(compute(this.tree.node(index)), index, metric);
    table.set(index, value);
    return value;
  }

  private checked(value: number, index: NodeIndex, metric: Metric): number {
    if (!Number.isSafeInteger(value) || value < 0) {
      const node = this.tree.node(index);
      throw new CountInvariantError(
        `${metric} of ${node.kind} at index ${index} is ${value}`,
        'ERR_NEGATIVE_COUNT',
        { nodeIndex: index, nodeKind: node.kind, metric, value },
        'Counters do not match the tree they were recorded against',
      );
    }
    return value;
  }

  private requireParent(node: DecoratedNode): NodeIndex {
    if (node.parent === null) {
      throw new TreeShapeError(`${node.kind} at index ${node.index} has no parent`, 'ERR_TREE_SHAPE', {
        nodeIndex: node.index,
        nodeKind: node.kind,
      });
    }
    return node.parent;
  }
}
