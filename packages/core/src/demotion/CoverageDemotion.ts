/**
 * Coverage demotion
 *
 * Phase 1 takes every node's executionCount as its raw runs. Phase 2 walks the
 * tree children-first: a branching construct that ran, but has a sub-branch
 * that never did, is reported with that sub-branch's runs (0) instead. Nested
 * constructs are demoted before their parents look at them.
 */

import type { BranchingNode, DecoratedNode, NodeIndex } from '@forkcov/types';
import type { FlowCountModel } from '../flow/FlowCountModel.js';

/** One outcome of a branching construct */
export type SubBranch =
  | { readonly type: 'node'; readonly index: NodeIndex }
  | { readonly type: 'synthetic'; readonly runs: number };

export function isCovered(runs: number): boolean {
  return runs > 0;
}

function asBranching(node: DecoratedNode): BranchingNode | null {
  switch (node.kind) {
    case 'Conditional':
    case 'Dispatch':
    case 'ShortCircuit':
    case 'SafeNavigationCall':
      return node;
    default:
      return null;
  }
}

/**
 * Outcomes of a branching construct. Outcomes with no node of their own
 * (short-circuiting, safe-navigation call/skip) carry their count directly.
 */
export function subBranches(model: FlowCountModel, node: BranchingNode): SubBranch[] {
  switch (node.kind) {
    case 'Conditional':
      return [
        { type: 'node', index: node.whenTruthy },
        { type: 'node', index: node.whenFalsy },
      ];
    case 'Dispatch':
      return [
        ...node.arms.map((arm): SubBranch => ({
          type: 'node',
          index: model.tree.nodeOfKind(arm, 'DispatchArm').body,
        })),
        { type: 'node', index: node.elseBranch },
      ];
    case 'ShortCircuit':
      return [
        { type: 'node', index: node.right },
        { type: 'synthetic', runs: model.shortCircuitedCount(node.index) },
      ];
    case 'SafeNavigationCall':
      return [
        { type: 'synthetic', runs: model.hits(node.trackers.call) },
        { type: 'synthetic', runs: model.hits(node.trackers.skip) },
      ];
  }
}

export function computeRawRuns(model: FlowCountModel): Map<NodeIndex, number> {
  const runs = new Map<NodeIndex, number>();
  for (const node of model.tree.preorder()) {
    runs.set(node.index, model.executionCount(node.index));
  }
  return runs;
}

/**
 * Demoted copy of `rawRuns`. The input map is left untouched.
 */
export function applyCoverageDemotion(model: FlowCountModel, rawRuns: ReadonlyMap<NodeIndex, number>): Map<NodeIndex, number> {
  const runs = new Map(rawRuns);
  const runsOf = (index: NodeIndex): number => runs.get(index) ?? model.executionCount(index);

  for (const node of model.tree.postorder()) {
    const branching = asBranching(node);
    if (!branching) continue;

    const own = runsOf(node.index);
    if (!isCovered(own)) continue;

    const worst = Math.min(
      ...subBranches(model, branching).map(branch => (branch.type === 'node' ? runsOf(branch.index) : branch.runs)),
    );
    if (!isCovered(worst)) {
      runs.set(node.index, worst);
    }
  }
  return runs;
}
