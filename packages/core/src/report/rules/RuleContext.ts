import type {
  BranchEntry,
  BranchTag,
  DecoratedNode,
  SourceRange,
} from '@forkcov/types';
import type { FlowCountModel } from '../../flow/FlowCountModel.js';
import {
  describe,
  resolveBranchLocation,
  type EnclosingConstruct,
  type TraversalContext,
} from '../../location/LocationResolver.js';
import type { DecoratedTree } from '../../tree/DecoratedTree.js';

/** What every report rule reads during one pass */
export interface RuleContext {
  readonly tree: DecoratedTree;
  readonly model: FlowCountModel;
  readonly traversal: TraversalContext;
}

/**
 * Locate one branch through the fallback tiers and take its location id.
 */
export function branchEntry(
  ctx: RuleContext,
  enclosing: EnclosingConstruct,
  tag: BranchTag,
  branch: DecoratedNode | SourceRange,
  explicitEmptyMarker: SourceRange | null,
  count: number,
): BranchEntry {
  const range = resolveBranchLocation(ctx.tree, enclosing, branch, explicitEmptyMarker);
  return { descriptor: describe(ctx.traversal, tag, range), count };
}
