import type { BranchRecord, BranchTag, ShortCircuitNode } from '@forkcov/types';
import { describe } from '../../location/LocationResolver.js';
import { branchEntry, type RuleContext } from './RuleContext.js';

/**
 * `a && b`: `then` is b evaluated, `else` is a short-circuiting.
 * `a || b` swaps the keys. The evaluated branch always comes first.
 */
export function shortCircuitRecord(ctx: RuleContext, node: ShortCircuitNode): BranchRecord {
  const { tree, model } = ctx;
  const condition = describe(ctx.traversal, node.operator, node.range);
  const [evaluated, skipped]: BranchTag[] = node.operator === '&&' ? ['then', 'else'] : ['else', 'then'];
  const enclosing = { node, range: node.range };

  return {
    node: node.index,
    condition,
    branches: [
      branchEntry(ctx, enclosing, evaluated, tree.node(node.right), null, model.executionCount(node.right)),
      branchEntry(ctx, enclosing, skipped, tree.node(node.left), null, model.shortCircuitedCount(node.index)),
    ],
  };
}
