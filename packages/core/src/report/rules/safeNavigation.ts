import type { BranchRecord, SafeNavigationCallNode } from '@forkcov/types';
import { describe } from '../../location/LocationResolver.js';
import type { RuleContext } from './RuleContext.js';

export function safeNavigationRecord(ctx: RuleContext, node: SafeNavigationCallNode): BranchRecord {
  const { model, traversal } = ctx;
  return {
    node: node.index,
    condition: describe(traversal, '&.', node.range),
    branches: [
      { descriptor: describe(traversal, 'then', node.range), count: model.hits(node.trackers.call) },
      { descriptor: describe(traversal, 'else', node.range), count: model.hits(node.trackers.skip) },
    ],
  };
}
