import type { BranchRecord, LoopNode, NodeIndex, SourceRange } from '@forkcov/types';
import { TreeShapeError } from '../../errors/ForkcovError.js';
import { describe, resolveBranchLocation, spanning, startOf } from '../../location/LocationResolver.js';
import type { DecoratedTree } from '../../tree/DecoratedTree.js';
import type { RuleContext } from './RuleContext.js';

function statementsSpan(tree: DecoratedTree, statements: readonly NodeIndex[]): SourceRange | null {
  const first = statements.at(0);
  const last = statements.at(-1);
  if (first === undefined || last === undefined) return null;
  return spanning(tree.rangeOf(first), tree.rangeOf(last));
}

function bodyLocation(ctx: RuleContext, node: LoopNode, range: SourceRange): SourceRange {
  const { tree } = ctx;

  if (node.test === 'post') {
    const body = tree.nodeOfKind(node.body, 'Sequence');
    const span = statementsSpan(tree, body.statements);
    if (span) return span;
    if (!body.loc.end) {
      throw new TreeShapeError('Empty post-test loop body has no closing keyword', 'ERR_EMPTY_CLAUSE_UNLOCATABLE', {
        nodeIndex: body.index,
        nodeKind: node.kind,
      });
    }
    return startOf(body.loc.end);
  }

  const body = tree.node(node.body);
  if (body.kind === 'Sequence') {
    const span = statementsSpan(tree, body.statements);
    if (span) return span;
  }
  if (body.kind === 'EmptyBody' && node.loc.end) {
    return startOf(node.loc.end);
  }
  return resolveBranchLocation(tree, { node, range }, body, null);
}

export function loopRecord(ctx: RuleContext, node: LoopNode): BranchRecord {
  const condition = describe(ctx.traversal, node.polarity, node.range);
  const location = bodyLocation(ctx, node, node.range);
  return {
    node: node.index,
    condition,
    branches: [
      { descriptor: describe(ctx.traversal, 'body', location), count: ctx.model.executionCount(node.body) },
    ],
  };
}
