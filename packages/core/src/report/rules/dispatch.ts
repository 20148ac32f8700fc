import type {
  BranchEntry,
  BranchRecord,
  DecoratedNode,
  DispatchArmNode,
  DispatchNode,
  SourceRange,
} from '@forkcov/types';
import { afterToken, describe, skipToContentStart, startOf } from '../../location/LocationResolver.js';
import { branchEntry, type RuleContext } from './RuleContext.js';

function armEntry(ctx: RuleContext, enclosing: { node: DispatchNode; range: SourceRange }, arm: DispatchArmNode): BranchEntry {
  const { tree, model } = ctx;
  const body = tree.node(arm.body);

  const lastPattern = arm.patterns.at(-1);
  const anchor = arm.loc.begin ?? (lastPattern === undefined ? arm.range : tree.rangeOf(lastPattern));
  const marker = afterToken(tree.source, anchor);

  let view: DecoratedNode | SourceRange = body;
  if (body.kind !== 'EmptyBody') {
    const start = arm.loc.begin ? skipToContentStart(tree.source, arm.loc.begin) : body.range.start;
    view = { start, end: body.range.end };
  }

  return branchEntry(ctx, enclosing, 'when', view, marker, model.executionCount(body.index));
}

export function dispatchRecord(ctx: RuleContext, node: DispatchNode): BranchRecord {
  const { tree, model } = ctx;
  const condition = describe(ctx.traversal, 'case', node.range);
  const enclosing = { node, range: node.range };

  const branches = node.arms.map(index => armEntry(ctx, enclosing, tree.nodeOfKind(index, 'DispatchArm')));

  const { else: elseLoc, end } = node.loc;
  const elseMarker = elseLoc && end ? startOf(end) : null;
  branches.push(
    branchEntry(ctx, enclosing, 'else', tree.node(node.elseBranch), elseMarker, model.executionCount(node.elseBranch)),
  );

  return { node: node.index, condition, branches };
}
