import type {
  BranchRecord,
  BranchTag,
  ConditionalNode,
  DecoratedNode,
  SourceRange,
} from '@forkcov/types';
import { afterToken, describe, startOf } from '../../location/LocationResolver.js';
import type { DecoratedTree } from '../../tree/DecoratedTree.js';
import { branchEntry, type RuleContext } from './RuleContext.js';

/**
 * The `if` an elsif chain hangs off. Each elsif is the falsy branch of the
 * conditional before it.
 */
export function rootConditional(tree: DecoratedTree, node: ConditionalNode): ConditionalNode {
  let current = node;
  while (current.style === 'elsif' && current.parent !== null) {
    const parent = tree.node(current.parent);
    if (parent.kind !== 'Conditional' || parent.whenFalsy !== current.index) break;
    current = parent;
  }
  return current;
}

/** Last elsif of the chain starting at `node` (`node` itself if none follows) */
export function deepestElsif(tree: DecoratedTree, node: ConditionalNode): ConditionalNode {
  let current = node;
  for (;;) {
    const next = tree.node(current.whenFalsy);
    if (next.kind !== 'Conditional' || next.style !== 'elsif') return current;
    current = next;
  }
}

/**
 * An elsif whose chain ends without an else reaches up to the start of the
 * outer `end`. Null when no extension applies.
 */
export function extendedElsifRange(tree: DecoratedTree, node: DecoratedNode): SourceRange | null {
  if (node.kind !== 'Conditional' || node.style !== 'elsif') return null;
  if (tree.node(deepestElsif(tree, node).whenFalsy).kind !== 'EmptyBody') return null;

  const end = rootConditional(tree, node).loc.end;
  if (end === undefined) return null;
  return { start: node.range.start, end: end.start };
}

function emptyClauseFallbacks(ctx: RuleContext, node: ConditionalNode): [SourceRange | null, SourceRange | null] {
  if (node.style === 'ternary') return [null, null];

  const source = ctx.tree.source;
  const { begin, else: elseLoc } = node.loc;

  let first: SourceRange | null = null;
  if (begin) {
    first = afterToken(source, begin);
  } else if (elseLoc) {
    first = startOf(elseLoc);
  }
  const second = elseLoc ? afterToken(source, elseLoc) : null;

  const rootEnd = rootConditional(ctx.tree, node).loc.end;
  const endLoc = rootEnd ? startOf(rootEnd) : null;

  return [first ?? endLoc, second ?? endLoc];
}

export function conditionalRecord(ctx: RuleContext, node: ConditionalNode): BranchRecord {
  const { tree, model } = ctx;
  const nodeRange = extendedElsifRange(tree, node) ?? node.range;
  const condition = describe(ctx.traversal, node.style === 'unless' ? 'unless' : 'if', nodeRange);

  let tags: BranchTag[] = ['then', 'else'];
  let fallbacks = emptyClauseFallbacks(ctx, node);
  if (node.style === 'unless') {
    tags = ['else', 'then'];
    fallbacks = [fallbacks[1], fallbacks[0]];
  }

  const truthy = tree.node(node.whenTruthy);
  const falsy = tree.node(node.whenFalsy);
  const enclosing = { node, range: nodeRange };

  return {
    node: node.index,
    condition,
    branches: [
      branchEntry(ctx, enclosing, tags[0], truthy, fallbacks[0], model.executionCount(truthy.index)),
      branchEntry(
        ctx,
        enclosing,
        tags[1],
        extendedElsifRange(tree, falsy) ?? falsy,
        fallbacks[1],
        model.executionCount(falsy.index),
      ),
    ],
  };
}
