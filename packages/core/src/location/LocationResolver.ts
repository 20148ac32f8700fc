/**
 * Location fallback policy for branch descriptors
 *
 * A branch is located by one of three tiers:
 *
 * 1. it has content: the content's own range
 * 2. its clause is written but empty: an explicit marker chosen by the rule
 *    (usually a zero-width position after a keyword)
 * 3. there is no clause at all: the enclosing construct's range, except for a
 *    subject-bearing Dispatch, which points at its subject
 */

import type {
  BranchDescriptor,
  DecoratedNode,
  DescriptorTag,
  Position,
  SourceRange,
} from '@forkcov/types';
import { TreeShapeError } from '../errors/ForkcovError.js';
import type { DecoratedTree } from '../tree/DecoratedTree.js';
import type { SourceText } from '../tree/SourceText.js';

/**
 * Per-pass state. Location ids are handed out in visit order and restart at
 * 1 for every pass.
 */
export interface TraversalContext {
  nextLocationId: number;
}

export function createTraversalContext(): TraversalContext {
  return { nextLocationId: 1 };
}

export function describe<T extends DescriptorTag>(
  context: TraversalContext,
  tag: T,
  range: SourceRange,
): BranchDescriptor<T> {
  const locationId = context.nextLocationId++;
  return {
    tag,
    locationId,
    startLine: range.start.line,
    startColumn: range.start.column,
    endLine: range.end.line,
    endColumn: range.end.column,
  };
}

export interface EnclosingConstruct {
  node: DecoratedNode;
  /** Range reported for the construct itself (may be extended by the rule) */
  range: SourceRange;
}

function isSourceRange(branch: DecoratedNode | SourceRange): branch is SourceRange {
  return !('kind' in branch);
}

export function resolveBranchLocation(
  tree: DecoratedTree,
  enclosing: EnclosingConstruct,
  branch: DecoratedNode | SourceRange,
  explicitEmptyMarker: SourceRange | null,
): SourceRange {
  if (isSourceRange(branch)) {
    return branch;
  }
  if (branch.kind !== 'EmptyBody') {
    return branch.range;
  }
  if (branch.range !== null) {
    if (explicitEmptyMarker === null) {
      throw new TreeShapeError(
        `Written but empty clause under ${enclosing.node.kind} has no marker to locate it`,
        'ERR_EMPTY_CLAUSE_UNLOCATABLE',
        { nodeIndex: branch.index, nodeKind: enclosing.node.kind },
        'Empty clauses of this construct must carry their keyword locations',
      );
    }
    return explicitEmptyMarker;
  }
  if (enclosing.node.kind === 'Dispatch' && enclosing.node.subject !== null) {
    return tree.rangeOf(enclosing.node.subject);
  }
  return enclosing.range;
}

// === RANGE HELPERS ===

function point(position: Position): SourceRange {
  return { start: position, end: position };
}

export function startOf(range: SourceRange): SourceRange {
  return point(range.start);
}

/**
 * Zero-width range after a keyword and any whitespace or comments that follow
 * it. Without source text, right at the keyword's end.
 */
export function afterToken(source: SourceText | null, token: SourceRange): SourceRange {
  return point(skipToContentStart(source, token));
}

export function skipToContentStart(source: SourceText | null, range: SourceRange): Position {
  return source === null ? range.end : source.skipToContentStart(range);
}

export function spanning(first: SourceRange, last: SourceRange): SourceRange {
  return { start: first.start, end: last.end };
}
