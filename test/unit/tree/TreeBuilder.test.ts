/**
 * TreeBuilder tests - JSON tree documents into arenas
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { buildDecoratedTree, TreeShapeError } from '@forkcov/core';
import { toNodeIndex } from '@forkcov/types';
import { caseWithoutElseDocument, expr, ifThenDocument, treeDocument } from '../../helpers/documents.js';

function shapeError(code: string, path?: string) {
  return (err: unknown): boolean =>
    err instanceof TreeShapeError && err.code === code && (path === undefined || err.context.path === path);
}

describe('buildDecoratedTree', () => {
  // ===========================================================================
  // Arena layout
  // ===========================================================================

  it('numbers nodes in pre-order and materialises the absent else', () => {
    const tree = buildDecoratedTree(ifThenDocument());

    assert.deepStrictEqual(
      [...tree.preorder()].map(node => node.kind),
      ['Root', 'Conditional', 'Expression', 'Expression', 'EmptyBody'],
    );
    const conditional = tree.nodeOfKind(toNodeIndex(1), 'Conditional');
    assert.strictEqual(conditional.style, 'if');
    assert.strictEqual(conditional.whenFalsy, 4);
    assert.deepStrictEqual(conditional.loc.begin, { start: { line: 1, column: 5 }, end: { line: 1, column: 9 } });

    const empty = tree.node(toNodeIndex(4));
    assert.strictEqual(empty.kind, 'EmptyBody');
    assert.strictEqual(empty.range, null);
    assert.notStrictEqual(tree.source, null);
  });

  it('synthesizes the dispatch else without a range', () => {
    const tree = buildDecoratedTree(caseWithoutElseDocument());
    const dispatch = tree.nodeOfKind(toNodeIndex(1), 'Dispatch');
    const elseBranch = tree.node(dispatch.elseBranch);

    assert.strictEqual(dispatch.elseBranch, 6);
    assert.strictEqual(elseBranch.kind, 'EmptyBody');
    assert.strictEqual(elseBranch.range, null);
  });

  it('gives an empty dispatch arm an EmptyBody spanning the arm', () => {
    const tree = buildDecoratedTree(treeDocument({
      kind: 'Dispatch',
      range: [1, 0, 3, 3],
      trackers: { else: 'e' },
      subject: expr('v', [1, 5, 1, 6]),
      arms: [{ kind: 'DispatchArm', range: [2, 0, 2, 6], trackers: { body: 'w' }, patterns: [expr('1', [2, 5, 2, 6])] }],
    }, [1, 0, 3, 3]));

    const arm = tree.nodeOfKind(toNodeIndex(3), 'DispatchArm');
    const body = tree.node(arm.body);
    assert.strictEqual(body.kind, 'EmptyBody');
    assert.deepStrictEqual(body.range, { start: { line: 2, column: 0 }, end: { line: 2, column: 6 } });
  });

  it('lays out post-test loops body first', () => {
    const tree = buildDecoratedTree(treeDocument({
      kind: 'Loop',
      polarity: 'while',
      test: 'post',
      range: [1, 0, 3, 11],
      trackers: { body: 'lb' },
      condition: expr('x', [3, 10, 3, 11]),
      body: { kind: 'Sequence', range: [1, 0, 3, 3], statements: [expr('a', [2, 2, 2, 3])] },
    }, [1, 0, 3, 11]));

    const loop = tree.nodeOfKind(toNodeIndex(1), 'Loop');
    assert.strictEqual(loop.body, 2);
    assert.strictEqual(loop.condition, 4);
    assert.deepStrictEqual(tree.children(loop.index), [2, 4]);
  });

  it('loads unknown kinds as labelled expressions', () => {
    const tree = buildDecoratedTree(treeDocument(
      { kind: 'Yield', range: [1, 0, 1, 5], children: [expr('v', [1, 4, 1, 5])] },
      [1, 0, 1, 5],
    ));

    const node = tree.nodeOfKind(toNodeIndex(1), 'Expression');
    assert.strictEqual(node.label, 'Yield');
    assert.deepStrictEqual(node.children, [2]);
  });

  // ===========================================================================
  // Shape violations
  // ===========================================================================

  it('requires the condition of a conditional', () => {
    const document = treeDocument(
      { kind: 'Conditional', range: [1, 0, 1, 5], trackers: { truthy: 't' }, whenTruthy: expr('a', [1, 0, 1, 1]) },
      [1, 0, 1, 5],
    );
    assert.throws(() => buildDecoratedTree(document), shapeError('ERR_MISSING_CHILD', '$.root.body'));
  });

  it('requires trackers of branching kinds', () => {
    const document = treeDocument(
      { kind: 'ShortCircuit', operator: '&&', range: [1, 0, 1, 6], left: expr('a', [1, 0, 1, 1]), right: expr('b', [1, 5, 1, 6]) },
      [1, 0, 1, 6],
    );
    assert.throws(() => buildDecoratedTree(document), shapeError('ERR_MISSING_CHILD', '$.root.body.trackers'));
  });

  it('rejects malformed ranges with their path', () => {
    const document = treeDocument(expr('a', [1, 4, 1, 2]), [1, 0, 1, 5]);
    assert.throws(() => buildDecoratedTree(document), shapeError('ERR_TREE_SHAPE', '$.root.body.range'));
  });

  it('rejects documents whose root is not a Root node', () => {
    assert.throws(
      () => buildDecoratedTree({ root: expr('a', [1, 0, 1, 1]) }),
      shapeError('ERR_TREE_SHAPE', '$.root'),
    );
  });

  it('rejects unknown operators', () => {
    const document = treeDocument(
      { kind: 'ShortCircuit', operator: 'and', range: [1, 0, 1, 7], trackers: { right: 'r' }, left: expr('a', [1, 0, 1, 1]), right: expr('b', [1, 6, 1, 7]) },
      [1, 0, 1, 7],
    );
    assert.throws(() => buildDecoratedTree(document), shapeError('ERR_TREE_SHAPE', '$.root.body.operator'));
  });

  it('rejects dispatch arms of the wrong kind', () => {
    const document = treeDocument(
      { kind: 'Dispatch', range: [1, 0, 2, 3], trackers: { else: 'e' }, arms: [expr('a', [1, 5, 1, 6])] },
      [1, 0, 2, 3],
    );
    assert.throws(() => buildDecoratedTree(document), shapeError('ERR_UNEXPECTED_KIND', '$.root.body.arms'));
  });

  it('rejects documents that are not objects', () => {
    assert.throws(() => buildDecoratedTree([]), shapeError('ERR_TREE_SHAPE', '$'));
  });
});
