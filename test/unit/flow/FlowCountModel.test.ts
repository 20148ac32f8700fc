/**
 * FlowCountModel tests - entry, completion and execution counts per kind
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  CountInvariantError,
  FlowCountModel,
  buildDecoratedTree,
  counterStoreFromRecord,
} from '@forkcov/core';
import { toNodeIndex, type NodeIndex } from '@forkcov/types';
import {
  expr,
  ifThenDocument,
  rescueDocument,
  treeDocument,
  type TreeDocument,
} from '../../helpers/documents.js';

function modelOf(document: TreeDocument, counts: Record<string, number>): FlowCountModel {
  return new FlowCountModel(buildDecoratedTree(document), counterStoreFromRecord(counts));
}

function counts(model: FlowCountModel, index: number): { entry: number; completion: number; execution: number } {
  const node: NodeIndex = toNodeIndex(index);
  return {
    entry: model.flowEntryCount(node),
    completion: model.flowCompletionCount(node),
    execution: model.executionCount(node),
  };
}

function countError(code: string) {
  return (err: unknown): boolean => err instanceof CountInvariantError && err.code === code;
}

describe('FlowCountModel', () => {
  // ===========================================================================
  // Conditionals
  // ===========================================================================

  describe('Conditional', () => {
    it('splits the condition completions between the two branches', () => {
      // root 0, conditional 1, x 2, a 3, absent else 4
      const model = modelOf(ifThenDocument(), { root: 3, t: 1 });

      assert.deepStrictEqual(counts(model, 1), { entry: 3, completion: 3, execution: 3 });
      assert.deepStrictEqual(counts(model, 3), { entry: 1, completion: 1, execution: 1 });
      assert.deepStrictEqual(counts(model, 4), { entry: 2, completion: 2, execution: 2 });
    });

    it('keeps branch counts summing to the runs while a branch interrupts', () => {
      // root 0, conditional 1, x 2, raise 3, b 4
      const model = modelOf(treeDocument({
        kind: 'Conditional',
        range: [1, 0, 1, 30],
        trackers: { truthy: 't' },
        condition: expr('x', [1, 3, 1, 4]),
        whenTruthy: { kind: 'Interrupt', label: 'raise', range: [1, 10, 1, 15] },
        whenFalsy: expr('b', [1, 21, 1, 22]),
      }, [1, 0, 1, 30]), { root: 3, t: 1 });

      const runs = model.executionCount(toNodeIndex(1));
      const then = model.executionCount(toNodeIndex(3));
      const otherwise = model.executionCount(toNodeIndex(4));
      assert.strictEqual(runs, 3);
      assert.strictEqual(then + otherwise, runs);
      assert.strictEqual(model.flowCompletionCount(toNodeIndex(3)), 0);
      assert.strictEqual(model.flowCompletionCount(toNodeIndex(1)), 2);
      assert.strictEqual(model.flowCompletionCount(toNodeIndex(0)), 2);
    });

    it('raises when the truthy tracker exceeds the condition completions', () => {
      const model = modelOf(ifThenDocument(), { root: 1, t: 5 });
      assert.throws(() => model.executionCount(toNodeIndex(4)), countError('ERR_NEGATIVE_COUNT'));
    });
  });

  // ===========================================================================
  // Sequences and expressions
  // ===========================================================================

  describe('Sequence', () => {
    it('stops the chain at a call that raised', () => {
      // root 0, sequence 1, a 2, call 3, c 4
      const model = modelOf(treeDocument({
        kind: 'Sequence',
        range: [1, 0, 3, 1],
        statements: [
          expr('a', [1, 0, 1, 1]),
          expr('call', [2, 0, 2, 4], { trackers: { completion: 'ok' } }),
          expr('c', [3, 0, 3, 1]),
        ],
      }, [1, 0, 3, 1]), { root: 4, ok: 3 });

      assert.deepStrictEqual(counts(model, 3), { entry: 4, completion: 3, execution: 4 });
      assert.deepStrictEqual(counts(model, 4), { entry: 3, completion: 3, execution: 3 });
      assert.deepStrictEqual(counts(model, 1), { entry: 4, completion: 3, execution: 4 });
    });

    it('raises when a node completes more often than it was entered', () => {
      const model = modelOf(
        treeDocument(expr('call', [1, 0, 1, 4], { trackers: { completion: 'ok' } }), [1, 0, 1, 4]),
        { root: 1, ok: 2 },
      );
      assert.throws(() => model.flowCompletionCount(toNodeIndex(1)), countError('ERR_COMPLETION_EXCEEDS_ENTRY'));
    });
  });

  // ===========================================================================
  // Dispatch
  // ===========================================================================

  describe('Dispatch', () => {
    it('passes unmatched evaluations from arm to arm', () => {
      // root 0, case 1, v 2, arm 3, p 4, a 5, arm 6, p 7, b 8, else 9
      const arm = (name: string, line: number) => ({
        kind: 'DispatchArm',
        range: [line, 0, line, 8],
        trackers: { body: name },
        patterns: [expr('p', [line, 5, line, 6])],
        body: expr(name, [line, 7, line, 8]),
      });
      const model = modelOf(treeDocument({
        kind: 'Dispatch',
        range: [1, 0, 4, 3],
        trackers: { else: 'e' },
        subject: expr('v', [1, 5, 1, 6]),
        arms: [arm('a', 2), arm('b', 3)],
      }, [1, 0, 4, 3]), { root: 6, a: 3, b: 2, e: 1 });

      assert.strictEqual(model.flowEntryCount(toNodeIndex(3)), 6);
      assert.strictEqual(model.flowEntryCount(toNodeIndex(6)), 3);
      assert.strictEqual(model.executionCount(toNodeIndex(5)), 3);
      assert.strictEqual(model.executionCount(toNodeIndex(8)), 2);
      assert.strictEqual(model.executionCount(toNodeIndex(9)), 1);
      assert.deepStrictEqual(counts(model, 1), { entry: 6, completion: 6, execution: 6 });
    });
  });

  // ===========================================================================
  // Short circuits and safe navigation
  // ===========================================================================

  describe('ShortCircuit', () => {
    it('counts short-circuited evaluations from the right tracker', () => {
      // root 0, && 1, a 2, b 3
      const model = modelOf(treeDocument({
        kind: 'ShortCircuit',
        operator: '&&',
        range: [1, 0, 1, 6],
        trackers: { right: 'r' },
        left: expr('a', [1, 0, 1, 1]),
        right: expr('b', [1, 5, 1, 6]),
      }, [1, 0, 1, 6]), { root: 3, r: 2 });

      assert.strictEqual(model.shortCircuitedCount(toNodeIndex(1)), 1);
      assert.deepStrictEqual(counts(model, 1), { entry: 3, completion: 3, execution: 3 });
      assert.strictEqual(model.flowEntryCount(toNodeIndex(3)), 2);
    });
  });

  describe('SafeNavigationCall', () => {
    it('adds skipped calls to completed ones', () => {
      // root 0, call 1, receiver 2, argument 3
      const model = modelOf(treeDocument({
        kind: 'SafeNavigationCall',
        method: 'fetch',
        range: [1, 0, 1, 10],
        trackers: { call: 'c', skip: 's' },
        receiver: expr('a', [1, 0, 1, 1]),
        arguments: [expr('k', [1, 9, 1, 10])],
      }, [1, 0, 1, 10]), { root: 5, c: 3, s: 2 });

      assert.strictEqual(model.flowEntryCount(toNodeIndex(3)), 3);
      assert.deepStrictEqual(counts(model, 1), { entry: 5, completion: 5, execution: 5 });
    });
  });

  // ===========================================================================
  // Loops
  // ===========================================================================

  describe('Loop', () => {
    it('re-enters the condition of a pre-test loop after each body run', () => {
      // root 0, loop 1, x 2, body 3
      const model = modelOf(treeDocument({
        kind: 'Loop',
        polarity: 'while',
        range: [1, 0, 3, 3],
        trackers: { body: 'lb' },
        condition: expr('x', [1, 6, 1, 7]),
        body: expr('a', [2, 2, 2, 3]),
      }, [1, 0, 3, 3]), { root: 1, lb: 3 });

      assert.strictEqual(model.flowEntryCount(toNodeIndex(2)), 4);
      assert.strictEqual(model.executionCount(toNodeIndex(3)), 3);
      assert.deepStrictEqual(counts(model, 1), { entry: 1, completion: 1, execution: 1 });
    });

    it('runs the body of a post-test loop before the first check', () => {
      // root 0, loop 1, body 2, a 3, x 4
      const model = modelOf(treeDocument({
        kind: 'Loop',
        polarity: 'while',
        test: 'post',
        range: [1, 0, 3, 11],
        trackers: { body: 'lb' },
        condition: expr('x', [3, 10, 3, 11]),
        body: { kind: 'Sequence', range: [1, 0, 3, 3], statements: [expr('a', [2, 2, 2, 3])] },
      }, [1, 0, 3, 11]), { root: 1, lb: 2 });

      assert.strictEqual(model.flowEntryCount(toNodeIndex(4)), 2);
      assert.deepStrictEqual(counts(model, 1), { entry: 1, completion: 1, execution: 1 });
    });

    it('prefers the completion tracker when a loop can break', () => {
      const model = modelOf(treeDocument({
        kind: 'Loop',
        polarity: 'until',
        range: [1, 0, 3, 3],
        trackers: { body: 'lb', completion: 'done' },
        condition: expr('x', [1, 6, 1, 7]),
        body: { kind: 'Interrupt', label: 'break', range: [2, 2, 2, 7] },
      }, [1, 0, 3, 3]), { root: 2, lb: 2, done: 2 });

      assert.strictEqual(model.flowCompletionCount(toNodeIndex(1)), 2);
    });

    // root 0, sequence 1, loop 2, then the loop's children, then z last
    function loopThenStatement(loop: Record<string, unknown>, z: Record<string, unknown> = {}): TreeDocument {
      return treeDocument({
        kind: 'Sequence',
        range: [1, 0, 4, 1],
        statements: [
          { kind: 'Loop', polarity: 'while', range: [1, 0, 3, 3], trackers: { body: 'b' }, ...loop },
          expr('z', [4, 0, 4, 1], z),
        ],
      }, [1, 0, 4, 1]);
    }

    it('counts next in a pre-test loop as a pass back to the condition', () => {
      // loop 2, c 3, next 4, z 5
      const model = modelOf(loopThenStatement({
        condition: expr('c', [1, 6, 1, 7]),
        body: { kind: 'Interrupt', label: 'next', range: [2, 2, 2, 6] },
      }), { root: 1, b: 2 });

      assert.strictEqual(model.flowEntryCount(toNodeIndex(3)), 3);
      assert.deepStrictEqual(counts(model, 2), { entry: 1, completion: 1, execution: 1 });
      assert.strictEqual(model.flowEntryCount(toNodeIndex(5)), model.flowCompletionCount(toNodeIndex(2)));
    });

    it('completes a pre-test loop left by break', () => {
      // loop 2, c 3, break 4, z 5
      const model = modelOf(loopThenStatement({
        condition: expr('c', [1, 6, 1, 7]),
        body: { kind: 'Interrupt', label: 'break', range: [2, 2, 2, 7] },
      }, { trackers: { completion: 'zc' } }), { root: 1, b: 1, zc: 1 });

      assert.deepStrictEqual(counts(model, 2), { entry: 1, completion: 1, execution: 1 });
      assert.deepStrictEqual(counts(model, 5), { entry: 1, completion: 1, execution: 1 });
    });

    it('counts next in a post-test loop as a pass to the condition', () => {
      // loop 2, body 3, next 4, c 5, z 6
      const model = modelOf(loopThenStatement({
        test: 'post',
        condition: expr('c', [3, 10, 3, 11]),
        body: { kind: 'Sequence', range: [1, 0, 3, 3], statements: [{ kind: 'Interrupt', label: 'next', range: [2, 2, 2, 6] }] },
      }), { root: 1, b: 3 });

      assert.strictEqual(model.flowEntryCount(toNodeIndex(5)), 3);
      assert.deepStrictEqual(counts(model, 2), { entry: 1, completion: 1, execution: 1 });
      assert.strictEqual(model.flowEntryCount(toNodeIndex(6)), 1);
    });

    it('completes a post-test loop left by break', () => {
      // loop 2, body 3, break 4, c 5, z 6
      const model = modelOf(loopThenStatement({
        test: 'post',
        condition: expr('c', [3, 10, 3, 11]),
        body: { kind: 'Sequence', range: [1, 0, 3, 3], statements: [{ kind: 'Interrupt', label: 'break', range: [2, 2, 2, 7] }] },
      }), { root: 1, b: 1 });

      assert.strictEqual(model.flowEntryCount(toNodeIndex(5)), 1);
      assert.deepStrictEqual(counts(model, 2), { entry: 1, completion: 1, execution: 1 });
      assert.strictEqual(model.flowEntryCount(toNodeIndex(6)), model.flowCompletionCount(toNodeIndex(2)));
    });
  });

  // ===========================================================================
  // Long statement lists
  // ===========================================================================

  describe('precompute', () => {
    it('fills long sibling chains without deep recursion', () => {
      const statements = Array.from({ length: 5000 }, (_, i) => expr(`s${i}`, [i + 1, 0, i + 1, 2]));
      const model = modelOf(treeDocument(
        { kind: 'Sequence', range: [1, 0, 5000, 2], statements },
        [1, 0, 5000, 2],
      ), { root: 2 });

      model.precompute();
      // root 0, sequence 1, statements 2..5001
      assert.deepStrictEqual(counts(model, 5001), { entry: 2, completion: 2, execution: 2 });
      assert.strictEqual(model.flowCompletionCount(toNodeIndex(0)), 2);
    });
  });

  // ===========================================================================
  // Exception handling
  // ===========================================================================

  describe('TryHandler', () => {
    it('routes a raise into the handler arm', () => {
      // root 0, try 1, r 2, arm 3, h 4
      const model = modelOf(rescueDocument(), { root: 1, rc: 0, h: 1 });

      assert.strictEqual(model.executionCount(toNodeIndex(3)), 1);
      assert.strictEqual(model.flowCompletionCount(toNodeIndex(3)), 1);
      assert.strictEqual(model.handlerGroupEntryCount(toNodeIndex(3)), 1);
      assert.deepStrictEqual(counts(model, 1), { entry: 1, completion: 1, execution: 0 });
    });

    it('passes uncaught raises on to the next arm', () => {
      // root 0, try 1, r 2, arm 3, exceptions 4, h1 5, arm 6, h2 7, else 8, e 9
      const model = modelOf(treeDocument({
        kind: 'TryHandler',
        range: [1, 0, 6, 3],
        protectedBody: expr('r', [1, 7, 1, 8], { trackers: { completion: 'rc' } }),
        arms: [
          {
            kind: 'HandlerArm',
            range: [2, 0, 3, 4],
            trackers: { enteredBody: 'h1' },
            exceptions: expr('KeyError', [2, 7, 2, 15]),
            body: expr('h1', [3, 2, 3, 4]),
          },
          { kind: 'HandlerArm', range: [4, 0, 4, 9], trackers: { enteredBody: 'h2' }, body: expr('h2', [4, 7, 4, 9]) },
        ],
        else: { kind: 'ElseClause', range: [5, 0, 5, 6], body: expr('e', [5, 5, 5, 6]) },
      }, [1, 0, 6, 3]), { root: 5, rc: 2, h1: 1, h2: 2 });

      assert.strictEqual(model.handlerGroupEntryCount(toNodeIndex(3)), 3);
      assert.strictEqual(model.handlerGroupEntryCount(toNodeIndex(6)), 2);
      assert.strictEqual(model.flowEntryCount(toNodeIndex(8)), 2);
      assert.deepStrictEqual(counts(model, 1), { entry: 5, completion: 5, execution: 2 });
    });
  });

  describe('FinallyBlock', () => {
    it('enters the finally body as often as the guarded body', () => {
      // root 0, block 1, a 2, f 3
      const model = modelOf(treeDocument({
        kind: 'FinallyBlock',
        range: [1, 0, 4, 3],
        body: expr('a', [2, 2, 2, 3], { trackers: { completion: 'ac' } }),
        finally: expr('f', [3, 9, 3, 10]),
      }, [1, 0, 4, 3]), { root: 2, ac: 1 });

      assert.strictEqual(model.flowEntryCount(toNodeIndex(3)), 2);
      assert.deepStrictEqual(counts(model, 1), { entry: 2, completion: 1, execution: 2 });
    });
  });

  it('returns the same values on repeated queries', () => {
    const model = modelOf(ifThenDocument(), { root: 2, t: 2 });
    const first = [0, 1, 2, 3, 4].map(index => counts(model, index));
    const second = [0, 1, 2, 3, 4].map(index => counts(model, index));
    assert.deepStrictEqual(second, first);
  });
});
