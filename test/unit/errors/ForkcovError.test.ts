/**
 * ForkcovError Hierarchy Tests
 *
 * Tests:
 * - Extends Error (instanceof Error === true)
 * - Each concrete error sets code, severity, message, context correctly
 * - toJSON() returns expected structure
 * - Suggestion is optional
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  ForkcovError,
  ConfigError,
  InputError,
  TreeShapeError,
  CountInvariantError,
} from '@forkcov/core';
import { toNodeIndex } from '@forkcov/types';

// =============================================================================
// TESTS: ForkcovError Base Class
// =============================================================================

describe('ForkcovError', () => {
  it('should have Error in prototype chain', () => {
    const error = new InputError('Cannot read tree.json', 'ERR_INPUT_UNREADABLE', { filePath: 'tree.json' });
    assert.ok(error instanceof Error);
    assert.ok(error instanceof ForkcovError);
    assert.ok(error instanceof InputError);
    assert.strictEqual(error.name, 'InputError');
  });

  it('should capture a stack trace', () => {
    const error = new ConfigError('bad', 'ERR_CONFIG_OPTION');
    assert.strictEqual(typeof error.stack, 'string');
  });

  // ===========================================================================
  // TESTS: concrete classes
  // ===========================================================================

  describe('severity', () => {
    it('ConfigError is fatal', () => {
      assert.strictEqual(new ConfigError('m', 'ERR_CONFIG_INVALID').severity, 'fatal');
    });

    it('InputError is error', () => {
      assert.strictEqual(new InputError('m', 'ERR_INPUT_NOT_JSON').severity, 'error');
    });

    it('TreeShapeError is fatal', () => {
      assert.strictEqual(new TreeShapeError('m', 'ERR_MISSING_CHILD').severity, 'fatal');
    });

    it('CountInvariantError is fatal', () => {
      assert.strictEqual(new CountInvariantError('m', 'ERR_NEGATIVE_COUNT').severity, 'fatal');
    });
  });

  describe('context and suggestion', () => {
    it('defaults to an empty context and no suggestion', () => {
      const error = new TreeShapeError('Missing body', 'ERR_MISSING_CHILD');
      assert.deepStrictEqual(error.context, {});
      assert.strictEqual(error.suggestion, undefined);
    });

    it('keeps the given context and suggestion', () => {
      const error = new CountInvariantError(
        'Loop at index 3 completed 4 times but was entered 2 times',
        'ERR_COMPLETION_EXCEEDS_ENTRY',
        { nodeIndex: toNodeIndex(3), nodeKind: 'Loop', entry: 2, completion: 4 },
        'Counters do not match the tree they were recorded against',
      );
      assert.strictEqual(error.code, 'ERR_COMPLETION_EXCEEDS_ENTRY');
      assert.strictEqual(error.context.nodeKind, 'Loop');
      assert.strictEqual(error.context.completion, 4);
      assert.strictEqual(error.suggestion, 'Counters do not match the tree they were recorded against');
    });
  });

  // ===========================================================================
  // TESTS: toJSON
  // ===========================================================================

  describe('toJSON', () => {
    it('returns code, severity, message, context and suggestion', () => {
      const error = new ConfigError(
        'Config error: demote must be a boolean, got string',
        'ERR_CONFIG_OPTION',
        { filePath: '.forkcov/config.yaml', option: 'demote' },
        'Use true or false',
      );
      assert.deepStrictEqual(error.toJSON(), {
        code: 'ERR_CONFIG_OPTION',
        severity: 'fatal',
        message: 'Config error: demote must be a boolean, got string',
        context: { filePath: '.forkcov/config.yaml', option: 'demote' },
        suggestion: 'Use true or false',
      });
    });

    it('serializes through JSON.stringify', () => {
      const error = new InputError('Counter "t" is -1', 'ERR_COUNTER_INVALID', { tracker: 't' });
      assert.deepStrictEqual(JSON.parse(JSON.stringify(error)), {
        code: 'ERR_COUNTER_INVALID',
        severity: 'error',
        message: 'Counter "t" is -1',
        context: { tracker: 't' },
      });
    });
  });
});
