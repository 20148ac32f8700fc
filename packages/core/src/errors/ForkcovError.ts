/**
 * ForkcovError - Error hierarchy for forkcov
 *
 * All errors extend the native JavaScript Error class so callers can keep
 * using `instanceof Error` and `catch (e)` without knowing the hierarchy.
 *
 * Error types:
 * - ConfigError: configuration parsing/validation errors (fatal)
 * - InputError: unreadable or malformed input files (error)
 * - TreeShapeError: decorated tree violates a node kind's invariants (fatal)
 * - CountInvariantError: derived counts are negative or inconsistent (fatal)
 *
 * Data gaps are not errors: missing counters read as 0 and unknown node
 * kinds are loaded as generic expressions.
 */

import type { NodeIndex, NodeKind } from '@forkcov/types';

export type ErrorSeverity = 'fatal' | 'error' | 'warning';

/**
 * Context for error reporting
 */
export interface ErrorContext {
  filePath?: string;
  /** JSON path inside a tree document, e.g. `root.body.statements[2]` */
  path?: string;
  nodeIndex?: NodeIndex;
  nodeKind?: NodeKind;
  [key: string]: unknown;
}

/**
 * JSON representation of ForkcovError
 */
export interface ForkcovErrorJSON {
  code: string;
  severity: ErrorSeverity;
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

/**
 * Abstract base class for all forkcov errors.
 */
export abstract class ForkcovError extends Error {
  abstract readonly code: string;
  abstract readonly severity: ErrorSeverity;
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.suggestion = suggestion;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): ForkcovErrorJSON {
    return {
      code: this.code,
      severity: this.severity,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

/**
 * Configuration error - config.yaml/config.json parsing, bad option values
 *
 * Severity: fatal (always)
 * Codes: ERR_CONFIG_INVALID, ERR_CONFIG_OPTION
 */
export class ConfigError extends ForkcovError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Input error - tree document or counter file missing, unreadable, not JSON,
 * or holding counter values that are not non-negative integers
 *
 * Severity: error (always)
 * Codes: ERR_INPUT_UNREADABLE, ERR_INPUT_NOT_JSON, ERR_COUNTER_INVALID
 */
export class InputError extends ForkcovError {
  readonly code: string;
  readonly severity = 'error' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Tree shape error - the decorated tree breaks an invariant its node kinds
 * guarantee. Points at a defect in whatever built the tree.
 *
 * Severity: fatal (always)
 * Codes: ERR_TREE_SHAPE, ERR_MISSING_CHILD, ERR_UNEXPECTED_KIND,
 *        ERR_EMPTY_CLAUSE_UNLOCATABLE, ERR_POSITION_OUT_OF_SOURCE
 */
export class TreeShapeError extends ForkcovError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Count invariant error - a derived count came out negative, or a node
 * completed more often than it was entered. Points at a defect in the
 * instrumentation or the counter store.
 *
 * Severity: fatal (always)
 * Codes: ERR_NEGATIVE_COUNT, ERR_COMPLETION_EXCEEDS_ENTRY
 */
export class CountInvariantError extends ForkcovError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}
