/**
 * TreeBuilder - turns a JSON tree document into a DecoratedTree.
 *
 * Document format:
 *
 * ```json
 * {
 *   "source": "if x then a end\n",
 *   "root": {
 *     "kind": "Root", "range": [1, 0, 1, 15], "trackers": { "entered": "t0" },
 *     "body": {
 *       "kind": "Conditional", "style": "if", "range": [1, 0, 1, 15],
 *       "loc": { "begin": [1, 5, 1, 9], "end": [1, 12, 1, 15] },
 *       "trackers": { "truthy": "t1" },
 *       "condition": { "kind": "Expression", "range": [1, 3, 1, 4] },
 *       "whenTruthy": { "kind": "Expression", "range": [1, 10, 1, 11] }
 *     }
 *   }
 * }
 * ```
 *
 * Ranges are `[startLine, startColumn, endLine, endColumn]`. `source` is
 * optional; without it empty-clause markers are placed right at the end of
 * the keyword instead of after the following whitespace.
 *
 * Absent branches of Conditional and Dispatch become EmptyBody nodes without
 * a range. An absent DispatchArm body becomes an EmptyBody spanning the arm,
 * since the arm's keyword is always written. Unknown kinds load as generic
 * Expression nodes and never produce report records.
 */

import type {
  ConditionalStyle,
  DecoratedNode,
  KeywordLocKey,
  KeywordLocs,
  LoopPolarity,
  LoopTest,
  NodeIndex,
  NodeKind,
  ShortCircuitOperator,
  SourceRange,
  TrackerId,
} from '@forkcov/types';
import { NODE_KIND, toNodeIndex, toTrackerId } from '@forkcov/types';
import { TreeShapeError } from '../errors/ForkcovError.js';
import { silentLogger, type Logger } from '../logging/Logger.js';
import { DecoratedTree } from './DecoratedTree.js';
import { SourceText } from './SourceText.js';

type JsonObject = { readonly [key: string]: unknown };

const KNOWN_KINDS: readonly NodeKind[] = Object.values(NODE_KIND);
const LOC_KEYS: readonly KeywordLocKey[] = ['begin', 'else', 'end', 'keyword'];
const CONDITIONAL_STYLES: readonly ConditionalStyle[] = ['if', 'unless', 'elsif', 'ternary'];
const OPERATORS: readonly ShortCircuitOperator[] = ['&&', '||'];
const POLARITIES: readonly LoopPolarity[] = ['while', 'until'];
const LOOP_TESTS: readonly LoopTest[] = ['pre', 'post'];

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function shapeError(message: string, path: string, code = 'ERR_TREE_SHAPE'): TreeShapeError {
  return new TreeShapeError(`${message} at ${path}`, code, { path });
}

function readEnum<T extends string>(value: unknown, allowed: readonly T[], path: string): T {
  const match = allowed.find(candidate => candidate === value);
  if (match === undefined) {
    throw shapeError(`Expected one of ${allowed.join(', ')}, got ${JSON.stringify(value)}`, path);
  }
  return match;
}

function readRange(value: unknown, path: string): SourceRange {
  if (
    !Array.isArray(value) ||
    value.length !== 4 ||
    !value.every((part: unknown) => typeof part === 'number' && Number.isInteger(part) && part >= 0)
  ) {
    throw shapeError('Range must be [startLine, startColumn, endLine, endColumn] of non-negative integers', path);
  }
  const [startLine, startColumn, endLine, endColumn] = value.map(Number);
  if (startLine < 1 || endLine < startLine || (endLine === startLine && endColumn < startColumn)) {
    throw shapeError(`Range ${JSON.stringify(value)} is not a forward range of 1-based lines`, path);
  }
  return {
    start: { line: startLine, column: startColumn },
    end: { line: endLine, column: endColumn },
  };
}

function readLocs(doc: JsonObject, path: string): KeywordLocs {
  const raw = doc.loc;
  if (raw === undefined || raw === null) return {};
  if (!isObject(raw)) {
    throw shapeError('loc must be an object of ranges', `${path}.loc`);
  }
  const locs: Partial<Record<KeywordLocKey, SourceRange>> = {};
  for (const [key, value] of Object.entries(raw)) {
    const locKey = readEnum(key, LOC_KEYS, `${path}.loc`);
    locs[locKey] = readRange(value, `${path}.loc.${key}`);
  }
  return locs;
}

function readString(doc: JsonObject, key: string, path: string, fallback: string): string {
  const value = doc[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'string') {
    throw shapeError(`${key} must be a string`, `${path}.${key}`);
  }
  return value;
}

function trackerTable(doc: JsonObject, path: string): JsonObject {
  const raw = doc.trackers;
  if (raw === undefined || raw === null) return {};
  if (!isObject(raw)) {
    throw shapeError('trackers must be an object of tracker ids', `${path}.trackers`);
  }
  return raw;
}

function readOptionalTracker(doc: JsonObject, name: string, path: string): TrackerId | undefined {
  const value = trackerTable(doc, path)[name];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string' || value.length === 0) {
    throw shapeError(`Tracker ${name} must be a non-empty string`, `${path}.trackers.${name}`);
  }
  return toTrackerId(value);
}

function readTracker(doc: JsonObject, name: string, path: string): TrackerId {
  const tracker = readOptionalTracker(doc, name, path);
  if (tracker === undefined) {
    throw shapeError(`Missing tracker ${name}`, `${path}.trackers`, 'ERR_MISSING_CHILD');
  }
  return tracker;
}

/**
 * Flattens nested node documents into pre-order arena slots.
 */
class ArenaWriter {
  private readonly slots: Array<DecoratedNode | undefined> = [];
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  finish(): DecoratedNode[] {
    return this.slots.map((node, i) => {
      if (!node) {
        throw new TreeShapeError(`Arena slot ${i} was never filled`, 'ERR_TREE_SHAPE');
      }
      return node;
    });
  }

  private reserve(): NodeIndex {
    this.slots.push(undefined);
    return toNodeIndex(this.slots.length - 1);
  }

  private emptyBody(parent: NodeIndex, range: SourceRange | null): NodeIndex {
    const index = this.reserve();
    this.slots[index] = { kind: 'EmptyBody', index, parent, range, loc: {} };
    return index;
  }

  private required(doc: JsonObject, key: string, path: string, parent: NodeIndex): NodeIndex {
    const value = doc[key];
    if (value === undefined || value === null) {
      throw shapeError(`Missing required child ${key}`, path, 'ERR_MISSING_CHILD');
    }
    return this.build(value, `${path}.${key}`, parent);
  }

  private optional(doc: JsonObject, key: string, path: string, parent: NodeIndex): NodeIndex | null {
    const value = doc[key];
    if (value === undefined || value === null) return null;
    return this.build(value, `${path}.${key}`, parent);
  }

  /** A branch slot: absent means "no syntax at all" */
  private branch(doc: JsonObject, key: string, path: string, parent: NodeIndex): NodeIndex {
    return this.optional(doc, key, path, parent) ?? this.emptyBody(parent, null);
  }

  private list(doc: JsonObject, key: string, path: string, parent: NodeIndex): NodeIndex[] {
    const value = doc[key];
    if (value === undefined || value === null) return [];
    if (!Array.isArray(value)) {
      throw shapeError(`${key} must be an array`, `${path}.${key}`);
    }
    return value.map((item: unknown, i) => this.build(item, `${path}.${key}[${i}]`, parent));
  }

  build(value: unknown, path: string, parent: NodeIndex | null): NodeIndex {
    if (!isObject(value)) {
      throw shapeError('Node must be an object', path);
    }
    if (typeof value.kind !== 'string') {
      throw shapeError('Node kind must be a string', `${path}.kind`);
    }

    const index = this.reserve();
    const loc = readLocs(value, path);
    const kind = KNOWN_KINDS.find(known => known === value.kind);

    if (kind === 'EmptyBody') {
      const range = value.range === undefined || value.range === null ? null : readRange(value.range, `${path}.range`);
      this.slots[index] = { kind, index, parent: this.parentOf(parent, path), range, loc };
      return index;
    }

    const range = readRange(value.range, `${path}.range`);

    if (kind === 'Root') {
      if (parent !== null) {
        throw shapeError('Root may only appear at the top of the document', path);
      }
      this.slots[index] = {
        kind,
        index,
        parent: null,
        range,
        loc,
        trackers: { entered: readTracker(value, 'entered', path) },
        body: this.optional(value, 'body', path, index),
      };
      return index;
    }

    const owner = this.parentOf(parent, path);

    switch (kind) {
      case 'Sequence':
        this.slots[index] = { kind, index, parent: owner, range, loc, statements: this.list(value, 'statements', path, index) };
        break;
      case 'Expression':
      case 'Interrupt': {
        const label = readString(value, 'label', path, kind === 'Expression' ? 'expression' : 'interrupt');
        const children = this.list(value, 'children', path, index);
        this.slots[index] = kind === 'Expression'
          ? { kind, index, parent: owner, range, loc, label, children, trackers: { completion: readOptionalTracker(value, 'completion', path) } }
          : { kind, index, parent: owner, range, loc, label, children };
        break;
      }
      case 'Conditional':
        this.slots[index] = {
          kind,
          index,
          parent: owner,
          range,
          loc,
          style: readEnum(value.style ?? 'if', CONDITIONAL_STYLES, `${path}.style`),
          trackers: { truthy: readTracker(value, 'truthy', path) },
          condition: this.required(value, 'condition', path, index),
          whenTruthy: this.branch(value, 'whenTruthy', path, index),
          whenFalsy: this.branch(value, 'whenFalsy', path, index),
        };
        break;
      case 'Dispatch':
        this.slots[index] = {
          kind,
          index,
          parent: owner,
          range,
          loc,
          trackers: { else: readTracker(value, 'else', path) },
          subject: this.optional(value, 'subject', path, index),
          arms: this.list(value, 'arms', path, index),
          elseBranch: this.branch(value, 'else', path, index),
        };
        break;
      case 'DispatchArm': {
        const patterns = this.list(value, 'patterns', path, index);
        this.slots[index] = {
          kind,
          index,
          parent: owner,
          range,
          loc,
          trackers: { body: readTracker(value, 'body', path) },
          patterns,
          body: this.optional(value, 'body', path, index) ?? this.emptyBody(index, range),
        };
        break;
      }
      case 'ShortCircuit':
        this.slots[index] = {
          kind,
          index,
          parent: owner,
          range,
          loc,
          operator: readEnum(value.operator, OPERATORS, `${path}.operator`),
          trackers: { right: readTracker(value, 'right', path) },
          left: this.required(value, 'left', path, index),
          right: this.required(value, 'right', path, index),
        };
        break;
      case 'SafeNavigationCall':
        this.slots[index] = {
          kind,
          index,
          parent: owner,
          range,
          loc,
          method: readString(value, 'method', path, 'call'),
          trackers: {
            call: readTracker(value, 'call', path),
            skip: readTracker(value, 'skip', path),
            completion: readOptionalTracker(value, 'completion', path),
          },
          receiver: this.required(value, 'receiver', path, index),
          arguments: this.list(value, 'arguments', path, index),
        };
        break;
      case 'Loop': {
        const test = readEnum(value.test ?? 'pre', LOOP_TESTS, `${path}.test`);
        const trackers = {
          body: readTracker(value, 'body', path),
          completion: readOptionalTracker(value, 'completion', path),
        };
        const polarity = readEnum(value.polarity ?? 'while', POLARITIES, `${path}.polarity`);
        // Pre-order slots follow flow order
        if (test === 'post') {
          const body = this.branch(value, 'body', path, index);
          const condition = this.required(value, 'condition', path, index);
          this.slots[index] = { kind, index, parent: owner, range, loc, polarity, test, trackers, condition, body };
        } else {
          const condition = this.required(value, 'condition', path, index);
          const body = this.branch(value, 'body', path, index);
          this.slots[index] = { kind, index, parent: owner, range, loc, polarity, test, trackers, condition, body };
        }
        break;
      }
      case 'TryHandler':
        this.slots[index] = {
          kind,
          index,
          parent: owner,
          range,
          loc,
          protectedBody: this.optional(value, 'protectedBody', path, index),
          arms: this.list(value, 'arms', path, index),
          elseClause: this.optional(value, 'else', path, index),
        };
        break;
      case 'HandlerArm':
        this.slots[index] = {
          kind,
          index,
          parent: owner,
          range,
          loc,
          trackers: { enteredBody: readTracker(value, 'enteredBody', path) },
          exceptions: this.optional(value, 'exceptions', path, index),
          assignment: this.optional(value, 'assignment', path, index),
          body: this.optional(value, 'body', path, index),
        };
        break;
      case 'ElseClause':
        this.slots[index] = { kind, index, parent: owner, range, loc, body: this.optional(value, 'body', path, index) };
        break;
      case 'FinallyBlock':
        this.slots[index] = {
          kind,
          index,
          parent: owner,
          range,
          loc,
          body: this.optional(value, 'body', path, index),
          finallyBody: this.optional(value, 'finally', path, index),
        };
        break;
      case undefined:
        this.logger.debug('Unknown node kind loaded as generic expression', { kind: value.kind, path });
        this.slots[index] = {
          kind: 'Expression',
          index,
          parent: owner,
          range,
          loc,
          label: value.kind,
          children: this.list(value, 'children', path, index),
          trackers: { completion: readOptionalTracker(value, 'completion', path) },
        };
        break;
    }

    this.checkSlotKinds(index, path);
    return index;
  }

  private parentOf(parent: NodeIndex | null, path: string): NodeIndex {
    if (parent === null) {
      throw shapeError('Document root must be a Root node', path);
    }
    return parent;
  }

  /** Container slots that only accept one kind */
  private checkSlotKinds(index: NodeIndex, path: string): void {
    const node = this.slots[index];
    if (!node) return;
    const expect = (children: readonly NodeIndex[], kind: NodeKind, slot: string): void => {
      for (const child of children) {
        const childKind = this.slots[child]?.kind;
        if (childKind !== kind) {
          throw shapeError(`${slot} must hold ${kind} nodes, found ${childKind ?? 'nothing'}`, `${path}.${slot}`, 'ERR_UNEXPECTED_KIND');
        }
      }
    };
    if (node.kind === 'Dispatch') expect(node.arms, 'DispatchArm', 'arms');
    if (node.kind === 'TryHandler') {
      expect(node.arms, 'HandlerArm', 'arms');
      expect(node.elseClause === null ? [] : [node.elseClause], 'ElseClause', 'else');
    }
  }
}

export interface BuildTreeOptions {
  logger?: Logger;
}

/**
 * Validate a parsed tree document and build its arena.
 */
export function buildDecoratedTree(document: unknown, options: BuildTreeOptions = {}): DecoratedTree {
  const logger = options.logger ?? silentLogger;
  if (!isObject(document)) {
    throw shapeError('Tree document must be an object', '$');
  }
  if (document.source !== undefined && document.source !== null && typeof document.source !== 'string') {
    throw shapeError('source must be a string', '$.source');
  }

  const writer = new ArenaWriter(logger);
  writer.build(document.root, '$.root', null);
  const nodes = writer.finish();

  const source = typeof document.source === 'string' ? new SourceText(document.source) : null;
  if (!source) {
    logger.debug('Tree document has no source text; empty-clause markers will not skip whitespace');
  }

  logger.debug('Decorated tree built', { nodes: nodes.length });
  return new DecoratedTree(nodes, source);
}
