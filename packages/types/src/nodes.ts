/**
 * Decorated AST node types
 *
 * Nodes live in a flat arena (DecoratedTree) and refer to each other through
 * NodeIndex values. Every kind is a member of the closed DecoratedNode union,
 * so a `switch (node.kind)` with a `never` default is checked for
 * exhaustiveness by the compiler.
 */

import type { NodeIndex, TrackerId } from './branded.js';

// === SOURCE POSITIONS ===

/** 1-based line, 0-based column (reference report coordinates) */
export interface Position {
  readonly line: number;
  readonly column: number;
}

export interface SourceRange {
  readonly start: Position;
  readonly end: Position;
}

/**
 * Keyword locations a node may carry besides its own range.
 *
 * - begin: `then` of a conditional or dispatch arm
 * - else: `else` (or `elsif`) keyword
 * - end: closing `end` keyword
 * - keyword: the introducing keyword (`when`, `if`, ...)
 */
export type KeywordLocKey = 'begin' | 'else' | 'end' | 'keyword';

export type KeywordLocs = Readonly<Partial<Record<KeywordLocKey, SourceRange>>>;

// === NODE KINDS ===

export const NODE_KIND = {
  ROOT: 'Root',
  SEQUENCE: 'Sequence',
  EXPRESSION: 'Expression',
  INTERRUPT: 'Interrupt',
  EMPTY_BODY: 'EmptyBody',
  CONDITIONAL: 'Conditional',
  DISPATCH: 'Dispatch',
  DISPATCH_ARM: 'DispatchArm',
  SHORT_CIRCUIT: 'ShortCircuit',
  SAFE_NAVIGATION_CALL: 'SafeNavigationCall',
  LOOP: 'Loop',
  TRY_HANDLER: 'TryHandler',
  HANDLER_ARM: 'HandlerArm',
  ELSE_CLAUSE: 'ElseClause',
  FINALLY_BLOCK: 'FinallyBlock',
} as const;

export type NodeKind = typeof NODE_KIND[keyof typeof NODE_KIND];

// === BASE SHAPES ===

interface NodeBase {
  readonly index: NodeIndex;
  /** null only for the Root node */
  readonly parent: NodeIndex | null;
  readonly loc: KeywordLocs;
}

interface RangedNode extends NodeBase {
  readonly range: SourceRange;
}

// === GENERIC KINDS ===

/** Compilation unit. `entered` counts how many times the unit was loaded. */
export interface RootNode extends RangedNode {
  readonly kind: 'Root';
  readonly body: NodeIndex | null;
  readonly trackers: { readonly entered: TrackerId };
}

/** Statements executed one after another (`begin ... end`, method bodies) */
export interface SequenceNode extends RangedNode {
  readonly kind: 'Sequence';
  readonly statements: readonly NodeIndex[];
}

/**
 * Any expression that is not a control-flow construct. Calls that may raise
 * carry a `completion` tracker; otherwise completion follows the last child.
 */
export interface ExpressionNode extends RangedNode {
  readonly kind: 'Expression';
  readonly label: string;
  readonly children: readonly NodeIndex[];
  readonly trackers: { readonly completion?: TrackerId };
}

/** raise / return / break / next: evaluates its children, never falls through */
export interface InterruptNode extends RangedNode {
  readonly kind: 'Interrupt';
  readonly label: string;
  readonly children: readonly NodeIndex[];
}

/**
 * Placeholder for a branch with no content.
 * `range` is set when the clause is written but empty (`else` with nothing
 * after it), and null when there is no syntax for it at all.
 */
export interface EmptyBodyNode extends NodeBase {
  readonly kind: 'EmptyBody';
  readonly range: SourceRange | null;
}

// === BRANCHING KINDS ===

export type ConditionalStyle = 'if' | 'unless' | 'elsif' | 'ternary';

/**
 * if / unless / elsif / ternary, including modifier forms.
 *
 * Slots are named by what runs, not by surface order: for `unless c; a; end`
 * `whenFalsy` is `a`.
 */
export interface ConditionalNode extends RangedNode {
  readonly kind: 'Conditional';
  readonly style: ConditionalStyle;
  readonly condition: NodeIndex;
  readonly whenTruthy: NodeIndex;
  readonly whenFalsy: NodeIndex;
  readonly trackers: { readonly truthy: TrackerId };
}

/** case / when. `elseBranch` is an EmptyBody when no else was written. */
export interface DispatchNode extends RangedNode {
  readonly kind: 'Dispatch';
  readonly subject: NodeIndex | null;
  readonly arms: readonly NodeIndex[];
  readonly elseBranch: NodeIndex;
  readonly trackers: { readonly else: TrackerId };
}

export interface DispatchArmNode extends RangedNode {
  readonly kind: 'DispatchArm';
  readonly patterns: readonly NodeIndex[];
  readonly body: NodeIndex;
  readonly trackers: { readonly body: TrackerId };
}

export type ShortCircuitOperator = '&&' | '||';

export interface ShortCircuitNode extends RangedNode {
  readonly kind: 'ShortCircuit';
  readonly operator: ShortCircuitOperator;
  readonly left: NodeIndex;
  readonly right: NodeIndex;
  /** `right` counts evaluations of the right operand */
  readonly trackers: { readonly right: TrackerId };
}

/** `receiver&.method(arguments)` */
export interface SafeNavigationCallNode extends RangedNode {
  readonly kind: 'SafeNavigationCall';
  readonly method: string;
  readonly receiver: NodeIndex;
  readonly arguments: readonly NodeIndex[];
  readonly trackers: {
    /** receiver was non-nil, call made */
    readonly call: TrackerId;
    /** receiver was nil, call skipped */
    readonly skip: TrackerId;
    /** call returned normally */
    readonly completion?: TrackerId;
  };
}

export type LoopPolarity = 'while' | 'until';

/** pre: condition checked before the body; post: `begin ... end while c` */
export type LoopTest = 'pre' | 'post';

export interface LoopNode extends RangedNode {
  readonly kind: 'Loop';
  readonly polarity: LoopPolarity;
  readonly test: LoopTest;
  readonly condition: NodeIndex;
  readonly body: NodeIndex;
  readonly trackers: {
    readonly body: TrackerId;
    /** loop finished normally, `break` included */
    readonly completion?: TrackerId;
  };
}

// === EXCEPTION HANDLING ===

/** begin / rescue / else */
export interface TryHandlerNode extends RangedNode {
  readonly kind: 'TryHandler';
  readonly protectedBody: NodeIndex | null;
  readonly arms: readonly NodeIndex[];
  readonly elseClause: NodeIndex | null;
}

/** One `rescue` arm */
export interface HandlerArmNode extends RangedNode {
  readonly kind: 'HandlerArm';
  readonly exceptions: NodeIndex | null;
  readonly assignment: NodeIndex | null;
  readonly body: NodeIndex | null;
  readonly trackers: { readonly enteredBody: TrackerId };
}

export interface ElseClauseNode extends RangedNode {
  readonly kind: 'ElseClause';
  readonly body: NodeIndex | null;
}

/** begin / ensure */
export interface FinallyBlockNode extends RangedNode {
  readonly kind: 'FinallyBlock';
  readonly body: NodeIndex | null;
  readonly finallyBody: NodeIndex | null;
}

// === UNION ===

export type DecoratedNode =
  | RootNode
  | SequenceNode
  | ExpressionNode
  | InterruptNode
  | EmptyBodyNode
  | ConditionalNode
  | DispatchNode
  | DispatchArmNode
  | ShortCircuitNode
  | SafeNavigationCallNode
  | LoopNode
  | TryHandlerNode
  | HandlerArmNode
  | ElseClauseNode
  | FinallyBlockNode;

export type NodeOfKind<K extends NodeKind> = Extract<DecoratedNode, { kind: K }>;

/** Kinds whose sub-branches take part in coverage demotion */
export type BranchingNode =
  | ConditionalNode
  | DispatchNode
  | ShortCircuitNode
  | SafeNavigationCallNode;

/**
 * Type guard narrowing a node to one kind.
 */
export function isNodeKind<K extends NodeKind>(node: DecoratedNode, kind: K): node is NodeOfKind<K> {
  return node.kind === kind;
}
