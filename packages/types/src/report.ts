/**
 * Branch report types
 *
 * Shape of the reference runtime's branch coverage output:
 *
 *   { [conditionTag, id, startLine, startCol, endLine, endCol] =>
 *       { [branchTag, id, startLine, startCol, endLine, endCol] => count } }
 *
 * Both levels are insertion-ordered; the order is part of the format.
 */

import type { NodeIndex } from './branded.js';
import type { ShortCircuitOperator } from './nodes.js';

// === TAGS ===

/** Keys of the outer mapping */
export type ConditionTag = 'if' | 'unless' | 'case' | 'while' | 'until' | '&.' | ShortCircuitOperator;

/** Keys of the inner mapping */
export type BranchTag = 'then' | 'else' | 'when' | 'body';

export type DescriptorTag = ConditionTag | BranchTag;

// === DESCRIPTORS ===

export interface BranchDescriptor<T extends DescriptorTag = DescriptorTag> {
  readonly tag: T;
  /** Per-pass counter, assigned in visit order */
  readonly locationId: number;
  readonly startLine: number;
  readonly startColumn: number;
  readonly endLine: number;
  readonly endColumn: number;
}

/** `(kindTag, locationId, startLine, startColumn, endLine, endColumn)` */
export type DescriptorTuple = readonly [DescriptorTag, number, number, number, number, number];

export interface BranchEntry {
  readonly descriptor: BranchDescriptor<BranchTag>;
  readonly count: number;
}

export interface BranchRecord {
  /** Node the record was derived from */
  readonly node: NodeIndex;
  readonly condition: BranchDescriptor<ConditionTag>;
  readonly branches: readonly BranchEntry[];
}

// === ANALYSIS RESULT ===

export interface BranchCoverageSummary {
  /** Number of condition descriptors */
  readonly constructs: number;
  /** Number of branch descriptors */
  readonly branches: number;
  /** Branch descriptors with a non-zero count */
  readonly coveredBranches: number;
  /**
   * Constructs whose node runs are non-zero. Loops, which are never demoted,
   * count only when their body ran.
   */
  readonly coveredConstructs: number;
}

export interface BranchCoverageResult {
  readonly records: readonly BranchRecord[];
  /** executionCount of every node */
  readonly rawRuns: ReadonlyMap<NodeIndex, number>;
  /** rawRuns after coverage demotion */
  readonly nodeRuns: ReadonlyMap<NodeIndex, number>;
  readonly summary: BranchCoverageSummary;
}
