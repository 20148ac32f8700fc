/**
 * analyzeBranchCoverage - one read-only pass over a tree and its counters
 */

import type {
  BranchCoverageResult,
  BranchCoverageSummary,
  BranchRecord,
  ConditionTag,
  CounterStore,
  NodeIndex,
} from '@forkcov/types';
import { applyCoverageDemotion, computeRawRuns, isCovered } from './demotion/CoverageDemotion.js';
import { FlowCountModel } from './flow/FlowCountModel.js';
import { silentLogger, type Logger } from './logging/Logger.js';
import { buildBranchReport } from './report/BranchReportBuilder.js';
import type { DecoratedTree } from './tree/DecoratedTree.js';

export interface AnalyzeOptions {
  /** Apply coverage demotion to node runs (default: true) */
  demote?: boolean;
  logger?: Logger;
}

const LOOP_TAGS: ReadonlySet<ConditionTag> = new Set<ConditionTag>(['while', 'until']);

export function summarize(
  records: readonly BranchRecord[],
  nodeRuns: ReadonlyMap<NodeIndex, number>,
): BranchCoverageSummary {
  let branches = 0;
  let coveredBranches = 0;
  let coveredConstructs = 0;

  for (const record of records) {
    branches += record.branches.length;
    coveredBranches += record.branches.filter(branch => isCovered(branch.count)).length;
    const covered = LOOP_TAGS.has(record.condition.tag)
      ? record.branches.every(branch => isCovered(branch.count))
      : isCovered(nodeRuns.get(record.node) ?? 0);
    if (covered) coveredConstructs++;
  }

  return { constructs: records.length, branches, coveredBranches, coveredConstructs };
}

export function analyzeBranchCoverage(
  tree: DecoratedTree,
  counters: CounterStore,
  options: AnalyzeOptions = {},
): BranchCoverageResult {
  const logger = options.logger ?? silentLogger;
  const model = new FlowCountModel(tree, counters);
  model.precompute();

  const records = buildBranchReport(model);
  logger.debug('Branch records derived', { records: records.length, nodes: tree.size });

  const rawRuns = computeRawRuns(model);
  const nodeRuns = options.demote === false ? new Map(rawRuns) : applyCoverageDemotion(model, rawRuns);
  if (options.demote === false) {
    logger.debug('Coverage demotion disabled');
  }

  const summary = summarize(records, nodeRuns);
  logger.info('Branch coverage analyzed', { ...summary });
  return { records, rawRuns, nodeRuns, summary };
}
