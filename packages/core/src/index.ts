/**
 * @forkcov/core - Branch coverage derivation engine
 */

// Error types
export {
  ForkcovError,
  ConfigError,
  InputError,
  TreeShapeError,
  CountInvariantError,
} from './errors/ForkcovError.js';
export type { ErrorContext, ErrorSeverity, ForkcovErrorJSON } from './errors/ForkcovError.js';

// Logging
export {
  ConsoleLogger,
  FileLogger,
  MultiLogger,
  createLogger,
  parseLogLevel,
  silentLogger,
  LOG_LEVELS,
} from './logging/Logger.js';
export type { Logger, LogLevel } from './logging/Logger.js';

// Config
export { loadConfig, DEFAULT_CONFIG, validateConfig, validateVersion, parseReportFormat } from './config/index.js';
export type { ForkcovConfig } from './config/index.js';

// Version
export { FORKCOV_VERSION, getSchemaVersion } from './version.js';

// Decorated tree
export { DecoratedTree, childrenInFlowOrder, assertNever } from './tree/DecoratedTree.js';
export { SourceText } from './tree/SourceText.js';
export { buildDecoratedTree } from './tree/TreeBuilder.js';
export type { BuildTreeOptions } from './tree/TreeBuilder.js';
export { loadTreeDocument, loadDecoratedTree } from './tree/loadTree.js';

// Counters
export { MapCounterStore, counterStoreFromRecord, loadCounterStore } from './counters/CounterStore.js';

// Flow counts
export { FlowCountModel } from './flow/FlowCountModel.js';

// Locations
export {
  createTraversalContext,
  describe,
  resolveBranchLocation,
  startOf,
  afterToken,
  skipToContentStart,
  spanning,
} from './location/LocationResolver.js';
export type { TraversalContext, EnclosingConstruct } from './location/LocationResolver.js';

// Branch report
export { buildBranchReport, deriveBranchRecord } from './report/BranchReportBuilder.js';
export type { RuleContext } from './report/rules/RuleContext.js';
export { extendedElsifRange, rootConditional, deepestElsif } from './report/rules/conditional.js';

// Demotion
export { computeRawRuns, applyCoverageDemotion, subBranches, isCovered } from './demotion/CoverageDemotion.js';
export type { SubBranch } from './demotion/CoverageDemotion.js';

// Pipeline
export { analyzeBranchCoverage, summarize } from './analyze.js';
export type { AnalyzeOptions } from './analyze.js';

// Formatting
export {
  formatReferenceReport,
  toJsonReport,
  formatSummary,
  toTuple,
  REPORT_FORMATS,
} from './format/ReportFormatter.js';
export type { ReportFormat, JsonBranchRecord } from './format/ReportFormatter.js';
