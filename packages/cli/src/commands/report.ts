/**
 * Report command - derive the branch coverage report for one tree
 *
 *   forkcov report tree.json --counters counters.json --format summary
 *
 * The report goes to stdout; logs go to stderr (and --log-file).
 */

import { Command } from 'commander';
import { resolve } from 'path';
import {
  ConfigError,
  ConsoleLogger,
  MultiLogger,
  analyzeBranchCoverage,
  createLogger,
  formatReferenceReport,
  formatSummary,
  loadConfig,
  loadCounterStore,
  loadDecoratedTree,
  parseLogLevel,
  parseReportFormat,
  toJsonReport,
  type LogLevel,
  type ReportFormat,
} from '@forkcov/core';
import type { BranchCoverageResult } from '@forkcov/types';
import { describeError, exitWithError } from '../utils/errorFormatter.js';

export interface ReportOptions {
  counters: string;
  format?: string;
  /** false only when --no-demote was given */
  demote?: boolean;
  project?: string;
  logLevel?: string;
  logFile?: string;
}

export function renderReport(result: BranchCoverageResult, format: ReportFormat): string {
  switch (format) {
    case 'reference':
      return formatReferenceReport(result.records);
    case 'json':
      return JSON.stringify(toJsonReport(result.records), null, 2);
    case 'summary':
      return formatSummary(result.summary);
  }
}

function cliLogLevel(value: string | undefined): LogLevel | null {
  if (value === undefined) return null;
  const level = parseLogLevel(value);
  if (level === null) {
    throw new ConfigError(
      `Unknown log level "${value}"`,
      'ERR_CONFIG_OPTION',
      { option: 'log-level' },
      'Use one of: silent, errors, warnings, info, debug',
    );
  }
  return level;
}

/**
 * Load inputs, analyze and render. Returns the report text.
 */
export async function runReport(treePath: string, options: ReportOptions): Promise<string> {
  const projectPath = resolve(options.project ?? '.');
  const requestedLevel = cliLogLevel(options.logLevel);

  const config = loadConfig(projectPath, new ConsoleLogger(requestedLevel ?? 'warnings'));
  const logger = createLogger(requestedLevel ?? config.logLevel, { logFile: options.logFile });

  try {
    const format = options.format === undefined ? config.format : parseReportFormat(options.format);
    const demote = options.demote === false ? false : config.demote;

    logger.debug('Loading inputs', { tree: treePath, counters: options.counters });
    const tree = loadDecoratedTree(resolve(treePath), logger);
    const counters = loadCounterStore(resolve(options.counters));
    logger.debug('Counters loaded', { trackers: counters.size });

    const result = analyzeBranchCoverage(tree, counters, { demote, logger });
    return renderReport(result, format);
  } finally {
    if (logger instanceof MultiLogger) {
      await logger.close();
    }
  }
}

export const reportCommand = new Command('report')
  .description('Derive the branch coverage report of a decorated tree')
  .argument('<tree>', 'Decorated tree document (JSON)')
  .requiredOption('-c, --counters <file>', 'Counter file written by the instrumented run (JSON)')
  .option('-f, --format <format>', 'Output format: reference, json, summary')
  .option('--no-demote', 'Report raw node runs without coverage demotion')
  .option('-p, --project <path>', 'Project path (where .forkcov/ is located)', '.')
  .option('-l, --log-level <level>', 'Log level: silent, errors, warnings, info, debug')
  .option('--log-file <path>', 'Also write debug logs to this file')
  .action(async (tree: string, options: ReportOptions) => {
    try {
      console.log(await runReport(tree, options));
    } catch (err) {
      const { title, nextSteps } = describeError(err);
      exitWithError(title, nextSteps);
    }
  });
