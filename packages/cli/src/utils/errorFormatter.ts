/**
 * Standardized error formatting for CLI commands
 *
 * Provides consistent error messages across all CLI commands.
 * Format:
 *   ✗ Main error message (1 line, concise)
 *
 *   → Next action 1
 *   → Next action 2
 */

import { ForkcovError } from '@forkcov/core';

/**
 * Print a standardized error message and exit.
 *
 * @param title - Main error message (should be under 80 chars)
 * @param nextSteps - Optional array of actionable suggestions
 * @returns never - always calls process.exit(1)
 *
 * @example
 * exitWithError('Cannot read counters.json', [
 *   'Check that the file exists and is readable'
 * ]);
 */
export function exitWithError(title: string, nextSteps?: string[]): never {
  console.error(`✗ ${title}`);

  if (nextSteps && nextSteps.length > 0) {
    console.error('');
    for (const step of nextSteps) {
      console.error(`→ ${step}`);
    }
  }

  process.exit(1);
}

/**
 * Title and next steps for an error thrown by a command.
 */
export function describeError(error: unknown): { title: string; nextSteps: string[] } {
  if (error instanceof ForkcovError) {
    const nextSteps: string[] = [];
    if (error.suggestion) nextSteps.push(error.suggestion);
    if (error.context.path) nextSteps.push(`Document path: ${error.context.path}`);
    if (error.context.filePath) nextSteps.push(`File: ${error.context.filePath}`);
    return { title: `${error.message} (${error.code})`, nextSteps };
  }
  return {
    title: error instanceof Error ? error.message : String(error),
    nextSteps: ['Run with --log-level debug for details'],
  };
}
