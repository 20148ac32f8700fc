#!/usr/bin/env node
/**
 * @forkcov/cli - CLI for the forkcov branch coverage engine
 */

import { Command } from 'commander';
import { FORKCOV_VERSION } from '@forkcov/core';
import { reportCommand } from './commands/report.js';

const program = new Command();

program
  .name('forkcov')
  .description('Branch coverage reports from decorated trees and hit counters')
  .version(FORKCOV_VERSION);

program.addCommand(reportCommand);

await program.parseAsync();
