#!/usr/bin/env node

/**
 * scenario-runner CLI entry point.
 * Thin wrapper: commands delegate to the runner.
 */

import { Command } from 'commander';

import { registerListCommand, registerRunCommand } from './run.js';

const program = new Command();

program
  .name('scenario-runner')
  .description('Run JSON browser scenarios for a list of accounts, with an optional step debugger.')
  .version('0.1.0');

registerRunCommand(program);
registerListCommand(program);

await program.parseAsync();
