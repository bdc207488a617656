#!/usr/bin/env node

import { Command } from 'commander';
import { Logger } from '@tasksync/core';
import { registerSyncCommands } from './commands/sync/sync';
import type { BaseCommandOptions } from './interfaces/command';

const program = new Command();

program
  .name('tasksync')
  .description('tasksync CLI - share a task list and ID counters through git')
  .version('1.0.0')
  .option('--json', 'Output machine-readable JSON')
  .option('--quiet', 'Suppress output except errors')
  .option('--verbose', 'Show debug logs and extra details');

// Output flags drive the core loggers for every command
program.hook('preAction', (_thisCommand, actionCommand) => {
  const options = actionCommand.optsWithGlobals<BaseCommandOptions>();
  if (options.json || options.quiet) {
    Logger.setLogLevel('error');
  } else if (options.verbose) {
    Logger.setLogLevel('debug');
  }
});

registerSyncCommands(program);

program.parseAsync().catch((error: unknown) => {
  console.error('❌ Fatal error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
