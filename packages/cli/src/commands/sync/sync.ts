import { Command } from 'commander';
import type { BaseCommandOptions } from '../../interfaces/command';
import { SyncCommand } from './sync-command';
import type { SyncInitOptions, SyncRunOptions } from './sync-command';

/**
 * Register sync commands
 *
 * `tasksync sync` itself pulls, commits and pushes; the subcommands set up
 * and inspect the sync branch. Output flags (--json, --quiet, --verbose)
 * are global and read through optsWithGlobals().
 */
export function registerSyncCommands(program: Command): void {
  const syncCommand = new SyncCommand();

  const syncCmd = program
    .command('sync')
    .description('Share tasks and ID counters through a dedicated git branch')
    .option('-m, --message <text>', 'Commit message for the tasks snapshot')
    .option('--pull', 'Fetch and merge remote tasks before committing')
    .option('--push', 'Push the sync branch after committing')
    .action(async (_options: SyncRunOptions, command: Command) => {
      await syncCommand.executeSync(command.optsWithGlobals<SyncRunOptions>());
    });

  syncCmd
    .command('init')
    .description('Create the sync branch and seed ID counters from local tasks')
    .option('--branch <name>', 'Sync branch name (saved to .tasksync/config.json)')
    .action(async (_options: SyncInitOptions, command: Command) => {
      await syncCommand.executeInit(command.optsWithGlobals<SyncInitOptions>());
    });

  syncCmd
    .command('status')
    .description('Compare the local sync branch with the last fetched remote state')
    .action(async (_options: BaseCommandOptions, command: Command) => {
      await syncCommand.executeSubCommand('status', command.optsWithGlobals<BaseCommandOptions>());
    });

  syncCmd
    .command('counters')
    .description('Show the next spec and standalone task numbers')
    .action(async (_options: BaseCommandOptions, command: Command) => {
      await syncCommand.executeSubCommand('counters', command.optsWithGlobals<BaseCommandOptions>());
    });

  syncCmd
    .command('verify-counters')
    .description('Check local task IDs against the remote counters before pushing')
    .action(async (_options: BaseCommandOptions, command: Command) => {
      await syncCommand.executeSubCommand('verify-counters', command.optsWithGlobals<BaseCommandOptions>());
    });
}
