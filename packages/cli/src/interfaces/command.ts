/**
 * Standard Command Interface for the tasksync CLI
 *
 * Every command implements this interface so that registration, execution
 * and output formatting stay consistent and commands can be tested with a
 * mocked DependencyInjectionService.
 */

import { Command } from 'commander';

/**
 * Base options that all commands should support
 */
export interface BaseCommandOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Command registration interface for Commander.js integration
 */
export interface ICommand {
  /**
   * Register the command with Commander.js program
   * @param program - The Commander.js program instance
   */
  register(program: Command): void;
}

/**
 * Executable command interface
 */
export interface IExecutableCommand<TOptions extends BaseCommandOptions = BaseCommandOptions> {
  execute(options: TOptions): Promise<void>;
}

/**
 * Sub-command handler interface for commands with multiple actions
 */
export interface ISubCommandHandler<TOptions extends BaseCommandOptions = BaseCommandOptions> {
  /**
   * Execute a named sub-command
   * @param subcommand - The sub-command name, e.g. "status"
   */
  executeSubCommand(subcommand: string, options: TOptions): Promise<void>;
}

/**
 * Complete command interface combining all capabilities
 */
export interface ICompleteCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  extends ICommand, IExecutableCommand<TOptions>, ISubCommandHandler<TOptions> { }
