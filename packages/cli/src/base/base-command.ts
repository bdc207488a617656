/**
 * Base Command Class for the tasksync CLI
 *
 * Provides common functionality and enforces standards across all commands.
 * Follows the Command Pattern and provides dependency injection support.
 */

import { Command } from 'commander';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, ICompleteCommand } from '../interfaces/command';

/** Handler run for one sub-command name */
export type SubCommandHandler<TOptions> = (options: TOptions) => Promise<void>;

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICompleteCommand<TOptions> {

  protected readonly dependencyService = DependencyInjectionService.getInstance();

  /**
   * Register the command with Commander.js
   * Must be implemented by each command
   */
  abstract register(program: Command): void;

  /**
   * Sub-commands this command routes to, keyed by name
   */
  protected subCommands(): Record<string, SubCommandHandler<TOptions>> {
    return {};
  }

  /**
   * Execute the main command action
   * Default implementation asks for a sub-command
   */
  async execute(options: TOptions): Promise<void> {
    this.handleError('No action specified. Use --help for available options.', options);
  }

  /**
   * Execute a sub-command by name through the subCommands() table
   */
  async executeSubCommand(subcommand: string, options: TOptions): Promise<void> {
    const handler = this.subCommands()[subcommand];

    if (!handler) {
      this.handleError(`Unknown sub-command: ${subcommand}`, options);
      return;
    }

    try {
      await handler(options);
    } catch (error) {
      this.handleError(
        `Failed to execute ${subcommand}: ${error instanceof Error ? error.message : String(error)}`,
        options,
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(message: string, options: TOptions, error?: Error, exitCode: number = 1): void {
    const isJson = options.json || false;
    const isVerbose = options.verbose || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: false,
        error: message,
        exitCode
      }, null, 2));
    } else {
      // Only add ❌ if message doesn't already have it
      const formattedMessage = message.startsWith('❌') ? message : `❌ ${message}`;
      console.error(formattedMessage);
      if (isVerbose && error) {
        console.error(`🔍 Technical details: ${error.stack}`);
      }
    }

    process.exit(exitCode);
  }

  /**
   * Handle successful output consistently
   */
  protected handleSuccess(data: unknown, options: TOptions, message?: string): void {
    const isJson = options.json || false;
    const isQuiet = options.quiet || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: true,
        data
      }, null, 2));
    } else {
      if (message && !isQuiet) {
        console.log(`✅ ${message}`);
      }
      if (typeof data === 'string' && data.length > 0 && !isQuiet) {
        console.log(data);
      }
    }
  }
}

