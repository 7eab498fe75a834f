/**
 * Base Command Class for the Remedy CLI
 *
 * Provides common functionality and enforces standards across all commands.
 * Follows the Command Pattern and provides dependency injection support.
 */

import { Command } from 'commander';
import { Errors } from '@remedy/core';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, ICommand } from '../interfaces/command';

/**
 * Message for any thrown value, with field errors spelled out for
 * validation failures.
 */
export function describeError(error: unknown): string {
  if (error instanceof Errors.DetailedValidationError) {
    const details = error.errors.map(e => `   • ${e.field}: ${e.message}`);
    return [error.message, ...details].join('\n');
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICommand {

  protected readonly dependencyService = DependencyInjectionService.getInstance();

  /**
   * Register the command with Commander.js
   * Must be implemented by each command
   */
  abstract register(program: Command): void;

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(message: string, options: TOptions, error?: unknown, exitCode: number = 1): void {
    const isJson = options.json || false;
    const isVerbose = options.verbose || false;
    const code = error instanceof Errors.RemedyError ? error.code : undefined;

    if (isJson) {
      console.log(JSON.stringify({
        success: false,
        error: message,
        code,
        exitCode
      }, null, 2));
    } else {
      // Only add ❌ if message doesn't already have it
      const formattedMessage = message.startsWith('❌') ? message : `❌ ${message}`;
      console.error(formattedMessage);
      if (isVerbose && error instanceof Error) {
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
    } else if (message && !isQuiet) {
      console.log(`✅ ${message}`);
    }
  }

  /**
   * Runs an action and reports any failure as `<failure>: <reason>`.
   */
  protected async run(options: TOptions, failure: string, action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (error) {
      this.handleError(`${failure}: ${describeError(error)}`, options, error);
    }
  }
}
