/**
 * Base Command Class for the task checker CLI
 *
 * Provides common output and error handling across both executables.
 */

import { Command } from 'commander';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, ICommand } from '../interfaces/command';

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
   * Report a fatal error on stderr and exit.
   * The error's stack trace always follows the message; --verbose adds its cause.
   * With --json the error is printed as a JSON object on stdout instead.
   */
  protected handleError(message: string, options: TOptions, error?: Error, exitCode: number = 1): void {
    const isJson = options.json || false;
    const isVerbose = options.verbose || false;

    if (isJson) {
      this.printJsonError(message, exitCode);
    } else {
      // Only add ❌ if message doesn't already have it
      const formattedMessage = message.startsWith('❌') ? message : `❌ ${message}`;
      console.error(formattedMessage);
      if (error) {
        console.error(`🔍 Technical details: ${error.stack}`);
      }
      if (isVerbose && error?.cause !== undefined) {
        const cause = error.cause instanceof Error ? error.cause.stack : String(error.cause);
        console.error(`🔍 Caused by: ${cause}`);
      }
    }

    process.exit(exitCode);
  }

  /**
   * Report an expected failure (usage, lookup miss) on stdout and exit.
   */
  protected exitWithMessage(message: string, options: TOptions, exitCode: number = 1): void {
    if (options.json) {
      this.printJsonError(message, exitCode);
    } else {
      console.log(message);
    }

    process.exit(exitCode);
  }

  /**
   * Handle successful output consistently
   */
  protected handleSuccess(data: unknown, lines: string[], options: TOptions): void {
    if (options.json) {
      console.log(JSON.stringify({
        success: true,
        data
      }, null, 2));
      return;
    }

    for (const line of lines) {
      console.log(line);
    }
  }

  private printJsonError(message: string, exitCode: number): void {
    console.log(JSON.stringify({
      success: false,
      error: message,
      exitCode
    }, null, 2));
  }
}
