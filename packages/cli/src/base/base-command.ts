/**
 * Base Command Class for the omc-bridge CLI
 *
 * Provides common functionality and enforces output standards across all
 * commands. Follows the Command Pattern with dependency injection support.
 */

import { Command } from 'commander';
import { Errors, Logger } from '@omc-bridge/core';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, ICompleteCommand } from '../interfaces/command';

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICompleteCommand<TOptions> {

  protected readonly container = DependencyInjectionService.getInstance();

  abstract register(program: Command): void;

  abstract execute(options: TOptions): Promise<void>;

  /**
   * Level for core loggers. --json keeps stdout clean for the envelope.
   */
  protected resolveLogLevel(options: TOptions, configured?: Logger.LogLevel): Logger.LogLevel {
    if (options.verbose) {
      return 'debug';
    }
    if (options.json || options.quiet) {
      return 'error';
    }
    return configured ?? 'warn';
  }

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(message: string, options: TOptions, error?: unknown, exitCode: number = 1): void {
    const isJson = options.json || false;
    const isVerbose = options.verbose || false;
    const code = error instanceof Errors.OmcBridgeError ? error.code : undefined;

    if (isJson) {
      console.log(JSON.stringify({
        success: false,
        error: message,
        ...(code !== undefined && { code }),
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
  protected handleSuccess(data: unknown, options: TOptions, lines: string[] = []): void {
    if (options.json) {
      console.log(JSON.stringify({
        success: true,
        data
      }, null, 2));
      return;
    }

    if (!options.quiet) {
      for (const line of lines) {
        console.log(line);
      }
    }
  }
}
