import { Command } from 'commander';
import { promises as fs } from 'fs';
import * as path from 'path';
import { Config, Errors, Verification } from '@omc-bridge/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface VerifyCommandOptions extends BaseCommandOptions {
  /** OMC JSON document to submit */
  document: string;
  endpoint?: string;
  config?: string;
}

const OUTCOME_ICONS: Record<Verification.VerificationOutcome, string> = {
  success: '✅',
  success_with_notes: '📝',
  failure: '❌',
  indeterminate: '❔',
};

/**
 * Report lines shared by `verify` and `convert --verify`.
 */
export function formatVerificationLines(result: Verification.VerificationResult): string[] {
  const lines = [`🔎 Verification: ${OUTCOME_ICONS[result.outcome]} ${result.outcome}`];

  for (const [rule, status] of Object.entries(result.report.summary ?? {})) {
    lines.push(`   • ${rule}: ${status}`);
  }
  for (const issue of result.report.issues ?? []) {
    const label = [issue.rule, issue.status].filter(part => part !== undefined).join(' ');
    lines.push(label ? `   ⚠️  [${label}] ${issue.message}` : `   ⚠️  ${issue.message}`);
  }

  return lines;
}

/**
 * Verify Command - submits an existing OMC document to the checking service.
 * The document is sent exactly as stored on disk.
 */
export class VerifyCommand extends BaseCommand<VerifyCommandOptions> {
  protected commandName = 'verify';
  protected description = 'Submit an OMC JSON document to the OMC checking service';

  register(program: Command): void {
    program
      .command('verify <document>')
      .description(this.description)
      .option('--endpoint <url>', 'Checking service endpoint')
      .option('-c, --config <file>', 'Config file (default: nearest omc-bridge.config.yml)')
      .option('--json', 'Output in JSON format', false)
      .option('-q, --quiet', 'Only print errors', false)
      .option('-v, --verbose', 'Show technical details', false)
      .action(async (document: string, options: Omit<VerifyCommandOptions, 'document'>) => {
        await this.execute({ ...options, document });
      });
  }

  async execute(options: VerifyCommandOptions): Promise<void> {
    try {
      const overrides: Config.ConfigOverrides = options.endpoint !== undefined ? { endpoint: options.endpoint } : {};
      const configManager = this.container.getConfigManager(options.config);
      const settings = await configManager.getVerificationSettings(overrides);
      if (settings === null) {
        this.handleError('No checking service endpoint (use --endpoint or verification.endpoint in the config file)', options);
        return;
      }

      let content: string;
      try {
        content = await fs.readFile(options.document, 'utf-8');
      } catch (error) {
        throw new Errors.InputReadError(options.document, error);
      }

      try {
        JSON.parse(content);
      } catch (error) {
        throw new Errors.InputStructureError(
          options.document,
          `not a JSON document (${Errors.describeCause(error)})`
        );
      }

      const logLevel = this.resolveLogLevel(options, await configManager.getLogLevel());
      const client = this.container.createVerificationClient(settings, logLevel);
      const result = await client.verify(content, path.basename(options.document));

      this.handleSuccess({
        document: options.document,
        endpoint: settings.endpoint,
        ...result,
      }, options, formatVerificationLines(result));

      if (result.outcome === 'failure') {
        process.exit(1);
      }
    } catch (error) {
      const message = error instanceof Errors.OmcBridgeError
        ? error.message
        : `Verification failed: ${Errors.describeCause(error)}`;
      this.handleError(message, options, error);
    }
  }
}
