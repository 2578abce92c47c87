import { Command, Option } from 'commander';
import * as path from 'path';
import { Config, EntityMetrics, Entities, Errors, EventBus, Verification } from '@omc-bridge/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import { formatVerificationLines } from '../verify/verify-command';

/**
 * Convert Command Options
 */
export interface ConvertCommandOptions extends BaseCommandOptions {
  /** ShotGrid CSV task export */
  input: string;
  /** Destination file (default: input with `.omc.json` extension) */
  output?: string;
  /** Shape of originalShotGridData: verbatim | encoded */
  policy?: string;
  /** Identifier scope written in every identifier */
  scope?: string;
  /** Submit the document to the checking service after writing it */
  verify?: boolean;
  /** Checking service endpoint (overrides the config file) */
  endpoint?: string;
  /** Explicit config file */
  config?: string;
}

/**
 * `tasks.csv` -> `tasks.omc.json`, next to the input.
 */
export function defaultOutputPath(inputPath: string): string {
  const parsed = path.parse(inputPath);
  return path.join(parsed.dir, `${parsed.name}.omc.json`);
}

/**
 * Convert Command - Thin wrapper around the core ConversionModule
 *
 * This command is responsible for:
 * - Parsing CLI arguments and merging them over the config file
 * - Injecting dependencies
 * - Formatting output (text/JSON)
 * - Setting exit codes
 */
export class ConvertCommand extends BaseCommand<ConvertCommandOptions> {
  protected commandName = 'convert';
  protected description = 'Convert a ShotGrid CSV task export into an OMC Task document';

  register(program: Command): void {
    program
      .command('convert <input>')
      .description(this.description)
      .option('-o, --output <file>', 'Output file (default: <input>.omc.json)')
      .addOption(new Option('--policy <policy>', 'Shape of originalShotGridData').choices(Entities.ORIGINAL_RECORD_POLICIES))
      .option('--scope <scope>', 'Identifier scope for every identifier')
      .option('--verify', 'Submit the document to the OMC checking service', false)
      .option('--endpoint <url>', 'Checking service endpoint')
      .option('-c, --config <file>', 'Config file (default: nearest omc-bridge.config.yml)')
      .option('--json', 'Output in JSON format', false)
      .option('-q, --quiet', 'Only print errors', false)
      .option('-v, --verbose', 'Show progress and technical details', false)
      .action(async (input: string, options: Omit<ConvertCommandOptions, 'input'>) => {
        await this.execute({ ...options, input });
      });
  }

  async execute(options: ConvertCommandOptions): Promise<void> {
    try {
      const { policy } = options;
      if (policy !== undefined && !Entities.isOriginalRecordPolicy(policy)) {
        this.handleError(`Unknown policy "${policy}" (expected verbatim or encoded)`, options);
        return;
      }

      const overrides: Config.ConfigOverrides = {
        ...(options.scope !== undefined && { identifierScope: options.scope }),
        ...(policy !== undefined && { originalRecordPolicy: policy }),
        ...(options.endpoint !== undefined && { endpoint: options.endpoint }),
      };

      const configManager = this.container.getConfigManager(options.config);
      const conversionOptions = await configManager.getConversionOptions(overrides);
      const logLevel = this.resolveLogLevel(options, await configManager.getLogLevel());

      // Resolve verification up front so a missing endpoint fails before anything is written
      let verificationSettings: Config.ResolvedVerificationSettings | null = null;
      if (options.verify) {
        verificationSettings = await configManager.getVerificationSettings(overrides);
        if (verificationSettings === null) {
          this.handleError('--verify needs an endpoint (use --endpoint or verification.endpoint in the config file)', options);
          return;
        }
      }

      const outputPath = options.output ?? defaultOutputPath(options.input);
      const showProgress = options.verbose === true && !options.json;

      const eventBus = this.container.getEventBus();
      const subscription = eventBus.subscribe<EventBus.ConversionProgressEvent>('conversion.progress', event => {
        if (showProgress) {
          const { entitiesProduced, rowsProcessed, rowsRead } = event.payload;
          console.log(`⏳ ${entitiesProduced} tasks converted (${rowsProcessed}/${rowsRead} rows)`);
        }
      });

      const conversionModule = this.container.createConversionModule(conversionOptions, logLevel);
      const result = await conversionModule
        .convert({
          source: this.container.createRowSource(options.input),
          sink: this.container.createDocumentSink(outputPath),
        })
        .finally(() => eventBus.unsubscribe(subscription.id));

      let verification: Verification.VerificationResult | undefined;
      if (verificationSettings !== null) {
        const client = this.container.createVerificationClient(verificationSettings, logLevel);
        verification = await client.verify(result.serialized, path.basename(outputPath));
      }

      const lines = [
        `✅ Converted ${result.statistics.totalEntities} tasks from ${options.input}`,
        `📄 Output: ${outputPath} (${result.bytesWritten ?? 0} bytes)`,
      ];
      if (result.rowsSkipped > 0) {
        lines.push(`⚠️  Skipped ${result.rowsSkipped} of ${result.rowsRead} rows without a usable Id`);
      }
      lines.push('', ...EntityMetrics.formatStatisticsLines(result.statistics));
      if (verification) {
        lines.push('', ...formatVerificationLines(verification));
      }

      this.handleSuccess({
        input: options.input,
        output: outputPath,
        rowsRead: result.rowsRead,
        rowsSkipped: result.rowsSkipped,
        bytesWritten: result.bytesWritten,
        statistics: result.statistics,
        ...(verification && { verification }),
      }, options, lines);

      if (verification?.outcome === 'failure') {
        process.exit(1);
      }
    } catch (error) {
      const message = error instanceof Errors.OmcBridgeError
        ? error.message
        : `Conversion failed: ${Errors.describeCause(error)}`;
      this.handleError(message, options, error);
    }
  }
}
