import { Config, Conversion, EventBus, Logger, Verification } from '@omc-bridge/core';
import type { DocumentSink, RowSource } from '@omc-bridge/core';
import { createConfigManager, FsCsvRowSource, FsDocumentSink } from '@omc-bridge/core/fs';

/**
 * Dependency Injection Service for the omc-bridge CLI
 *
 * Creates and caches the core modules a command needs. Commands never
 * construct core classes directly, so tests replace this service.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private configManager: Config.ConfigManager | null = null;
  private configPath: string | undefined;
  private eventBus: EventBus.EventBus | null = null;

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * ConfigManager for an explicit config file, or the nearest
   * omc-bridge.config.yml above the working directory.
   */
  getConfigManager(configPath?: string): Config.ConfigManager {
    if (!this.configManager || this.configPath !== configPath) {
      this.configManager = createConfigManager(configPath === undefined ? {} : { configPath });
      this.configPath = configPath;
    }
    return this.configManager;
  }

  getEventBus(): EventBus.EventBus {
    if (!this.eventBus) {
      this.eventBus = new EventBus.EventBus();
    }
    return this.eventBus;
  }

  createConversionModule(
    options: Config.ConversionOptions,
    logLevel: Logger.LogLevel
  ): Conversion.ConversionModule {
    return new Conversion.ConversionModule({
      eventBus: this.getEventBus(),
      logger: Logger.createLogger('[Conversion] ', logLevel),
      options,
    });
  }

  createRowSource(inputPath: string): RowSource {
    return new FsCsvRowSource(inputPath);
  }

  createDocumentSink(outputPath: string): DocumentSink {
    return new FsDocumentSink(outputPath);
  }

  createVerificationClient(
    settings: Config.ResolvedVerificationSettings,
    logLevel: Logger.LogLevel
  ): Verification.IVerificationClient {
    return new Verification.OmcVerificationClient(settings.endpoint, {
      timeoutMs: settings.timeoutMs,
      fieldName: settings.fieldName,
      logger: Logger.createLogger('[Verification] ', logLevel),
    });
  }

  /**
   * Drops cached instances (for tests)
   */
  static reset(): void {
    DependencyInjectionService.instance = null;
  }
}
