/**
 * ConfigManager - Converter Configuration Manager
 *
 * Provides typed access to the converter configuration and resolves the
 * options of a pass from three layers: command-line overrides, the config
 * file, then built-in defaults.
 */

import type { ConfigStore } from '../config_store/config_store';
import { DEFAULT_IDENTIFIER_SCOPE } from '../entity_types';
import type { LogLevel } from '../logger';
import type {
  IConfigManager,
  ConverterConfig,
  ConversionOptions,
  ConfigOverrides,
  ResolvedVerificationSettings
} from './config_manager.types';

export const DEFAULT_PROGRESS_INTERVAL = 50;
export const DEFAULT_VERIFICATION_TIMEOUT_MS = 30000;
export const DEFAULT_VERIFICATION_FIELD_NAME = 'file';

/**
 * @example
 * ```typescript
 * // Production usage
 * const configManager = new ConfigManager(new FsConfigStore('omc-bridge.config.yml'));
 *
 * // Test usage
 * const configManager = new ConfigManager(new MemoryConfigStore({ progressInterval: 1 }));
 * ```
 */
export class ConfigManager implements IConfigManager {
  private readonly configStore: ConfigStore;
  private cachedConfig: ConverterConfig | null = null;

  constructor(configStore: ConfigStore) {
    this.configStore = configStore;
  }

  /**
   * Load the configuration; a missing configuration is an empty one.
   */
  async loadConfig(): Promise<ConverterConfig> {
    if (!this.cachedConfig) {
      this.cachedConfig = (await this.configStore.loadConfig()) ?? {};
    }
    return this.cachedConfig;
  }

  async getConversionOptions(overrides: ConfigOverrides = {}): Promise<ConversionOptions> {
    const config = await this.loadConfig();

    return {
      identifierScope: overrides.identifierScope ?? config.identifierScope ?? DEFAULT_IDENTIFIER_SCOPE,
      originalRecordPolicy: overrides.originalRecordPolicy ?? config.originalRecordPolicy ?? 'verbatim',
      progressInterval: config.progressInterval ?? DEFAULT_PROGRESS_INTERVAL
    };
  }

  /**
   * @returns null when no endpoint is configured or given
   */
  async getVerificationSettings(overrides: ConfigOverrides = {}): Promise<ResolvedVerificationSettings | null> {
    const config = await this.loadConfig();
    const endpoint = overrides.endpoint ?? config.verification?.endpoint;
    if (!endpoint) {
      return null;
    }

    return {
      endpoint,
      timeoutMs: config.verification?.timeoutMs ?? DEFAULT_VERIFICATION_TIMEOUT_MS,
      fieldName: config.verification?.fieldName ?? DEFAULT_VERIFICATION_FIELD_NAME
    };
  }

  async getLogLevel(): Promise<LogLevel | undefined> {
    const config = await this.loadConfig();
    return config.logLevel;
  }
}
