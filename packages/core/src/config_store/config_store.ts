/**
 * ConfigStore Interface
 *
 * Read-only source of the converter configuration, so the ConfigManager
 * works the same against a YAML file or in-memory test data.
 */

import type { ConverterConfig } from '../config_manager/config_manager.types';

/**
 * Implementations:
 * - FsConfigStore: YAML file on disk (omc-bridge.config.yml)
 * - MemoryConfigStore: In-memory for tests
 */
export interface ConfigStore {
  /**
   * @returns ConverterConfig, or null when no configuration exists
   */
  loadConfig(): Promise<ConverterConfig | null>;
}
