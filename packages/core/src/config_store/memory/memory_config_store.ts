/**
 * MemoryConfigStore - In-memory implementation of ConfigStore
 */

import type { ConfigStore } from '../config_store';
import type { ConverterConfig } from '../../config_manager/config_manager.types';

/**
 * In-memory ConfigStore implementation for tests.
 *
 * @example
 * ```typescript
 * const configStore = new MemoryConfigStore({ identifierScope: 'studio-x' });
 * const manager = new ConfigManager(configStore);
 * ```
 */
export class MemoryConfigStore implements ConfigStore {
  private config: ConverterConfig | null;

  constructor(initial: ConverterConfig | null = null) {
    this.config = initial;
  }

  async loadConfig(): Promise<ConverterConfig | null> {
    return this.config;
  }

  /**
   * Set configuration directly (for test setup). Accepts null to clear it.
   */
  setConfig(config: ConverterConfig | null): void {
    this.config = config;
  }
}
