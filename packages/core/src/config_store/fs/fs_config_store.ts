/**
 * FsConfigStore - Filesystem implementation of ConfigStore
 *
 * Reads omc-bridge.config.yml with js-yaml (plain JSON files parse too) and
 * validates it against the converter configuration schema.
 */

import { promises as fs } from 'fs';
import { existsSync } from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import type { ConfigStore } from '../config_store';
import type { ConverterConfig } from '../../config_manager/config_manager.types';
import { ConfigurationError, DetailedValidationError, describeCause, getErrorCode } from '../../errors';
import { isConverterConfig, validateConverterConfigDetailed } from '../../validation';

export const CONFIG_FILE_NAMES = ['omc-bridge.config.yml', 'omc-bridge.config.yaml'] as const;

/**
 * Filesystem-based ConfigStore implementation.
 *
 * A missing file is not an error (defaults apply); an unparsable or invalid
 * file is, because silently ignoring it would change the produced document.
 *
 * @example
 * ```typescript
 * const configPath = FsConfigStore.findConfigFile() ?? 'omc-bridge.config.yml';
 * const store = new FsConfigStore(configPath);
 * const config = await store.loadConfig();
 * ```
 */
export class FsConfigStore implements ConfigStore {
  constructor(private readonly configPath: string) { }

  async loadConfig(): Promise<ConverterConfig | null> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (getErrorCode(error) === 'ENOENT') {
        return null;
      }
      throw new ConfigurationError(
        `Cannot read configuration ${this.configPath}: ${describeCause(error)}`
      );
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(content);
    } catch (error) {
      throw new ConfigurationError(
        `Invalid YAML in ${this.configPath}: ${describeCause(error)}`
      );
    }

    // An empty file parses to undefined
    const candidate = parsed ?? {};
    if (!isConverterConfig(candidate)) {
      const validation = validateConverterConfigDetailed(candidate);
      throw new DetailedValidationError(`Configuration ${this.configPath}`, validation.errors);
    }

    return candidate;
  }

  /**
   * Finds the configuration file by searching upwards from startPath.
   *
   * @returns Absolute path of the first config file found, or null
   */
  static findConfigFile(startPath: string = process.cwd()): string | null {
    let currentPath = path.resolve(startPath);

    while (true) {
      for (const fileName of CONFIG_FILE_NAMES) {
        const candidate = path.join(currentPath, fileName);
        if (existsSync(candidate)) {
          return candidate;
        }
      }

      const parentPath = path.dirname(currentPath);
      if (parentPath === currentPath) {
        return null;
      }
      currentPath = parentPath;
    }
  }
}
