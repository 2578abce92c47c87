/**
 * Filesystem-dependent implementations
 *
 * Use @omc-bridge/core/memory for in-memory alternatives.
 */
import { ConfigManager } from './config_manager';
import { FsConfigStore } from './config_store/fs/fs_config_store';
import { MemoryConfigStore } from './config_store/memory/memory_config_store';

export { FsConfigStore, CONFIG_FILE_NAMES } from './config_store/fs/fs_config_store';
export { FsCsvRowSource } from './row_source/fs/fs_csv_row_source';
export { FsDocumentSink } from './document_sink/fs/fs_document_sink';

/**
 * Creates a ConfigManager backed by an explicit config file, or by the
 * nearest omc-bridge.config.yml above `startPath` when none is given.
 * Without any file the manager serves defaults.
 */
export function createConfigManager(options: { configPath?: string; startPath?: string } = {}): ConfigManager {
  const configPath = options.configPath
    ?? FsConfigStore.findConfigFile(options.startPath ?? process.cwd());
  return new ConfigManager(configPath === null ? new MemoryConfigStore() : new FsConfigStore(configPath));
}
