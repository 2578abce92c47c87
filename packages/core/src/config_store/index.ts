export type { ConfigStore } from './config_store';
export { FsConfigStore, CONFIG_FILE_NAMES } from './fs/fs_config_store';
export { MemoryConfigStore } from './memory/memory_config_store';
