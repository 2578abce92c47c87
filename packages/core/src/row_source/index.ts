export type { RowSource } from './row_source';
export { FsCsvRowSource } from './fs/fs_csv_row_source';
export { MemoryRowSource } from './memory/memory_row_source';
