/**
 * In-memory implementations for tests and programmatic use
 */
export { MemoryConfigStore } from './config_store/memory/memory_config_store';
export { MemoryRowSource } from './row_source/memory/memory_row_source';
export { MemoryDocumentSink } from './document_sink/memory/memory_document_sink';
