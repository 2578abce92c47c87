export type { DocumentSink, SinkWriteResult } from './document_sink';
export { FsDocumentSink } from './fs/fs_document_sink';
export { MemoryDocumentSink } from './memory/memory_document_sink';
