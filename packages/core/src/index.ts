export * as Config from './config_manager';
export * as Conversion from './conversion';
export * as Document from './document';
export * as Entities from './entity_types';
export * as EntityFactories from './entity_factories';
export * as EntityMetrics from './entity_metrics';
export * as Errors from './errors';
export * as EventBus from './event_bus';
export * as Logger from './logger';
export * as MappingTables from './mapping_tables';
export * as RowNormalizer from './row_normalizer';
export * as Schemas from './schemas';
export * as Validation from './validation';
export * as Verification from './verification';

// Storage seams (interfaces only; implementations live in ./fs and ./memory)
export type { ConfigStore } from './config_store';
export type { RowSource } from './row_source';
export type { DocumentSink, SinkWriteResult } from './document_sink';
