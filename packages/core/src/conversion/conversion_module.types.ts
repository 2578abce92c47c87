import type { IEventStream } from '../event_bus';
import type { Logger } from '../logger';
import type { ConversionOptions } from '../config_manager';
import type { OmcDocument } from '../entity_types';
import type { ConversionStatistics } from '../entity_metrics';
import type { RowSource } from '../row_source';
import type { DocumentSink } from '../document_sink';

/**
 * ConversionModule Dependencies - Facade + Dependency Injection Pattern
 */
export type ConversionModuleDependencies = {
  eventBus: IEventStream;
  // Optional: defaults to a module-scoped logger
  logger?: Logger;
  // Optional: missing keys fall back to the converter defaults
  options?: Partial<ConversionOptions>;
};

export type ConversionRequest = {
  source: RowSource;
  /** Nothing is persisted when absent. */
  sink?: DocumentSink;
};

export type ConversionResult = {
  document: OmcDocument;
  serialized: string;
  statistics: ConversionStatistics;
  rowsRead: number;
  rowsSkipped: number;
  /** Only set when a sink was given. */
  bytesWritten?: number;
};

export interface IConversionModule {
  /**
   * Runs one pass: read, transform, aggregate, assemble, serialize, persist.
   */
  convert(request: ConversionRequest): Promise<ConversionResult>;
}
