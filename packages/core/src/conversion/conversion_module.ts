import { DEFAULT_IDENTIFIER_SCOPE } from '../entity_types';
import { transformRows } from '../entity_factories';
import { calculateConversionStatistics } from '../entity_metrics';
import { assembleDocument, serializeDocument } from '../document';
import { publishConversionEvent } from '../event_bus';
import type { IEventStream } from '../event_bus';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import { DEFAULT_PROGRESS_INTERVAL } from '../config_manager';
import type { ConversionOptions } from '../config_manager';
import type {
  ConversionModuleDependencies,
  ConversionRequest,
  ConversionResult,
  IConversionModule,
} from './conversion_module.types';

const EVENT_SOURCE = 'conversion_module';

/**
 * ConversionModule - ShotGrid task export to OMC Task document
 *
 * Rows are read in full before any entity is built. Rows without a usable
 * id are dropped and counted. The sink is only touched after the document
 * has been serialized, so a failing read or transform writes nothing.
 */
export class ConversionModule implements IConversionModule {
  private eventBus: IEventStream;
  private logger: Logger;
  private options: ConversionOptions;

  constructor(dependencies: ConversionModuleDependencies) {
    this.eventBus = dependencies.eventBus;
    this.logger = dependencies.logger ?? createLogger('[Conversion] ');
    this.options = {
      identifierScope: dependencies.options?.identifierScope ?? DEFAULT_IDENTIFIER_SCOPE,
      originalRecordPolicy: dependencies.options?.originalRecordPolicy ?? 'verbatim',
      progressInterval: dependencies.options?.progressInterval ?? DEFAULT_PROGRESS_INTERVAL,
    };
  }

  async convert(request: ConversionRequest): Promise<ConversionResult> {
    const { source, sink } = request;

    const rows = await source.readRows();
    this.logger.info(`Read ${rows.length} rows from ${source.name}`);

    publishConversionEvent(this.eventBus, {
      type: 'conversion.started',
      timestamp: Date.now(),
      source: EVENT_SOURCE,
      payload: { inputName: source.name, rowsRead: rows.length },
    });

    const { progressInterval } = this.options;
    const { entities, rowsSkipped } = transformRows(rows, this.options, {
      onSkip: rowNumber => this.logger.debug(`Skipping row ${rowNumber}: no usable Id`),
      onEntity: (_entity, progress) => {
        if (progress.entitiesProduced % progressInterval === 0) {
          publishConversionEvent(this.eventBus, {
            type: 'conversion.progress',
            timestamp: Date.now(),
            source: EVENT_SOURCE,
            payload: progress,
          });
        }
      },
    });

    if (rowsSkipped > 0) {
      this.logger.warn(`${rowsSkipped} of ${rows.length} rows skipped (missing or non-numeric Id)`);
    }

    const statistics = calculateConversionStatistics(entities);
    const document = assembleDocument(entities);
    const serialized = serializeDocument(document);

    let bytesWritten: number | undefined;
    if (sink) {
      ({ bytesWritten } = await sink.write(serialized));
      this.logger.info(`Wrote ${bytesWritten} bytes to ${sink.name}`);
    }

    publishConversionEvent(this.eventBus, {
      type: 'conversion.completed',
      timestamp: Date.now(),
      source: EVENT_SOURCE,
      payload: {
        entitiesProduced: entities.length,
        rowsSkipped,
        ...(bytesWritten !== undefined && { bytesWritten }),
      },
    });

    return {
      document,
      serialized,
      statistics,
      rowsRead: rows.length,
      rowsSkipped,
      ...(bytesWritten !== undefined && { bytesWritten }),
    };
  }
}
