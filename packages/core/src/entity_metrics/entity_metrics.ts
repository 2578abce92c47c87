import type { TaskEntity } from '../entity_types';
import { countBy } from '../utils/object_utils';
import type { ConversionStatistics } from './entity_metrics.types';

/**
 * Reduces the produced entities into category, state and pipeline-step tallies.
 * Reads only; the entities are never modified.
 */
export function calculateConversionStatistics(entities: readonly TaskEntity[]): ConversionStatistics {
  return {
    totalEntities: entities.length,
    byFunctionalType: countBy(entities, entity => entity.taskFC.functionalType),
    byState: countBy(entities, entity => entity.taskFC.customData.state),
    byPipelineStep: countBy(entities, entity => entity.taskFC.customData.pipelineStep),
  };
}

/**
 * Renders the tallies as report lines, one section per tally.
 */
export function formatStatisticsLines(statistics: ConversionStatistics): string[] {
  const section = (title: string, tally: Partial<Record<string, number>>): string[] => [
    title,
    ...Object.entries(tally).map(([key, count]) => `   • ${key}: ${count ?? 0} tasks`),
  ];

  return [
    ...section('📈 Official OMC Functional Classes:', statistics.byFunctionalType),
    ...section('📊 Task States:', statistics.byState),
    ...section('🔧 Pipeline Steps:', statistics.byPipelineStep),
  ];
}
