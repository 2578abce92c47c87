import type { FunctionalCategory, LifecycleState } from '../entity_types';

/**
 * Tallies over the entities of one conversion pass.
 * Keys appear in order of first occurrence.
 */
export type ConversionStatistics = {
  totalEntities: number;
  /** Entities without a functional type are not counted. */
  byFunctionalType: Partial<Record<FunctionalCategory, number>>;
  /** Every entity is counted, using its defaulted state. */
  byState: Partial<Record<LifecycleState, number>>;
  /** Entities without a pipeline step are not counted. */
  byPipelineStep: Partial<Record<string, number>>;
};
