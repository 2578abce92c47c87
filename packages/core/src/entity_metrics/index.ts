export type { ConversionStatistics } from './entity_metrics.types';
export { calculateConversionStatistics, formatStatisticsLines } from './entity_metrics';
