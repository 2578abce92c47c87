export { readCell, parseRowId, normalizeSourceRow, hasRequiredColumns } from './row_normalizer';
