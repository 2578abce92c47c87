import { SOURCE_COLUMNS } from '../entity_types';
import type { RawRow, SourceRow, SourceColumnKey } from '../entity_types';

/**
 * Returns the trimmed cell text, or `undefined` when the cell is missing or blank.
 */
export function readCell(raw: RawRow, column: string): string | undefined {
  const value = raw[column];
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

// Unsigned decimal digits, optionally float-formatted ("7.0")
const DECIMAL_ID_PATTERN = /^\d+(\.0+)?$/;

/**
 * Parses the `Id` cell. Exports sometimes carry float-formatted ids ("7.0"),
 * which are accepted as long as they denote an integer. Hex, exponent and
 * signed forms are not ids.
 */
export function parseRowId(value: string | undefined): number | null {
  if (value === undefined || !DECIMAL_ID_PATTERN.test(value)) {
    return null;
  }
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

/**
 * Normalizes one raw row into a SourceRow.
 * Returns null when the identifier is missing or not an integer: such rows are skipped.
 */
export function normalizeSourceRow(raw: RawRow): SourceRow | null {
  const id = parseRowId(readCell(raw, SOURCE_COLUMNS.id));
  if (id === null) {
    return null;
  }

  const cell = (key: Exclude<SourceColumnKey, 'id'>): string | undefined => readCell(raw, SOURCE_COLUMNS[key]);

  return {
    id,
    taskName: cell('taskName'),
    link: cell('link'),
    pipelineStep: cell('pipelineStep'),
    status: cell('status'),
    assignedTo: cell('assignedTo'),
    reviewer: cell('reviewer'),
    startDate: cell('startDate'),
    dueDate: cell('dueDate'),
    shotStatus: cell('shotStatus'),
    project: cell('project'),
    thumbnail: cell('thumbnail'),
  };
}

/**
 * A header without `Id` cannot yield a single entity: that is a malformed input,
 * not a batch of skippable rows.
 */
export function hasRequiredColumns(columns: readonly string[]): boolean {
  return columns.some(column => column.trim() === SOURCE_COLUMNS.id);
}
