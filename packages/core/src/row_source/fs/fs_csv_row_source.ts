import { promises as fs } from 'fs';
import * as path from 'path';
import Papa from 'papaparse';
import type { RowSource } from '../row_source';
import type { RawRow } from '../../entity_types';
import { InputReadError, InputStructureError } from '../../errors';
import { hasRequiredColumns } from '../../row_normalizer';

// Field-count mismatches still yield usable rows; missing cells are absent values
const RECOVERABLE_ERROR_TYPES = new Set(['FieldMismatch', 'Delimiter']);

function toRawRow(record: Record<string, unknown>): RawRow {
  return Object.fromEntries(
    Object.entries(record).filter((entry): entry is [string, string] => typeof entry[1] === 'string')
  );
}

/**
 * Reads a ShotGrid CSV export with papaparse.
 *
 * @example
 * const rows = await new FsCsvRowSource('exports/tasks.csv').readRows();
 */
export class FsCsvRowSource implements RowSource {
  readonly name: string;

  constructor(private readonly filePath: string) {
    this.name = path.basename(filePath);
  }

  async readRows(): Promise<RawRow[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      throw new InputReadError(this.filePath, error);
    }

    const result = Papa.parse<Record<string, unknown>>(content.replace(/^\uFEFF/, ''), {
      header: true,
      skipEmptyLines: 'greedy',
      transformHeader: (header: string) => header.trim(),
    });

    const structural = result.errors.find(error => !RECOVERABLE_ERROR_TYPES.has(error.type));
    if (structural) {
      const location = structural.row === undefined ? '' : ` (row ${structural.row + 1})`;
      throw new InputStructureError(this.filePath, `${structural.message}${location}`);
    }

    const columns = result.meta.fields ?? [];
    if (!hasRequiredColumns(columns)) {
      throw new InputStructureError(this.filePath, `missing required column "Id" (found: ${columns.join(', ') || 'none'})`);
    }

    return result.data.map(toRawRow);
  }
}
