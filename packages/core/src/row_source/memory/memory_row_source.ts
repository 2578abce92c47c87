import type { RowSource } from '../row_source';
import type { RawRow } from '../../entity_types';

/**
 * In-memory RowSource for tests and programmatic use.
 */
export class MemoryRowSource implements RowSource {
  constructor(
    private readonly rows: RawRow[],
    readonly name: string = 'memory'
  ) { }

  async readRows(): Promise<RawRow[]> {
    return [...this.rows];
  }
}
