import type { RawRow } from '../entity_types';

/**
 * Produces the ordered rows of one task export.
 * The whole export is materialized; there is no streaming.
 */
export interface RowSource {
  /** Name used in logs and events (e.g. the file name). */
  readonly name: string;

  /**
   * @throws InputReadError when the source cannot be read
   * @throws InputStructureError when the source is not a task export
   */
  readRows(): Promise<RawRow[]>;
}
