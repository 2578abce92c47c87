import type { OmcDocument, TaskEntity } from '../entity_types';

/**
 * Wraps the entities of one run as the output document, in input order.
 * The array is frozen; entities are referenced, not copied or changed.
 */
export function assembleDocument(entities: readonly TaskEntity[]): OmcDocument {
  return Object.freeze([...entities]);
}

/**
 * Serializes the document as indented JSON. Non-ASCII text is written as-is.
 */
export function serializeDocument(document: OmcDocument): string {
  return JSON.stringify(document, null, 2);
}
