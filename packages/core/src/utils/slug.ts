/**
 * Slug used in Context pointers for people: lower-case, spaces become hyphens.
 * Other characters are kept as-is so the pointer stays traceable to the source.
 */
export function toSlug(value: string): string {
  return value.toLowerCase().replace(/ /g, '-');
}

/**
 * Slug for shot/asset links (e.g. 'Shot/010' -> 'shot-010').
 */
export function toLinkSlug(link: string): string {
  return toSlug(link).replace(/\//g, '-');
}
