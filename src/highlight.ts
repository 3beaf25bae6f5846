import type { SearchResultRecord } from './record.js';

export const OFFICIAL_HEADWORD_FIELD = 'official_headword';
export const HEADWORD_FIELD = 'headword';

/**
 * Values to display for a field: the highlight snippets when the search layer
 * produced any (verbatim, duplicates kept), else the stored value(s), else [].
 */
export function resolveHighlight(record: SearchResultRecord, field: string): string[] {
  if (record.hasHighlightField(field)) {
    return record.highlightField(field);
  }
  if (record.hasField(field)) {
    const value = record.fetch(field);
    return Array.isArray(value) ? [...value] : [value];
  }
  return [];
}

export function highlightedOfficialHeadword(record: SearchResultRecord): string | null {
  return resolveHighlight(record, OFFICIAL_HEADWORD_FIELD)[0] ?? null;
}

/**
 * Headword spellings other than the official one. Every value equal to the
 * official headword is dropped, not just the first.
 */
export function highlightedOtherSpellings(record: SearchResultRecord): string[] {
  const official = highlightedOfficialHeadword(record);
  return resolveHighlight(record, HEADWORD_FIELD).filter(w => w !== official);
}
