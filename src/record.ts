import { z } from 'zod';
import { PayloadError } from './errors.js';

export type FieldValue = string | string[];

/**
 * One search hit as the search layer hands it over: stored field values plus
 * optional highlight snippets.
 */
export interface SearchResultRecord {
  hasHighlightField(name: string): boolean;
  highlightField(name: string): string[];
  hasField(name: string): boolean;
  fetch(name: string): FieldValue;
}

export const storedRecordSchema = z.object({
  fields: z.record(z.string(), z.union([z.string(), z.array(z.string())])),
  highlighting: z.record(z.string(), z.array(z.string())).optional()
});

export type StoredRecordData = z.infer<typeof storedRecordSchema>;

/**
 * In-memory search record.
 */
export class StoredRecord implements SearchResultRecord {
  private fields: Map<string, FieldValue>;
  private highlighting: Map<string, string[]>;

  constructor(data: StoredRecordData) {
    this.fields = new Map(Object.entries(data.fields));
    this.highlighting = new Map(Object.entries(data.highlighting ?? {}));
  }

  /**
   * Validate an untrusted record (e.g. a request body) and wrap it.
   */
  static parse(raw: unknown): StoredRecord {
    const parsed = storedRecordSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PayloadError(
        'Invalid search record',
        parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
      );
    }
    return new StoredRecord(parsed.data);
  }

  hasHighlightField(name: string): boolean {
    return this.highlighting.has(name);
  }

  highlightField(name: string): string[] {
    return [...(this.highlighting.get(name) ?? [])];
  }

  hasField(name: string): boolean {
    return this.fields.has(name);
  }

  fetch(name: string): FieldValue {
    const value = this.fields.get(name);
    if (value === undefined) {
      throw new PayloadError(`Search record has no field "${name}"`);
    }
    return value;
  }
}

/**
 * Fetch a field that must hold a single string.
 */
export function fetchString(record: SearchResultRecord, name: string): string {
  if (!record.hasField(name)) {
    throw new PayloadError(`Search record has no field "${name}"`);
  }
  const value = record.fetch(name);
  const single = Array.isArray(value) ? value[0] : value;
  if (single === undefined) {
    throw new PayloadError(`Search record field "${name}" is empty`);
  }
  return single;
}
