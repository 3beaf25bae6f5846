import fs from 'fs-extra';
import { z } from 'zod';
import { getConfig } from './config.js';
import { ConfigurationError, errorMessage } from './errors.js';

const tableSchema = z.record(z.string(), z.string());

/**
 * Case-insensitive map from a citation's reference id (stencil) to its
 * bibliography id. Keys are stored upper-cased; lookups upper-case too.
 */
export class BibliographyIdMapper {
  private ids = new Map<string, string>();
  private reportedMisses = new Set<string>();

  constructor(table: Record<string, string> | Map<string, string>) {
    const pairs = table instanceof Map ? Array.from(table.entries()) : Object.entries(table);
    for (const [referenceId, bibliographyId] of pairs) {
      this.ids.set(referenceId.toUpperCase(), bibliographyId);
    }
  }

  /**
   * @returns the bibliography id, or null when the reference id is unknown.
   * The first miss for each id is logged.
   */
  lookup(referenceId: string | null | undefined): string | null {
    if (!referenceId) {
      return null;
    }
    const key = referenceId.toUpperCase();
    const found = this.ids.get(key);
    if (found !== undefined) {
      return found;
    }
    if (!this.reportedMisses.has(key)) {
      this.reportedMisses.add(key);
      console.warn(`[Bibliography] no bibliography id for reference ${referenceId}`);
    }
    return null;
  }

  get size(): number {
    return this.ids.size;
  }
}

/**
 * Read a `{ "<reference id>": "<bibliography id>" }` JSON file.
 */
export function loadBibliographyTable(filePath: string): Record<string, string> {
  let raw: unknown;
  try {
    raw = fs.readJsonSync(filePath);
  } catch (err) {
    throw new ConfigurationError(`Cannot read bibliography table ${filePath}: ${errorMessage(err)}`);
  }
  const parsed = tableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Bibliography table ${filePath} must map reference ids to string bibliography ids`
    );
  }
  return parsed.data;
}

let defaultMapper: BibliographyIdMapper | null = null;

/**
 * The process-wide mapper, built from the configured table on first use.
 */
export function getBibliographyIdMapper(): BibliographyIdMapper {
  if (!defaultMapper) {
    const filePath = getConfig().bibliographyFile;
    defaultMapper = new BibliographyIdMapper(loadBibliographyTable(filePath));
    console.log(`[Bibliography] loaded ${defaultMapper.size} reference ids from ${filePath}`);
  }
  return defaultMapper;
}
