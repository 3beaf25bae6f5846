import fs from 'fs-extra';
import * as path from 'node:path';
import { getConfig } from './config.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { compileStylesheet } from './transform.js';
import { parseXml } from './xml.js';

const XSL_NAMESPACE = 'http://www.w3.org/1999/XSL/Transform';

/**
 * The stylesheets an entry is rendered with, one per section.
 */
export const STYLESHEET_NAMES = [
  'FormOnly',
  'DefOnly',
  'CitOnly',
  'EtymOnly',
  'NoteOnly',
  'SupplementOnly'
] as const;

export type StylesheetName = typeof STYLESHEET_NAMES[number];

/**
 * A stylesheet ready to apply. Frozen once compiled.
 */
export interface CompiledStylesheet {
  readonly name: StylesheetName;
  /** Stylesheet text that passed the compile check */
  readonly source: string;
}

export interface StylesheetCacheStats {
  /** Names with a successfully compiled stylesheet */
  compiled: number;
  /** Compilations started, successful or not */
  compilations: number;
}

/**
 * Compiles each named stylesheet at most once and hands every caller the same
 * object.
 *
 * The compile promise is stored before any I/O is awaited, so callers that
 * arrive while the first compile is still reading the file wait on that same
 * promise instead of starting another. A failed compile stays failed: the
 * rejected promise is kept and returned to later callers.
 */
export class StylesheetCache {
  private entries = new Map<StylesheetName, Promise<CompiledStylesheet>>();
  private compiledCount = 0;
  private compilations = 0;

  constructor(private readonly xslDir: string) {}

  get(name: StylesheetName): Promise<CompiledStylesheet> {
    let entry = this.entries.get(name);
    if (!entry) {
      entry = this.compile(name);
      this.entries.set(name, entry);
    }
    return entry;
  }

  /**
   * Compile every known stylesheet. Rejects with the first ConfigurationError.
   */
  async preload(): Promise<void> {
    await Promise.all(STYLESHEET_NAMES.map(name => this.get(name)));
  }

  get stats(): StylesheetCacheStats {
    return { compiled: this.compiledCount, compilations: this.compilations };
  }

  private async compile(name: StylesheetName): Promise<CompiledStylesheet> {
    this.compilations++;
    const filePath = path.join(this.xslDir, `${name}.xsl`);

    let source: string;
    try {
      source = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      throw new ConfigurationError(`Stylesheet ${name} not found at ${filePath}: ${errorMessage(err)}`);
    }

    try {
      const root = parseXml(source).documentElement;
      if (!root || root.namespaceURI !== XSL_NAMESPACE ||
          (root.localName !== 'stylesheet' && root.localName !== 'transform')) {
        throw new Error('root element is not xsl:stylesheet');
      }
      compileStylesheet(source);
    } catch (err) {
      throw new ConfigurationError(`Stylesheet ${name} failed to compile: ${errorMessage(err)}`);
    }

    const compiled: CompiledStylesheet = Object.freeze({ name, source });
    this.compiledCount++;
    console.log(`[StylesheetCache] compiled ${name}`);
    return compiled;
  }
}

let defaultCache: StylesheetCache | null = null;

/**
 * The process-wide cache, reading from the configured stylesheet directory.
 */
export function getStylesheetCache(): StylesheetCache {
  if (!defaultCache) {
    defaultCache = new StylesheetCache(getConfig().xslDir);
  }
  return defaultCache;
}
