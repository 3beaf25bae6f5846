import { BibliographyIdMapper, getBibliographyIdMapper } from './bibliography.js';
import { Citation, Entry, Note, Sense, Supplement, entryFromJson } from './entry.js';
import {
  highlightedOfficialHeadword,
  highlightedOtherSpellings,
  resolveHighlight,
  OFFICIAL_HEADWORD_FIELD
} from './highlight.js';
import { SearchResultRecord, fetchString } from './record.js';
import { StylesheetCache, StylesheetName, getStylesheetCache } from './stylesheet-cache.js';
import { TransformFn, TransformParams, applyStylesheet } from './transform.js';
import { firstMatch, isolate, parseXml } from './xml.js';

/** Stands in for the regularized headword inside definitions */
export const HEADWORD_PLACEHOLDER = '~';

/** Element a definition fragment is wrapped in so it parses as one document */
export const DEFINITION_CONTAINER = 'DEF_FRAGMENT';

export const FORM_PATH = '/ENTRYFREE/FORM';
export const ETYM_PATH = '/ENTRYFREE/ETYM';

/**
 * What the entry presenter needs from the generic result presenter of the
 * results page. Only these calls are forwarded.
 */
export interface ResultPresenter {
  /** Display title of the hit */
  heading(): string;
  /** Id of the hit in the index, when it has one */
  documentId(): string | null;
}

/**
 * Generic presenter reading title and id straight off the record.
 */
export class RecordResultPresenter implements ResultPresenter {
  constructor(private readonly record: SearchResultRecord) {}

  heading(): string {
    if (!this.record.hasField(OFFICIAL_HEADWORD_FIELD)) {
      return '';
    }
    return fetchString(this.record, OFFICIAL_HEADWORD_FIELD);
  }

  documentId(): string | null {
    return this.record.hasField('id') ? fetchString(this.record, 'id') : null;
  }
}

/**
 * Collaborators; each defaults to the process-wide instance.
 */
export interface PresenterDependencies {
  stylesheets?: StylesheetCache;
  bibliography?: BibliographyIdMapper;
  transform?: TransformFn;
}

/**
 * Renders one search hit's dictionary entry, section by section.
 *
 * Created per hit and thrown away after the render. Every section method
 * resolves to null when the entry has no such section.
 */
export class EntryPresenter {
  readonly entry: Entry;
  readonly record: SearchResultRecord;
  /** The search field the user searched on, if any */
  readonly searchField: string | null;

  private readonly entryDocument: Document;
  private readonly base: ResultPresenter;
  private readonly deps: PresenterDependencies;
  private placeholdersFilled = false;

  constructor(
    record: SearchResultRecord,
    base: ResultPresenter,
    searchField: string | null = null,
    deps: PresenterDependencies = {}
  ) {
    this.record = record;
    this.base = base;
    this.searchField = searchField;
    this.deps = deps;
    this.entry = entryFromJson(fetchString(record, 'json'));
    this.entryDocument = parseXml(fetchString(record, 'xml'));
  }

  // Sections

  formHtml(): Promise<string | null> {
    return this.transformFromEntry(FORM_PATH, 'FormOnly');
  }

  etymHtml(): Promise<string | null> {
    return this.transformFromEntry(ETYM_PATH, 'EtymOnly');
  }

  /**
   * Definitions can be bare inline text, so they are wrapped in a container
   * element before parsing.
   */
  defHtml(sense: Sense): Promise<string | null> {
    const xml = sense.definitionXml === null
      ? null
      : `<${DEFINITION_CONTAINER}>${sense.definitionXml}</${DEFINITION_CONTAINER}>`;
    return this.transformFromXml(xml, 'DefOnly');
  }

  noteHtml(note: Note): Promise<string | null> {
    return this.transformFromXml(note.xml, 'NoteOnly');
  }

  /**
   * The citation stylesheet gets the resolved bibliography id as `bibid`.
   * An unknown reference id renders without the parameter.
   */
  async citHtml(cit: Citation): Promise<string | null> {
    const bibid = this.bibliography.lookup(cit.bib.stencil.referenceId);
    const params: TransformParams = bibid === null ? {} : { bibid };
    return this.transformFromXml(cit.xml, 'CitOnly', params);
  }

  readonly citeHtml = this.citHtml;
  readonly citationHtml = this.citHtml;

  supplementHtml(supplement: Supplement): Promise<string | null> {
    return this.transformFromXml(supplement.xml, 'SupplementOnly');
  }

  // Entry data

  /**
   * The entry's senses with every `~` in their definitions replaced by the
   * regularized headword. The replacement is made in place, once per presenter.
   */
  senses(): Sense[] {
    if (!this.placeholdersFilled) {
      this.placeholdersFilled = true;
      const headword = this.regularizedHeadword();
      if (headword !== null) {
        for (const sense of this.entry.senses) {
          if (sense.definitionXml !== null) {
            sense.definitionXml = sense.definitionXml.replaceAll(HEADWORD_PLACEHOLDER, () => headword);
          }
        }
      }
    }
    return this.entry.senses;
  }

  quoteCount(): number {
    return this.entry.allQuotes().length;
  }

  partOfSpeechAbbrev(): string {
    return this.entry.pos;
  }

  // Highlighting

  hlField(field: string): string[] {
    return resolveHighlight(this.record, field);
  }

  highlightedOfficialHeadword(): string | null {
    return highlightedOfficialHeadword(this.record);
  }

  highlightedOtherSpellings(): string[] {
    return highlightedOtherSpellings(this.record);
  }

  // Forwarded to the result presenter

  heading(): string {
    return this.base.heading();
  }

  documentId(): string | null {
    return this.base.documentId();
  }

  // Helpers

  private regularizedHeadword(): string | null {
    const first = this.entry.headwords[0];
    return first?.regularizedSpellings()[0] ?? null;
  }

  private get stylesheets(): StylesheetCache {
    return this.deps.stylesheets ?? getStylesheetCache();
  }

  private get bibliography(): BibliographyIdMapper {
    return this.deps.bibliography ?? getBibliographyIdMapper();
  }

  private get transform(): TransformFn {
    return this.deps.transform ?? applyStylesheet;
  }

  private async transformDocument(
    document: Document | null,
    name: StylesheetName,
    params: TransformParams = {}
  ): Promise<string | null> {
    if (document === null) {
      return null;
    }
    const stylesheet = await this.stylesheets.get(name);
    return this.transform(document, stylesheet, params);
  }

  private async transformFromEntry(path: string, name: StylesheetName): Promise<string | null> {
    return this.transformDocument(isolate(firstMatch(this.entryDocument, path)), name);
  }

  private async transformFromXml(
    xml: string | null,
    name: StylesheetName,
    params: TransformParams = {}
  ): Promise<string | null> {
    if (xml === null) {
      return null;
    }
    return this.transformDocument(isolate(parseXml(xml)), name, params);
  }
}
