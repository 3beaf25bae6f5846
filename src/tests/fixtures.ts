import * as path from 'node:path';
import * as url from 'node:url';
import { StoredRecord } from '../record.js';
import type { TransformFn, TransformParams } from '../transform.js';
import { serializeXml } from '../xml.js';

const __dirname = path.dirname(url.fileURLToPath(import.meta.url));

/** Minimal stylesheets with predictable output */
export const xslFixturesDir = path.join(__dirname, 'fixtures', 'xslt');

export const ENTRY_XML =
  '<ENTRYFREE ID="MED52860">' +
  '<FORM><ORTH>worde</ORTH><POS>n</POS></FORM>' +
  '<ETYM>OE <I>word</I></ETYM>' +
  '<SENSE><DEF>see ~ above</DEF></SENSE>' +
  '</ENTRYFREE>';

export const ENTRY_XML_WITHOUT_FORM_OR_ETYM =
  '<ENTRYFREE ID="MED52860"><SENSE><DEF>see ~ above</DEF></SENSE></ENTRYFREE>';

export interface CitationPayload {
  xml: string | null;
  bib?: { stencil?: { reference_id?: string | null } };
}

export interface EntryPayload {
  id: string;
  pos?: string;
  headwords: { orig: string; regs?: string[] }[];
  senses?: { sense_number?: number; definition_xml?: string | null; quotes: CitationPayload[] }[];
  notes?: { xml: string | null }[];
  supplements?: { xml: string | null; quotes: CitationPayload[] }[];
}

export function entryPayload(): Required<EntryPayload> {
  return {
    id: 'MED52860',
    pos: 'n',
    headwords: [{ orig: 'word', regs: ['worde', 'wurde'] }],
    senses: [
      {
        sense_number: 1,
        definition_xml: 'see ~ above',
        quotes: [
          { xml: '<CIT><Q>a ~ spoken</Q></CIT>', bib: { stencil: { reference_id: 'wb12' } } }
        ]
      },
      {
        sense_number: 2,
        definition_xml: '<DEF>a <I>promise</I></DEF>',
        quotes: []
      }
    ],
    notes: [{ xml: '<NOTE>Cp. <I>wordes</I>.</NOTE>' }],
    supplements: [
      {
        xml: '<SUPPLEMENT>later use</SUPPLEMENT>',
        quotes: [
          { xml: '<CIT><Q>late</Q></CIT>', bib: { stencil: { reference_id: 'unknown-ref' } } }
        ]
      }
    ]
  };
}

export interface RecordOptions {
  payload?: EntryPayload;
  xml?: string;
  highlighting?: Record<string, string[]>;
}

export function makeRecord(options: RecordOptions = {}): StoredRecord {
  return new StoredRecord({
    fields: {
      id: 'MED52860',
      json: JSON.stringify(options.payload ?? entryPayload()),
      xml: options.xml ?? ENTRY_XML,
      official_headword: 'worde',
      headword: ['worde', 'wurde']
    },
    highlighting: options.highlighting
  });
}

export const BIBLIOGRAPHY_TABLE = { WB12: '123' };

/**
 * Count every node in a tree (the root included), to check a tree was left unchanged.
 */
export function countNodes(node: Node): number {
  let count = 1;
  for (const child of Array.from(node.childNodes)) {
    count += countNodes(child);
  }
  return count;
}

export interface TransformCall {
  stylesheet: string;
  params: TransformParams;
  input: string | null;
}

/**
 * A transform that echoes `<stylesheet>:<serialized input>` and records its calls.
 */
export function recordingTransform(): { transform: TransformFn; calls: TransformCall[] } {
  const calls: TransformCall[] = [];
  const transform: TransformFn = async (document, stylesheet, params = {}) => {
    const input = document === null ? null : serializeXml(document);
    calls.push({ stylesheet: stylesheet.name, params, input });
    return input === null ? null : `${stylesheet.name}:${input}`;
  };
  return { transform, calls };
}
