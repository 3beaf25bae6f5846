import { DOMImplementation, DOMParser, XMLSerializer } from '@xmldom/xmldom';
import { XMLValidator } from 'fast-xml-parser';
import xpath from 'xpath';
import { ParseError, QueryError, errorMessage } from './errors.js';

// DOM nodeType values (the DOM's Node constants are not globals under Node.js)
const DOCUMENT_NODE = 9;
const DOCUMENT_TYPE_NODE = 10;

function isNode(value: unknown): value is Node {
  return typeof value === 'object' && value !== null && 'nodeType' in value;
}

export function isDocument(node: Node): node is Document {
  return node.nodeType === DOCUMENT_NODE;
}

/**
 * Parse an XML string into a document.
 *
 * The string is validated first: xmldom silently drops text outside the root
 * element, so a bare inline fragment like `see <I>x</I>` would otherwise "parse".
 */
export function parseXml(xml: string): Document {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new ParseError(`Malformed XML: ${msg}`, line, col);
  }

  const raise = (msg: string): never => {
    throw new ParseError(`Malformed XML: ${msg}`);
  };
  const parser = new DOMParser({
    errorHandler: { error: raise, fatalError: raise }
  });
  return parser.parseFromString(xml, 'text/xml');
}

export function serializeXml(node: Node): string {
  return new XMLSerializer().serializeToString(node);
}

/**
 * Return the first node matching `path` in document order, or null.
 * Paths that select something other than nodes (`count(...)`) also give null.
 */
export function firstMatch(document: Node, path: string): Node | null {
  const result = select(document, path);
  if (!Array.isArray(result)) {
    return null;
  }
  for (const value of result) {
    if (isNode(value)) {
      return value;
    }
  }
  return null;
}

function select(document: Node, path: string): unknown {
  try {
    return xpath.select(path, document);
  } catch (err) {
    throw new QueryError(`Invalid XPath "${path}": ${errorMessage(err)}`, path);
  }
}

/**
 * Build a standalone document holding only `node`.
 *
 * XSLT wants a document root, not an arbitrary element. The result is always a
 * copy: a document input is duplicated, an element is deep-copied under a new
 * empty document. The input tree is never touched.
 */
export function isolate(node: Node | null | undefined): Document | null {
  if (node === null || node === undefined) {
    return null;
  }

  const doc = new DOMImplementation().createDocument(null, null, null);
  const sources = isDocument(node) ? Array.from(node.childNodes) : [node];
  for (const source of sources) {
    if (source.nodeType === DOCUMENT_TYPE_NODE) {
      continue;
    }
    doc.appendChild(doc.importNode(source, true));
  }
  return doc;
}

