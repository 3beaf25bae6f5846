import SaxonJS from 'saxon-js';
import { TransformError, errorMessage } from './errors.js';
import type { CompiledStylesheet } from './stylesheet-cache.js';
import { serializeXml } from './xml.js';

const MAP_NAMESPACE = 'http://www.w3.org/2005/xpath-functions/map';

/**
 * Runs a stylesheet held as text over a serialized source document and returns
 * the serialized principal result. Parameter names arrive as strings and are
 * turned into no-namespace QNames for `xsl:param`.
 */
const TRANSFORM_EXPRESSION = `transform(map {
  'stylesheet-text': $stylesheet,
  'source-node': parse-xml($source),
  'stylesheet-params': map:merge(
    for $name in map:keys($params) return map { QName('', $name): string($params($name)) }
  ),
  'delivery-format': 'serialized'
})?output`;

/** Input the compile check runs a stylesheet over */
const COMPILE_CHECK_SOURCE = '<compile-check/>';

/**
 * Named string parameters handed to the stylesheet (`<xsl:param name="bibid"/>`).
 * Values are plain strings; no XPath quoting is needed.
 */
export type TransformParams = Record<string, string>;

export type TransformFn = (
  document: Document | null,
  stylesheet: CompiledStylesheet,
  params?: TransformParams
) => Promise<string | null>;

function runTransform(stylesheet: string, source: string, params: TransformParams): string {
  const output = SaxonJS.XPath.evaluate(TRANSFORM_EXPRESSION, null, {
    params: { stylesheet, source, params },
    namespaceContext: { map: MAP_NAMESPACE }
  });
  if (typeof output !== 'string') {
    throw new Error('no serialized output');
  }
  return output;
}

/**
 * Compile stylesheet text and run it once over a placeholder document.
 * Static errors (bad XPath, unknown instructions) throw here rather than on
 * the first real render.
 */
export function compileStylesheet(source: string): void {
  runTransform(source, COMPILE_CHECK_SOURCE, {});
}

/**
 * Apply a compiled stylesheet to an isolated document.
 *
 * A null document stays null: an absent section is not rendered as an empty
 * shell. Anything the processor throws comes back as a TransformError.
 */
export const applyStylesheet: TransformFn = async (document, stylesheet, params = {}) => {
  if (document === null) {
    return null;
  }

  try {
    return runTransform(stylesheet.source, serializeXml(document), params);
  } catch (err) {
    throw new TransformError(`${stylesheet.name} failed: ${errorMessage(err)}`, stylesheet.name);
  }
};
