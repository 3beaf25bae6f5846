// saxon-js ships without type declarations; only the XPath entry point is used here.
declare module 'saxon-js' {
  interface XPathOptions {
    /** Values bound to `$name` variables in the expression */
    params?: Record<string, unknown>;
    /** Prefix to namespace URI bindings for the expression */
    namespaceContext?: Record<string, string>;
  }

  interface SaxonJSPlatform {
    XPath: {
      evaluate(expression: string, contextItem?: unknown, options?: XPathOptions): unknown;
    };
  }

  const SaxonJS: SaxonJSPlatform;
  export = SaxonJS;
}
