/**
 * A required resource (stylesheet, config file, bibliography table) could not be
 * located or compiled. Fatal at first use.
 */
export class ConfigurationError extends Error {
  constructor(message: string, public readonly statusCode: number = 500) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class QueryError extends Error {
  constructor(message: string, public readonly expression: string, public readonly statusCode: number = 500) {
    super(message);
    this.name = "QueryError";
  }
}

/**
 * An XML fragment is not well-formed.
 */
export class ParseError extends Error {
  constructor(
    message: string,
    public readonly line?: number,
    public readonly column?: number,
    public readonly statusCode: number = 400
  ) {
    super(message);
    this.name = "ParseError";
  }
}

export class TransformError extends Error {
  constructor(message: string, public readonly stylesheet: string, public readonly statusCode: number = 500) {
    super(message);
    this.name = "TransformError";
  }
}

/**
 * A stored entry payload or request body does not have the expected shape.
 */
export class PayloadError extends Error {
  constructor(message: string, public readonly issues: string[] = [], public readonly statusCode: number = 400) {
    super(message);
    this.name = "PayloadError";
  }
}

/**
 * Render a caught value as a log/response message.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
