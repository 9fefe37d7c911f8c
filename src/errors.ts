import type { ZodIssue } from "zod";

/**
 * Base class for every error raised while registering or parsing resources.
 */
export class ResourceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ResourceError";
  }
}

/**
 * Error caused by user-supplied text.
 */
export class UserError extends ResourceError {
  constructor(message: string) {
    super(message);
    this.name = "UserError";
  }
}

/**
 * The text could not be matched to any known resource shape.
 */
export class InvalidResourceException extends UserError {
  constructor(public readonly line: string) {
    super(`could not parse resource: [${line}]`);
    this.name = "InvalidResourceException";
  }
}

/**
 * No collection was given and none could be inferred from the text.
 */
export class UnknownCollectionException extends UserError {
  constructor(public readonly line: string) {
    super(`unknown collection for [${line}]`);
    this.name = "UnknownCollectionException";
  }
}

/**
 * The text named (or resolved to) a collection other than the expected one.
 */
export class WrongResourceCollectionException extends UserError {
  constructor(
    public readonly expected: string,
    public readonly got: string,
    public readonly path: string
  ) {
    super(`wrong collection: expected [${expected}], got [${got}], for path [${path}]`);
    this.name = "WrongResourceCollectionException";
  }
}

/**
 * A collection-path had a number of fields the collection cannot accept,
 * or an empty field.
 */
export class WrongFieldNumberException extends UserError {
  constructor(
    public readonly path: string,
    public readonly params: readonly string[]
  ) {
    super(`wrong number of fields: [${path}] does not match any of ${acceptedShapes(params)}`);
    this.name = "WrongFieldNumberException";
  }
}

/**
 * A parameter was still unknown after every resolver was tried.
 */
export class UnknownFieldException extends UserError {
  constructor(
    public readonly path: string,
    public readonly field: string
  ) {
    super(`unknown field [${field}] in [${path}]`);
    this.name = "UnknownFieldException";
  }
}

/**
 * A URL without an http(s) scheme was given where an endpoint was expected.
 */
export class InvalidEndpointException extends UserError {
  constructor(public readonly url: string) {
    super(`invalid endpoint: [${url}] must start with http:// or https://`);
    this.name = "InvalidEndpointException";
  }
}

/**
 * Error caused by the schemas or defaults fed into a registry.
 */
export class ConfigurationError extends ResourceError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Two different APIs define the same collection id.
 */
export class AmbiguousAPIException extends ConfigurationError {
  constructor(
    public readonly collection: string,
    public readonly apis: readonly string[]
  ) {
    super(`collection [${collection}] defined in multiple APIs: ${apis.join(", ")}`);
    this.name = "AmbiguousAPIException";
  }
}

/**
 * Two collections map to the same URL shape, or a trie level would mix
 * literal and parameter segments.
 */
export class AmbiguousResourcePathException extends ConfigurationError {
  constructor(
    public readonly collection: string,
    public readonly conflict: string
  ) {
    super(`cannot register [${collection}]: ${conflict}`);
    this.name = "AmbiguousResourcePathException";
  }
}

/**
 * A collection schema or catalog definition is malformed.
 */
export class MalformedSchemaException extends ConfigurationError {
  constructor(
    message: string,
    public readonly issues: readonly ZodIssue[] = []
  ) {
    super(message);
    this.name = "MalformedSchemaException";
  }
}

/**
 * A default resolver was registered without an api or param.
 */
export class InvalidDefaultException extends ConfigurationError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidDefaultException";
  }
}

/**
 * The catalog knows nothing about the requested API or version.
 */
export class UnknownApiException extends ConfigurationError {
  constructor(
    public readonly api: string,
    public readonly version?: string | undefined
  ) {
    super(
      version === undefined
        ? `unknown API [${api}]`
        : `unknown version [${version}] of API [${api}]`
    );
    this.name = "UnknownApiException";
  }
}

/**
 * Render the path shapes a collection accepts, for error messages: the
 * terminal param alone, all but the first param, every param, and every
 * param after a leading slash.
 */
function acceptedShapes(params: readonly string[]): string {
  const upper = params.map((p) => p.toUpperCase());
  const shapes = new Set([
    upper.slice(-1).join("/"),
    upper.slice(1).join("/"),
    upper.join("/"),
    "/" + upper.join("/"),
  ]);
  shapes.delete("");
  return Array.from(shapes).join(", ");
}
