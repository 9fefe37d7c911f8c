import { WrongFieldNumberException, WrongResourceCollectionException } from "../errors.js";
import type { CollectionInfo } from "../schema/collection.js";
import { parseCollectionPath } from "../refs/collection-path.js";
import { Reference } from "../refs/reference.js";
import type { ParseContext } from "../refs/resolver.js";

/**
 * What a parser needs from the registry that owns it. Parsers keep a
 * non-owning reference to their host; a cloned registry re-binds them.
 */
export interface ParserHost {
  getDefault(api: string, collection: string | null, param: string): string | undefined;
  isLegacyUnquoted(api: string): boolean;
}

/**
 * Turns collection-paths (or keyword context alone) into references for one
 * collection.
 */
export class CollectionParser {
  constructor(
    readonly info: CollectionInfo,
    private readonly host: ParserHost
  ) {}

  /**
   * A copy of this parser bound to another host.
   */
  rebind(host: ParserHost): CollectionParser {
    return new CollectionParser(this.info, host);
  }

  /**
   * Build a reference from a collection-path.
   *
   * @param text - The collection-path, or undefined to take every param from `context`
   * @param context - Resolvers for params the path does not give
   * @param resolve - Whether to resolve the reference before returning it
   * @param baseUrl - Endpoint to use instead of the collection's base URL
   */
  parse(
    text: string | undefined,
    context: ParseContext,
    resolve: boolean,
    baseUrl?: string | undefined
  ): Reference {
    const values =
      text === undefined ? this.info.params.map(() => undefined) : this.fieldsFor(text);

    const ref = new Reference({
      info: this.info,
      values,
      context,
      text,
      baseUrl: baseUrl ?? this.info.baseUrl,
      defaults: (param) => this.host.getDefault(this.info.api, this.info.id, param),
      unquoteLink: this.host.isLegacyUnquoted(this.info.api),
    });

    if (resolve) {
      ref.resolve();
    }
    return ref;
  }

  /**
   * The ordered field values a collection-path supplies. Params the path
   * leaves out come first and are undefined.
   */
  fieldsFor(text: string): Array<string | undefined> {
    const parsed = parseCollectionPath(text);
    const { params } = this.info;

    if (parsed.collection !== undefined && parsed.collection !== this.info.id) {
      throw new WrongResourceCollectionException(this.info.id, parsed.collection, text);
    }

    let fields = parsed.path.split("/");
    if (parsed.isAbsolute) {
      // The leading empty token only marks that every param is present.
      fields = fields.slice(1);
      if (fields.length !== params.length) {
        throw new WrongFieldNumberException(parsed.path, params);
      }
    } else if (
      fields.length !== 1 &&
      fields.length !== params.length - 1 &&
      fields.length !== params.length
    ) {
      // Without a slash: the name alone, everything but the primary param,
      // or every param.
      throw new WrongFieldNumberException(parsed.path, params);
    }

    if (fields.includes("")) {
      throw new WrongFieldNumberException(parsed.path, params);
    }

    const missing: Array<string | undefined> = new Array<undefined>(params.length - fields.length).fill(undefined);
    return [...missing, ...fields];
  }

  /**
   * Help text for the accepted collection-path shapes,
   * e.g. `[svc.projects.widgets::][[/project]/]widget`.
   */
  describe(): string {
    let path = "";
    for (const param of this.info.params) {
      path = path === "" ? `[/${param}]` : `[${path}/]${param}`;
    }
    if (this.info.params.length === 1) {
      path = this.info.params[0] ?? "";
    }
    return `[${this.info.id}::]${path}`;
  }

  toString(): string {
    return this.describe();
  }
}
