import { UnknownFieldException } from "../errors.js";
import { expandTemplate, type CollectionInfo } from "../schema/collection.js";
import { evaluate, toResolver, type ParseContext } from "./resolver.js";

/**
 * Everything a parser hands to a new reference.
 */
export interface ReferenceInit {
  info: CollectionInfo;
  /** Values aligned with `info.params`; undefined where not yet known */
  values: ReadonlyArray<string | undefined>;
  context: ParseContext;
  /** The text the reference was parsed from, for error messages */
  text?: string | undefined;
  /** Endpoint the self-link is composed against */
  baseUrl: string;
  /** Registry defaults for this collection */
  defaults: (param: string) => string | undefined;
  /** Percent-decode the composed self-link */
  unquoteLink: boolean;
}

/**
 * A reference to one resource of a collection, possibly partially resolved.
 *
 * Missing params are filled lazily by `weakResolve()`/`resolve()` from the
 * parse context first, then from the registry defaults. Filled params are
 * never overwritten.
 */
export class Reference {
  private readonly info: CollectionInfo;
  private readonly values = new Map<string, string>();
  private readonly context: ParseContext;
  private readonly contextCache = new Map<string, string | undefined>();
  private readonly defaults: (param: string) => string | undefined;
  private readonly unquoteLink: boolean;
  private link = "";

  readonly text: string | undefined;
  readonly baseUrl: string;

  constructor(init: ReferenceInit) {
    this.info = init.info;
    this.context = init.context;
    this.defaults = init.defaults;
    this.unquoteLink = init.unquoteLink;
    this.text = init.text;
    this.baseUrl = init.baseUrl;

    init.info.params.forEach((param, i) => {
      const value = init.values[i];
      if (value !== undefined && value !== "") {
        this.values.set(param, value);
      }
    });
    this.composeLink();
  }

  collection(): string {
    return this.info.id;
  }

  /**
   * The API and version whose schema produced this reference.
   */
  api(): { name: string; version: string } {
    return { name: this.info.api, version: this.info.version };
  }

  /**
   * The ordered params of the collection.
   */
  paramNames(): readonly string[] {
    return this.info.params;
  }

  /**
   * Current value of a param, without resolving anything.
   */
  get(param: string): string | undefined {
    return this.values.get(param);
  }

  /**
   * Snapshot of the current values, in param order.
   */
  params(): Record<string, string | undefined> {
    const out: Record<string, string | undefined> = {};
    for (const param of this.info.params) {
      out[param] = this.values.get(param);
    }
    return out;
  }

  /**
   * Fill what can be filled. Never throws for params that stay unknown.
   */
  weakResolve(): void {
    for (const param of this.info.params) {
      if (this.values.has(param)) {
        continue;
      }
      const value = this.fromContext(param) ?? this.defaults(param);
      if (value !== undefined && value !== "") {
        this.values.set(param, value);
      }
    }
    this.composeLink();
  }

  /**
   * Fill every param.
   *
   * @throws UnknownFieldException naming the first param still unknown
   */
  resolve(): void {
    this.weakResolve();
    for (const param of this.info.params) {
      this.require(param);
    }
  }

  /**
   * The value of the terminal param, which names this specific resource.
   */
  name(): string {
    this.resolve();
    return this.require(this.terminal());
  }

  selfLink(): string {
    this.resolve();
    return this.link;
  }

  /**
   * The self-link with `*` in place of params that could not be resolved.
   */
  weakSelfLink(): string {
    this.weakResolve();
    return this.link;
  }

  equals(other: Reference): boolean {
    return this.selfLink() === other.selfLink();
  }

  toString(): string {
    return this.selfLink();
  }

  private terminal(): string {
    return this.info.params[this.info.params.length - 1] ?? "";
  }

  private require(param: string): string {
    const value = this.values.get(param);
    if (value === undefined) {
      throw new UnknownFieldException(this.text ?? this.info.id, param);
    }
    return value;
  }

  private fromContext(param: string): string | undefined {
    if (this.contextCache.has(param)) {
      return this.contextCache.get(param);
    }
    const input = this.context[param];
    if (input === undefined) {
      return undefined;
    }
    const value = evaluate(toResolver(input));
    this.contextCache.set(param, value);
    return value;
  }

  private composeLink(): void {
    const relative = expandTemplate(this.info.tokens, (param) => {
      const value = this.values.get(param);
      return value === undefined ? "*" : encodeURIComponent(value);
    });
    const link = this.baseUrl + relative;
    this.link = this.unquoteLink ? unquote(link) : link;
  }
}

/**
 * Percent-decode a URL, leaving it unchanged where it is not valid percent-encoding.
 */
export function unquote(text: string): string {
  try {
    return decodeURIComponent(text);
  } catch (e) {
    if (e instanceof URIError) {
      return text;
    }
    throw e;
  }
}
