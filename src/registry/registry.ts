import { resolveOptions, type RegistryConfig, type RegistryOptions } from "../config.js";
import {
  InvalidResourceException,
  UnknownApiException,
  UnknownCollectionException,
  WrongResourceCollectionException,
} from "../errors.js";
import * as logger from "../logger.js";
import { parseCollectionPath } from "../refs/collection-path.js";
import type { Reference } from "../refs/reference.js";
import type { ParseContext, ResolverInput } from "../refs/resolver.js";
import { MemoryCatalog, type ApiCatalog } from "../schema/catalog.js";
import {
  apiNameOf,
  collectionInfo,
  defineCollection,
  type CollectionSchema,
  type TemplateToken,
} from "../schema/collection.js";
import { CollectionIndex } from "./collection-index.js";
import { DefaultResolverTable } from "./defaults.js";
import { hasHttpScheme, splitResourceUrl } from "./endpoint.js";
import { CollectionParser, type ParserHost } from "./parser.js";
import {
  isStorageShorthand,
  parseStorageShorthand,
  storageTargetFromUrl,
  type StorageTarget,
} from "./storage.js";
import { UrlTrie } from "./url-trie.js";

/**
 * An API version to switch to. Without `schemas` the catalog supplies them.
 */
export interface ApiVersion {
  api: string;
  version: string;
  schemas?: CollectionSchema[] | undefined;
}

/**
 * Options for `Registry.parse`.
 */
export interface ParseOptions {
  /** Resolvers for params the text does not give */
  params?: ParseContext | undefined;
  /** Expected collection; required unless the text names one */
  collection?: string | undefined;
  /** Fail when a URL points into a collection other than `collection` (default: true) */
  enforceCollection?: boolean | undefined;
  /** Resolve every param before returning (default: true) */
  resolve?: boolean | undefined;
}

/**
 * Registry of resource collections and the parsers that turn text into
 * references to them.
 *
 * API versions are materialized from the catalog the first time they are
 * needed. URL templates accumulate in a trie that only ever grows. Parsers
 * are kept per API version; collection-paths go to the version `registerApi`
 * settles on, which only an explicit switch replaces.
 */
export class Registry implements ParserHost {
  private index = new CollectionIndex();
  private trie = new UrlTrie();
  private defaults = new DefaultResolverTable();
  private knownApis = new Map<string, Set<string>>();

  readonly config: RegistryConfig;

  constructor(
    private readonly catalog: ApiCatalog = new MemoryCatalog(),
    options: RegistryOptions = {}
  ) {
    this.config = resolveOptions(options);
  }

  /**
   * Register one collection of an API version.
   *
   * @throws MalformedSchemaException if the schema is invalid
   * @throws AmbiguousAPIException if another API already owns the collection id
   * @throws AmbiguousResourcePathException if its URL shape clashes with a registered one
   */
  registerSchema(api: string, version: string, schema: CollectionSchema): void {
    const parser = new CollectionParser(collectionInfo(api, version, defineCollection(schema)), this);
    this.index.checkClaim(parser);
    this.trie.insert(trieTokens(parser), parser);
    this.index.claim(parser);
    this.markKnown(api, version);
  }

  /**
   * Make sure an API version has been registered, loading it from the
   * catalog if needed. Without a version, the single known version is used
   * if there is exactly one, else the catalog default.
   *
   * @returns The version in effect
   * @throws UnknownApiException if the catalog does not know the API or version
   */
  registerApi(api: string, version?: string): string {
    const effective = version ?? this.preferredVersion(api);
    if (effective === undefined) {
      throw new UnknownApiException(api);
    }
    if (this.knownApis.get(api)?.has(effective)) {
      return effective;
    }

    const schemas = this.catalog.collections(api, effective);
    if (!schemas) {
      throw new UnknownApiException(api, effective);
    }
    for (const schema of schemas) {
      this.registerSchema(api, effective, schema);
    }
    this.markKnown(api, effective);
    logger.debug("registered API", { api, version: effective, collections: schemas.length });
    return effective;
  }

  /**
   * Replace the parsers of an API with those of another version and forget
   * its other known versions. URL templates of previous versions stay
   * registered.
   *
   * @throws UnknownApiException if no schemas are given and the catalog lacks the version
   */
  switchApi(api: string, version: string, schemas?: CollectionSchema[]): void {
    const source = schemas ?? this.catalog.collections(api, version);
    if (!source) {
      throw new UnknownApiException(api, version);
    }

    const parsers = source.map(
      (schema) => new CollectionParser(collectionInfo(api, version, defineCollection(schema)), this)
    );
    for (const parser of parsers) {
      this.trie.insert(trieTokens(parser), parser);
    }
    this.index.supersede(api, parsers);
    this.knownApis.delete(api);
    this.markKnown(api, version);
    logger.debug("switched API", { api, version, collections: parsers.length });
  }

  /**
   * Copy this registry and switch the given APIs on the copy only.
   * Parsers of the copy refer to the copy, so defaults set on it do not leak
   * back into this registry.
   */
  cloneAndSwitchApis(...apis: ApiVersion[]): Registry {
    const clone = new Registry(this.catalog, this.config);

    const rebound = new Map<CollectionParser, CollectionParser>();
    const rebind = (parser: CollectionParser): CollectionParser => {
      let copy = rebound.get(parser);
      if (!copy) {
        copy = parser.rebind(clone);
        rebound.set(parser, copy);
      }
      return copy;
    };

    clone.index = this.index.clone(rebind);
    clone.trie = this.trie.clone(rebind);
    clone.defaults = this.defaults.clone();
    for (const [api, versions] of this.knownApis) {
      clone.knownApis.set(api, new Set(versions));
    }

    for (const { api, version, schemas } of apis) {
      clone.switchApi(api, version, schemas);
    }
    logger.debug("cloned registry", { switched: apis.map((a) => `${a.api}/${a.version}`) });
    return clone;
  }

  /**
   * Ids of the collections that currently parse collection-paths, sorted.
   */
  collections(): string[] {
    const ids: string[] = [];
    for (const api of this.knownApis.keys()) {
      const version = this.preferredVersion(api);
      if (version !== undefined) {
        ids.push(...this.index.ids(api, version));
      }
    }
    return ids.sort();
  }

  /**
   * Provide a fallback for a param.
   *
   * @param collection - A collection id, or null for every collection of `api`
   */
  setDefault(api: string, collection: string | null, param: string, resolver: ResolverInput): void {
    this.defaults.setDefault(api, collection, param, resolver);
  }

  getDefault(api: string, collection: string | null, param: string): string | undefined {
    return this.defaults.getDefault(api, collection, param);
  }

  isLegacyUnquoted(api: string): boolean {
    return this.config.legacyUnquotedApis.includes(api);
  }

  /**
   * Parse text into a reference.
   *
   * Accepts URLs, storage shorthand, `collection::path`, and bare
   * collection-paths (with `options.collection`). Text may be omitted when
   * a collection is given, in which case every param comes from `params`.
   *
   * @throws UnknownCollectionException if no collection is given or inferable
   * @throws WrongResourceCollectionException if the text names another collection
   */
  parse(text: string | undefined, options: ParseOptions = {}): Reference {
    const { params = {}, collection, enforceCollection = true, resolve = true } = options;

    if (text) {
      if (hasHttpScheme(text)) {
        const ref = this.parseUrlOrStorage(text);
        if (enforceCollection && collection && ref.collection() !== collection) {
          throw new WrongResourceCollectionException(collection, ref.collection(), ref.selfLink());
        }
        return ref;
      }
      if (isStorageShorthand(text, this.config.storage)) {
        return this.parseStorageShorthand(text);
      }
    }

    let target = collection;
    if (!target) {
      target = text ? parseCollectionPath(text).collection : undefined;
      if (!target) {
        throw new UnknownCollectionException(text ?? "");
      }
    }

    if (target === this.config.storage.objectsCollection) {
      return this.parseStorageObjectPath(text, params, resolve);
    }
    return this.parseCollectionPath(target, text, params, resolve);
  }

  /**
   * Build a reference from known param values.
   */
  create(collection: string, params: Readonly<Record<string, string>>): Reference {
    return this.parse(undefined, { collection, params });
  }

  /**
   * Parse a collection-path for a given collection.
   *
   * @throws UnknownCollectionException if the collection is not registered or registrable
   */
  parseCollectionPath(
    collection: string,
    text: string | undefined,
    context: ParseContext = {},
    resolve = true
  ): Reference {
    const api = apiNameOf(collection);
    let version: string;
    try {
      version = this.registerApi(api);
    } catch (e) {
      if (e instanceof UnknownApiException) {
        throw new UnknownCollectionException(collection);
      }
      throw e;
    }

    const parser = this.index.get(api, version, collection);
    if (!parser) {
      throw new UnknownCollectionException(collection);
    }
    return parser.parse(text, context, resolve, this.config.endpointOverrides[api]);
  }

  /**
   * Parse a resource URL. The result is fully resolved.
   *
   * @throws InvalidEndpointException if the URL has no http(s) scheme
   * @throws InvalidResourceException if no registered collection matches
   */
  parseUrl(url: string): Reference {
    const parts = splitResourceUrl(url, this.config);

    // Versions already in the trie match without touching the known versions.
    const version =
      parts.version !== undefined && this.trie.covers(parts.api, parts.version)
        ? parts.version
        : this.registerUrlApi(url, parts.api, parts.version);

    const match = this.trie.match([parts.api, version, ...parts.resourcePath.split("/")]);
    if (!match) {
      throw new InvalidResourceException(url);
    }
    return match.parser.parse(undefined, match.params, true, parts.endpoint);
  }

  /**
   * Parse `gs://bucket` or `gs://bucket/object` (scheme per config).
   *
   * @throws InvalidResourceException for any other shape
   */
  parseStorageShorthand(url: string): Reference {
    return this.storageReference(parseStorageShorthand(url, this.config.storage));
  }

  private registerUrlApi(url: string, api: string, version: string | undefined): string {
    try {
      return this.registerApi(api, version);
    } catch (e) {
      if (e instanceof UnknownApiException) {
        throw new InvalidResourceException(url);
      }
      throw e;
    }
  }

  private parseUrlOrStorage(url: string): Reference {
    try {
      return this.parseUrl(url);
    } catch (e) {
      if (!(e instanceof InvalidResourceException)) {
        throw e;
      }
      const target = storageTargetFromUrl(url, this.config.storage);
      if (!target) {
        throw e;
      }
      logger.debug("storage URL did not match a template, using storage shorthand", { url });
      return this.storageReference(target);
    }
  }

  private parseStorageObjectPath(
    text: string | undefined,
    params: ParseContext,
    resolve: boolean
  ): Reference {
    const objects = this.config.storage.objectsCollection;
    if (params["bucket"] !== undefined && params["object"] !== undefined) {
      return this.parseCollectionPath(objects, undefined, params, resolve);
    }

    const parsed = text ? parseCollectionPath(text) : undefined;
    if (parsed?.collection !== undefined && parsed.collection !== objects) {
      throw new WrongResourceCollectionException(objects, parsed.collection, parsed.original);
    }
    const path = parsed?.path ?? "";
    const slash = path.indexOf("/");
    if (slash <= 0 || slash === path.length - 1) {
      throw new InvalidResourceException(text ?? "");
    }

    return this.parseCollectionPath(
      objects,
      undefined,
      { ...params, bucket: path.slice(0, slash), object: path.slice(slash + 1) },
      resolve
    );
  }

  private storageReference(target: StorageTarget): Reference {
    return this.parseCollectionPath(target.collection, undefined, target.params, true);
  }

  private preferredVersion(api: string): string | undefined {
    const known = Array.from(this.knownApis.get(api) ?? []);
    if (known.length === 1) {
      return known[0];
    }
    // Registries without a catalog entry fall back to the latest registration.
    return this.catalog.defaultVersion(api) ?? known.pop();
  }

  private markKnown(api: string, version: string): void {
    let versions = this.knownApis.get(api);
    if (!versions) {
      versions = new Set();
      this.knownApis.set(api, versions);
    }
    versions.add(version);
  }
}

function trieTokens(parser: CollectionParser): TemplateToken[] {
  return [
    { kind: "literal", value: parser.info.api },
    { kind: "literal", value: parser.info.version },
    ...parser.info.tokens,
  ];
}
