// collection-refs - resolve names, collection-paths and URLs into typed resource references

// Registry
export {
  Registry,
  type ApiVersion,
  type ParseOptions,
} from "./registry/registry.js";
export { CollectionParser, type ParserHost } from "./registry/parser.js";
export { DefaultResolverTable } from "./registry/defaults.js";
export { CollectionIndex } from "./registry/collection-index.js";
export { UrlTrie, type TrieMatch } from "./registry/url-trie.js";
export {
  splitResourceUrl,
  looksLikeVersion,
  hasHttpScheme,
  type UrlParts,
  type EndpointRules,
} from "./registry/endpoint.js";
export {
  parseStorageShorthand,
  storageTargetFromUrl,
  isStorageShorthand,
  type StorageRules,
  type StorageTarget,
} from "./registry/storage.js";

// References
export { Reference, unquote, type ReferenceInit } from "./refs/reference.js";
export { parseCollectionPath, type ParsedCollectionPath } from "./refs/collection-path.js";
export {
  literal,
  lazy,
  evaluate,
  toResolver,
  type Resolver,
  type ResolverInput,
  type ParseContext,
} from "./refs/resolver.js";

// Schemas and catalogs
export {
  defineCollection,
  collectionInfo,
  tokenizeTemplate,
  expandTemplate,
  apiNameOf,
  CollectionSchemaSchema,
  COLLECTION_ID_PATTERN,
  type CollectionSchema,
  type CollectionInfo,
  type TemplateToken,
} from "./schema/collection.js";
export {
  MemoryCatalog,
  parseCatalog,
  CatalogDefinitionSchema,
  type ApiCatalog,
  type CatalogDefinition,
} from "./schema/catalog.js";

// Configuration
export {
  resolveOptions,
  optionsFromEnv,
  RegistryOptionsSchema,
  type RegistryOptions,
  type RegistryConfig,
} from "./config.js";

// Logging
export {
  debug,
  info,
  warn,
  error,
  onLog,
  setLogLevel,
  getLogLevel,
  levelFromEnv,
  type LogLevel,
  type LogEntry,
  type LogCallback,
} from "./logger.js";

// Errors
export {
  ResourceError,
  UserError,
  ConfigurationError,
  InvalidResourceException,
  UnknownCollectionException,
  WrongResourceCollectionException,
  WrongFieldNumberException,
  UnknownFieldException,
  InvalidEndpointException,
  AmbiguousAPIException,
  AmbiguousResourcePathException,
  MalformedSchemaException,
  InvalidDefaultException,
  UnknownApiException,
} from "./errors.js";
