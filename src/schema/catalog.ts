import { z } from "zod";
import { MalformedSchemaException } from "../errors.js";
import { CollectionSchemaSchema, tokenizeTemplate, type CollectionSchema } from "./collection.js";

/**
 * Source of collection schemas, consulted lazily by a registry the first time
 * an API version is needed.
 */
export interface ApiCatalog {
  /**
   * The version used when a caller does not name one, or undefined if the
   * API is unknown.
   */
  defaultVersion(api: string): string | undefined;

  /**
   * The collections of one API version, or undefined if unknown.
   */
  collections(api: string, version: string): CollectionSchema[] | undefined;
}

/**
 * Zod schema for a serialized catalog:
 *
 * @example
 * {
 *   "svc": {
 *     "defaultVersion": "v1",
 *     "versions": {
 *       "v1": [{ "id": "svc.projects", "params": ["project"], ... }]
 *     }
 *   }
 * }
 */
export const CatalogDefinitionSchema = z.record(
  z.string().regex(/^[a-zA-Z_][a-zA-Z0-9_]*$/, "API names are single identifiers"),
  z.object({
    defaultVersion: z.string().min(1).optional(),
    versions: z.record(z.string().min(1), z.array(CollectionSchemaSchema)),
  })
);

export type CatalogDefinition = z.infer<typeof CatalogDefinitionSchema>;

/**
 * Validate a catalog definition (for example, parsed JSON).
 *
 * @throws MalformedSchemaException if the definition is malformed
 */
export function parseCatalog(input: unknown): CatalogDefinition {
  const result = CatalogDefinitionSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues;
    throw new MalformedSchemaException(
      `invalid catalog: ${issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
      issues
    );
  }

  for (const [api, entry] of Object.entries(result.data)) {
    if (entry.defaultVersion !== undefined && !(entry.defaultVersion in entry.versions)) {
      throw new MalformedSchemaException(
        `invalid catalog: default version [${entry.defaultVersion}] of API [${api}] is not defined`
      );
    }
    for (const schemas of Object.values(entry.versions)) {
      for (const schema of schemas) {
        tokenizeTemplate(schema);
      }
    }
  }

  return result.data;
}

interface ApiEntry {
  defaultVersion?: string | undefined;
  versions: Map<string, CollectionSchema[]>;
}

/**
 * In-memory catalog, used by tests and by embedders that already hold their
 * schemas.
 */
export class MemoryCatalog implements ApiCatalog {
  private apis = new Map<string, ApiEntry>();

  constructor(definition?: CatalogDefinition) {
    if (definition) {
      for (const [api, entry] of Object.entries(definition)) {
        for (const [version, schemas] of Object.entries(entry.versions)) {
          this.add(api, version, schemas, { isDefault: entry.defaultVersion === version });
        }
      }
    }
  }

  /**
   * Build a catalog from untrusted input, validating it first.
   */
  static fromJSON(input: unknown): MemoryCatalog {
    return new MemoryCatalog(parseCatalog(input));
  }

  /**
   * Add (or replace) the collections of an API version.
   */
  add(
    api: string,
    version: string,
    schemas: CollectionSchema[],
    options: { isDefault?: boolean } = {}
  ): this {
    let entry = this.apis.get(api);
    if (!entry) {
      entry = { versions: new Map() };
      this.apis.set(api, entry);
    }
    entry.versions.set(version, [...schemas]);
    if (options.isDefault) {
      entry.defaultVersion = version;
    }
    return this;
  }

  defaultVersion(api: string): string | undefined {
    const entry = this.apis.get(api);
    if (!entry) {
      return undefined;
    }
    if (entry.defaultVersion !== undefined) {
      return entry.defaultVersion;
    }
    // A single version is the default by construction.
    if (entry.versions.size === 1) {
      return entry.versions.keys().next().value;
    }
    return undefined;
  }

  collections(api: string, version: string): CollectionSchema[] | undefined {
    const schemas = this.apis.get(api)?.versions.get(version);
    return schemas ? [...schemas] : undefined;
  }
}
