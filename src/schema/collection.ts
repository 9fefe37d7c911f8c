import { z } from "zod";
import { MalformedSchemaException } from "../errors.js";

/**
 * Pattern for a collection id such as `svc.projects.widgets`.
 */
export const COLLECTION_ID_PATTERN = /^[a-zA-Z_]+(?:\.[a-zA-Z0-9_]+)+$/;

const PLACEHOLDER_PATTERN = /^\{([a-zA-Z_][a-zA-Z0-9_]*)\}$/;

/**
 * Zod schema for the registration input of a single collection.
 */
export const CollectionSchemaSchema = z.object({
  id: z.string().regex(COLLECTION_ID_PATTERN, "collection id must be dotted, e.g. api.things"),
  params: z.array(z.string().min(1)).min(1, "a collection needs at least one param"),
  path: z
    .string()
    .min(1)
    .refine((p) => !p.startsWith("/"), "relative path must not start with /"),
  baseUrl: z
    .string()
    .url()
    .regex(/^https?:\/\//, "base URL must be http(s)")
    .refine((u) => u.endsWith("/"), "base URL must end with /"),
});

/**
 * Static description of one resource collection.
 */
export type CollectionSchema = z.infer<typeof CollectionSchemaSchema>;

/**
 * One segment of a relative path template.
 */
export type TemplateToken =
  | { kind: "literal"; value: string }
  | { kind: "param"; name: string };

/**
 * A validated collection schema bound to the API version that owns it.
 */
export interface CollectionInfo {
  api: string;
  version: string;
  id: string;
  params: readonly string[];
  path: string;
  baseUrl: string;
  tokens: readonly TemplateToken[];
}

/**
 * Validate a collection definition.
 *
 * @throws MalformedSchemaException if the input does not describe a collection
 */
export function defineCollection(input: unknown): CollectionSchema {
  const result = CollectionSchemaSchema.safeParse(input);
  if (!result.success) {
    const id = describeId(input);
    throw new MalformedSchemaException(
      `invalid collection ${id}: ${result.error.issues.map((i) => i.message).join("; ")}`,
      result.error.issues
    );
  }
  // Run the template checks early so callers learn about them at definition time.
  tokenizeTemplate(result.data);
  return result.data;
}

/**
 * Bind a collection schema to an API version, checking its template.
 */
export function collectionInfo(api: string, version: string, schema: CollectionSchema): CollectionInfo {
  return {
    api,
    version,
    id: schema.id,
    params: [...schema.params],
    path: schema.path,
    baseUrl: schema.baseUrl,
    tokens: tokenizeTemplate(schema),
  };
}

/**
 * Split a relative path template into literal and parameter segments.
 * Every parameter must appear exactly once, as a whole segment.
 *
 * @throws MalformedSchemaException if the template and params disagree
 */
export function tokenizeTemplate(schema: CollectionSchema): TemplateToken[] {
  const tokens: TemplateToken[] = [];
  const seen = new Set<string>();

  for (const segment of schema.path.split("/")) {
    const match = PLACEHOLDER_PATTERN.exec(segment);
    if (match?.[1] !== undefined) {
      const name = match[1];
      if (seen.has(name)) {
        throw new MalformedSchemaException(
          `collection [${schema.id}]: placeholder {${name}} appears more than once in ${schema.path}`
        );
      }
      seen.add(name);
      tokens.push({ kind: "param", name });
      continue;
    }
    if (segment === "" || segment.includes("{") || segment.includes("}")) {
      throw new MalformedSchemaException(
        `collection [${schema.id}]: bad segment "${segment}" in ${schema.path}`
      );
    }
    tokens.push({ kind: "literal", value: segment });
  }

  if (seen.size !== schema.params.length || schema.params.some((p) => !seen.has(p))) {
    throw new MalformedSchemaException(
      `collection [${schema.id}]: template ${schema.path} must have exactly one placeholder ` +
        `for each of [${schema.params.join(", ")}]`
    );
  }

  return tokens;
}

/**
 * Expand template tokens, substituting each parameter with `value(name)`.
 */
export function expandTemplate(
  tokens: readonly TemplateToken[],
  value: (name: string) => string
): string {
  return tokens
    .map((token) => (token.kind === "literal" ? token.value : value(token.name)))
    .join("/");
}

/**
 * The API name a collection id belongs to (its first dotted segment).
 */
export function apiNameOf(collection: string): string {
  const dot = collection.indexOf(".");
  return dot === -1 ? collection : collection.slice(0, dot);
}

function describeId(input: unknown): string {
  if (typeof input === "object" && input !== null && "id" in input && typeof input.id === "string") {
    return `[${input.id}]`;
  }
  return "definition";
}
