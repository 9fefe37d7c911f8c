import process from "node:process";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";

const withTrailingSlash = (url: string): string => (url.endsWith("/") ? url : url + "/");

const StorageOptionsSchema = z.object({
  scheme: z.string().regex(/^[a-z][a-z0-9+.-]*$/).default("gs"),
  bucketsCollection: z.string().default("storage.buckets"),
  objectsCollection: z.string().default("storage.objects"),
  jsonApiUrl: z.string().url().transform(withTrailingSlash).default("https://www.googleapis.com/storage/v1/"),
  xmlApiUrl: z.string().url().transform(withTrailingSlash).default("https://storage.googleapis.com/"),
});

/**
 * Zod schema for registry options. Every field has a default.
 */
export const RegistryOptionsSchema = z.object({
  /** Domain whose subdomains name APIs (`svc.googleapis.com` is API `svc`) */
  serviceDomain: z.string().min(1).default("googleapis.com"),
  /** API name to the endpoint URL that replaces its standard base URL */
  endpointOverrides: z
    .record(z.string(), z.string().url().regex(/^https?:\/\//).transform(withTrailingSlash))
    .default({}),
  /** APIs whose self-links are percent-decoded after composition */
  legacyUnquotedApis: z.array(z.string()).default(["compute", "clouduseraccounts", "storage"]),
  storage: StorageOptionsSchema.default({}),
});

/**
 * Options as callers write them.
 */
export type RegistryOptions = z.input<typeof RegistryOptionsSchema>;

/**
 * Options with every default filled in.
 */
export type RegistryConfig = z.output<typeof RegistryOptionsSchema>;

/**
 * Validate options and fill in defaults.
 *
 * @throws ConfigurationError if the options are malformed
 */
export function resolveOptions(options: RegistryOptions = {}): RegistryConfig {
  const result = RegistryOptionsSchema.safeParse(options);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigurationError(`invalid registry options: ${issues.join("; ")}`);
  }
  return result.data;
}

/**
 * Read options from the environment:
 *
 * - COLLECTION_REFS_ENDPOINT_OVERRIDES: JSON object of API name to endpoint URL
 * - COLLECTION_REFS_SERVICE_DOMAIN: service domain
 *
 * @throws ConfigurationError if the overrides are not a JSON object
 */
export function optionsFromEnv(env: NodeJS.ProcessEnv = process.env): RegistryOptions {
  const options: RegistryOptions = {};

  const domain = env["COLLECTION_REFS_SERVICE_DOMAIN"];
  if (domain) {
    options.serviceDomain = domain;
  }

  const overrides = env["COLLECTION_REFS_ENDPOINT_OVERRIDES"];
  if (overrides) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(overrides);
    } catch (e) {
      throw new ConfigurationError(
        `COLLECTION_REFS_ENDPOINT_OVERRIDES is not valid JSON: ${e instanceof Error ? e.message : String(e)}`
      );
    }
    const record = z.record(z.string(), z.string()).safeParse(parsed);
    if (!record.success) {
      throw new ConfigurationError("COLLECTION_REFS_ENDPOINT_OVERRIDES must map API names to URLs");
    }
    options.endpointOverrides = record.data;
  }

  return options;
}
