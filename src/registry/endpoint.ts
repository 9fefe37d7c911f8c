import { InvalidEndpointException, InvalidResourceException } from "../errors.js";

const SCHEME_PATTERN = /^https?:\/\//;
const VERSION_PATTERN = /^(?:v\d+[a-z0-9]*|alpha|beta|preview)$/;

/**
 * A resource URL split at the boundary between its endpoint and the path the
 * collection template describes.
 */
export interface UrlParts {
  api: string;
  /** Undefined when the URL carries no version and the API default applies */
  version?: string | undefined;
  /** Everything before the resource path, ending in "/" */
  endpoint: string;
  /** The path the collection template matches */
  resourcePath: string;
}

export interface EndpointRules {
  /** Domain whose subdomains name APIs, e.g. `googleapis.com` */
  serviceDomain: string;
  /** API name to endpoint URL (ending in "/") that replaces its standard one */
  endpointOverrides: Readonly<Record<string, string>>;
}

/**
 * Whether a path segment names an API version (`v1`, `v1beta2`, `alpha`...).
 */
export function looksLikeVersion(segment: string): boolean {
  return VERSION_PATTERN.test(segment);
}

/**
 * Whether the text starts with an http(s) scheme.
 */
export function hasHttpScheme(text: string): boolean {
  return SCHEME_PATTERN.test(text);
}

/**
 * Work out which API and version a resource URL belongs to.
 *
 * Endpoint overrides are tried first. Otherwise hosts of the form
 * `<api>.<serviceDomain>` name the API, optionally followed by a version
 * segment; any other host carries api and version as the first two path
 * segments.
 *
 * @throws InvalidEndpointException if the URL has no http(s) scheme
 * @throws InvalidResourceException if no api, version or resource path can be found
 */
export function splitResourceUrl(url: string, rules: EndpointRules): UrlParts {
  const scheme = SCHEME_PATTERN.exec(url)?.[0];
  if (scheme === undefined) {
    throw new InvalidEndpointException(url);
  }

  const overridden = fromOverride(url, rules.endpointOverrides);
  if (overridden) {
    return requirePath(url, overridden);
  }

  const rest = url.slice(scheme.length);
  const slash = rest.indexOf("/");
  if (slash === -1) {
    throw new InvalidResourceException(url);
  }
  const host = rest.slice(0, slash);
  const segments = rest.slice(slash + 1).split("/");
  const origin = scheme + host + "/";

  const api = apiFromHost(host, rules.serviceDomain);
  if (api !== undefined) {
    const first = segments[0] ?? "";
    if (looksLikeVersion(first)) {
      return requirePath(url, {
        api,
        version: first,
        endpoint: `${origin}${first}/`,
        resourcePath: segments.slice(1).join("/"),
      });
    }
    return requirePath(url, { api, endpoint: origin, resourcePath: segments.join("/") });
  }

  const [pathApi, pathVersion, ...resource] = segments;
  if (!pathApi || !pathVersion) {
    throw new InvalidResourceException(url);
  }
  return requirePath(url, {
    api: pathApi,
    version: pathVersion,
    endpoint: `${origin}${pathApi}/${pathVersion}/`,
    resourcePath: resource.join("/"),
  });
}

function apiFromHost(host: string, serviceDomain: string): string | undefined {
  const hostname = host.replace(/:\d+$/, "").toLowerCase();
  const suffix = "." + serviceDomain.toLowerCase();
  if (!hostname.endsWith(suffix)) {
    return undefined;
  }
  const subdomain = hostname.slice(0, -suffix.length);
  if (subdomain === "" || subdomain === "www" || subdomain.includes(".")) {
    return undefined;
  }
  return subdomain;
}

function fromOverride(
  url: string,
  overrides: Readonly<Record<string, string>>
): UrlParts | undefined {
  // Longest override first, so nested endpoints win over their parents.
  const candidates = Object.entries(overrides).sort(([, a], [, b]) => b.length - a.length);

  for (const [api, endpoint] of candidates) {
    if (!url.startsWith(endpoint)) {
      continue;
    }
    const rest = url.slice(endpoint.length);
    const endpointVersion = endpoint.split("/").filter(Boolean).pop();
    if (endpointVersion !== undefined && looksLikeVersion(endpointVersion)) {
      return { api, version: endpointVersion, endpoint, resourcePath: rest };
    }

    const [first = "", ...others] = rest.split("/");
    if (looksLikeVersion(first)) {
      return {
        api,
        version: first,
        endpoint: `${endpoint}${first}/`,
        resourcePath: others.join("/"),
      };
    }
    return { api, endpoint, resourcePath: rest };
  }

  return undefined;
}

function requirePath(url: string, parts: UrlParts): UrlParts {
  if (parts.resourcePath === "") {
    throw new InvalidResourceException(url);
  }
  return parts;
}
