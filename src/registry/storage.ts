import { InvalidResourceException } from "../errors.js";

/**
 * Where storage shorthand points, and the URLs that spell the same thing.
 */
export interface StorageRules {
  /** Shorthand scheme, e.g. `gs` for `gs://bucket/object` */
  scheme: string;
  bucketsCollection: string;
  objectsCollection: string;
  /** JSON API root: `<root>b/<bucket>/o/<object>` */
  jsonApiUrl: string;
  /** XML API root: `<root><bucket>/<object>` */
  xmlApiUrl: string;
}

/**
 * A storage resource picked out of shorthand or a storage URL.
 */
export interface StorageTarget {
  collection: string;
  params: { bucket: string; object?: string };
}

/**
 * Whether text uses the storage shorthand scheme.
 */
export function isStorageShorthand(text: string, rules: StorageRules): boolean {
  return text.startsWith(`${rules.scheme}://`);
}

/**
 * Parse `scheme://bucket` or `scheme://bucket/object`.
 *
 * @throws InvalidResourceException for any other shape
 */
export function parseStorageShorthand(url: string, rules: StorageRules): StorageTarget {
  const prefix = `${rules.scheme}://`;
  if (!url.startsWith(prefix)) {
    throw new InvalidResourceException(url);
  }
  const target = bucketAndObject(url.slice(prefix.length), rules);
  if (!target) {
    throw new InvalidResourceException(url);
  }
  return target;
}

/**
 * Recognize the JSON and XML storage API URLs.
 *
 * @returns The target, or undefined if the URL is not a storage URL
 */
export function storageTargetFromUrl(url: string, rules: StorageRules): StorageTarget | undefined {
  if (url.startsWith(rules.jsonApiUrl)) {
    const [bucketPrefix, bucket, objectPrefix, ...object] = url
      .slice(rules.jsonApiUrl.length)
      .split("/");
    if (bucketPrefix !== "b" || !bucket) {
      return undefined;
    }
    if (objectPrefix === undefined) {
      return { collection: rules.bucketsCollection, params: { bucket } };
    }
    if (objectPrefix !== "o" || object.length === 0) {
      return undefined;
    }
    return objectTarget(bucket, object.join("/"), rules);
  }

  if (url.startsWith(rules.xmlApiUrl)) {
    return bucketAndObject(url.slice(rules.xmlApiUrl.length), rules);
  }

  return undefined;
}

function bucketAndObject(rest: string, rules: StorageRules): StorageTarget | undefined {
  const slash = rest.indexOf("/");
  if (slash === -1) {
    return rest ? { collection: rules.bucketsCollection, params: { bucket: rest } } : undefined;
  }
  return objectTarget(rest.slice(0, slash), rest.slice(slash + 1), rules);
}

function objectTarget(bucket: string, object: string, rules: StorageRules): StorageTarget | undefined {
  if (!bucket || !object) {
    return undefined;
  }
  return { collection: rules.objectsCollection, params: { bucket, object } };
}
