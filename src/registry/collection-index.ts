import { AmbiguousAPIException } from "../errors.js";
import type { CollectionParser } from "./parser.js";

/**
 * Collection-path parsers, keyed by API, version and collection id.
 *
 * Two mutation policies live here as two operations: `claim` for ordinary
 * registration, which may not take an id from another API, and `supersede`
 * for an explicit switch of an API to another version.
 */
export class CollectionIndex {
  private apis = new Map<string, Map<string, Map<string, CollectionParser>>>();

  get(api: string, version: string, id: string): CollectionParser | undefined {
    return this.apis.get(api)?.get(version)?.get(id);
  }

  /**
   * Install a parser under its API version, replacing one with the same id.
   *
   * @throws AmbiguousAPIException if another API already owns the id
   */
  claim(parser: CollectionParser): void {
    this.checkClaim(parser);
    this.parsersOf(parser.info.api, parser.info.version).set(parser.info.id, parser);
  }

  /**
   * Throw what `claim` would throw, without changing anything.
   */
  checkClaim(parser: CollectionParser): void {
    const { id, api, version, baseUrl } = parser.info;
    for (const [owner, versions] of this.apis) {
      if (owner === api) {
        continue;
      }
      for (const parsers of versions.values()) {
        const existing = parsers.get(id);
        if (existing) {
          throw new AmbiguousAPIException(id, [
            `${api}/${version} (${baseUrl})`,
            `${existing.info.api}/${existing.info.version} (${existing.info.baseUrl})`,
          ]);
        }
      }
    }
  }

  /**
   * Drop every parser of `api`, whatever its version, and install `parsers`
   * in their place.
   */
  supersede(api: string, parsers: readonly CollectionParser[]): void {
    this.apis.delete(api);
    for (const parser of parsers) {
      this.parsersOf(api, parser.info.version).set(parser.info.id, parser);
    }
  }

  /**
   * Collection ids of one API version, sorted.
   */
  ids(api: string, version: string): string[] {
    return Array.from(this.apis.get(api)?.get(version)?.keys() ?? []).sort();
  }

  clone(mapParser: (parser: CollectionParser) => CollectionParser): CollectionIndex {
    const copy = new CollectionIndex();
    for (const [api, versions] of this.apis) {
      for (const [version, parsers] of versions) {
        const target = copy.parsersOf(api, version);
        for (const [id, parser] of parsers) {
          target.set(id, mapParser(parser));
        }
      }
    }
    return copy;
  }

  private parsersOf(api: string, version: string): Map<string, CollectionParser> {
    let versions = this.apis.get(api);
    if (!versions) {
      versions = new Map();
      this.apis.set(api, versions);
    }
    let parsers = versions.get(version);
    if (!parsers) {
      parsers = new Map();
      versions.set(version, parsers);
    }
    return parsers;
  }
}
