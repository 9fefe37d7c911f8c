import { InvalidDefaultException } from "../errors.js";
import { evaluate, toResolver, type Resolver, type ResolverInput } from "../refs/resolver.js";

const WILDCARD = "*";

/**
 * Parameter fallbacks keyed by param, then api, then collection id
 * (or the wildcard, for every collection of the api).
 */
export class DefaultResolverTable {
  private table = new Map<string, Map<string, Map<string, Resolver>>>();

  /**
   * Register or overwrite a default.
   *
   * @param collection - A collection id, or null for every collection in `api`
   * @throws InvalidDefaultException if api or param is empty
   */
  setDefault(api: string, collection: string | null, param: string, resolver: ResolverInput): void {
    if (!api) {
      throw new InvalidDefaultException("provided api cannot be empty");
    }
    if (!param) {
      throw new InvalidDefaultException("provided param cannot be empty");
    }

    let byApi = this.table.get(param);
    if (!byApi) {
      byApi = new Map();
      this.table.set(param, byApi);
    }
    let byCollection = byApi.get(api);
    if (!byCollection) {
      byCollection = new Map();
      byApi.set(api, byCollection);
    }
    byCollection.set(collection ?? WILDCARD, toResolver(resolver));
  }

  /**
   * Look up the default value for a param. The collection's own entry wins;
   * the wildcard entry is used when it is missing or yields nothing.
   *
   * @returns The value, or undefined when no default applies
   */
  getDefault(api: string, collection: string | null, param: string): string | undefined {
    const byCollection = this.table.get(param)?.get(api);
    if (!byCollection) {
      return undefined;
    }

    if (collection !== null) {
      const exact = byCollection.get(collection);
      const value = exact ? evaluate(exact) : undefined;
      if (value !== undefined) {
        return value;
      }
    }

    const wildcard = byCollection.get(WILDCARD);
    return wildcard ? evaluate(wildcard) : undefined;
  }

  /**
   * Whether an entry (not necessarily a value) exists for exactly this key.
   */
  has(api: string, collection: string | null, param: string): boolean {
    return this.table.get(param)?.get(api)?.has(collection ?? WILDCARD) ?? false;
  }

  /**
   * Copy the table structure. Resolvers are immutable and shared.
   */
  clone(): DefaultResolverTable {
    const copy = new DefaultResolverTable();
    for (const [param, byApi] of this.table) {
      const apis = new Map<string, Map<string, Resolver>>();
      for (const [api, byCollection] of byApi) {
        apis.set(api, new Map(byCollection));
      }
      copy.table.set(param, apis);
    }
    return copy;
  }
}
