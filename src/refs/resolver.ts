/**
 * A way to fill a resource parameter that the text did not supply.
 *
 * - literal: a fixed value
 * - function: computed when the reference is resolved; returning undefined
 *   means "no value available" and lets the next resolver try
 */
export type Resolver =
  | { kind: "literal"; value: string }
  | { kind: "function"; fn: () => string | undefined };

/**
 * Resolver inputs accepted at the API surface. A plain string is a literal.
 */
export type ResolverInput = Resolver | string;

/**
 * Keyword context passed to a parse: param name to resolver.
 */
export type ParseContext = Readonly<Record<string, ResolverInput>>;

export function literal(value: string): Resolver {
  return { kind: "literal", value };
}

export function lazy(fn: () => string | undefined): Resolver {
  return { kind: "function", fn };
}

export function toResolver(input: ResolverInput): Resolver {
  return typeof input === "string" ? literal(input) : input;
}

/**
 * Evaluate a resolver. Empty strings count as "no value".
 */
export function evaluate(resolver: Resolver): string | undefined {
  const value = resolver.kind === "literal" ? resolver.value : resolver.fn();
  return value === "" ? undefined : value;
}
