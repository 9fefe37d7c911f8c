import { AmbiguousResourcePathException } from "../errors.js";
import type { TemplateToken } from "../schema/collection.js";
import { unquote } from "../refs/reference.js";
import type { CollectionParser } from "./parser.js";

/**
 * One level of the trie. A level holds either literal children or a single
 * parameter child, never both; `leaf` marks that a URL may end here.
 */
interface TrieNode {
  literals: Map<string, TrieNode>;
  param?: { name: string; node: TrieNode } | undefined;
  leaf?: CollectionParser | undefined;
}

/**
 * Result of matching URL tokens against the trie.
 */
export interface TrieMatch {
  parser: CollectionParser;
  params: Record<string, string>;
}

function emptyNode(): TrieNode {
  return { literals: new Map() };
}

/**
 * Prefix tree matching URL segments against registered path templates.
 * The first two levels are the API name and version. Entries are only ever
 * added, so URLs of superseded versions keep matching.
 */
export class UrlTrie {
  private root: TrieNode = emptyNode();

  /**
   * Add a template, reusing existing branches.
   *
   * @throws AmbiguousResourcePathException if the template would mix literal
   *   and parameter segments at one level, or end where another collection does
   */
  insert(tokens: readonly TemplateToken[], parser: CollectionParser): void {
    // Check the whole path first so a rejected template leaves no branches behind.
    this.check(tokens, parser);

    let node = this.root;
    for (const token of tokens) {
      if (token.kind === "literal") {
        let next = node.literals.get(token.value);
        if (!next) {
          next = emptyNode();
          node.literals.set(token.value, next);
        }
        node = next;
      } else {
        if (!node.param) {
          node.param = { name: token.name, node: emptyNode() };
        }
        node = node.param.node;
      }
    }
    node.leaf = parser;
  }

  /**
   * Walk the trie with URL tokens.
   *
   * @returns The match, or undefined if no registered shape fits
   */
  match(tokens: readonly string[]): TrieMatch | undefined {
    const params: Record<string, string> = {};
    let node = this.root;

    for (let i = 0; i < tokens.length; i++) {
      const token = tokens[i] ?? "";
      const literal = node.literals.get(token);
      if (literal) {
        node = literal;
        continue;
      }

      const param = node.param;
      if (!param || token === "") {
        return undefined;
      }

      const next = param.node;
      if (next.leaf && next.literals.size === 0 && !next.param) {
        // Last param: resource names may themselves contain "/".
        params[param.name] = unquote(tokens.slice(i).join("/"));
        node = next;
        break;
      }

      params[param.name] = unquote(token);
      node = next;
    }

    return node.leaf ? { parser: node.leaf, params } : undefined;
  }

  /**
   * Copy the trie, mapping every leaf parser (e.g. onto a cloned registry).
   */
  clone(mapParser: (parser: CollectionParser) => CollectionParser): UrlTrie {
    const copy = new UrlTrie();
    copy.root = cloneNode(this.root, mapParser);
    return copy;
  }

  /**
   * Number of templates that end in the trie.
   */
  size(): number {
    return countLeaves(this.root);
  }

  /**
   * Whether templates of an API version have been inserted.
   */
  covers(api: string, version: string): boolean {
    return this.root.literals.get(api)?.literals.has(version) ?? false;
  }

  private check(tokens: readonly TemplateToken[], parser: CollectionParser): void {
    const id = parser.info.id;
    let node: TrieNode | undefined = this.root;

    for (const token of tokens) {
      if (!node) {
        return;
      }
      if (token.kind === "literal") {
        if (node.param) {
          throw new AmbiguousResourcePathException(
            id,
            `segment "${token.value}" conflicts with parameter {${node.param.name}} at the same level`
          );
        }
        node = node.literals.get(token.value);
      } else {
        if (node.literals.size > 0) {
          throw new AmbiguousResourcePathException(
            id,
            `parameter {${token.name}} conflicts with literal segments ` +
              `${Array.from(node.literals.keys()).join(", ")} at the same level`
          );
        }
        if (node.param && node.param.name !== token.name) {
          throw new AmbiguousResourcePathException(
            id,
            `parameter {${token.name}} conflicts with parameter {${node.param.name}} at the same level`
          );
        }
        node = node.param?.node;
      }
    }

    if (node?.leaf && node.leaf.info.id !== id) {
      throw new AmbiguousResourcePathException(
        id,
        `path is already registered for [${node.leaf.info.id}]`
      );
    }
  }
}

function cloneNode(
  node: TrieNode,
  mapParser: (parser: CollectionParser) => CollectionParser
): TrieNode {
  const copy: TrieNode = { literals: new Map() };
  for (const [key, child] of node.literals) {
    copy.literals.set(key, cloneNode(child, mapParser));
  }
  if (node.param) {
    copy.param = { name: node.param.name, node: cloneNode(node.param.node, mapParser) };
  }
  if (node.leaf) {
    copy.leaf = mapParser(node.leaf);
  }
  return copy;
}

function countLeaves(node: TrieNode): number {
  let count = node.leaf ? 1 : 0;
  for (const child of node.literals.values()) {
    count += countLeaves(child);
  }
  if (node.param) {
    count += countLeaves(node.param.node);
  }
  return count;
}
