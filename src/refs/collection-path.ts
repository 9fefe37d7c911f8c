import { InvalidResourceException } from "../errors.js";

const COLLECTION_PATH_PATTERN = /^(?:([a-zA-Z_]+(?:\.[a-zA-Z0-9_]+)+)::)?(.+)$/s;

/**
 * A collection-path split into its optional collection prefix and its path.
 */
export interface ParsedCollectionPath {
  /** Collection named by a `collection::` prefix, if any */
  collection?: string | undefined;
  /** The path after the prefix */
  path: string;
  /** Whether the path starts with `/` (every param given) */
  isAbsolute: boolean;
  /** The original text */
  original: string;
}

/**
 * Split a collection-path into its components.
 *
 * Format: [collection::]path
 *
 * Examples:
 * - mywidget
 * - myproj/mywidget
 * - /myproj/mywidget
 * - svc.projects.widgets::myproj/mywidget
 *
 * @throws InvalidResourceException if the text is empty
 */
export function parseCollectionPath(text: string): ParsedCollectionPath {
  const match = COLLECTION_PATH_PATTERN.exec(text);
  const path = match?.[2];
  if (path === undefined) {
    throw new InvalidResourceException(text);
  }

  return {
    collection: match?.[1],
    path,
    isAbsolute: path.startsWith("/"),
    original: text,
  };
}
