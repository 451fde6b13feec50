/**
 * Format grammar.
 *
 * A format tells how an object is laid out in the key space:
 * `segment ('/' segment)*` where a segment is a literal, `{key}` (one map key
 * is consumed here) or a trailing empty segment (the object is stored
 * recursively from here). A format that runs out of segments means the
 * object is stored as a single blob.
 *
 * @module keypath-sync/format/format
 */

import { KeypathError, KeypathErrorCode } from "../errors/keypath.error";

/** Separator between key path components. */
export const SEPARATOR = "/";

/** Binds the next key path component to a map key. */
export const KEY: unique symbol = Symbol("{key}");

/** Binds the next key path component to a sequence index (never walkable). */
export const INDEX: unique symbol = Symbol("{index}");

/** Trailing marker: the object is stored recursively below the current path. */
export const END: unique symbol = Symbol("end");

export type FormatToken = typeof KEY | typeof INDEX | typeof END;

export type FormatSegment = string | FormatToken;

export type Format = readonly FormatSegment[];

const KEY_TEXT = "{key}";
const INDEX_TEXT = "{index}";

/**
 * Whether the segment is a literal key path component.
 */
export function isLiteral(segment: FormatSegment | undefined): segment is string {
  return typeof segment === "string";
}

/**
 * Parse a textual format.
 *
 * @example
 * ```typescript
 * parseFormat("map/{key}/s1/"); // ["map", KEY, "s1", END]
 * parseFormat("here");          // ["here"]
 * parseFormat("");              // [END]
 * ```
 */
export function parseFormat(text: string): Format {
  const parts = text.split(SEPARATOR);

  return parts.map((part, index): FormatSegment => {
    if (part === KEY_TEXT) return KEY;
    if (part === INDEX_TEXT) return INDEX;
    if (part === "" && index === parts.length - 1) return END;

    return part;
  });
}

/**
 * Parse the format attached to a struct field.
 *
 * Without a format the field is stored under its own name, as a blob.
 */
export function parseFieldFormat(name: string, format?: string): Format {
  if (format === undefined || format === "") {
    return [name];
  }

  if (format.startsWith(SEPARATOR)) {
    throw new KeypathError(KeypathErrorCode.TAG_FIRST_SLASH, undefined, format);
  }

  return parseFormat(format);
}

/**
 * Textual form of a parsed format.
 */
export function formatToString(format: Format): string {
  return format
    .map((segment) => {
      if (segment === KEY) return KEY_TEXT;
      if (segment === INDEX) return INDEX_TEXT;
      if (segment === END) return "";

      return segment;
    })
    .join(SEPARATOR);
}

/**
 * Literal segments a format starts with, up to the first token.
 */
export function literalPrefix(format: Format): string[] {
  const prefix: string[] = [];

  for (const segment of format) {
    if (!isLiteral(segment)) break;

    prefix.push(segment);
  }

  return prefix;
}

/**
 * Split a concrete key into its components.
 */
export function splitKey(key: string): string[] {
  return key.split(SEPARATOR);
}

/**
 * Join key path components into a concrete key.
 */
export function joinKey(keypath: readonly string[]): string {
  return keypath.join(SEPARATOR);
}

function unrooted(components: string[]): string[] {
  return components[0] === "" ? components.slice(1) : components;
}

/**
 * Whether the literal key paths of two formats are prefixes of one another.
 *
 * Rooted and unrooted forms compare equal (`/a/` and `a/`).
 *
 * @example
 * ```typescript
 * prefixCollision("/a/", "/a/b/"); // true
 * prefixCollision("/a/", "/b/");   // false
 * ```
 */
export function prefixCollision(first: string, second: string): boolean {
  let longer = unrooted(literalPrefix(parseFormat(first)));
  let shorter = unrooted(literalPrefix(parseFormat(second)));

  if (longer.length < shorter.length) {
    [longer, shorter] = [shorter, longer];
  }

  return shorter.every((component, index) => longer[index] === component);
}
