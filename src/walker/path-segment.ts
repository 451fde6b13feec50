/**
 * Field paths.
 *
 * Walker results describe "which nested field" as a list of tagged segments:
 * a struct field name or a typed map key, never a stringified key path.
 *
 * @module keypath-sync/walker/path-segment
 */

export type FieldSegment = {
  readonly kind: "field";
  readonly name: string;
};

export type KeySegment = {
  readonly kind: "key";
  readonly key: unknown;
};

export type PathSegment = FieldSegment | KeySegment;

/**
 * Input selector. A bare string is a field name at a struct and a key at a
 * map; numbers and booleans are map keys. Structured map keys go through
 * {@link key}.
 */
export type Selector = string | number | boolean | PathSegment;

/**
 * Struct field segment.
 */
export function field(name: string): FieldSegment {
  return { kind: "field", name };
}

/**
 * Map key segment.
 *
 * @example
 * ```typescript
 * encode(registry, Registry, "/r/", ["byOwner", key({ team: "core", id: 4 })]);
 * ```
 */
export function key(value: unknown): KeySegment {
  return { kind: "key", key: value };
}

export function isPathSegment(selector: Selector): selector is PathSegment {
  return typeof selector === "object" && selector !== null;
}

/**
 * Readable form of a field path, for messages and logs.
 */
export function describePath(fields: readonly PathSegment[]): string {
  return fields
    .map((segment) =>
      segment.kind === "field" ? segment.name : `[${JSON.stringify(segment.key) ?? "undefined"}]`,
    )
    .join(".");
}
