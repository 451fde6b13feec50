/**
 * Path operations on a root object.
 *
 * Every operation takes the root object, its descriptor and the format the
 * root is stored with (e.g. `"/settings/"`).
 *
 * @module keypath-sync/walker/operations
 */

import { deserializeValue } from "../codec/value-codec";
import { copyValue, type AnyDescriptor, type Infer } from "../descriptors/descriptor";
import { KeypathError, KeypathErrorCode, isKeypathError } from "../errors/keypath.error";
import { formatToString, joinKey, splitKey } from "../format/format";
import { MapCursor } from "./map-cursor";
import { assign, rootCursor, type ObjectCursor } from "./object-cursor";
import type { PathSegment, Selector } from "./path-segment";
import { walkFields, walkKey } from "./walk";

export type FindByFieldsResult = {
  /**
   * Live sub-object.
   */
  value: unknown;
  /**
   * Key the sub-object is stored under; ends with `/` when it is stored
   * recursively.
   */
  key: string;
  /**
   * Field path of the sub-object.
   */
  fields: PathSegment[];
};

export type FindByKeyResult = {
  value: unknown;
  fields: PathSegment[];
};

export type UpdateOptions = {
  /**
   * Reset the target to its zero value when the stored string does not
   * decode, instead of failing.
   *
   * @default true
   */
  ignoreUnmarshalFailure?: boolean;
};

/**
 * Key of a cursor: its key path followed by the textual remaining format.
 */
function cursorKey(cursor: ObjectCursor): string {
  const remaining = cursor.format.length === 0 ? [] : formatToString(cursor.format).split("/");

  return joinKey([...cursor.keypath, ...remaining]);
}

/**
 * Root cursor and key path components for a key mode walk. Rooted (`/a/b`)
 * and unrooted (`a/b`) keys match either form of format.
 */
function keyCursor(
  object: unknown,
  descriptor: AnyDescriptor,
  format: string,
  keypath: string,
): { cursor: ObjectCursor; path: string[] } {
  const cursor = rootCursor(object, descriptor, format);
  const path = splitKey(keypath);
  const rootedFormat = cursor.format.length > 1 && cursor.format[0] === "";
  const rootedPath = path.length > 1 && path[0] === "";

  if (rootedPath && !rootedFormat) {
    return { cursor, path: path.slice(1) };
  }

  if (rootedFormat && !rootedPath) {
    return { cursor: { ...cursor, format: cursor.format.slice(1) }, path };
  }

  return { cursor, path };
}

/**
 * Locates a sub-object by its field path.
 *
 * @example
 * ```typescript
 * const { value, key } = findByFields(settings, Settings, "/app/", ["users", "alice"]);
 * // key === "/app/users/alice/"
 * ```
 *
 * @throws KeypathError with code KEY_NOT_FOUND when the sub-object does not exist
 */
export function findByFields<D extends AnyDescriptor>(
  object: Infer<D>,
  descriptor: D,
  format: string,
  selectors: readonly Selector[] = [],
): FindByFieldsResult {
  const cursor = walkFields(rootCursor(object, descriptor, format), selectors);

  if (!cursor.present) {
    throw new KeypathError(KeypathErrorCode.KEY_NOT_FOUND, undefined, cursorKey(cursor));
  }

  return { value: cursor.value, key: cursorKey(cursor), fields: [...cursor.fields] };
}

/**
 * Locates a sub-object by the concrete key it is stored under.
 *
 * @throws KeypathError with code KEY_NOT_FOUND when the sub-object does not exist
 */
export function findByKey<D extends AnyDescriptor>(
  object: Infer<D>,
  descriptor: D,
  format: string,
  keypath: string,
): FindByKeyResult {
  const { cursor, path } = keyCursor(object, descriptor, format, keypath);
  const found = walkKey(cursor, path);

  if (!found.present) {
    throw new KeypathError(KeypathErrorCode.KEY_NOT_FOUND, undefined, keypath);
  }

  return { value: found.value, fields: [...found.fields] };
}

/**
 * Applies a stored `(key, value)` pair to the object, creating whatever is
 * missing on the way, and returns the field path of the updated sub-object.
 *
 * @example
 * ```typescript
 * updateByKey(settings, Settings, "/app/", "/app/users/alice/age", "31");
 * // [field("users"), key("alice"), field("age")]
 * ```
 */
export function updateByKey<D extends AnyDescriptor>(
  object: Infer<D>,
  descriptor: D,
  format: string,
  keypath: string,
  value: string,
  options: UpdateOptions = {},
): PathSegment[] {
  const ignoreUnmarshalFailure = options.ignoreUnmarshalFailure ?? true;
  const { cursor, path } = keyCursor(object, descriptor, format, keypath);

  const updated = walkKey(cursor, path, {
    create: true,
    apply: (target) => assign(target, decode(target.descriptor, value, ignoreUnmarshalFailure)),
  });

  return [...updated.fields];
}

function decode(descriptor: AnyDescriptor, text: string, ignoreUnmarshalFailure: boolean): unknown {
  try {
    return deserializeValue(descriptor, text);
  } catch (error) {
    if (ignoreUnmarshalFailure && isKeypathError(error, KeypathErrorCode.UNMARSHAL_FAILED)) {
      return descriptor.zero();
    }

    throw error;
  }
}

/**
 * Sets a sub-object, creating whatever is missing on the way. An empty
 * selector list replaces the contents of the root object in place.
 *
 * @throws KeypathError with code SET_WRONG_TYPE when the value does not have
 * the shape of the target
 */
export function setByFields<D extends AnyDescriptor>(
  object: Infer<D>,
  descriptor: D,
  format: string,
  value: unknown,
  selectors: readonly Selector[] = [],
): void {
  walkFields(rootCursor(object, descriptor, format), selectors, {
    create: true,
    apply: (target) => {
      if (target.present && !target.descriptor.conforms(value)) {
        throw new KeypathError(KeypathErrorCode.SET_WRONG_TYPE, undefined, target.keypath.join("/"));
      }

      assign(target, copyValue(target.descriptor, value));
    },
  });
}

/**
 * Removes a map entry. The selectors must end on a key of a map.
 *
 * Returns the key the removed entry was stored under, ending with `/` when
 * the entry was stored recursively.
 *
 * @throws KeypathError with code NOT_MAP_INDEX or OBJECT_NOT_FOUND
 */
export function deleteByFields<D extends AnyDescriptor>(
  object: Infer<D>,
  descriptor: D,
  format: string,
  selectors: readonly Selector[],
): string {
  if (selectors.length < 1) {
    throw new KeypathError(KeypathErrorCode.NOT_MAP_INDEX);
  }

  const last = selectors[selectors.length - 1];
  let removedKey: string | undefined;

  walkFields(rootCursor(object, descriptor, format), selectors.slice(0, -1), {
    apply: (parent) => {
      removedKey = removeEntry(parent, last);
    },
  });

  if (removedKey === undefined) {
    throw new KeypathError(KeypathErrorCode.OBJECT_NOT_FOUND);
  }

  return removedKey;
}

function removeEntry(parent: ObjectCursor, selector: Selector): string {
  const descriptor = parent.descriptor;

  if (descriptor.kind !== "map") {
    throw new KeypathError(KeypathErrorCode.NOT_MAP_INDEX, undefined, parent.keypath.join("/"));
  }

  const entry = walkFields(parent, [selector]);
  const last = entry.fields[entry.fields.length - 1];

  if (!entry.present || !(parent.value instanceof Map) || last?.kind !== "key") {
    throw new KeypathError(KeypathErrorCode.OBJECT_NOT_FOUND, undefined, entry.keypath.join("/"));
  }

  new MapCursor(parent.value, descriptor).delete(last.key);

  const key = joinKey(entry.keypath);

  return entry.format.length === 0 ? key : `${key}/`;
}

/**
 * Removes the sub-object stored under a concrete key and returns its field
 * path. The key may stop where the object is stored recursively (the key of
 * a map entry stored as `entries/{key}/`).
 */
export function deleteByKey<D extends AnyDescriptor>(
  object: Infer<D>,
  descriptor: D,
  format: string,
  keypath: string,
): PathSegment[] {
  const { cursor, path } = keyCursor(object, descriptor, format, keypath);
  const found = walkKey(cursor, path, { allowShortKey: true });
  const fields = [...found.fields];

  deleteByFields(object, descriptor, format, fields);

  return fields;
}
