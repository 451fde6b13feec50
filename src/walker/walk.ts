/**
 * Object path walker.
 *
 * Two modes share one descent:
 *
 * - fields mode follows a list of selectors (field names, map keys) and
 *   accumulates the concrete key path the object is stored under;
 * - key mode follows the components of a concrete key path and accumulates
 *   the field path it designates.
 *
 * Both dereference pointers, consume the literal segments of the current
 * format, stop on the target, reject paths that reach inside a blob and
 * descend into structs and maps. Mutation through a map always goes through
 * a {@link MapCursor}: the walk continues into a working copy of the entry,
 * which is put back once the rest of the walk succeeded.
 *
 * @module keypath-sync/walker/walk
 */

import { deserializeMapKey, serializeMapKey } from "../codec/value-codec";
import {
  isRecord,
  type MapDescriptor,
  type PointerDescriptor,
  type StructDescriptor,
  type StructField,
} from "../descriptors/descriptor";
import { KeypathError, KeypathErrorCode, isKeypathError } from "../errors/keypath.error";
import { END, KEY, isLiteral } from "../format/format";
import { MapCursor } from "./map-cursor";
import { absent, type ObjectCursor } from "./object-cursor";
import { field as fieldSegment, isPathSegment, key as keySegment, type Selector } from "./path-segment";

export interface WalkOptions {
  /**
   * Allocate missing pointers, maps and map entries on the way.
   */
  readonly create?: boolean;
  /**
   * Runs on the target cursor. Map entry copies are put back only after it
   * returned.
   */
  readonly apply?: (cursor: ObjectCursor) => void;
  /**
   * Key mode: a key path ending where the object expects more components
   * designates the object reached so far instead of failing.
   */
  readonly allowShortKey?: boolean;
}

function isMutating(options: WalkOptions): boolean {
  return options.create === true || options.apply !== undefined;
}

function arrive(cursor: ObjectCursor, options: WalkOptions): ObjectCursor {
  options.apply?.(cursor);

  return cursor;
}

function isMap(value: unknown): value is Map<unknown, unknown> {
  return value instanceof Map;
}

function dereference(
  cursor: ObjectCursor,
  descriptor: PointerDescriptor<unknown>,
  options: WalkOptions,
): ObjectCursor {
  const target = descriptor.target;

  if (cursor.present && cursor.value !== null && cursor.value !== undefined) {
    return { ...cursor, descriptor: target };
  }

  if (!cursor.present || !options.create) {
    return absent({ ...cursor, descriptor: target });
  }

  if (cursor.slot === undefined) {
    throw new KeypathError(KeypathErrorCode.NOT_ADDRESSABLE, undefined, cursor.keypath.join("/"));
  }

  const value = target.zero();
  cursor.slot.set(value);

  return { ...cursor, descriptor: target, value, present: true };
}

function enterField(cursor: ObjectCursor, field: StructField): ObjectCursor {
  const record = cursor.present && isRecord(cursor.value) ? cursor.value : undefined;

  const next: ObjectCursor = {
    ...cursor,
    descriptor: field.type,
    fields: [...cursor.fields, fieldSegment(field.name)],
    format: field.format,
  };

  if (record === undefined) {
    return absent(next);
  }

  return {
    ...next,
    value: record[field.name],
    present: true,
    slot: {
      set(value: unknown) {
        record[field.name] = value;
      },
    },
  };
}

function expectStructFormat(cursor: ObjectCursor): void {
  if (cursor.format[0] !== END) {
    throw new KeypathError(KeypathErrorCode.STRUCT_FORMAT, undefined, cursor.keypath.join("/"));
  }
}

function expectMapFormat(cursor: ObjectCursor): void {
  if (cursor.format[0] !== KEY) {
    throw new KeypathError(KeypathErrorCode.MAP_FORMAT, undefined, cursor.keypath.join("/"));
  }
}

/**
 * Enters the entry `key` of the map at the cursor and continues with `next`.
 */
function enterEntry(
  cursor: ObjectCursor,
  descriptor: MapDescriptor<unknown, unknown>,
  key: unknown,
  keyText: string,
  options: WalkOptions,
  next: (entry: ObjectCursor) => ObjectCursor,
): ObjectCursor {
  let map = cursor.present && isMap(cursor.value) ? cursor.value : undefined;

  if (map === undefined && cursor.present && options.create) {
    if (cursor.slot === undefined) {
      throw new KeypathError(KeypathErrorCode.NOT_ADDRESSABLE, undefined, cursor.keypath.join("/"));
    }

    map = new Map<unknown, unknown>();
    cursor.slot.set(map);
  }

  const base: ObjectCursor = {
    ...cursor,
    descriptor: descriptor.value,
    keypath: [...cursor.keypath, keyText],
    fields: [...cursor.fields, keySegment(key)],
    format: cursor.format.slice(1),
  };

  if (map === undefined) {
    return next(absent(base));
  }

  const entries = new MapCursor(map, descriptor);

  if (!isMutating(options)) {
    const entry = entries.lookup(key);

    return next(entry === undefined ? absent(base) : { ...base, value: entry.value, present: true, slot: undefined });
  }

  const entry = options.create ? entries.getOrCreate(key) : entries.get(key);

  if (entry === undefined) {
    return next(absent(base));
  }

  let current = entry.value;

  const result = next({
    ...base,
    value: current,
    present: true,
    slot: {
      set(value: unknown) {
        current = value;
      },
    },
  });

  entries.put(key, current);

  return result;
}

function descendLeaf(cursor: ObjectCursor): never {
  const keypath = cursor.keypath.join("/");

  switch (cursor.descriptor.kind) {
    case "list":
      throw new KeypathError(KeypathErrorCode.NOT_IMPLEMENTED, undefined, keypath);
    case "json":
      throw new KeypathError(KeypathErrorCode.UNSUPPORTED_TYPE, undefined, keypath);
    default:
      throw new KeypathError(KeypathErrorCode.SCALAR_TYPE, undefined, keypath);
  }
}

/**
 * Appends the leading literal segments of the format to the key path.
 */
function consumeFieldsFormat(cursor: ObjectCursor): ObjectCursor {
  let index = 0;

  while (index < cursor.format.length && isLiteral(cursor.format[index])) {
    index++;
  }

  if (index === 0) return cursor;

  const literals = cursor.format.slice(0, index).filter(isLiteral);

  return {
    ...cursor,
    keypath: [...cursor.keypath, ...literals],
    format: cursor.format.slice(index),
  };
}

function fieldName(selector: Selector): string {
  if (typeof selector === "string") return selector;
  if (isPathSegment(selector) && selector.kind === "field") return selector.name;

  throw new KeypathError(KeypathErrorCode.WRONG_FIELD_TYPE);
}

function selectorKey(descriptor: MapDescriptor<unknown, unknown>, selector: Selector): unknown {
  let candidate: unknown = selector;

  if (isPathSegment(selector)) {
    if (selector.kind === "field") {
      throw new KeypathError(KeypathErrorCode.WRONG_FIELD_TYPE);
    }

    candidate = selector.key;
  }

  if (!descriptor.key.conforms(candidate)) {
    throw new KeypathError(KeypathErrorCode.KEY_WRONG_TYPE);
  }

  return candidate;
}

function walkFieldsStruct(
  cursor: ObjectCursor,
  descriptor: StructDescriptor<unknown>,
  selectors: readonly Selector[],
  options: WalkOptions,
): ObjectCursor {
  expectStructFormat(cursor);

  const name = fieldName(selectors[0]);
  const field = descriptor.field(name);

  if (field === undefined) {
    throw new KeypathError(KeypathErrorCode.WRONG_FIELD_NAME, `Provided field '${name}' does not exist`);
  }

  return walkFields(enterField(cursor, field), selectors.slice(1), options);
}

function walkFieldsMap(
  cursor: ObjectCursor,
  descriptor: MapDescriptor<unknown, unknown>,
  selectors: readonly Selector[],
  options: WalkOptions,
): ObjectCursor {
  expectMapFormat(cursor);

  const key = selectorKey(descriptor, selectors[0]);
  const keyText = serializeMapKey(descriptor.key, key);

  return enterEntry(cursor, descriptor, key, keyText, options, (entry) =>
    walkFields(entry, selectors.slice(1), options),
  );
}

/**
 * Fields mode: follows the selectors from the cursor.
 */
export function walkFields(
  cursor: ObjectCursor,
  selectors: readonly Selector[],
  options: WalkOptions = {},
): ObjectCursor {
  if (cursor.descriptor.kind === "pointer") {
    return walkFields(dereference(cursor, cursor.descriptor, options), selectors, options);
  }

  const current = consumeFieldsFormat(cursor);

  if (selectors.length === 0) {
    return arrive(current, options);
  }

  if (current.format.length === 0) {
    throw new KeypathError(KeypathErrorCode.PATH_PAST_OBJECT, undefined, current.keypath.join("/"));
  }

  const descriptor = current.descriptor;

  switch (descriptor.kind) {
    case "struct":
      return walkFieldsStruct(current, descriptor, selectors, options);
    case "map":
      return walkFieldsMap(current, descriptor, selectors, options);
    default:
      return descendLeaf(current);
  }
}

type KeyProgress = {
  cursor: ObjectCursor;
  path: readonly string[];
};

/**
 * Matches the leading literal segments of the format against the key path.
 * Returns nothing when a literal does not match.
 */
function consumeKeyFormat(cursor: ObjectCursor, path: readonly string[]): KeyProgress | undefined {
  let index = 0;

  while (index < cursor.format.length && index < path.length) {
    const segment = cursor.format[index];
    if (!isLiteral(segment)) break;
    if (segment !== path[index]) return undefined;

    index++;
  }

  if (index === 0) return { cursor, path };

  return {
    cursor: {
      ...cursor,
      keypath: [...cursor.keypath, ...path.slice(0, index)],
      format: cursor.format.slice(index),
    },
    path: path.slice(index),
  };
}

function walkKeyStruct(
  cursor: ObjectCursor,
  descriptor: StructDescriptor<unknown>,
  path: readonly string[],
  options: WalkOptions,
): ObjectCursor {
  expectStructFormat(cursor);

  for (const field of descriptor.fields) {
    const progress = consumeKeyFormat(enterField(cursor, field), path);

    if (progress !== undefined) {
      return walkKey(progress.cursor, progress.path, options);
    }
  }

  throw new KeypathError(KeypathErrorCode.PATH_NOT_FOUND, undefined, path.join("/"));
}

function walkKeyMap(
  cursor: ObjectCursor,
  descriptor: MapDescriptor<unknown, unknown>,
  path: readonly string[],
  options: WalkOptions,
): ObjectCursor {
  expectMapFormat(cursor);

  const keyText = path[0];
  let key: unknown;

  try {
    key = deserializeMapKey(descriptor.key, keyText);
  } catch (error) {
    if (!isKeypathError(error, KeypathErrorCode.UNMARSHAL_FAILED)) throw error;

    throw new KeypathError(
      KeypathErrorCode.KEY_WRONG_TYPE,
      `Key component '${keyText}' does not decode into the map key type`,
      keyText,
    );
  }

  return enterEntry(cursor, descriptor, key, keyText, options, (entry) =>
    walkKey(entry, path.slice(1), options),
  );
}

/**
 * Key mode: follows the components of a concrete key path from the cursor.
 *
 * A path reduced to a single empty component designates the object reached
 * so far (the key of a recursively stored object ends in `/`).
 */
export function walkKey(
  cursor: ObjectCursor,
  path: readonly string[],
  options: WalkOptions = {},
): ObjectCursor {
  if (cursor.descriptor.kind === "pointer") {
    return walkKey(dereference(cursor, cursor.descriptor, options), path, options);
  }

  const progress = consumeKeyFormat(cursor, path);

  if (progress === undefined) {
    throw new KeypathError(KeypathErrorCode.PATH_NOT_FOUND, undefined, path.join("/"));
  }

  const current = progress.cursor;
  const rest = progress.path;

  if (current.format.length === 0) {
    if (rest.length !== 0) {
      throw new KeypathError(KeypathErrorCode.PATH_PAST_OBJECT, undefined, current.keypath.join("/"));
    }

    return arrive(current, options);
  }

  if (rest.length === 0 || (rest[0] === "" && rest.length !== 1)) {
    if (options.allowShortKey) return current;

    throw new KeypathError(KeypathErrorCode.KEY_INVALID, undefined, current.keypath.join("/"));
  }

  if (rest[0] === "") {
    return arrive(current, options);
  }

  const descriptor = current.descriptor;

  switch (descriptor.kind) {
    case "struct":
      return walkKeyStruct(current, descriptor, rest, options);
    case "map":
      return walkKeyMap(current, descriptor, rest, options);
    default:
      return descendLeaf(current);
  }
}
