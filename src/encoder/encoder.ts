/**
 * Encoder: flattens an object (or one of its sub-objects) into the key-value
 * pairs it occupies.
 *
 * @module keypath-sync/encoder/encoder
 */

import { serializeMapKey, serializeValue } from "../codec/value-codec";
import { isRecord, type AnyDescriptor, type Infer } from "../descriptors/descriptor";
import { KeypathError, KeypathErrorCode } from "../errors/keypath.error";
import { END, KEY, isLiteral, joinKey } from "../format/format";
import { rootCursor, type ObjectCursor } from "../walker/object-cursor";
import type { Selector } from "../walker/path-segment";
import { walkFields } from "../walker/walk";

class EncodeState {
  public readonly pairs = new Map<string, string>();

  public emit(keypath: readonly string[], value: string): void {
    const key = joinKey(keypath);
    const existing = this.pairs.get(key);

    if (existing !== undefined) {
      throw new KeypathError(
        KeypathErrorCode.ENCODE_KEY_COLLISION,
        `Key '${key}' is already used by value '${existing}'`,
        key,
      );
    }

    this.pairs.set(key, value);
  }
}

function consumeLiterals(cursor: ObjectCursor): ObjectCursor {
  let index = 0;

  while (index < cursor.format.length && isLiteral(cursor.format[index])) {
    index++;
  }

  return {
    ...cursor,
    keypath: [...cursor.keypath, ...cursor.format.slice(0, index).filter(isLiteral)],
    format: cursor.format.slice(index),
  };
}

function flatten(state: EncodeState, cursor: ObjectCursor): void {
  const descriptor = cursor.descriptor;

  if (descriptor.kind === "pointer") {
    if (cursor.value === null || cursor.value === undefined) {
      const here = consumeLiterals(cursor);

      if (here.format.length === 0) {
        state.emit(here.keypath, serializeValue(descriptor, null));
      }

      return;
    }

    return flatten(state, { ...cursor, descriptor: descriptor.target });
  }

  const current = consumeLiterals(cursor);

  if (current.format.length === 0) {
    return state.emit(current.keypath, serializeValue(descriptor, current.value));
  }

  const keypath = current.keypath.join("/");

  switch (descriptor.kind) {
    case "struct": {
      if (current.format[0] !== END) {
        throw new KeypathError(KeypathErrorCode.STRUCT_FORMAT, undefined, keypath);
      }

      const record = isRecord(current.value) ? current.value : {};

      for (const field of descriptor.fields) {
        flatten(state, {
          ...current,
          value: record[field.name],
          descriptor: field.type,
          format: field.format,
        });
      }

      return;
    }
    case "map": {
      if (current.format[0] !== KEY) {
        throw new KeypathError(KeypathErrorCode.MAP_FORMAT, undefined, keypath);
      }

      if (!(current.value instanceof Map)) return;

      for (const [key, entry] of current.value) {
        flatten(state, {
          ...current,
          value: entry,
          descriptor: descriptor.value,
          keypath: [...current.keypath, serializeMapKey(descriptor.key, key)],
          format: current.format.slice(1),
        });
      }

      return;
    }
    case "list":
      throw new KeypathError(KeypathErrorCode.NOT_IMPLEMENTED, undefined, keypath);
    case "json":
      throw new KeypathError(KeypathErrorCode.UNSUPPORTED_TYPE, undefined, keypath);
    default:
      throw new KeypathError(KeypathErrorCode.SCALAR_TYPE, undefined, keypath);
  }
}

/**
 * Every key-value pair the object (or the sub-object addressed by the
 * selectors) is stored as.
 *
 * @example
 * ```typescript
 * const Point = k.struct({ x: k.int(), y: k.int() });
 *
 * encode({ x: 1, y: 2 }, Point, "/point/"); // { "/point/x": "1", "/point/y": "2" }
 * encode({ x: 1, y: 2 }, Point, "/point");  // { "/point": '{"x":1,"y":2}' }
 * ```
 *
 * @throws KeypathError with code OBJECT_NOT_FOUND when the addressed
 * sub-object does not exist, ENCODE_KEY_COLLISION when two paths are stored
 * under the same key
 */
export function encode<D extends AnyDescriptor>(
  object: Infer<D>,
  descriptor: D,
  format: string,
  selectors: readonly Selector[] = [],
): Record<string, string> {
  const cursor = walkFields(rootCursor(object, descriptor, format), selectors);

  if (!cursor.present) {
    throw new KeypathError(KeypathErrorCode.OBJECT_NOT_FOUND, undefined, cursor.keypath.join("/"));
  }

  const state = new EncodeState();
  flatten(state, cursor);

  return Object.fromEntries(state.pairs);
}
