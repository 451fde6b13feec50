import { isRecord, type AnyDescriptor } from "../descriptors/descriptor";
import { KeypathError, KeypathErrorCode } from "../errors/keypath.error";
import { parseFormat, type Format } from "../format/format";
import type { PathSegment } from "./path-segment";

/**
 * Writes a new value where the cursor's value lives (a struct field, a map
 * entry copy, a pointer target).
 */
export interface ValueSlot {
  set(value: unknown): void;
}

/**
 * Transient traversal state: where we are, how we got here and what the
 * remaining format expects.
 */
export interface ObjectCursor {
  /**
   * Value at this position; `undefined` when the object does not exist.
   */
  readonly value: unknown;
  /**
   * Whether an object exists at this position.
   */
  readonly present: boolean;
  /**
   * Static type at this position, known even when no object exists.
   */
  readonly descriptor: AnyDescriptor;
  /**
   * Key path components accumulated so far.
   */
  readonly keypath: readonly string[];
  /**
   * Field path accumulated so far.
   */
  readonly fields: readonly PathSegment[];
  /**
   * Unconsumed format of the current object.
   */
  readonly format: Format;
  /**
   * Write access to the current value, when it has one.
   */
  readonly slot?: ValueSlot;
}

export function rootCursor(object: unknown, descriptor: AnyDescriptor, format: string): ObjectCursor {
  return {
    value: object,
    present: object !== undefined,
    descriptor,
    keypath: [],
    fields: [],
    format: parseFormat(format),
  };
}

/**
 * Same position, but no object there.
 */
export function absent(cursor: ObjectCursor): ObjectCursor {
  return { ...cursor, value: undefined, present: false, slot: undefined };
}

/**
 * Slot replacing the contents of a struct or map in place, for values that
 * have no container to be written into (the root object).
 */
export function inPlaceSlot(cursor: ObjectCursor): ValueSlot | undefined {
  const target = cursor.value;

  if (cursor.descriptor.kind === "struct" && isRecord(target)) {
    return {
      set(value: unknown) {
        if (!isRecord(value)) throw new KeypathError(KeypathErrorCode.SET_WRONG_TYPE);

        for (const name of Object.keys(target)) {
          delete target[name];
        }

        Object.assign(target, value);
      },
    };
  }

  if (cursor.descriptor.kind === "map" && target instanceof Map) {
    return {
      set(value: unknown) {
        if (!(value instanceof Map)) throw new KeypathError(KeypathErrorCode.SET_WRONG_TYPE);

        target.clear();

        for (const [key, entry] of value) {
          target.set(key, entry);
        }
      },
    };
  }

  return undefined;
}

/**
 * Writes the value where the cursor points.
 */
export function assign(cursor: ObjectCursor, value: unknown): void {
  if (!cursor.present) {
    throw new KeypathError(KeypathErrorCode.SET_NO_EXISTS, undefined, cursor.keypath.join("/"));
  }

  const slot = cursor.slot ?? inPlaceSlot(cursor);

  if (slot === undefined) {
    throw new KeypathError(KeypathErrorCode.NOT_ADDRESSABLE, undefined, cursor.keypath.join("/"));
  }

  slot.set(value);
}
