/**
 * Value codec.
 *
 * Leaf values (and whole objects stored as blobs) travel as strings. String
 * scalars are stored as-is so that keys and values stay legible; everything
 * else is the JSON document of the descriptor-driven plain form of the value.
 *
 * @module keypath-sync/codec/value-codec
 */

import { isRecord, type AnyDescriptor } from "../descriptors/descriptor";
import { KeypathError, KeypathErrorCode } from "../errors/keypath.error";

type Plain = null | boolean | number | string | Plain[] | { [key: string]: Plain };

function unmarshalFailure(reason: string): KeypathError {
  return new KeypathError(KeypathErrorCode.UNMARSHAL_FAILED, `Value cannot be decoded: ${reason}`);
}

function expectNumber(value: unknown): number {
  if (typeof value !== "number") throw unmarshalFailure(`expected a number, got ${typeof value}`);

  return value;
}

/**
 * Plain (JSON-ready) form of a value.
 */
export function toPlain(descriptor: AnyDescriptor, value: unknown): Plain {
  switch (descriptor.kind) {
    case "string":
    case "int":
    case "float":
    case "bool":
      return toScalar(value);
    case "json":
      return toJson(value);
    case "struct": {
      const plain: Record<string, Plain> = {};
      if (!isRecord(value)) return plain;

      for (const field of descriptor.fields) {
        plain[field.name] = toPlain(field.type, value[field.name]);
      }

      return plain;
    }
    case "map": {
      if (!(value instanceof Map)) return null;

      const plain: Record<string, Plain> = {};

      for (const [key, entry] of value) {
        plain[serializeValue(descriptor.key, key)] = toPlain(descriptor.value, entry);
      }

      return plain;
    }
    case "pointer":
      return value === null || value === undefined ? null : toPlain(descriptor.target, value);
    case "list":
      return Array.isArray(value) ? value.map((item) => toPlain(descriptor.item, item)) : [];
  }
}

function toScalar(value: unknown): Plain {
  if (typeof value === "number" && !Number.isFinite(value)) {
    throw new KeypathError(KeypathErrorCode.MARSHAL_FAILED, `Value cannot be encoded: ${value}`);
  }

  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }

  return null;
}

function toJson(value: unknown): Plain {
  const text = JSON.stringify(value);
  if (text === undefined) return null;

  const plain: Plain = JSON.parse(text);

  return plain;
}

/**
 * Value of the descriptor's type built from its plain form.
 *
 * Struct fields missing from the plain object keep their zero value and
 * unknown properties are ignored.
 */
export function fromPlain(descriptor: AnyDescriptor, plain: unknown): unknown {
  switch (descriptor.kind) {
    case "string":
      if (typeof plain !== "string") throw unmarshalFailure(`expected a string, got ${typeof plain}`);

      return plain;
    case "int": {
      const value = expectNumber(plain);
      if (!Number.isInteger(value)) throw unmarshalFailure(`${value} is not an integer`);

      return value;
    }
    case "float":
      return expectNumber(plain);
    case "bool":
      if (typeof plain !== "boolean") throw unmarshalFailure(`expected a boolean, got ${typeof plain}`);

      return plain;
    case "json":
      if (!descriptor.conforms(plain)) throw unmarshalFailure("document rejected by its guard");

      return plain;
    case "struct": {
      if (!isRecord(plain)) throw unmarshalFailure("expected an object");

      const value = descriptor.zero();
      if (!isRecord(value)) return value;

      for (const field of descriptor.fields) {
        if (plain[field.name] === undefined) continue;

        value[field.name] = fromPlain(field.type, plain[field.name]);
      }

      return value;
    }
    case "map": {
      if (plain === null) return null;
      if (!isRecord(plain)) throw unmarshalFailure("expected an object");

      const value = new Map<unknown, unknown>();

      for (const [key, entry] of Object.entries(plain)) {
        value.set(deserializeMapKey(descriptor.key, key), fromPlain(descriptor.value, entry));
      }

      return value;
    }
    case "pointer":
      return plain === null ? null : fromPlain(descriptor.target, plain);
    case "list":
      if (!Array.isArray(plain)) throw unmarshalFailure("expected an array");

      return plain.map((item: unknown) => fromPlain(descriptor.item, item));
  }
}

/**
 * Stored string form of a value.
 *
 * @example
 * ```typescript
 * serializeValue(k.string(), "nya"); // "nya"
 * serializeValue(k.int(), 5); // "5"
 * serializeValue(k.struct({ A: k.int() }), { A: 1 }); // '{"A":1}'
 * ```
 *
 * @throws KeypathError with code MARSHAL_FAILED for NaN and infinite numbers
 */
export function serializeValue(descriptor: AnyDescriptor, value: unknown): string {
  if (descriptor.kind === "string" && typeof value === "string") {
    return value;
  }

  return JSON.stringify(toPlain(descriptor, value));
}

/**
 * Value decoded from its stored string form.
 *
 * @throws KeypathError with code UNMARSHAL_FAILED
 */
export function deserializeValue(descriptor: AnyDescriptor, text: string): unknown {
  if (descriptor.kind === "string") {
    return text;
  }

  let plain: unknown;

  try {
    plain = JSON.parse(text);
  } catch (error) {
    throw unmarshalFailure(error instanceof Error ? error.message : String(error));
  }

  return fromPlain(descriptor, plain);
}

/**
 * Key path component a map key is stored under.
 *
 * @throws KeypathError with code KEY_WRONG_TYPE when the stored form
 * contains `/`
 */
export function serializeMapKey(descriptor: AnyDescriptor, key: unknown): string {
  const text = serializeValue(descriptor, key);

  if (text.includes("/")) {
    throw new KeypathError(
      KeypathErrorCode.KEY_WRONG_TYPE,
      `Map key '${text}' cannot be stored in a single key component`,
      text,
    );
  }

  return text;
}

/**
 * Map key decoded from a key path component.
 *
 * @throws KeypathError with code UNMARSHAL_FAILED
 */
export function deserializeMapKey(descriptor: AnyDescriptor, text: string): unknown {
  return deserializeValue(descriptor, text);
}
