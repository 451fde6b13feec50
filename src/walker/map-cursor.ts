import { serializeValue } from "../codec/value-codec";
import { isRecord, type AnyDescriptor, type MapDescriptor } from "../descriptors/descriptor";

export type MapEntry = {
  readonly value: unknown;
};

function isPrimitiveKey(key: unknown): boolean {
  return typeof key !== "object" || key === null;
}

/**
 * Copies struct values field by field and shares everything they reach
 * through a map or a pointer.
 */
function copyEntry(descriptor: AnyDescriptor, value: unknown): unknown {
  if (descriptor.kind !== "struct" || !isRecord(value)) return value;

  const copy: Record<string, unknown> = Object.assign(Object.create(Object.getPrototypeOf(value)), value);

  for (const field of descriptor.fields) {
    copy[field.name] = copyEntry(field.type, value[field.name]);
  }

  return copy;
}

/**
 * Copy-modify-write access to the entries of a map.
 *
 * Writers never mutate a struct entry in place: they take a copy with `get`
 * or `getOrCreate`, mutate the copy, then `put` it back. A walk that fails
 * half way therefore leaves the entry as it was. Maps and pointed-to
 * objects inside an entry are shared with the copy, so references to them
 * stay live.
 *
 * Keys that are objects are matched by their serialized form.
 */
export class MapCursor {
  public constructor(
    private readonly map: Map<unknown, unknown>,
    private readonly descriptor: MapDescriptor<unknown, unknown>,
  ) {}

  /**
   * Live entry, for reads only.
   */
  public lookup(key: unknown): MapEntry | undefined {
    const stored = this.storedKey(key);
    if (stored === undefined) return undefined;

    return { value: this.map.get(stored.key) };
  }

  /**
   * Working copy of the entry, if it exists.
   */
  public get(key: unknown): MapEntry | undefined {
    const entry = this.lookup(key);
    if (entry === undefined) return undefined;

    return { value: copyEntry(this.descriptor.value, entry.value) };
  }

  /**
   * Working copy of the entry, or a zero value when the entry does not exist.
   * The map itself is not touched.
   */
  public getOrCreate(key: unknown): MapEntry {
    return this.get(key) ?? { value: this.descriptor.value.zero() };
  }

  public put(key: unknown, value: unknown): void {
    const stored = this.storedKey(key);

    this.map.set(stored === undefined ? key : stored.key, value);
  }

  public delete(key: unknown): boolean {
    const stored = this.storedKey(key);
    if (stored === undefined) return false;

    return this.map.delete(stored.key);
  }

  private storedKey(key: unknown): { key: unknown } | undefined {
    if (isPrimitiveKey(key)) {
      return this.map.has(key) ? { key } : undefined;
    }

    const wanted = serializeValue(this.descriptor.key, key);

    for (const candidate of this.map.keys()) {
      if (!isPrimitiveKey(candidate) && serializeValue(this.descriptor.key, candidate) === wanted) {
        return { key: candidate };
      }
    }

    return undefined;
  }
}
