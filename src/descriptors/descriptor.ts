/**
 * Type descriptors.
 *
 * A descriptor states the static shape of a value so that the walker, the
 * codec and the encoder can traverse it without runtime reflection. Each
 * descriptor knows its zero value, how to make an owned deep copy of a value
 * and how to check that an arbitrary value conforms to it.
 *
 * Composite descriptors carry the static type of their values as a type
 * parameter; their children are kept as {@link AnyDescriptor} so that the
 * traversal code can branch on `kind`.
 *
 * @module keypath-sync/descriptors/descriptor
 */

import { clone } from "@mongez/reinforcements";
import { parseFieldFormat, type Format } from "../format/format";

export type DescriptorKind =
  | "string"
  | "int"
  | "float"
  | "bool"
  | "json"
  | "struct"
  | "map"
  | "pointer"
  | "list";

/**
 * Common surface of every descriptor.
 */
export abstract class TypeDescriptor<T> {
  public abstract readonly kind: DescriptorKind;

  /**
   * Value a freshly created object of this type holds.
   */
  public abstract zero(): T;

  /**
   * Deep copy owned by the caller.
   */
  public abstract copy(value: T): T;

  /**
   * Runtime check that the value has this descriptor's shape.
   */
  public abstract conforms(value: unknown): value is T;
}

/**
 * Static TypeScript type of the values a descriptor describes.
 *
 * @example
 * ```typescript
 * const Point = k.struct({ x: k.int(), y: k.int() });
 * type Point = Infer<typeof Point>; // { x: number; y: number }
 * ```
 */
export type Infer<D> = D extends TypeDescriptor<infer T> ? T : never;

export class StringDescriptor extends TypeDescriptor<string> {
  public readonly kind = "string" as const;

  public zero(): string {
    return "";
  }

  public copy(value: string): string {
    return value;
  }

  public conforms(value: unknown): value is string {
    return typeof value === "string";
  }
}

export class IntDescriptor extends TypeDescriptor<number> {
  public readonly kind = "int" as const;

  public zero(): number {
    return 0;
  }

  public copy(value: number): number {
    return value;
  }

  public conforms(value: unknown): value is number {
    return Number.isInteger(value);
  }
}

export class FloatDescriptor extends TypeDescriptor<number> {
  public readonly kind = "float" as const;

  public zero(): number {
    return 0;
  }

  public copy(value: number): number {
    return value;
  }

  public conforms(value: unknown): value is number {
    return typeof value === "number" && Number.isFinite(value);
  }
}

export class BoolDescriptor extends TypeDescriptor<boolean> {
  public readonly kind = "bool" as const;

  public zero(): boolean {
    return false;
  }

  public copy(value: boolean): boolean {
    return value;
  }

  public conforms(value: unknown): value is boolean {
    return typeof value === "boolean";
  }
}

export type JsonGuard<T> = (value: unknown) => value is T;

/**
 * Opaque leaf: stored as a JSON document and never walked into.
 */
export class JsonDescriptor<T> extends TypeDescriptor<T> {
  public readonly kind = "json" as const;

  public constructor(
    private readonly zeroValue: T,
    private readonly guard: JsonGuard<T>,
  ) {
    super();
  }

  public zero(): T {
    return this.copy(this.zeroValue);
  }

  public copy(value: T): T {
    return clone(value);
  }

  public conforms(value: unknown): value is T {
    return this.guard(value);
  }
}

export type AnyDescriptor =
  | StringDescriptor
  | IntDescriptor
  | FloatDescriptor
  | BoolDescriptor
  | JsonDescriptor<unknown>
  | StructDescriptor<unknown>
  | MapDescriptor<unknown, unknown>
  | PointerDescriptor<unknown>
  | ListDescriptor<unknown>;

/**
 * A struct field: either a bare descriptor (stored under the field name, as a
 * blob) or a descriptor with its own format.
 */
export type FieldInput = AnyDescriptor | { type: AnyDescriptor; format?: string };

export type StructShape = Record<string, FieldInput>;

type FieldDescriptor<F> = F extends { type: infer D } ? D : F;

export type StructValue<S extends StructShape> = {
  [K in keyof S]: Infer<FieldDescriptor<S[K]>>;
};

export interface StructField {
  readonly name: string;
  readonly type: AnyDescriptor;
  readonly format: Format;
}

/**
 * Whether the value can hold struct fields: any object that is not an
 * array or a map, class instances included.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Map);
}

function fieldType(input: FieldInput): AnyDescriptor {
  return input instanceof TypeDescriptor ? input : input.type;
}

function fieldFormat(input: FieldInput): string | undefined {
  return input instanceof TypeDescriptor ? undefined : input.format;
}

/**
 * Record with a fixed, ordered set of fields.
 *
 * Values are plain objects. Field order is the declaration order and drives
 * both the encoding order and the key-mode search order.
 */
export class StructDescriptor<T> extends TypeDescriptor<T> {
  public readonly kind = "struct" as const;

  public readonly fields: readonly StructField[];

  private readonly byName: Map<string, StructField>;

  public constructor(shape: StructShape) {
    super();
    this.fields = Object.entries(shape).map(([name, input]) => ({
      name,
      type: fieldType(input),
      format: parseFieldFormat(name, fieldFormat(input)),
    }));
    this.byName = new Map(this.fields.map((field) => [field.name, field]));
  }

  /**
   * Field declared under the given name, if any.
   */
  public field(name: string): StructField | undefined {
    return this.byName.get(name);
  }

  public zero(): T {
    return this.build((field) => field.type.zero());
  }

  public copy(value: T): T {
    if (!isRecord(value)) return value;

    return this.build((field) => copyValue(field.type, value[field.name]));
  }

  public conforms(value: unknown): value is T {
    if (!isRecord(value)) return false;

    return this.fields.every((field) => field.type.conforms(value[field.name]));
  }

  private build(valueOf: (field: StructField) => unknown): T {
    const result: Record<string, unknown> = {};

    for (const field of this.fields) {
      result[field.name] = valueOf(field);
    }

    if (!this.conforms(result)) {
      throw new TypeError("Struct value does not match its descriptor");
    }

    return result;
  }
}

/**
 * Associative collection. Values are `Map` instances; `null` is a map that
 * does not exist yet.
 */
export class MapDescriptor<K, V> extends TypeDescriptor<Map<K, V> | null> {
  public readonly kind = "map" as const;

  public constructor(
    public readonly key: AnyDescriptor,
    public readonly value: AnyDescriptor,
  ) {
    super();
  }

  public zero(): Map<K, V> | null {
    return null;
  }

  /**
   * Empty map of this type.
   */
  public create(): Map<K, V> {
    return new Map<K, V>();
  }

  public copy(map: Map<K, V> | null): Map<K, V> | null {
    if (map === null) return null;

    const result = new Map<unknown, unknown>();

    for (const [key, value] of map) {
      result.set(copyValue(this.key, key), copyValue(this.value, value));
    }

    if (!this.conforms(result)) {
      throw new TypeError("Map value does not match its descriptor");
    }

    return result;
  }

  public conforms(map: unknown): map is Map<K, V> | null {
    if (map === null) return true;
    if (!(map instanceof Map)) return false;

    for (const [key, value] of map) {
      if (!this.key.conforms(key) || !this.value.conforms(value)) return false;
    }

    return true;
  }
}

/**
 * Optional indirection. `null` means the target object does not exist.
 */
export class PointerDescriptor<T> extends TypeDescriptor<T | null> {
  public readonly kind = "pointer" as const;

  public constructor(public readonly target: AnyDescriptor) {
    super();
  }

  public zero(): T | null {
    return null;
  }

  public copy(value: T | null): T | null {
    if (value === null) return null;

    const copied = copyValue(this.target, value);

    return this.conforms(copied) ? copied : value;
  }

  public conforms(value: unknown): value is T | null {
    return value === null || this.target.conforms(value);
  }
}

/**
 * Sequence. Declarable and storable as a blob, but never walked into.
 */
export class ListDescriptor<T> extends TypeDescriptor<T[]> {
  public readonly kind = "list" as const;

  public constructor(public readonly item: AnyDescriptor) {
    super();
  }

  public zero(): T[] {
    return [];
  }

  public copy(value: T[]): T[] {
    const copied = value.map((item) => copyValue(this.item, item));

    return this.conforms(copied) ? copied : value;
  }

  public conforms(value: unknown): value is T[] {
    return Array.isArray(value) && value.every((item) => this.item.conforms(item));
  }
}

/**
 * Deep copy of a value known only by its descriptor.
 *
 * Values that do not conform are returned untouched.
 */
export function copyValue(descriptor: AnyDescriptor, value: unknown): unknown {
  switch (descriptor.kind) {
    case "string":
    case "int":
    case "float":
    case "bool":
      return value;
    case "json":
      return descriptor.copy(value);
    case "struct":
      return descriptor.copy(value);
    case "pointer":
      return descriptor.copy(value);
    case "map":
      return descriptor.conforms(value) ? descriptor.copy(value) : value;
    case "list":
      return descriptor.conforms(value) ? descriptor.copy(value) : value;
  }
}
