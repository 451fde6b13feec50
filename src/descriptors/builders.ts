import {
  BoolDescriptor,
  FloatDescriptor,
  IntDescriptor,
  JsonDescriptor,
  ListDescriptor,
  MapDescriptor,
  PointerDescriptor,
  StringDescriptor,
  StructDescriptor,
  type AnyDescriptor,
  type Infer,
  type JsonGuard,
  type StructShape,
  type StructValue,
} from "./descriptor";

/**
 * Descriptor builders.
 *
 * @example
 * ```typescript
 * import { k } from "keypath-sync";
 *
 * const Settings = k.struct({
 *   theme: k.string(),
 *   limits: { type: k.struct({ max: k.int() }), format: "limits/" },
 *   users: { type: k.map(k.string(), k.struct({ age: k.int() })), format: "users/{key}/" },
 * });
 * ```
 */

export function string(): StringDescriptor {
  return new StringDescriptor();
}

export function int(): IntDescriptor {
  return new IntDescriptor();
}

export function float(): FloatDescriptor {
  return new FloatDescriptor();
}

export function bool(): BoolDescriptor {
  return new BoolDescriptor();
}

function defined<T>(value: unknown): value is T {
  return value !== undefined;
}

/**
 * Opaque JSON leaf.
 *
 * Without a guard any defined value is accepted as a `T`.
 */
export function json<T>(zero: T, guard: JsonGuard<T> = defined): JsonDescriptor<T> {
  return new JsonDescriptor(zero, guard);
}

export function struct<S extends StructShape>(shape: S): StructDescriptor<StructValue<S>> {
  return new StructDescriptor<StructValue<S>>(shape);
}

export function map<KD extends AnyDescriptor, VD extends AnyDescriptor>(
  key: KD,
  value: VD,
): MapDescriptor<Infer<KD>, Infer<VD>> {
  return new MapDescriptor<Infer<KD>, Infer<VD>>(key, value);
}

export function pointer<D extends AnyDescriptor>(target: D): PointerDescriptor<Infer<D>> {
  return new PointerDescriptor<Infer<D>>(target);
}

export function list<D extends AnyDescriptor>(item: D): ListDescriptor<Infer<D>> {
  return new ListDescriptor<Infer<D>>(item);
}
