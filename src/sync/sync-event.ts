/**
 * Change events.
 *
 * A sync callback receives one event per routed update. The event is
 * positioned on the root of the synced object and holds the field path of
 * the change; navigation steps consume that path against the live object and
 * fail as soon as the requested shape does not match. Failures are sticky, so
 * a callback can probe several shapes and dispatch on the one that succeeds.
 *
 * @module keypath-sync/sync/sync-event
 */

import { isRecord, type AnyDescriptor } from "../descriptors/descriptor";
import type { Update } from "../contracts/key-value-store.contract";
import { SyncEventError, SyncEventErrorCode, type SyncEventErrorCodeName } from "../errors/sync-event.error";
import { MapCursor } from "../walker/map-cursor";
import type { PathSegment } from "../walker/path-segment";

/**
 * Receives the key of the map entry {@link SyncEvent.mapValue} entered.
 */
export type MapKeyRef = {
  key?: unknown;
};

type Position = {
  readonly value: unknown;
  readonly present: boolean;
  readonly descriptor: AnyDescriptor;
  readonly remaining: readonly PathSegment[];
  readonly error?: SyncEventError;
};

/**
 * @example
 * ```typescript
 * router.syncObject({
 *   format: "/o/",
 *   object,
 *   descriptor: Root,
 *   callback: (event) => {
 *     const name = event.field("B");
 *     if (name.ok) return console.log("B is now", name.asString());
 *
 *     const ref: MapKeyRef = {};
 *     const entry = event.field("M").mapValue(ref);
 *     if (entry.isDeleted()) console.log("entry", ref.key, "removed");
 *   },
 * });
 * ```
 */
export class SyncEvent {
  private constructor(
    private readonly position: Position,
    /**
     * Field path of the change, from the root of the synced object.
     */
    public readonly fields: readonly PathSegment[],
    /**
     * The routed update.
     */
    public readonly update: Update,
  ) {}

  /**
   * Event positioned on the root of a synced object.
   */
  public static create(
    object: unknown,
    descriptor: AnyDescriptor,
    fields: readonly PathSegment[],
    update: Update,
  ): SyncEvent {
    return new SyncEvent(
      { value: object, present: true, descriptor, remaining: fields },
      fields,
      update,
    );
  }

  /**
   * Key of the routed update.
   */
  public get key(): string {
    return this.update.key;
  }

  /**
   * Whether every navigation step so far matched.
   */
  public get ok(): boolean {
    return this.position.error === undefined;
  }

  /**
   * Failure of the first navigation step that did not match.
   */
  public get error(): SyncEventError | undefined {
    return this.position.error;
  }

  /**
   * Enters the struct field `name`; fails unless the change lies under it.
   */
  public field(name: string): SyncEvent {
    const position = this.dereference();
    if (position.error) return this.with(position);

    const [segment, ...remaining] = position.remaining;
    const descriptor = position.descriptor;

    if (segment === undefined) return this.fail(SyncEventErrorCode.NO_MORE_FIELDS);
    if (descriptor.kind !== "struct") return this.fail(SyncEventErrorCode.NOT_A_STRUCT);
    if (segment.kind !== "field" || segment.name !== name) {
      return this.fail(SyncEventErrorCode.NOT_THIS_PATH);
    }

    const field = descriptor.field(name);
    if (field === undefined) return this.fail(SyncEventErrorCode.NOT_THIS_PATH);

    const record = isRecord(position.value) ? position.value : undefined;

    return this.with({
      value: record?.[name],
      present: record !== undefined,
      descriptor: field.type,
      remaining,
    });
  }

  /**
   * Enters the map entry the change lies under. The entry key is written to
   * `keyRef` when one is given.
   */
  public mapValue(keyRef?: MapKeyRef): SyncEvent {
    const position = this.dereference();
    if (position.error) return this.with(position);

    const [segment, ...remaining] = position.remaining;
    const descriptor = position.descriptor;

    if (segment === undefined) return this.fail(SyncEventErrorCode.NO_MORE_FIELDS);
    if (descriptor.kind !== "map") return this.fail(SyncEventErrorCode.NOT_A_MAP);
    if (segment.kind !== "key" || !descriptor.key.conforms(segment.key)) {
      return this.fail(SyncEventErrorCode.WRONG_KEY_TYPE);
    }

    if (keyRef) {
      keyRef.key = segment.key;
    }

    const entry =
      position.value instanceof Map
        ? new MapCursor(position.value, descriptor).lookup(segment.key)
        : undefined;

    return this.with({
      value: entry?.value,
      present: entry !== undefined,
      descriptor: descriptor.value,
      remaining,
    });
  }

  /**
   * Sequence elements cannot be synced.
   */
  public listIndex(): SyncEvent {
    if (this.position.error) return this;

    return this.fail(SyncEventErrorCode.NOT_IMPLEMENTED);
  }

  /**
   * Whether the change is the deletion of the object the event is on.
   */
  public isDeleted(): boolean {
    return !this.position.present && this.position.remaining.length === 0;
  }

  /**
   * Live object the event is on.
   *
   * @throws SyncEventError
   */
  public current(): unknown {
    const position = this.settled();

    return position.value;
  }

  /**
   * @throws SyncEventError
   */
  public asString(): string {
    const position = this.settled();

    if (position.descriptor.kind !== "string" || typeof position.value !== "string") {
      throw new SyncEventError(SyncEventErrorCode.NOT_A_STRING);
    }

    return position.value;
  }

  /**
   * @throws SyncEventError
   */
  public asInt(): number {
    const position = this.settled();

    if (position.descriptor.kind !== "int" || typeof position.value !== "number") {
      throw new SyncEventError(SyncEventErrorCode.NOT_AN_INT);
    }

    return position.value;
  }

  /**
   * Integers are accepted too.
   *
   * @throws SyncEventError
   */
  public asFloat(): number {
    const position = this.settled();
    const kind = position.descriptor.kind;

    if ((kind !== "float" && kind !== "int") || typeof position.value !== "number") {
      throw new SyncEventError(SyncEventErrorCode.NOT_A_FLOAT);
    }

    return position.value;
  }

  /**
   * @throws SyncEventError
   */
  public asBool(): boolean {
    const position = this.settled();

    if (position.descriptor.kind !== "bool" || typeof position.value !== "boolean") {
      throw new SyncEventError(SyncEventErrorCode.NOT_A_BOOL);
    }

    return position.value;
  }

  private with(position: Position): SyncEvent {
    return new SyncEvent(position, this.fields, this.update);
  }

  private fail(code: SyncEventErrorCodeName): SyncEvent {
    return this.with({ ...this.position, error: new SyncEventError(code) });
  }

  /**
   * Position after following pointers, or the failure met on the way.
   */
  private dereference(): Position {
    let position = this.position;
    if (position.error) return position;

    if (!position.present) {
      return { ...position, error: new SyncEventError(SyncEventErrorCode.IS_DELETE) };
    }

    while (position.descriptor.kind === "pointer") {
      if (position.value === null || position.value === undefined) {
        return { ...position, error: new SyncEventError(SyncEventErrorCode.NIL_POINTER) };
      }

      position = { ...position, descriptor: position.descriptor.target };
    }

    return position;
  }

  private settled(): Position {
    const position = this.dereference();

    if (position.error) {
      throw position.error;
    }

    return position;
  }
}
