/**
 * Change router.
 *
 * Pulls updates from a change source and applies each of them to the synced
 * object whose key space contains the updated key, then notifies that
 * object's callback with a {@link SyncEvent} describing which field changed.
 *
 * @module keypath-sync/sync/sync-router
 */

import { colors } from "@mongez/copper";
import { log } from "@warlock.js/logger";
import { getKeypathConfig, shouldLog } from "../config";
import {
  isWatchable,
  type ChangeSourceContract,
  type Update,
} from "../contracts/key-value-store.contract";
import type { AnyDescriptor } from "../descriptors/descriptor";
import { KeypathErrorCode, isKeypathError } from "../errors/keypath.error";
import { RegistrationConflictError, RegistrationNotFoundError } from "../errors/registration.error";
import { SyncCallbackError, type SyncCallbackFailure } from "../errors/sync-callback.error";
import { joinKey, literalPrefix, parseFormat, prefixCollision } from "../format/format";
import { deleteByKey, updateByKey } from "../walker/operations";
import { describePath, type PathSegment } from "../walker/path-segment";
import { RouterEventType, triggerRouterEvent } from "./router-events";
import { SyncEvent } from "./sync-event";
import type { SyncObject, SyncRegistration } from "./types";

/**
 * Literal key prefix a format's key space starts with.
 */
function watchPrefix(format: string): string {
  const parsed = parseFormat(format);
  const prefix = literalPrefix(parsed);

  if (prefix.length === parsed.length) return joinKey(prefix);

  return prefix.length === 0 ? "" : `${joinKey(prefix)}/`;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * @example
 * ```typescript
 * const store = new MemoryKeyValueStore();
 * const router = new SyncRouter(store);
 *
 * await router.syncObject({
 *   format: "/app/",
 *   object: settings,
 *   descriptor: Settings,
 *   callback: (event) => {
 *     if (event.field("theme").ok) applyTheme(settings.theme);
 *   },
 * });
 *
 * while (!signal.aborted) {
 *   await router.next(signal);
 * }
 * ```
 */
export class SyncRouter {
  private readonly objects = new Map<number, SyncRegistration>();

  private nextId = 0;

  public constructor(public readonly source: ChangeSourceContract) {}

  /**
   * Starts syncing an object.
   *
   * @returns The registration id
   * @throws RegistrationConflictError when the key space of the object
   * overlaps the key space of an already synced one
   */
  public async syncObject<D extends AnyDescriptor>(record: SyncObject<D>): Promise<number> {
    for (const registration of this.objects.values()) {
      if (prefixCollision(record.format, registration.format)) {
        throw new RegistrationConflictError(record.format, registration.format);
      }
    }

    const id = this.nextId++;
    const registration: SyncRegistration = {
      format: record.format,
      object: record.object,
      descriptor: record.descriptor,
      callback: record.callback,
      lock: record.lock,
      id,
    };

    this.objects.set(id, registration);

    if (isWatchable(this.source)) {
      try {
        await this.source.watch(watchPrefix(record.format));
      } catch (error) {
        this.objects.delete(id);
        throw error;
      }
    }

    if (shouldLog("info")) {
      log.info("keypath", "sync", `Syncing object at ${colors.cyan(record.format)}`);
    }

    triggerRouterEvent(RouterEventType.SYNCED, { id, format: record.format });

    return id;
  }

  /**
   * Stops syncing the object registered under exactly this format.
   *
   * @throws RegistrationNotFoundError
   */
  public async unsyncObject(format: string): Promise<void> {
    const registration = [...this.objects.values()].find((candidate) => candidate.format === format);

    if (registration === undefined) {
      throw new RegistrationNotFoundError(format);
    }

    this.objects.delete(registration.id);

    if (isWatchable(this.source)) {
      await this.source.unwatch(watchPrefix(format));
    }

    if (shouldLog("info")) {
      log.info("keypath", "unsync", `Stopped syncing object at ${colors.cyan(format)}`);
    }

    triggerRouterEvent(RouterEventType.UNSYNCED, { id: registration.id, format });
  }

  /**
   * Live registrations.
   */
  public registrations(): SyncRegistration[] {
    return [...this.objects.values()];
  }

  /**
   * Waits for one update, applies it and notifies the callbacks concerned.
   *
   * Errors of the change source (cancellation included) propagate as they
   * are.
   *
   * @throws SyncCallbackError when callbacks failed and `callbackErrors` is
   * `"throw"`
   */
  public async next(signal?: AbortSignal): Promise<void> {
    const update = await this.source.next(signal);
    const failures: SyncCallbackFailure[] = [];

    let routed = false;

    if (update.value === undefined) {
      routed = await this.routeDeletion(update, failures);
    }

    if (!routed) {
      routed = await this.routeUpsert(update, update.value ?? "", failures);
    }

    if (!routed) {
      if (shouldLog("info")) {
        log.info("keypath", "route", `No synced object for ${colors.yellow(update.key)}`);
      }

      triggerRouterEvent(RouterEventType.SKIPPED, { update });
    }

    this.report(update, failures);
  }

  /**
   * Removes the map entry a deletion designates from the first registration
   * holding it.
   */
  private async routeDeletion(update: Update, failures: SyncCallbackFailure[]): Promise<boolean> {
    const key = update.key.endsWith("/") ? update.key.slice(0, -1) : update.key;

    for (const registration of this.objects.values()) {
      let fields: PathSegment[];

      try {
        fields = await this.exclusive(registration, () =>
          deleteByKey(registration.object, registration.descriptor, registration.format, key),
        );
      } catch (error) {
        if (!isKeypathError(error) || error.code === KeypathErrorCode.OBJECT_NOT_FOUND) {
          throw error;
        }

        continue;
      }

      await this.notify(registration, fields, update, true, failures);

      return true;
    }

    return false;
  }

  /**
   * Applies the value to every registration whose key space holds the key.
   */
  private async routeUpsert(
    update: Update,
    value: string,
    failures: SyncCallbackFailure[],
  ): Promise<boolean> {
    const ignoreUnmarshalFailure = getKeypathConfig("ignoreUnmarshalFailure");
    let routed = false;

    for (const registration of this.registrations()) {
      let fields: PathSegment[];

      try {
        fields = await this.exclusive(registration, () =>
          updateByKey(
            registration.object,
            registration.descriptor,
            registration.format,
            update.key,
            value,
            { ignoreUnmarshalFailure },
          ),
        );
      } catch (error) {
        if (!isKeypathError(error)) throw error;

        if (shouldLog("info")) {
          log.info(
            "keypath",
            "route",
            `${colors.yellow(update.key)} skipped for ${colors.cyan(registration.format)}: ${error.message}`,
          );
        }

        continue;
      }

      routed = true;
      await this.notify(registration, fields, update, false, failures);
    }

    return routed;
  }

  private async exclusive<T>(registration: SyncRegistration, apply: () => T): Promise<T> {
    if (registration.lock === undefined) {
      return apply();
    }

    return await registration.lock.runExclusive(apply);
  }

  private async notify(
    registration: SyncRegistration,
    fields: PathSegment[],
    update: Update,
    deleted: boolean,
    failures: SyncCallbackFailure[],
  ): Promise<void> {
    const event = SyncEvent.create(registration.object, registration.descriptor, fields, update);

    if (shouldLog("info")) {
      log.info(
        "keypath",
        "route",
        `${colors.yellow(update.key)} ${deleted ? "deleted" : "updated"} ${colors.cyan(registration.format)} ${describePath(fields)}`,
      );
    }

    triggerRouterEvent(RouterEventType.ROUTED, {
      format: registration.format,
      update,
      fields,
      deleted,
    });

    try {
      await registration.callback(event);
    } catch (error) {
      failures.push({ format: registration.format, error: toError(error) });
    }
  }

  private report(update: Update, failures: SyncCallbackFailure[]): void {
    if (failures.length === 0) return;

    if (getKeypathConfig("callbackErrors") === "throw") {
      throw new SyncCallbackError(update.key, failures);
    }

    if (!shouldLog("error")) return;

    for (const failure of failures) {
      log.error(
        "keypath",
        "callback",
        `Callback of ${colors.cyan(failure.format)} failed on ${colors.yellow(update.key)}: ${failure.error.message}`,
      );
    }
  }
}
