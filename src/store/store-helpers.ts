/**
 * Store helpers.
 *
 * Keep a key-value store in step with a local object: push the pairs an
 * object occupies, set a sub-object then push it, or remove a map entry then
 * delete its keys. Walker calls run inside the caller's lock when one is
 * given; the store writes that follow do not.
 *
 * @module keypath-sync/store/store-helpers
 */

import type { KeyValueStoreContract } from "../contracts/key-value-store.contract";
import type { ScopedLockContract } from "../contracts/scoped-lock.contract";
import type { AnyDescriptor, Infer } from "../descriptors/descriptor";
import { encode } from "../encoder/encoder";
import { deleteByFields, setByFields } from "../walker/operations";
import type { Selector } from "../walker/path-segment";

export type StoreOptions = {
  /**
   * Lock shared with the sync router guarding the same object.
   */
  lock?: ScopedLockContract;
  /**
   * Cancels the store writes.
   */
  signal?: AbortSignal;
};

async function withLock<T>(lock: ScopedLockContract | undefined, callback: () => T): Promise<T> {
  if (lock === undefined) {
    return callback();
  }

  return await lock.runExclusive(callback);
}

/**
 * Writes every pair the object (or the sub-object the selectors address)
 * is stored as.
 *
 * @example
 * ```typescript
 * await storeObject(store, settings, Settings, "/app/");
 * await storeObject(store, settings, Settings, "/app/", ["users", "alice"]);
 * ```
 */
export async function storeObject<D extends AnyDescriptor>(
  store: KeyValueStoreContract,
  object: Infer<D>,
  descriptor: D,
  format: string,
  selectors: readonly Selector[] = [],
  options: StoreOptions = {},
): Promise<void> {
  const pairs = await withLock(options.lock, () => encode(object, descriptor, format, selectors));

  for (const [key, value] of Object.entries(pairs)) {
    await store.set(key, value, options.signal);
  }
}

/**
 * Sets a sub-object of the local object, then writes it to the store.
 */
export async function storeSet<D extends AnyDescriptor>(
  store: KeyValueStoreContract,
  object: Infer<D>,
  descriptor: D,
  format: string,
  value: unknown,
  selectors: readonly Selector[] = [],
  options: StoreOptions = {},
): Promise<void> {
  await withLock(options.lock, () => setByFields(object, descriptor, format, value, selectors));

  await storeObject(store, object, descriptor, format, selectors, options);
}

/**
 * Removes a map entry from the local object, then deletes the keys it was
 * stored under.
 */
export async function storeDelete<D extends AnyDescriptor>(
  store: KeyValueStoreContract,
  object: Infer<D>,
  descriptor: D,
  format: string,
  selectors: readonly Selector[],
  options: StoreOptions = {},
): Promise<void> {
  const key = await withLock(options.lock, () => deleteByFields(object, descriptor, format, selectors));

  await store.delete(key, options.signal);
}
