/**
 * A key-value pair change.
 *
 * `value` is missing when the pair is being deleted, `previous` when it is
 * being created.
 */
export type Update = {
  /** The key of the pair */
  key: string;

  /** The new value, absent on deletion */
  value?: string;

  /** The value before the change, absent on creation */
  previous?: string;
};

/**
 * Write access to a key-value store.
 */
export interface KeyValueStoreContract {
  /**
   * Sets the value of a key.
   *
   * @param key - The key to set
   * @param value - The value to store
   * @param signal - Cancels the write
   */
  set(key: string, value: string, signal?: AbortSignal): Promise<void>;

  /**
   * Deletes a key. A key ending in `/` deletes every key under that prefix.
   *
   * @param key - The key (or prefix) to delete
   * @param signal - Cancels the deletion
   */
  delete(key: string, signal?: AbortSignal): Promise<void>;
}

/**
 * Read access to a key-value store.
 */
export interface KeyValueGetterContract {
  /**
   * Returns the value stored under the key.
   *
   * @throws NoSuchKeyError when the key is not in the store
   */
  get(key: string, signal?: AbortSignal): Promise<string>;
}

/**
 * Stream of changes of a key-value store.
 *
 * The first calls replay every existing pair as a creation. There is no
 * ordering guarantee across keys; updates of one key arrive in order.
 */
export interface ChangeSourceContract {
  /**
   * Waits for the next change.
   *
   * Rejects with the signal's reason when the signal aborts first.
   */
  next(signal?: AbortSignal): Promise<Update>;
}

/**
 * Change source that can restrict the keys it reports.
 */
export interface WatchableChangeSourceContract extends ChangeSourceContract {
  /**
   * Starts reporting changes of keys under the prefix.
   */
  watch(prefix: string): void | Promise<void>;

  /**
   * Stops reporting changes of keys under the prefix.
   */
  unwatch(prefix: string): void | Promise<void>;
}

export function isWatchable(source: ChangeSourceContract): source is WatchableChangeSourceContract {
  return (
    "watch" in source &&
    typeof source.watch === "function" &&
    "unwatch" in source &&
    typeof source.unwatch === "function"
  );
}
