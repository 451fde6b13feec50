/**
 * Mutual exclusion around code touching a shared root object.
 *
 * The same lock is handed to the store helpers (writers) and to the router
 * registration (the apply path), so both never mutate the object at once.
 */
export interface ScopedLockContract {
  /**
   * Runs the callback while holding the lock and returns its result.
   */
  runExclusive<T>(callback: () => T | Promise<T>): Promise<T>;
}
