import { AsyncLocalStorage } from "async_hooks";
import type { ScopedLockContract } from "../contracts/scoped-lock.contract";

/**
 * FIFO async mutex guarding a shared root object.
 *
 * Re-entrant within one async call chain: a callback already holding the
 * lock may call `runExclusive` again without deadlocking.
 *
 * @example
 * ```typescript
 * const lock = new ObjectLock();
 *
 * await router.syncObject({ format: "/app/", object: settings, descriptor: Settings, callback, lock });
 * await storeSet(store, settings, Settings, "/app/", "dark", ["theme"], { lock });
 * ```
 */
export class ObjectLock implements ScopedLockContract {
  private readonly holders = new AsyncLocalStorage<ObjectLock>();

  private tail: Promise<void> = Promise.resolve();

  private pending = 0;

  /**
   * Whether the lock is held or waited for.
   */
  public get isLocked(): boolean {
    return this.pending > 0;
  }

  public async runExclusive<T>(callback: () => T | Promise<T>): Promise<T> {
    if (this.holders.getStore() === this) {
      return await callback();
    }

    let release: () => void = () => undefined;
    const turn = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;

    this.tail = previous.then(() => turn);
    this.pending++;

    try {
      await previous;

      return await this.holders.run(this, async () => await callback());
    } finally {
      this.pending--;
      release();
    }
  }
}
