import type { ScopedLockContract } from "../contracts/scoped-lock.contract";
import type { AnyDescriptor, Infer } from "../descriptors/descriptor";
import type { SyncEvent } from "./sync-event";

/**
 * Called once per update routed to a synced object.
 */
export type SyncCallback = (event: SyncEvent) => void | Promise<void>;

/**
 * An object kept in sync with a key space.
 */
export type SyncObject<D extends AnyDescriptor = AnyDescriptor> = {
  /**
   * Format the object is stored with, e.g. `"/settings/"`.
   */
  format: string;
  /**
   * Root object updates are applied to.
   */
  object: Infer<D>;
  /**
   * Descriptor of the root object.
   */
  descriptor: D;
  /**
   * Notified after each update was applied to the object.
   */
  callback: SyncCallback;
  /**
   * Lock shared with the writers of the object; updates are applied while
   * holding it.
   */
  lock?: ScopedLockContract;
};

export type SyncRegistration = SyncObject & {
  /**
   * Registration id, unique for the lifetime of a router.
   */
  readonly id: number;
};
