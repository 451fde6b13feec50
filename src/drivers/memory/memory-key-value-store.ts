import type {
  ChangeSourceContract,
  KeyValueGetterContract,
  KeyValueStoreContract,
  Update,
} from "../../contracts/key-value-store.contract";
import { NoSuchKeyError } from "../../errors/no-such-key.error";
import { abortable } from "../abortable";

/**
 * In-process key-value store and change source.
 *
 * Every write is queued as an update and handed out by `next` in order.
 * Entries the store is created with are queued as creations, so a consumer
 * replays them first.
 *
 * @example
 * ```typescript
 * const store = new MemoryKeyValueStore({ "/app/theme": "dark" });
 *
 * await store.next(); // { key: "/app/theme", value: "dark" }
 * ```
 */
export class MemoryKeyValueStore
  implements KeyValueStoreContract, KeyValueGetterContract, ChangeSourceContract
{
  private readonly values = new Map<string, string>();

  private readonly queue: Update[] = [];

  private waiters: Array<() => void> = [];

  public constructor(entries: Record<string, string> = {}) {
    for (const [key, value] of Object.entries(entries)) {
      this.values.set(key, value);
      this.queue.push({ key, value });
    }
  }

  public async set(key: string, value: string, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();

    const previous = this.values.get(key);

    this.values.set(key, value);
    this.push(previous === undefined ? { key, value } : { key, value, previous });
  }

  /**
   * A key ending in `/` removes every key under that prefix and is reported
   * as a single deletion of the prefix.
   *
   * @throws NoSuchKeyError when nothing is stored under the key
   */
  public async delete(key: string, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();

    if (key.endsWith("/")) {
      const matching = [...this.values.keys()].filter((candidate) => candidate.startsWith(key));

      if (matching.length === 0) {
        throw new NoSuchKeyError(key);
      }

      for (const candidate of matching) {
        this.values.delete(candidate);
      }

      return this.push({ key });
    }

    const previous = this.values.get(key);

    if (previous === undefined) {
      throw new NoSuchKeyError(key);
    }

    this.values.delete(key);
    this.push({ key, previous });
  }

  /**
   * @throws NoSuchKeyError
   */
  public async get(key: string, signal?: AbortSignal): Promise<string> {
    signal?.throwIfAborted();

    const value = this.values.get(key);

    if (value === undefined) {
      throw new NoSuchKeyError(key);
    }

    return value;
  }

  public async next(signal?: AbortSignal): Promise<Update> {
    signal?.throwIfAborted();

    for (;;) {
      const update = this.queue.shift();

      if (update !== undefined) {
        return update;
      }

      await this.changed(signal);
    }
  }

  /**
   * Snapshot of the stored pairs.
   */
  public getBackingMap(): Record<string, string> {
    return Object.fromEntries(this.values);
  }

  /**
   * Number of updates not handed out yet.
   */
  public get pending(): number {
    return this.queue.length;
  }

  /**
   * Number of `next` calls waiting for a write.
   */
  public get waiting(): number {
    return this.waiters.length;
  }

  /**
   * Resolves on the next write. An aborted wait stops waiting.
   */
  private changed(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();

    let wake: () => void = () => undefined;
    const changed = new Promise<void>((resolve) => {
      wake = resolve;
    });

    this.waiters.push(wake);

    if (signal === undefined) return changed;

    const forget = () => {
      this.waiters = this.waiters.filter((waiter) => waiter !== wake);
    };

    signal.addEventListener("abort", forget, { once: true });

    return abortable(changed, signal).finally(() => signal.removeEventListener("abort", forget));
  }

  private push(update: Update): void {
    this.queue.push(update);

    const waiters = this.waiters;
    this.waiters = [];

    for (const wake of waiters) {
      wake();
    }
  }
}
