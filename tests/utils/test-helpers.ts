/**
 * Shared test utilities for keypath-sync unit tests.
 *
 * Provides stand-ins for the collaborators of the router and the drivers
 * (change sources, MongoDB collections and change streams).
 */
import type { Collection } from "mongodb";
import { vi } from "vitest";
import type {
  ChangeSourceContract,
  Update,
  WatchableChangeSourceContract,
} from "../../src/contracts/key-value-store.contract";
import { MongoDbKeyValueStore } from "../../src/drivers/mongodb/mongodb-key-value-store";
import type { KeyValueDocument } from "../../src/drivers/mongodb/types";

// ============================================================================
// CHANGE SOURCES
// ============================================================================

/**
 * Change source handing out the given updates, one per `next` call.
 */
export function createMockChangeSource(updates: Update[] = []): ChangeSourceContract {
  const next = vi.fn();

  for (const update of updates) {
    next.mockResolvedValueOnce(update);
  }

  return { next };
}

/**
 * Change source with `watch` and `unwatch` stubs.
 */
export function createMockWatchableSource(updates: Update[] = []): WatchableChangeSourceContract {
  return {
    ...createMockChangeSource(updates),
    watch: vi.fn(),
    unwatch: vi.fn(),
  };
}

// ============================================================================
// MONGODB
// ============================================================================

export type MockChangeStream = {
  next: ReturnType<typeof vi.fn>;
  close: ReturnType<typeof vi.fn>;
};

export type MockCollection = {
  updateOne: ReturnType<typeof vi.fn>;
  deleteOne: ReturnType<typeof vi.fn>;
  deleteMany: ReturnType<typeof vi.fn>;
  findOne: ReturnType<typeof vi.fn>;
  find: ReturnType<typeof vi.fn>;
  watch: ReturnType<typeof vi.fn>;
};

/**
 * MongoDB store over a stubbed collection holding the given documents.
 *
 * @example
 * ```typescript
 * const { store, stream } = createMockMongoStore([{ _id: "/a", value: "1" }]);
 * stream.next.mockResolvedValueOnce({ operationType: "delete", documentKey: { _id: "/a" } });
 * ```
 */
export function createMockMongoStore(documents: KeyValueDocument[] = []) {
  const stream: MockChangeStream = {
    next: vi.fn(),
    close: vi.fn().mockResolvedValue(undefined),
  };

  const collection: MockCollection = {
    updateOne: vi.fn().mockResolvedValue({ acknowledged: true, upsertedCount: 1 }),
    deleteOne: vi.fn().mockResolvedValue({ acknowledged: true, deletedCount: 1 }),
    deleteMany: vi.fn().mockResolvedValue({ acknowledged: true, deletedCount: 2 }),
    findOne: vi.fn().mockResolvedValue(null),
    find: vi.fn().mockReturnValue({ toArray: vi.fn().mockResolvedValue(documents) }),
    watch: vi.fn().mockReturnValue(stream),
  };

  const store = new MongoDbKeyValueStore(collection as unknown as Collection<KeyValueDocument>);

  return { store, collection, stream };
}

/**
 * Promise settled from the outside.
 */
export function createDeferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;

  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });

  return { promise, resolve, reject };
}
