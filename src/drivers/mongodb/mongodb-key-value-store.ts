import { colors } from "@mongez/copper";
import { log } from "@warlock.js/logger";
import {
  MongoClient,
  type ChangeStream,
  type ChangeStreamDocument,
  type Collection,
} from "mongodb";
import { shouldLog } from "../../config";
import type {
  KeyValueGetterContract,
  KeyValueStoreContract,
  Update,
  WatchableChangeSourceContract,
} from "../../contracts/key-value-store.contract";
import { NoSuchKeyError } from "../../errors/no-such-key.error";
import { abortable } from "../abortable";
import type { KeyValueDocument, MongoDbKeyValueStoreOptions } from "./types";

const DEFAULT_COLLECTION = "keyvalues";

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Update carried by a change stream event, if the event changed a pair.
 */
function toUpdate(change: ChangeStreamDocument<KeyValueDocument>): Update | undefined {
  switch (change.operationType) {
    case "insert":
    case "replace":
      return { key: change.documentKey._id, value: change.fullDocument.value };
    case "update":
      if (!change.fullDocument) return undefined;

      return { key: change.documentKey._id, value: change.fullDocument.value };
    case "delete":
      return { key: change.documentKey._id };
    default:
      return undefined;
  }
}

/**
 * Key-value store kept in a MongoDB collection, one `{ _id: key, value }`
 * document per pair.
 *
 * As a change source it first replays every stored pair as a creation, then
 * follows the collection's change stream (which needs a replica set). Once a
 * prefix is watched, only keys under a watched prefix are reported.
 *
 * @example
 * ```typescript
 * const store = await MongoDbKeyValueStore.connect({
 *   uri: "mongodb://localhost:27017",
 *   database: "app",
 * });
 *
 * const router = new SyncRouter(store);
 * ```
 */
export class MongoDbKeyValueStore
  implements KeyValueStoreContract, KeyValueGetterContract, WatchableChangeSourceContract
{
  private readonly prefixes = new Map<string, number>();

  private readonly known = new Map<string, string>();

  private replay?: Update[];

  private stream?: ChangeStream<KeyValueDocument>;

  private pending?: Promise<Update | undefined>;

  public constructor(
    public readonly collection: Collection<KeyValueDocument>,
    private readonly client?: MongoClient,
  ) {}

  /**
   * Connects to the database and opens the store on its collection.
   */
  public static async connect(options: MongoDbKeyValueStoreOptions): Promise<MongoDbKeyValueStore> {
    const client = new MongoClient(options.uri, options.clientOptions);

    try {
      if (shouldLog("info")) {
        log.info(
          "keypath.mongodb",
          "connection",
          `Connecting to database ${colors.bold(colors.yellowBright(options.database))}`,
        );
      }

      await client.connect();
    } catch (error) {
      await client.close().catch(() => undefined);

      if (shouldLog("error")) {
        log.error(
          "keypath.mongodb",
          "connection",
          `Failed to connect to database: ${errorMessage(error)}`,
        );
      }

      throw error;
    }

    if (shouldLog("info")) {
      log.success("keypath.mongodb", "connection", "Connected to database");
    }

    const collection = client
      .db(options.database)
      .collection<KeyValueDocument>(options.collection ?? DEFAULT_COLLECTION);

    return new MongoDbKeyValueStore(collection, client);
  }

  public async set(key: string, value: string, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();

    await this.collection.updateOne({ _id: key }, { $set: { value } }, { upsert: true });
  }

  /**
   * A key ending in `/` removes every key under that prefix.
   *
   * @throws NoSuchKeyError when nothing is stored under the key
   */
  public async delete(key: string, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();

    const result = key.endsWith("/")
      ? await this.collection.deleteMany({ _id: { $regex: `^${escapeRegExp(key)}` } })
      : await this.collection.deleteOne({ _id: key });

    if (result.deletedCount === 0) {
      throw new NoSuchKeyError(key);
    }
  }

  /**
   * @throws NoSuchKeyError
   */
  public async get(key: string, signal?: AbortSignal): Promise<string> {
    signal?.throwIfAborted();

    const document = await this.collection.findOne({ _id: key });

    if (document === null) {
      throw new NoSuchKeyError(key);
    }

    return document.value;
  }

  public watch(prefix: string): void {
    this.prefixes.set(prefix, (this.prefixes.get(prefix) ?? 0) + 1);
  }

  public unwatch(prefix: string): void {
    const count = this.prefixes.get(prefix);
    if (count === undefined) return;

    if (count <= 1) {
      this.prefixes.delete(prefix);
    } else {
      this.prefixes.set(prefix, count - 1);
    }
  }

  /**
   * An aborted call does not lose the change it was waiting for: the next
   * call receives it.
   */
  public async next(signal?: AbortSignal): Promise<Update> {
    signal?.throwIfAborted();

    for (;;) {
      this.pending ??= this.pull();

      let update: Update | undefined;

      try {
        update = await abortable(this.pending, signal);
      } catch (error) {
        if (!signal?.aborted) {
          this.pending = undefined;
        }

        throw error;
      }

      this.pending = undefined;

      if (update === undefined) continue;

      const remembered = this.remember(update);

      if (this.isWatched(remembered.key)) {
        return remembered;
      }
    }
  }

  /**
   * Closes the change stream, and the client when the store opened it.
   */
  public async close(): Promise<void> {
    const stream = this.stream;
    this.stream = undefined;

    await stream?.close();

    if (this.client === undefined) return;

    await this.client.close();

    if (shouldLog("warn")) {
      log.warn("keypath.mongodb", "connection", "Disconnected from database");
    }
  }

  private changeStream(): ChangeStream<KeyValueDocument> {
    this.stream ??= this.collection.watch([], { fullDocument: "updateLookup" });

    return this.stream;
  }

  private async pull(): Promise<Update | undefined> {
    if (this.replay === undefined) {
      this.changeStream();

      const documents = await this.collection.find({}).toArray();

      this.replay = documents.map((document) => ({ key: document._id, value: document.value }));

      if (shouldLog("info")) {
        log.info(
          "keypath.mongodb",
          "replay",
          `Replaying ${colors.yellow(String(this.replay.length))} stored pairs`,
        );
      }
    }

    return this.replay.shift() ?? toUpdate(await this.changeStream().next());
  }

  private remember(update: Update): Update {
    const previous = this.known.get(update.key);

    if (update.value === undefined) {
      this.known.delete(update.key);
    } else {
      this.known.set(update.key, update.value);
    }

    return previous === undefined ? update : { ...update, previous };
  }

  private isWatched(key: string): boolean {
    if (this.prefixes.size === 0) return true;

    for (const prefix of this.prefixes.keys()) {
      if (key.startsWith(prefix)) return true;
    }

    return false;
  }
}
