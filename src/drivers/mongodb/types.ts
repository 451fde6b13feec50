import type { MongoClientOptions } from "mongodb";

/**
 * One stored pair. The key is the document id.
 */
export type KeyValueDocument = {
  _id: string;
  value: string;
};

/**
 * Connection settings of {@link MongoDbKeyValueStore.connect}.
 */
export type MongoDbKeyValueStoreOptions = {
  /**
   * Connection string, e.g. `mongodb://localhost:27017`.
   */
  uri: string;
  /**
   * Database holding the collection.
   */
  database: string;
  /**
   * Collection holding the pairs.
   *
   * @default "keyvalues"
   */
  collection?: string;
  /**
   * Options passed to the native client as they are.
   */
  clientOptions?: MongoClientOptions;
};
