// Configuration
export * from "./config";
export * from "./types";

// Errors
export * from "./errors";

// Format grammar
export * from "./format/format";

// Descriptors and codec
export * from "./descriptors";
export * from "./codec/value-codec";

// Walker
export { MapCursor, type MapEntry } from "./walker/map-cursor";
export * from "./walker/operations";
export * from "./walker/path-segment";

// Encoder
export * from "./encoder/encoder";

// Contracts
export * from "./contracts/key-value-store.contract";
export * from "./contracts/scoped-lock.contract";

// Lock
export * from "./lock/object-lock";

// Store helpers
export * from "./store/store-helpers";

// Sync
export * from "./sync/router-events";
export * from "./sync/sync-event";
export * from "./sync/sync-router";
export * from "./sync/types";

// Drivers
export * from "./drivers/memory/memory-key-value-store";
export * from "./drivers/mongodb/mongodb-key-value-store";
export * from "./drivers/mongodb/types";
