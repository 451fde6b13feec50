export * from "./keypath.error";
export * from "./no-such-key.error";
export * from "./registration.error";
export * from "./sync-callback.error";
export * from "./sync-event.error";
