export * as k from "./builders";
export * from "./descriptor";
