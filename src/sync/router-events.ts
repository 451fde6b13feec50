/**
 * Router lifecycle event names.
 *
 * The router publishes on the `@mongez/events` bus so that tooling (loggers,
 * metrics, tests) can follow routing without wrapping callbacks.
 *
 * @module keypath-sync/sync/router-events
 */

import events, { type EventSubscription } from "@mongez/events";
import type { Update } from "../contracts/key-value-store.contract";
import type { PathSegment } from "../walker/path-segment";

/**
 * Event name prefix for all router events.
 */
export const ROUTER_EVENT_PREFIX = "keypath";

export const RouterEventType = {
  /** An object was synced */
  SYNCED: "synced",
  /** An object was unsynced */
  UNSYNCED: "unsynced",
  /** An update was applied to a synced object */
  ROUTED: "routed",
  /** An update matched no synced object */
  SKIPPED: "skipped",
} as const;

export type RouterEventTypeName = (typeof RouterEventType)[keyof typeof RouterEventType];

export type RegistrationEventPayload = {
  id: number;
  format: string;
};

export type RoutedEventPayload = {
  format: string;
  update: Update;
  fields: readonly PathSegment[];
  deleted: boolean;
};

export type SkippedEventPayload = {
  update: Update;
};

type RouterEventPayloads = {
  synced: RegistrationEventPayload;
  unsynced: RegistrationEventPayload;
  routed: RoutedEventPayload;
  skipped: SkippedEventPayload;
};

/**
 * Full event name of a router event type.
 *
 * @example
 * ```typescript
 * getRouterEvent(RouterEventType.ROUTED); // "keypath.routed"
 * ```
 */
export function getRouterEvent(type: RouterEventTypeName): string {
  return `${ROUTER_EVENT_PREFIX}.${type}`;
}

export function triggerRouterEvent<Type extends RouterEventTypeName>(
  type: Type,
  payload: RouterEventPayloads[Type],
): void {
  events.trigger(getRouterEvent(type), payload);
}

/**
 * Subscribes to a router event type.
 *
 * @example
 * ```typescript
 * const subscription = onRouterEvent("skipped", ({ update }) => {
 *   console.log("nobody syncs", update.key);
 * });
 *
 * subscription.unsubscribe();
 * ```
 */
export function onRouterEvent<Type extends RouterEventTypeName>(
  type: Type,
  listener: (payload: RouterEventPayloads[Type]) => void,
): EventSubscription {
  return events.subscribe(getRouterEvent(type), listener);
}
