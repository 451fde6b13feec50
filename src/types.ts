export type DebugLevel = "error" | "warn" | "info";

export type KeypathConfigurations = {
  /**
   * Lowest level the router and the drivers log at.
   *
   * @default "warn"
   */
  debugLevel?: DebugLevel;
  /**
   * When a routed value does not decode into its target field, reset the
   * field to its zero value instead of skipping the update.
   *
   * @default true
   */
  ignoreUnmarshalFailure?: boolean;
  /**
   * What the router does when sync callbacks fail: re-throw them (after every
   * callback ran) from `next`, or log them and go on.
   *
   * @default "throw"
   */
  callbackErrors?: "throw" | "log";
};
