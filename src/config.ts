import type { DebugLevel, KeypathConfigurations } from "./types";

const defaultConfigurations: Required<KeypathConfigurations> = {
  debugLevel: "warn",
  ignoreUnmarshalFailure: true,
  callbackErrors: "throw",
};

let configurations: Partial<KeypathConfigurations> = {};

export function setKeypathConfigurations(keypathConfigurations: KeypathConfigurations) {
  configurations = {
    ...configurations,
    ...keypathConfigurations,
  };
}

export function getKeypathConfigurations(): Required<KeypathConfigurations> {
  return {
    ...defaultConfigurations,
    ...configurations,
  };
}

export function getKeypathConfig<Key extends keyof KeypathConfigurations>(
  key: Key,
): Required<KeypathConfigurations>[Key] {
  return getKeypathConfigurations()[key];
}

export function resetKeypathConfigurations() {
  configurations = {};
}

const levels: Record<DebugLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
};

/**
 * Whether messages of the given level pass the configured debug level.
 */
export function shouldLog(level: DebugLevel): boolean {
  return levels[level] <= levels[getKeypathConfig("debugLevel")];
}
