/**
 * Failure of one sync callback while routing an update.
 */
export type SyncCallbackFailure = {
  /** Format of the registration whose callback failed */
  format: string;
  /** What the callback threw */
  error: Error;
};

/**
 * Error raised by `SyncRouter.next` once every matching callback ran and at
 * least one of them failed.
 *
 * The routed update has already been applied to the synced objects.
 */
export class SyncCallbackError extends Error {
  /**
   * Key of the update being routed.
   */
  public readonly key: string;

  /**
   * Every callback failure, in invocation order.
   */
  public readonly failures: SyncCallbackFailure[];

  public constructor(key: string, failures: SyncCallbackFailure[]) {
    super(
      `${failures.length} sync callback(s) failed for key "${key}": ` +
        failures.map((failure) => `[${failure.format}] ${failure.error.message}`).join("; "),
    );
    this.name = "SyncCallbackError";
    this.key = key;
    this.failures = failures;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SyncCallbackError);
    }
  }
}
