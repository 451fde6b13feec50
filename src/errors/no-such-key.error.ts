/**
 * Error thrown by key-value stores when reading or deleting a key they do not
 * hold.
 */
export class NoSuchKeyError extends Error {
  public readonly key: string;

  public constructor(key: string) {
    super(`Key '${key}' is not in store`);
    this.name = "NoSuchKeyError";
    this.key = key;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, NoSuchKeyError);
    }
  }
}
