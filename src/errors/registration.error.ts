/**
 * Error thrown when an object is synced under a key space overlapping an
 * already synced one.
 */
export class RegistrationConflictError extends Error {
  /**
   * Format being registered.
   */
  public readonly format: string;

  /**
   * Format of the live registration it collides with.
   */
  public readonly conflictingFormat: string;

  public constructor(format: string, conflictingFormat: string) {
    super(
      `Cannot sync objects in overlapping key spaces: "${format}" collides with "${conflictingFormat}".`,
    );
    this.name = "RegistrationConflictError";
    this.format = format;
    this.conflictingFormat = conflictingFormat;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RegistrationConflictError);
    }
  }
}

/**
 * Error thrown when unsyncing a format nothing is registered under.
 */
export class RegistrationNotFoundError extends Error {
  public readonly format: string;

  public constructor(format: string) {
    super(`Key '${format}' not found in listeners`);
    this.name = "RegistrationNotFoundError";
    this.format = format;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RegistrationNotFoundError);
    }
  }
}
