/**
 * Reasons a change event navigation step can fail.
 */
export const SyncEventErrorCode = {
  NO_MORE_FIELDS: "NO_MORE_FIELDS",
  NOT_A_STRUCT: "NOT_A_STRUCT",
  NOT_A_MAP: "NOT_A_MAP",
  NOT_A_STRING: "NOT_A_STRING",
  NOT_AN_INT: "NOT_AN_INT",
  NOT_A_FLOAT: "NOT_A_FLOAT",
  NOT_A_BOOL: "NOT_A_BOOL",
  NOT_THIS_PATH: "NOT_THIS_PATH",
  WRONG_KEY_TYPE: "WRONG_KEY_TYPE",
  NIL_POINTER: "NIL_POINTER",
  IS_DELETE: "IS_DELETE",
  NOT_IMPLEMENTED: "NOT_IMPLEMENTED",
} as const;

export type SyncEventErrorCodeName = (typeof SyncEventErrorCode)[keyof typeof SyncEventErrorCode];

const MESSAGES: Record<SyncEventErrorCodeName, string> = {
  NO_MORE_FIELDS: "No more fields to consume",
  NOT_A_STRUCT: "Object is not a structure",
  NOT_A_MAP: "Object is not a map",
  NOT_A_STRING: "Object is not a string",
  NOT_AN_INT: "Object is not an integer",
  NOT_A_FLOAT: "Object is not a float",
  NOT_A_BOOL: "Object is not a bool",
  NOT_THIS_PATH: "The modified object is not on this path",
  WRONG_KEY_TYPE: "Provided key type mismatch",
  NIL_POINTER: "Reached nil pointer",
  IS_DELETE: "Object is being deleted",
  NOT_IMPLEMENTED: "This is not implemented",
};

/**
 * Error carried by a change event once a navigation step did not match the
 * shape of the change.
 */
export class SyncEventError extends Error {
  public readonly code: SyncEventErrorCodeName;

  public constructor(code: SyncEventErrorCodeName) {
    super(MESSAGES[code]);
    this.name = "SyncEventError";
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SyncEventError);
    }
  }
}
