/**
 * Error kinds raised by the format parser, the value codec, the object path
 * walker and the encoder.
 *
 * Callers branch on `error.code` rather than on messages.
 */
export const KeypathErrorCode = {
  /** A per-field format starts with `/`. */
  TAG_FIRST_SLASH: "TAG_FIRST_SLASH",
  /** A selector is not of the kind expected at this position. */
  WRONG_FIELD_TYPE: "WRONG_FIELD_TYPE",
  /** A struct has no field with the requested name. */
  WRONG_FIELD_NAME: "WRONG_FIELD_NAME",
  /** Sequences are declared but cannot be walked or encoded. */
  NOT_IMPLEMENTED: "NOT_IMPLEMENTED",
  /** The descriptor kind cannot be walked. */
  UNSUPPORTED_TYPE: "UNSUPPORTED_TYPE",
  /** The requested path reaches inside an object stored as a single blob. */
  PATH_PAST_OBJECT: "PATH_PAST_OBJECT",
  /** The sub-object addressed by the selectors does not exist. */
  OBJECT_NOT_FOUND: "OBJECT_NOT_FOUND",
  /** The addressed map entry does not exist. */
  KEY_NOT_FOUND: "KEY_NOT_FOUND",
  /** The key path ends before the format says an object is stored. */
  KEY_INVALID: "KEY_INVALID",
  /** No field format matches the key path. */
  PATH_NOT_FOUND: "PATH_NOT_FOUND",
  /** A value was to be set on an object that does not exist. */
  SET_NO_EXISTS: "SET_NO_EXISTS",
  /** The value to set does not conform to the target descriptor. */
  SET_WRONG_TYPE: "SET_WRONG_TYPE",
  /** A scalar was asked to be stored recursively. */
  SCALAR_TYPE: "SCALAR_TYPE",
  /** A map key selector does not conform to the map's key descriptor. */
  KEY_WRONG_TYPE: "KEY_WRONG_TYPE",
  /** The selectors do not end on a map entry. */
  NOT_MAP_INDEX: "NOT_MAP_INDEX",
  /** The format of a map does not contain `{key}` where the map is reached. */
  MAP_FORMAT: "MAP_FORMAT",
  /** The format of a struct does not end in a recursion marker. */
  STRUCT_FORMAT: "STRUCT_FORMAT",
  /** The root value cannot be replaced in place. */
  NOT_ADDRESSABLE: "NOT_ADDRESSABLE",
  /** A stored string could not be decoded into the target descriptor. */
  UNMARSHAL_FAILED: "UNMARSHAL_FAILED",
  /** A value has no stored string form (NaN, infinities). */
  MARSHAL_FAILED: "MARSHAL_FAILED",
  /** Two distinct paths were encoded under the same key. */
  ENCODE_KEY_COLLISION: "ENCODE_KEY_COLLISION",
} as const;

export type KeypathErrorCodeName = (typeof KeypathErrorCode)[keyof typeof KeypathErrorCode];

const DEFAULT_MESSAGES: Record<KeypathErrorCodeName, string> = {
  TAG_FIRST_SLASH: "Structure field format cannot start with /",
  WRONG_FIELD_TYPE: "Provided field is of wrong type",
  WRONG_FIELD_NAME: "Provided field does not exist",
  NOT_IMPLEMENTED: "Not implemented",
  UNSUPPORTED_TYPE: "Object type not supported",
  PATH_PAST_OBJECT: "Provided path goes past an encoded object",
  OBJECT_NOT_FOUND: "Object was not found",
  KEY_NOT_FOUND: "Key was not found in map",
  KEY_INVALID: "Invalid key for this object",
  PATH_NOT_FOUND: "Object not found at specified path",
  SET_NO_EXISTS: "Cannot set non existent object",
  SET_WRONG_TYPE: "The provided object is of wrong type",
  SCALAR_TYPE: "Cannot recursively store scalar type",
  KEY_WRONG_TYPE: "Provided map key field is of wrong type",
  NOT_MAP_INDEX: "Specified object is not a map index",
  MAP_FORMAT: "Map format must contain a '{key}' element",
  STRUCT_FORMAT: "Struct format must end with an empty segment",
  NOT_ADDRESSABLE: "Object is not addressable",
  UNMARSHAL_FAILED: "Value cannot be decoded",
  MARSHAL_FAILED: "Value cannot be encoded",
  ENCODE_KEY_COLLISION: "Key is already used",
};

/**
 * Error thrown by every path/format operation.
 *
 * @example
 * ```typescript
 * try {
 *   findByKey(settings, Settings, "/app/", "/app/unknown");
 * } catch (error) {
 *   if (isKeypathError(error, KeypathErrorCode.PATH_NOT_FOUND)) {
 *     // not one of ours
 *   }
 * }
 * ```
 */
export class KeypathError extends Error {
  /**
   * Categorical kind of the failure.
   */
  public readonly code: KeypathErrorCodeName;

  /**
   * Key path (or part of it) the operation was working on, when known.
   */
  public readonly keypath?: string;

  /**
   * Creates a new KeypathError.
   *
   * @param code - Error kind
   * @param message - Optional message replacing the default one of the kind
   * @param keypath - Key path involved in the failure
   */
  public constructor(code: KeypathErrorCodeName, message?: string, keypath?: string) {
    super(message ?? DEFAULT_MESSAGES[code]);
    this.name = "KeypathError";
    this.code = code;
    this.keypath = keypath;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, KeypathError);
    }
  }
}

/**
 * Whether the given error is a KeypathError, optionally of the given kind.
 */
export function isKeypathError(
  error: unknown,
  code?: KeypathErrorCodeName,
): error is KeypathError {
  if (!(error instanceof KeypathError)) {
    return false;
  }

  return code === undefined || error.code === code;
}
