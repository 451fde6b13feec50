import { describe, expect, it } from "vitest";
import {
  KeypathError,
  KeypathErrorCode,
  NoSuchKeyError,
  RegistrationConflictError,
  RegistrationNotFoundError,
  SyncCallbackError,
  isKeypathError,
} from "../../../src/errors";

describe("KeypathError", () => {
  it("should extend Error", () => {
    expect(new KeypathError(KeypathErrorCode.KEY_INVALID)).toBeInstanceOf(Error);
  });

  it("should use the default message of its code", () => {
    const error = new KeypathError(KeypathErrorCode.KEY_INVALID);

    expect(error.message).toBe("Invalid key for this object");
    expect(error.code).toBe("KEY_INVALID");
    expect(error.keypath).toBeUndefined();
  });

  it("should take a message and a key path", () => {
    const error = new KeypathError(KeypathErrorCode.PATH_NOT_FOUND, "nowhere", "/o/x");

    expect(error.message).toBe("nowhere");
    expect(error.keypath).toBe("/o/x");
    expect(error.name).toBe("KeypathError");
  });

  it("should capture stack trace correctly", () => {
    const error = new KeypathError(KeypathErrorCode.NOT_ADDRESSABLE);

    expect(error.stack).toContain("KeypathError");
  });

  describe("isKeypathError()", () => {
    it("should recognize keypath errors", () => {
      expect(isKeypathError(new KeypathError(KeypathErrorCode.KEY_INVALID))).toBe(true);
      expect(isKeypathError(new Error("other"))).toBe(false);
      expect(isKeypathError("KEY_INVALID")).toBe(false);
    });

    it("should match the code when given", () => {
      const error = new KeypathError(KeypathErrorCode.KEY_INVALID);

      expect(isKeypathError(error, KeypathErrorCode.KEY_INVALID)).toBe(true);
      expect(isKeypathError(error, KeypathErrorCode.KEY_NOT_FOUND)).toBe(false);
    });
  });
});

describe("SyncCallbackError", () => {
  it("should list every failure in its message", () => {
    const error = new SyncCallbackError("/o/B", [{ format: "/o/", error: new Error("boom") }]);

    expect(error.message).toBe('1 sync callback(s) failed for key "/o/B": [/o/] boom');
    expect(error.key).toBe("/o/B");
    expect(error.name).toBe("SyncCallbackError");
  });

  it("should join several failures", () => {
    const error = new SyncCallbackError("/o/B", [
      { format: "/o/", error: new Error("boom") },
      { format: "/p/", error: new Error("bang") },
    ]);

    expect(error.message).toBe('2 sync callback(s) failed for key "/o/B": [/o/] boom; [/p/] bang');
    expect(error.failures).toHaveLength(2);
  });
});

describe("registration errors", () => {
  it("should name both formats of a conflict", () => {
    const error = new RegistrationConflictError("/o/S/", "/o/");

    expect(error.message).toBe(
      'Cannot sync objects in overlapping key spaces: "/o/S/" collides with "/o/".',
    );
    expect(error.format).toBe("/o/S/");
    expect(error.conflictingFormat).toBe("/o/");
  });

  it("should name the missing format", () => {
    const error = new RegistrationNotFoundError("/o/");

    expect(error.message).toBe("Key '/o/' not found in listeners");
    expect(error.name).toBe("RegistrationNotFoundError");
  });
});

describe("NoSuchKeyError", () => {
  it("should carry the key", () => {
    const error = new NoSuchKeyError("/a");

    expect(error.message).toBe("Key '/a' is not in store");
    expect(error.key).toBe("/a");
    expect(error).toBeInstanceOf(Error);
  });
});
