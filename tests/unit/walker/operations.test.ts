import { describe, expect, it } from "vitest";
import { k } from "../../../src/descriptors";
import { KeypathErrorCode } from "../../../src/errors/keypath.error";
import {
  deleteByFields,
  deleteByKey,
  findByFields,
  findByKey,
  setByFields,
  updateByKey,
} from "../../../src/walker/operations";
import { field, key } from "../../../src/walker/path-segment";
import {
  Holder,
  Nested,
  Pair,
  Root,
  createPopulatedRoot,
  createRoot,
} from "../../fixtures/descriptors";

function withCode(code: string) {
  return expect.objectContaining({ code });
}

describe("walker operations", () => {
  describe("findByFields()", () => {
    it("should find a blob field and the key it is stored under", () => {
      const root = createPopulatedRoot();

      expect(findByFields(root, Root, "/o/", ["B"])).toEqual({
        value: "nya",
        key: "/o/B",
        fields: [field("B")],
      });
    });

    it("should end the key of a recursively stored object with a slash", () => {
      const root = createPopulatedRoot();
      const result = findByFields(root, Root, "/o/", ["S"]);

      expect(result.key).toBe("/o/S/");
      expect(result.value).toBe(root.S);
    });

    it("should walk into nested structs", () => {
      const root = createPopulatedRoot();

      expect(findByFields(root, Root, "/o/", ["S", "A"])).toEqual({
        value: 1,
        key: "/o/S/A",
        fields: [field("S"), field("A")],
      });
    });

    it("should walk into map entries", () => {
      const root = createPopulatedRoot();
      const result = findByFields(root, Root, "/o/", ["M", 7]);

      expect(result.key).toBe("/o/map/7/s1/");
      expect(result.fields).toEqual([field("M"), key(7)]);
      expect(result.value).toBe(root.M?.get(7));
    });

    it("should accept path segments as selectors", () => {
      const root = createPopulatedRoot();

      expect(findByFields(root, Root, "/o/", [field("M"), key(7), field("B")]).value).toBe(4);
    });

    it("should return the root for no selectors", () => {
      const root = createPopulatedRoot();
      const result = findByFields(root, Root, "/o/", []);

      expect(result.value).toBe(root);
      expect(result.key).toBe("/o/");
    });

    it("should fail on missing map entries", () => {
      expect(() => findByFields(createPopulatedRoot(), Root, "/o/", ["M", 8])).toThrow(
        withCode(KeypathErrorCode.KEY_NOT_FOUND),
      );
    });

    it("should fail on map keys of another type", () => {
      expect(() => findByFields(createPopulatedRoot(), Root, "/o/", ["M", "x"])).toThrow(
        withCode(KeypathErrorCode.KEY_WRONG_TYPE),
      );
    });

    it("should fail on field segments at a map", () => {
      expect(() => findByFields(createPopulatedRoot(), Root, "/o/", ["M", field("x")])).toThrow(
        withCode(KeypathErrorCode.WRONG_FIELD_TYPE),
      );
    });

    it("should fail on unknown fields", () => {
      expect(() => findByFields(createPopulatedRoot(), Root, "/o/", ["Z"])).toThrow(
        withCode(KeypathErrorCode.WRONG_FIELD_NAME),
      );
    });

    it("should fail on non string selectors at a struct", () => {
      expect(() => findByFields(createPopulatedRoot(), Root, "/o/", [5])).toThrow(
        withCode(KeypathErrorCode.WRONG_FIELD_TYPE),
      );
    });

    it("should fail on paths reaching inside a blob", () => {
      expect(() => findByFields(createPopulatedRoot(), Root, "/o/", ["B", "x"])).toThrow(
        withCode(KeypathErrorCode.PATH_PAST_OBJECT),
      );
    });
  });

  describe("findByKey()", () => {
    it("should find a field by its key", () => {
      expect(findByKey(createPopulatedRoot(), Root, "/o/", "/o/B")).toEqual({
        value: "nya",
        fields: [field("B")],
      });
    });

    it("should match unrooted keys against rooted formats", () => {
      expect(findByKey(createPopulatedRoot(), Root, "/o/", "o/B").value).toBe("nya");
    });

    it("should match rooted keys against unrooted formats", () => {
      expect(findByKey(createPopulatedRoot(), Root, "o/", "/o/B").value).toBe("nya");
    });

    it("should decode map keys on the way", () => {
      expect(findByKey(createPopulatedRoot(), Root, "/o/", "/o/map/7/s1/A")).toEqual({
        value: 3,
        fields: [field("M"), key(7), field("A")],
      });
    });

    it("should find recursively stored objects by their key ending in a slash", () => {
      const root = createPopulatedRoot();

      expect(findByKey(root, Root, "/o/", "/o/S/").value).toBe(root.S);
      expect(findByKey(root, Root, "/o/", "/o/").value).toBe(root);
    });

    it("should fail on missing map entries", () => {
      expect(() => findByKey(createPopulatedRoot(), Root, "/o/", "/o/map/8/s1/A")).toThrow(
        withCode(KeypathErrorCode.KEY_NOT_FOUND),
      );
    });

    it("should fail on keys outside the format", () => {
      expect(() => findByKey(createPopulatedRoot(), Root, "/o/", "/x/B")).toThrow(
        withCode(KeypathErrorCode.PATH_NOT_FOUND),
      );
    });

    it("should fail on keys no field matches", () => {
      expect(() => findByKey(createPopulatedRoot(), Root, "/o/", "/o/Q")).toThrow(
        withCode(KeypathErrorCode.PATH_NOT_FOUND),
      );
    });

    it("should fail on keys reaching inside a blob", () => {
      expect(() => findByKey(createPopulatedRoot(), Root, "/o/", "/o/B/x")).toThrow(
        withCode(KeypathErrorCode.PATH_PAST_OBJECT),
      );
    });

    it("should fail on keys ending before the object", () => {
      expect(() => findByKey(createPopulatedRoot(), Root, "/o/", "/o/S")).toThrow(
        withCode(KeypathErrorCode.KEY_INVALID),
      );
    });

    it("should fail on map key components that do not decode", () => {
      expect(() => findByKey(createPopulatedRoot(), Root, "/o/", "/o/map/sds/s1/A")).toThrow(
        withCode(KeypathErrorCode.KEY_WRONG_TYPE),
      );
    });
  });

  describe("updateByKey()", () => {
    it("should update fields of class instances", () => {
      const Point = k.struct({ x: k.int(), y: k.int() });

      class Position {
        public x = 1;
        public y = 2;
      }

      const position = new Position();

      expect(updateByKey(position, Point, "/p/", "/p/x", "7")).toEqual([field("x")]);
      expect(position.x).toBe(7);
      expect(position).toBeInstanceOf(Position);
    });

    it("should set blob fields", () => {
      const root = createRoot();

      expect(updateByKey(root, Root, "/o/", "/o/B", "nya")).toEqual([field("B")]);
      expect(root.B).toBe("nya");
    });

    it("should set nested fields", () => {
      const root = createRoot();

      updateByKey(root, Root, "/o/", "/o/S/A", "5");

      expect(root.S).toEqual({ A: 5, B: 0 });
    });

    it("should create the map and the entry it writes to", () => {
      const root = createRoot();

      expect(updateByKey(root, Root, "/o/", "/o/map/123/s1/A", "6")).toEqual([
        field("M"),
        key(123),
        field("A"),
      ]);
      expect(root.M).toEqual(new Map([[123, { A: 6, B: 0 }]]));
    });

    it("should replace a recursively stored object from its JSON form", () => {
      const root = createRoot();

      updateByKey(root, Root, "/o/", "/o/S/", '{"A":9}');

      expect(root.S).toEqual({ A: 9, B: 0 });
    });

    it("should replace the contents of a root stored as a blob", () => {
      const root = Pair.zero();

      updateByKey(root, Pair, "/here", "/here", '{"A":1,"B":2}');

      expect(root).toEqual({ A: 1, B: 2 });
    });

    it("should reset fields to zero on undecodable values by default", () => {
      const root = createRoot({ S: { A: 5, B: 0 } });

      updateByKey(root, Root, "/o/", "/o/S/A", "x");

      expect(root.S.A).toBe(0);
    });

    it("should fail on undecodable values when asked to", () => {
      const root = createRoot({ S: { A: 5, B: 0 } });

      expect(() =>
        updateByKey(root, Root, "/o/", "/o/S/A", "x", { ignoreUnmarshalFailure: false }),
      ).toThrow(withCode(KeypathErrorCode.UNMARSHAL_FAILED));
      expect(root.S.A).toBe(5);
    });

    it("should leave map entries untouched when the walk fails", () => {
      const root = createRoot();

      updateByKey(root, Root, "/o/", "/o/map/123/s1/A", "6");

      expect(() =>
        updateByKey(root, Root, "/o/", "/o/map/123/s1/A", "bad", { ignoreUnmarshalFailure: false }),
      ).toThrow(withCode(KeypathErrorCode.UNMARSHAL_FAILED));
      expect(() =>
        updateByKey(root, Root, "/o/", "/o/map/124/s1/A", "bad", { ignoreUnmarshalFailure: false }),
      ).toThrow(withCode(KeypathErrorCode.UNMARSHAL_FAILED));

      expect(root.M).toEqual(new Map([[123, { A: 6, B: 0 }]]));
    });

    it("should allocate nil pointers", () => {
      const holder = Holder.zero();

      updateByKey(holder, Holder, "/h/", "/h/P/A", "3");

      expect(holder.P).toEqual({ A: 3, B: 0 });
    });

    it("should fail on a nil root pointer", () => {
      expect(() => updateByKey(null, k.pointer(Pair), "/p/", "/p/A", "1")).toThrow(
        withCode(KeypathErrorCode.NOT_ADDRESSABLE),
      );
    });

    it("should fail on a nil root map", () => {
      expect(() => updateByKey(null, k.map(k.string(), k.int()), "/m/{key}", "/m/a", "1")).toThrow(
        withCode(KeypathErrorCode.NOT_ADDRESSABLE),
      );
    });

    it("should write into a root map", () => {
      const Scores = k.map(k.string(), k.int());
      const scores = new Map<string, number>();

      expect(updateByKey(scores, Scores, "/m/{key}", "/m/a", "1")).toEqual([key("a")]);
      expect(scores.get("a")).toBe(1);
    });

    it("should create nested maps", () => {
      const nested = Nested.zero();

      updateByKey(nested, Nested, "/x/", "/x/n/a/b", "4");

      expect(nested.N).toEqual(new Map([["a", new Map([["b", 4]])]]));
    });

    it("should keep inner maps live across updates", () => {
      const nested = Nested.zero();

      updateByKey(nested, Nested, "/x/", "/x/n/a/b", "4");
      const held = nested.N?.get("a");

      updateByKey(nested, Nested, "/x/", "/x/n/a/e", "5");

      expect(nested.N?.get("a")).toBe(held);
      expect(held?.get("e")).toBe(5);
    });

    it("should write through pointers stored in a map", () => {
      const Target = k.struct({ A: k.int() });
      const Refs = k.struct({
        m: { type: k.map(k.string(), k.pointer(Target)), format: "m/{key}/" },
      });
      const refs = Refs.zero();

      updateByKey(refs, Refs, "/r/", "/r/m/a/A", "1");
      const held = refs.m?.get("a");

      updateByKey(refs, Refs, "/r/", "/r/m/a/A", "2");

      expect(refs.m?.get("a")).toBe(held);
      expect(held).toEqual({ A: 2 });
    });

    it("should replace struct entries only once the walk succeeded", () => {
      const root = createRoot({ M: new Map([[1, { A: 1, B: 1 }]]) });
      const held = root.M?.get(1);

      expect(() =>
        updateByKey(root, Root, "/o/", "/o/map/1/s1/A", "oops", { ignoreUnmarshalFailure: false }),
      ).toThrow(withCode(KeypathErrorCode.UNMARSHAL_FAILED));
      expect(root.M?.get(1)).toBe(held);
      expect(held).toEqual({ A: 1, B: 1 });
    });

    it("should not create nested entries when the walk fails", () => {
      const nested = Nested.zero();

      updateByKey(nested, Nested, "/x/", "/x/n/a/b", "4");

      expect(() =>
        updateByKey(nested, Nested, "/x/", "/x/n/c/d", "oops", { ignoreUnmarshalFailure: false }),
      ).toThrow(withCode(KeypathErrorCode.UNMARSHAL_FAILED));
      expect(nested.N?.has("c")).toBe(false);
    });
  });

  describe("setByFields()", () => {
    it("should set a field", () => {
      const root = createRoot();

      setByFields(root, Root, "/here/", "test2", ["B"]);

      expect(root.B).toBe("test2");
    });

    it("should reject values of another type", () => {
      const root = createRoot();

      expect(() => setByFields(root, Root, "/here/", 10, ["B"])).toThrow(
        withCode(KeypathErrorCode.SET_WRONG_TYPE),
      );
      expect(() => setByFields(root, Root, "/here/", 10, ["S"])).toThrow(
        withCode(KeypathErrorCode.SET_WRONG_TYPE),
      );
    });

    it("should store a copy of the value", () => {
      const root = createRoot();
      const value = { A: 10, B: 0 };

      setByFields(root, Root, "/here/", value, ["S"]);

      expect(root.S).toEqual({ A: 10, B: 0 });
      expect(root.S).not.toBe(value);
    });

    it("should set nested fields", () => {
      const root = createRoot();

      setByFields(root, Root, "/here/", 12, ["S", "A"]);

      expect(root.S.A).toBe(12);
    });

    it("should create map entries", () => {
      const root = createRoot();

      setByFields(root, Root, "/here/", { A: 1, B: 2 }, ["M", 3]);

      expect(root.M).toEqual(new Map([[3, { A: 1, B: 2 }]]));
    });

    it("should replace the contents of the root in place", () => {
      const root = createRoot();

      setByFields(root, Root, "/here/", { S: { A: 5, B: 5 }, B: "all", M: null });

      expect(root).toEqual({ S: { A: 5, B: 5 }, B: "all", M: null });
    });

    it("should reject a root of another type", () => {
      expect(() => setByFields(createRoot(), Root, "/here/", "x")).toThrow(
        withCode(KeypathErrorCode.SET_WRONG_TYPE),
      );
    });
  });

  describe("deleteByFields()", () => {
    function createMapRoot() {
      return createRoot({
        M: new Map([
          [1, { A: 1, B: 1 }],
          [2, { A: 2, B: 2 }],
        ]),
      });
    }

    it("should remove the entry and return the key it was stored under", () => {
      const root = createMapRoot();

      expect(deleteByFields(root, Root, "/here/", ["M", 2])).toBe("/here/map/2/s1/");
      expect(root.M).toEqual(new Map([[1, { A: 1, B: 1 }]]));
    });

    it("should fail on missing entries", () => {
      expect(() => deleteByFields(createMapRoot(), Root, "/here/", ["M", 5])).toThrow(
        withCode(KeypathErrorCode.OBJECT_NOT_FOUND),
      );
    });

    it("should fail on entries of a nil map", () => {
      expect(() => deleteByFields(createRoot(), Root, "/here/", ["M", 1])).toThrow(
        withCode(KeypathErrorCode.OBJECT_NOT_FOUND),
      );
    });

    it("should fail when the selectors do not end on a map entry", () => {
      expect(() => deleteByFields(createMapRoot(), Root, "/here/", ["B"])).toThrow(
        withCode(KeypathErrorCode.NOT_MAP_INDEX),
      );
      expect(() => deleteByFields(createMapRoot(), Root, "/here/", [])).toThrow(
        withCode(KeypathErrorCode.NOT_MAP_INDEX),
      );
    });
  });

  describe("deleteByKey()", () => {
    function createMapRoot() {
      return createRoot({
        M: new Map([
          [1, { A: 1, B: 1 }],
          [2, { A: 2, B: 2 }],
        ]),
      });
    }

    it("should remove the entry a short key designates", () => {
      const root = createMapRoot();

      expect(deleteByKey(root, Root, "/o/", "/o/map/1")).toEqual([field("M"), key(1)]);
      expect(root.M).toEqual(new Map([[2, { A: 2, B: 2 }]]));
    });

    it("should accept keys stopping after the entry's literals", () => {
      const root = createMapRoot();

      expect(deleteByKey(root, Root, "/o/", "/o/map/1/s1")).toEqual([field("M"), key(1)]);
      expect(root.M?.has(1)).toBe(false);
    });

    it("should fail on missing entries", () => {
      expect(() => deleteByKey(createMapRoot(), Root, "/o/", "/o/map/9")).toThrow(
        withCode(KeypathErrorCode.OBJECT_NOT_FOUND),
      );
    });

    it("should fail on keys that are not map entries", () => {
      expect(() => deleteByKey(createMapRoot(), Root, "/o/", "/o/B")).toThrow(
        withCode(KeypathErrorCode.NOT_MAP_INDEX),
      );
    });
  });
});
