import { describe, expect, it } from "vitest";
import {
  cloneDocument,
  decodeDocument,
  encodeDocument,
  isMetadataDocument,
  mergeDocuments,
} from "../../src/common/json.js";

describe("metadata documents", () => {
  describe("isMetadataDocument", () => {
    it("accepts nested JSON objects", () => {
      expect(isMetadataDocument({})).toBe(true);
      expect(
        isMetadataDocument({
          name: "mypackage",
          version: "1.0.0",
          keywords: ["a", "b"],
          private: false,
          stars: 3,
          license: null,
          resources: [{ path: "data.csv", schema: { fields: [] } }],
        }),
      ).toBe(true);
    });

    it("accepts objects without prototype", () => {
      const document = Object.create(null);
      document.name = "bare";
      expect(isMetadataDocument(document)).toBe(true);
    });

    it("rejects values that are not JSON objects", () => {
      expect(isMetadataDocument(null)).toBe(false);
      expect(isMetadataDocument("text")).toBe(false);
      expect(isMetadataDocument([{ a: 1 }])).toBe(false);
      expect(isMetadataDocument(new Date())).toBe(false);
      expect(isMetadataDocument(new Map())).toBe(false);
    });

    it("rejects non-JSON members", () => {
      expect(isMetadataDocument({ when: new Date() })).toBe(false);
      expect(isMetadataDocument({ count: Number.NaN })).toBe(false);
      expect(isMetadataDocument({ count: Number.POSITIVE_INFINITY })).toBe(false);
      expect(isMetadataDocument({ missing: undefined })).toBe(false);
      expect(isMetadataDocument({ fn: () => 1 })).toBe(false);
      expect(isMetadataDocument({ big: 1n })).toBe(false);
    });

    it("rejects cycles but allows shared subtrees", () => {
      const cyclic: Record<string, unknown> = {};
      cyclic.self = cyclic;
      expect(isMetadataDocument(cyclic)).toBe(false);

      const shared = { x: 1 };
      expect(isMetadataDocument({ a: shared, b: shared })).toBe(true);
    });
  });

  it("clones deeply", () => {
    const original = { nested: { list: [1, 2] } };
    const copy = cloneDocument(original);
    expect(copy).toEqual(original);
    original.nested.list.push(3);
    expect(copy).toEqual({ nested: { list: [1, 2] } });
  });

  it("merges top-level keys shallowly", () => {
    const base = { name: "pkg", version: "1.0.0", extra: { a: 1, b: 2 } };
    const merged = mergeDocuments(base, { version: "1.1.0", extra: { c: 3 } });
    expect(merged).toEqual({ name: "pkg", version: "1.1.0", extra: { c: 3 } });
    expect(base).toEqual({ name: "pkg", version: "1.0.0", extra: { a: 1, b: 2 } });
  });

  describe("encoding", () => {
    it("decodes what it encodes", () => {
      const document = { name: "pkg", tags: ["x"], meta: { n: 1.5 } };
      const text = encodeDocument(document);
      expect(text).toBe('{\n  "name": "pkg",\n  "tags": [\n    "x"\n  ],\n  "meta": {\n    "n": 1.5\n  }\n}');
      expect(decodeDocument(text)).toEqual(document);
    });

    it("rejects text that is not a JSON object", () => {
      expect(() => decodeDocument("not json")).toThrow(SyntaxError);
      expect(() => decodeDocument("[1, 2]")).toThrow("Stored metadata is not a JSON object");
      expect(() => decodeDocument("null")).toThrow(TypeError);
    });
  });
});
