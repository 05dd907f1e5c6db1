/**
 * Bulk-patch list adjustment tests
 */
import { describe, expect, it } from "vitest";
import { z } from "zod";
import { BulkAdjustment, decodeBulkAdjustment, encodeBulkAdjustment } from "../src/bulk-adjustment.ts";
import { schemaCodec } from "../src/codec.ts";
import type { JsonObject } from "../src/codec.ts";
import { ConflictingFieldAdjustmentError, MalformedFieldError } from "../src/errors.ts";

const StringCodec = schemaCodec(z.string());

function encode(adjustment: BulkAdjustment<string>): JsonObject {
  const out: JsonObject = {};
  encodeBulkAdjustment(out, "categories", adjustment, StringCodec);
  return out;
}

describe("BulkAdjustment", () => {
  describe("decodeBulkAdjustment", () => {
    it("should reject setting and adjusting the same field", () => {
      const raw = { categories: ["a"], add_categories: ["b"] };
      expect(() => decodeBulkAdjustment(raw, "categories", StringCodec)).toThrow(ConflictingFieldAdjustmentError);
      try {
        decodeBulkAdjustment(raw, "categories", StringCodec);
      } catch (error) {
        expect(error instanceof ConflictingFieldAdjustmentError && error.field).toBe("categories");
      }
    });

    it("should also reject set with remove", () => {
      const raw = { categories: [], remove_categories: ["b"] };
      expect(() => decodeBulkAdjustment(raw, "categories", StringCodec)).toThrow(
        "Cannot simultaneously set `categories` and adjust it (with `add_categories` or `remove_categories`)"
      );
    });

    it("should decode a wholesale replacement", () => {
      expect(decodeBulkAdjustment({ categories: ["a", "b"] }, "categories", StringCodec)).toEqual({
        mode: "set",
        items: ["a", "b"],
      });
    });

    it("should decode one-sided adjustments", () => {
      expect(decodeBulkAdjustment({ add_categories: ["c"] }, "categories", StringCodec)).toEqual({
        mode: "adjust",
        add: ["c"],
        remove: undefined,
      });
    });

    it("should decode missing keys as unset", () => {
      expect(decodeBulkAdjustment({}, "categories", StringCodec)).toEqual({ mode: "unset" });
    });

    it("should report the key path of a malformed list", () => {
      expect(() => decodeBulkAdjustment({ add_categories: [1] }, "categories", StringCodec, "patch")).toThrow(
        MalformedFieldError
      );
    });
  });

  describe("encodeBulkAdjustment", () => {
    it("should write nothing when unset", () => {
      expect(encode(BulkAdjustment.unset())).toEqual({});
    });

    it("should write the field when set", () => {
      expect(encode(BulkAdjustment.set(["a"]))).toEqual({ categories: ["a"] });
    });

    it("should write both sides of an adjustment", () => {
      expect(encode(BulkAdjustment.adjust(["x"], ["y"]))).toEqual({
        add_categories: ["x"],
        remove_categories: ["y"],
      });
    });

    it("should omit an undefined side but keep an empty one", () => {
      expect(encode(BulkAdjustment.adjust(undefined, []))).toEqual({ remove_categories: [] });
    });

    it("should reproduce the decoded keys", () => {
      const raw = { remove_categories: ["old"] };
      expect(encode(decodeBulkAdjustment(raw, "categories", StringCodec))).toEqual(raw);
    });
  });
});
