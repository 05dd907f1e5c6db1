/**
 * Tri-state field tests
 */
import { describe, expect, it } from "vitest";
import { z } from "zod";
import { schemaCodec } from "../src/codec.ts";
import type { JsonObject } from "../src/codec.ts";
import { MalformedFieldError } from "../src/errors.ts";
import {
  ABSENT,
  decodeField,
  encodeField,
  fieldOrElse,
  fromNullable,
  fromOptional,
  mapField,
  matchField,
  NULL,
  requireField,
  requireNullableField,
  value,
} from "../src/field.ts";
import type { OptionalField } from "../src/field.ts";

const StringCodec = schemaCodec(z.string());

describe("OptionalField", () => {
  describe("decodeField", () => {
    it("should decode a missing key as absent", () => {
      expect(decodeField({}, "name", StringCodec, { nullable: true })).toBe(ABSENT);
    });

    it("should decode an explicit null as null when nullable", () => {
      expect(decodeField({ name: null }, "name", StringCodec, { nullable: true })).toBe(NULL);
    });

    it("should reject null when not nullable", () => {
      expect(() => decodeField({ name: null }, "name", StringCodec)).toThrow(MalformedFieldError);
    });

    it("should report the dotted path of a rejected null", () => {
      try {
        decodeField({ name: null }, "name", StringCodec, { nullable: false }, "patch");
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(MalformedFieldError);
        if (error instanceof MalformedFieldError) {
          expect(error.path).toBe("patch.name");
          expect(error.message).toBe('Malformed field "patch.name": null is not allowed');
        }
      }
    });

    it("should decode a present value", () => {
      expect(decodeField({ name: "Lantern" }, "name", StringCodec)).toEqual({ kind: "value", value: "Lantern" });
    });

    it("should reject a value of the wrong type", () => {
      expect(() => decodeField({ name: 7 }, "name", StringCodec)).toThrow(MalformedFieldError);
    });
  });

  describe("encodeField", () => {
    it("should omit the key when absent", () => {
      const out: JsonObject = {};
      encodeField(out, "name", ABSENT, StringCodec);
      expect(out).toEqual({});
      expect(Object.hasOwn(out, "name")).toBe(false);
    });

    it("should write JSON null when null", () => {
      const out: JsonObject = {};
      encodeField(out, "name", NULL, StringCodec);
      expect(JSON.stringify(out)).toBe('{"name":null}');
    });

    it("should write the encoded value", () => {
      const out: JsonObject = {};
      encodeField(out, "name", value("Lantern"), StringCodec);
      expect(JSON.stringify(out)).toBe('{"name":"Lantern"}');
    });
  });

  describe("constructors and helpers", () => {
    it("should lift undefined, null and values", () => {
      expect(fromNullable(undefined)).toBe(ABSENT);
      expect(fromNullable(null)).toBe(NULL);
      expect(fromNullable(3)).toEqual({ kind: "value", value: 3 });
      expect(fromOptional(undefined)).toBe(ABSENT);
      expect(fromOptional("x")).toEqual({ kind: "value", value: "x" });
    });

    it("should map only values", () => {
      expect(mapField(value(2), (n) => n * 10)).toEqual({ kind: "value", value: 20 });
      expect(mapField(NULL, (n: number) => n * 10)).toBe(NULL);
      expect(mapField(ABSENT, (n: number) => n * 10)).toBe(ABSENT);
    });

    it("should match every state", () => {
      const label = (field: OptionalField<string>) =>
        matchField(field, { absent: () => "absent", null: () => "null", value: (v) => `value:${v}` });
      expect(label(ABSENT)).toBe("absent");
      expect(label(NULL)).toBe("null");
      expect(label(value("a"))).toBe("value:a");
    });

    it("should fall back only when absent", () => {
      expect(fieldOrElse(ABSENT, "fallback")).toBe("fallback");
      expect(fieldOrElse(NULL, "fallback")).toBeNull();
      expect(fieldOrElse(value("set"), "fallback")).toBe("set");
    });
  });

  describe("requireField", () => {
    it("should reject a missing key", () => {
      expect(() => requireField({}, "id", StringCodec, "project")).toThrow('Malformed field "project.id": Required');
    });

    it("should reject null", () => {
      expect(() => requireField({ id: null }, "id", StringCodec)).toThrow('Malformed field "id": null is not allowed');
    });

    it("should accept null for nullable required keys", () => {
      expect(requireNullableField({ body: null }, "body", StringCodec)).toBeNull();
      expect(requireNullableField({ body: "text" }, "body", StringCodec)).toBe("text");
      expect(() => requireNullableField({}, "body", StringCodec)).toThrow(MalformedFieldError);
    });
  });
});
