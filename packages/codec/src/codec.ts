/**
 * Codec primitives
 *
 * A codec pairs a validating decode (wire JSON -> typed value) with its
 * inverse encode (typed value -> wire JSON). Field helpers, bitfields,
 * version numbers and the entity codecs in the protocol package are all
 * built from this one interface.
 */

import type { z } from "zod";
import { MalformedFieldError, MalformedVersionNumberError } from "./errors.ts";

// ============================================================================
// JSON Types
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonArray = JsonValue[];
export type JsonObject = { [key: string]: JsonValue };
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

// ============================================================================
// Codec
// ============================================================================

export interface Codec<T, J extends JsonValue = JsonValue> {
  /**
   * Validate and convert a raw wire value.
   * @param path - Location of the value, used in error messages
   * @throws MalformedFieldError if the value does not match
   */
  decode(raw: unknown, path: string): T;

  encode(value: T): J;
}

/**
 * Append a zod issue path to a base path: `project` + ["gallery", 0, "url"]
 * gives `project.gallery[0].url`.
 */
export function joinPath(base: string, segments: readonly (string | number)[]): string {
  let out = base;
  for (const segment of segments) {
    if (typeof segment === "number") {
      out = `${out}[${segment}]`;
    } else {
      out = out ? `${out}.${segment}` : segment;
    }
  }
  return out;
}

/**
 * A custom issue raised by a version-number transform carries
 * `params.malformedVersionNumber = { input, reason }`
 */
function versionNumberIssue(issue: z.ZodIssue): { input: string; reason: string } | undefined {
  if (issue.code !== "custom") {
    return undefined;
  }
  const detail: unknown = issue.params?.malformedVersionNumber;
  if (
    typeof detail === "object" &&
    detail !== null &&
    "input" in detail &&
    typeof detail.input === "string" &&
    "reason" in detail &&
    typeof detail.reason === "string"
  ) {
    return { input: detail.input, reason: detail.reason };
  }
  return undefined;
}

/**
 * Convert the first issue of a zod error into a codec error: a
 * MalformedVersionNumberError for version-number issues, a
 * MalformedFieldError otherwise
 */
export function fromZodError(error: z.ZodError, path: string): MalformedFieldError | MalformedVersionNumberError {
  const [issue] = error.issues;
  if (!issue) {
    return new MalformedFieldError(path, error.message, { cause: error });
  }
  const at = joinPath(path, issue.path);
  const versionNumber = versionNumberIssue(issue);
  if (versionNumber) {
    return new MalformedVersionNumberError(versionNumber.input, versionNumber.reason, at);
  }
  return new MalformedFieldError(at, issue.message, { cause: error });
}

/**
 * Run a zod schema, throwing on the first issue
 * @throws MalformedFieldError, or MalformedVersionNumberError for a bad version number
 */
export function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, path: string): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw fromZodError(parsed.error, path);
  }
  return parsed.data;
}

/**
 * Identity codec for values whose typed form is their wire form
 */
export function schemaCodec<T extends JsonValue>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): Codec<T, T> {
  return {
    decode: (raw, path) => parseWith(schema, raw, path),
    encode: (value) => value,
  };
}

export function arrayCodec<T, J extends JsonValue>(item: Codec<T, J>): Codec<T[], J[]> {
  return {
    decode: (raw, path) => {
      if (!Array.isArray(raw)) {
        throw new MalformedFieldError(path, "Expected array");
      }
      return raw.map((entry, index) => item.decode(entry, `${path}[${index}]`));
    },
    encode: (values) => values.map((value) => item.encode(value)),
  };
}

/**
 * Codec for a key that is always present but may hold null
 */
export function nullableCodec<T, J extends JsonValue>(inner: Codec<T, J>): Codec<T | null, J | null> {
  return {
    decode: (raw, path) => (raw === null ? null : inner.decode(raw, path)),
    encode: (value) => (value === null ? null : inner.encode(value)),
  };
}

export function isJsonObject(raw: unknown): raw is JsonObject {
  return typeof raw === "object" && raw !== null && !Array.isArray(raw);
}

/**
 * @throws MalformedFieldError if `raw` is not a plain JSON object
 */
export function expectObject(raw: unknown, path: string): JsonObject {
  if (!isJsonObject(raw)) {
    throw new MalformedFieldError(path, `Expected object, got ${describe(raw)}`);
  }
  return raw;
}

function describe(raw: unknown): string {
  if (raw === null) return "null";
  if (Array.isArray(raw)) return "array";
  return typeof raw;
}
