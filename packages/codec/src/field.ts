/**
 * Tri-state optional fields
 *
 * Patch payloads distinguish three states per key:
 * - absent: key omitted, the server leaves the value untouched
 * - null:   key present with JSON null, the server clears the value
 * - value:  key present with a concrete value
 *
 * `OptionalField<T>` carries all three. `PatchField<T>` is the subset for
 * keys whose schema does not allow clearing.
 */

import type { Codec, JsonObject, JsonValue } from "./codec.ts";
import { MalformedFieldError } from "./errors.ts";

// ============================================================================
// Types
// ============================================================================

export type Absent = { readonly kind: "absent" };
export type Null = { readonly kind: "null" };
export type Value<T> = { readonly kind: "value"; readonly value: T };

export type OptionalField<T> = Absent | Null | Value<T>;
export type PatchField<T> = Absent | Value<T>;

export type FieldOptions = {
  /** Whether JSON null is accepted (decoded as `Null`) */
  nullable: boolean;
};

// ============================================================================
// Constructors
// ============================================================================

export const ABSENT: Absent = Object.freeze({ kind: "absent" });
export const NULL: Null = Object.freeze({ kind: "null" });

export function value<T>(v: T): Value<T> {
  return Object.freeze({ kind: "value", value: v });
}

/**
 * Lift a plain optional value: `undefined` -> absent, `null` -> null
 */
export function fromNullable<T>(v: T | null | undefined): OptionalField<T> {
  if (v === undefined) return ABSENT;
  if (v === null) return NULL;
  return value(v);
}

/**
 * Lift a plain optional value for a non-clearable key: `undefined` -> absent
 */
export function fromOptional<T>(v: T | undefined): PatchField<T> {
  return v === undefined ? ABSENT : value(v);
}

// ============================================================================
// Inspection
// ============================================================================

export function isAbsent<T>(field: OptionalField<T>): field is Absent {
  return field.kind === "absent";
}

export function isNull<T>(field: OptionalField<T>): field is Null {
  return field.kind === "null";
}

export function isValue<T>(field: OptionalField<T>): field is Value<T> {
  return field.kind === "value";
}

export function matchField<T, R>(
  field: OptionalField<T>,
  cases: { absent: () => R; null: () => R; value: (v: T) => R }
): R {
  switch (field.kind) {
    case "absent":
      return cases.absent();
    case "null":
      return cases.null();
    case "value":
      return cases.value(field.value);
  }
}

export function mapField<T, U>(field: PatchField<T>, fn: (v: T) => U): PatchField<U>;
export function mapField<T, U>(field: OptionalField<T>, fn: (v: T) => U): OptionalField<U>;
export function mapField<T, U>(field: OptionalField<T>, fn: (v: T) => U): OptionalField<U> {
  return field.kind === "value" ? value(fn(field.value)) : field;
}

/**
 * The carried value, `null` for a cleared field, or `fallback` when absent
 */
export function fieldOrElse<T, F>(field: OptionalField<T>, fallback: F): T | null | F {
  switch (field.kind) {
    case "absent":
      return fallback;
    case "null":
      return null;
    case "value":
      return field.value;
  }
}

// ============================================================================
// Decoding
// ============================================================================

function keyPath(path: string, key: string): string {
  return path ? `${path}.${key}` : key;
}

/**
 * Decode one key of a JSON object into its tri-state form.
 *
 * Missing keys decode to `Absent`, never `Null`.
 * @throws MalformedFieldError on null for a non-nullable key, or a value the codec rejects
 */
export function decodeField<T>(
  object: JsonObject,
  key: string,
  codec: Codec<T, JsonValue>,
  options: { nullable: true },
  path?: string
): OptionalField<T>;
export function decodeField<T>(
  object: JsonObject,
  key: string,
  codec: Codec<T, JsonValue>,
  options?: { nullable: false },
  path?: string
): PatchField<T>;
export function decodeField<T>(
  object: JsonObject,
  key: string,
  codec: Codec<T, JsonValue>,
  options: FieldOptions = { nullable: false },
  path = ""
): OptionalField<T> {
  if (!Object.hasOwn(object, key)) {
    return ABSENT;
  }

  const raw = object[key];
  const at = keyPath(path, key);
  if (raw === null) {
    if (!options.nullable) {
      throw new MalformedFieldError(at, "null is not allowed");
    }
    return NULL;
  }

  return value(codec.decode(raw, at));
}

/**
 * Decode a key that must be present and non-null
 */
export function requireField<T>(object: JsonObject, key: string, codec: Codec<T, JsonValue>, path = ""): T {
  const at = keyPath(path, key);
  if (!Object.hasOwn(object, key)) {
    throw new MalformedFieldError(at, "Required");
  }
  const raw = object[key];
  if (raw === null) {
    throw new MalformedFieldError(at, "null is not allowed");
  }
  return codec.decode(raw, at);
}

/**
 * Decode a key that must be present but may hold null
 */
export function requireNullableField<T>(
  object: JsonObject,
  key: string,
  codec: Codec<T, JsonValue>,
  path = ""
): T | null {
  const at = keyPath(path, key);
  if (!Object.hasOwn(object, key)) {
    throw new MalformedFieldError(at, "Required");
  }
  const raw = object[key];
  return raw === null ? null : codec.decode(raw, at);
}

// ============================================================================
// Encoding
// ============================================================================

/**
 * Write one tri-state field into `target`: absent writes nothing, null
 * writes JSON null, a value writes its encoded form.
 */
export function encodeField<T, J extends JsonValue>(
  target: JsonObject,
  key: string,
  field: OptionalField<T>,
  codec: Codec<T, J>
): void {
  switch (field.kind) {
    case "absent":
      return;
    case "null":
      target[key] = null;
      return;
    case "value":
      target[key] = codec.encode(field.value);
      return;
  }
}
