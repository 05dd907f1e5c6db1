/**
 * @modrinth-kit/codec
 *
 * Wire-format building blocks shared by the protocol and client packages:
 * - Tri-state optional fields (absent / null / value)
 * - Named-flag bitfields
 * - RGB colours and three-part version numbers
 * - Search facet trees
 * - Bulk-patch list adjustments
 */

// Errors
export {
  CodecError,
  ConflictingFieldAdjustmentError,
  InvalidFacetOperationError,
  InvalidFacetValueError,
  isCodecError,
  MalformedFieldError,
  MalformedVersionNumberError,
  UnsupportedAlgorithmError,
} from "./errors.ts";
export type { CodecErrorCode } from "./errors.ts";

// Codec primitives
export {
  arrayCodec,
  expectObject,
  fromZodError,
  isJsonObject,
  joinPath,
  nullableCodec,
  parseWith,
  schemaCodec,
} from "./codec.ts";
export type { Codec, JsonArray, JsonObject, JsonPrimitive, JsonValue } from "./codec.ts";

// Tri-state fields
export {
  ABSENT,
  decodeField,
  encodeField,
  fieldOrElse,
  fromNullable,
  fromOptional,
  isAbsent,
  isNull,
  isValue,
  mapField,
  matchField,
  NULL,
  requireField,
  requireNullableField,
  value,
} from "./field.ts";
export type { Absent, FieldOptions, Null, OptionalField, PatchField, Value } from "./field.ts";

// Bitfields
export { defineBitfield, MAX_BITFIELD_WIDTH } from "./bitfield.ts";
export type { BitfieldCodec, BitfieldFlags } from "./bitfield.ts";

// Colours
export { ColorCodec, colorFromRgbInt, colorToRgbInt, createColor } from "./color.ts";
export type { Color } from "./color.ts";

// Version numbers
export {
  compareVersionNumbers,
  createVersionNumber,
  formatVersionNumber,
  parseVersionNumber,
  VersionNumberCodec,
  versionNumbersEqual,
} from "./version-number.ts";
export type { VersionNumber } from "./version-number.ts";

// Hash algorithms
export {
  HASH_ALGORITHMS,
  isHashAlgorithm,
  resolveHashAlgorithm,
  SHA1_HEX_LENGTH,
  SHA512_HEX_LENGTH,
} from "./hash-algorithm.ts";
export type { HashAlgorithm, HashAlgorithmRequest } from "./hash-algorithm.ts";

// Search facets
export {
  AllFacets,
  allOf,
  AnyFacets,
  anyOf,
  EQUALITY_OPERATIONS,
  FACET_FIELDS,
  FACET_OPERATIONS,
  facet,
  facetFrom,
  facetsToQueryParam,
  formatFacet,
  isFacetField,
} from "./facets.ts";
export type {
  AnyFacet,
  EqualityOperation,
  Facet,
  FacetAndJson,
  FacetField,
  FacetInput,
  FacetOperation,
  FacetOperationFor,
  FacetOrJson,
  FacetValue,
} from "./facets.ts";

// Bulk-patch list adjustments
export { addKey, BulkAdjustment, decodeBulkAdjustment, encodeBulkAdjustment, removeKey } from "./bulk-adjustment.ts";
