/**
 * Scalar codecs and tri-state key helpers shared by the patch payloads
 */

import {
  type Codec,
  decodeField,
  type JsonObject,
  type JsonValue,
  type OptionalField,
  type PatchField,
  schemaCodec,
} from "@modrinth-kit/codec";
import { z } from "zod";

export const StringCodec = schemaCodec(z.string());
export const BooleanCodec = schemaCodec(z.boolean());
export const IntCodec = schemaCodec(z.number().int());
export const NumberCodec = schemaCodec(z.number());
export const StringListCodec = schemaCodec(z.array(z.string()));

/**
 * Read a key that may be omitted but never cleared
 */
export function patchKey<T>(object: JsonObject, key: string, codec: Codec<T, JsonValue>, path: string): PatchField<T> {
  return decodeField(object, key, codec, { nullable: false }, path);
}

/**
 * Read a key that may be omitted or cleared with null
 */
export function clearableKey<T>(
  object: JsonObject,
  key: string,
  codec: Codec<T, JsonValue>,
  path: string
): OptionalField<T> {
  return decodeField(object, key, codec, { nullable: true }, path);
}
