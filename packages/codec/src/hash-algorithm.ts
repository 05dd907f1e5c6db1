/**
 * File hash algorithm resolution
 *
 * Callers may pass "auto" and let the hash length pick the algorithm.
 * "auto" is resolved client-side and never sent on the wire.
 */

import { UnsupportedAlgorithmError } from "./errors.ts";

export const HASH_ALGORITHMS = ["sha1", "sha512"] as const;
export type HashAlgorithm = (typeof HASH_ALGORITHMS)[number];
export type HashAlgorithmRequest = HashAlgorithm | "auto";

/** Hex length of a sha512 digest */
export const SHA512_HEX_LENGTH = 128;
/** Hex length of a sha1 digest */
export const SHA1_HEX_LENGTH = 40;

export function isHashAlgorithm(value: unknown): value is HashAlgorithm {
  return value === "sha1" || value === "sha512";
}

/**
 * Resolve the algorithm for `hash`.
 *
 * An explicit algorithm is returned unchanged. "auto" gives "sha512" for a
 * 128-character hash and `fallback` otherwise; an `undefined` fallback means
 * "leave the parameter out and let the server default apply".
 *
 * @throws UnsupportedAlgorithmError for anything other than "auto", "sha1" or "sha512"
 */
export function resolveHashAlgorithm(hash: string, requested: HashAlgorithmRequest, fallback: HashAlgorithm): HashAlgorithm;
export function resolveHashAlgorithm(
  hash: string,
  requested: HashAlgorithmRequest,
  fallback?: HashAlgorithm
): HashAlgorithm | undefined;
export function resolveHashAlgorithm(
  hash: string,
  requested: HashAlgorithmRequest,
  fallback?: HashAlgorithm
): HashAlgorithm | undefined {
  if (requested === "auto") {
    return hash.length === SHA512_HEX_LENGTH ? "sha512" : fallback;
  }
  if (isHashAlgorithm(requested)) {
    return requested;
  }
  // Reachable from untyped callers
  throw new UnsupportedAlgorithmError(String(requested));
}
