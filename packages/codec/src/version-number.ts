/**
 * Three-part dotted version numbers: `{major}.{minor}.{patch}`
 */

import type { Codec } from "./codec.ts";
import { MalformedFieldError, MalformedVersionNumberError } from "./errors.ts";

export interface VersionNumber {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
}

const COMPONENT_REGEX = /^\d+$/;

const isComponent = (n: number): boolean => Number.isSafeInteger(n) && n >= 0;

export function createVersionNumber(major: number, minor: number, patch: number): VersionNumber {
  if (!isComponent(major) || !isComponent(minor) || !isComponent(patch)) {
    throw new RangeError(`Version components must be non-negative integers, got (${major}, ${minor}, ${patch})`);
  }
  return Object.freeze({ major, minor, patch });
}

/**
 * @param path - Location of the value, carried on the error
 * @throws MalformedVersionNumberError unless `input` is exactly three dot-separated integers
 */
export function parseVersionNumber(input: string, path?: string): VersionNumber {
  const parts = input.split(".");
  if (parts.length !== 3) {
    throw new MalformedVersionNumberError(input, `expected 3 components, got ${parts.length}`, path);
  }

  const numbers = parts.map((part) => {
    if (!COMPONENT_REGEX.test(part)) {
      throw new MalformedVersionNumberError(input, `"${part}" is not a non-negative integer`, path);
    }
    const n = Number(part);
    if (!Number.isSafeInteger(n)) {
      throw new MalformedVersionNumberError(input, `"${part}" is too large`, path);
    }
    return n;
  });

  const [major = 0, minor = 0, patch = 0] = numbers;
  return createVersionNumber(major, minor, patch);
}

export function formatVersionNumber(version: VersionNumber): string {
  return `${version.major}.${version.minor}.${version.patch}`;
}

export function compareVersionNumbers(a: VersionNumber, b: VersionNumber): number {
  return a.major - b.major || a.minor - b.minor || a.patch - b.patch;
}

export function versionNumbersEqual(a: VersionNumber, b: VersionNumber): boolean {
  return compareVersionNumbers(a, b) === 0;
}

export const VersionNumberCodec: Codec<VersionNumber, string> = {
  decode: (raw, path) => {
    if (typeof raw !== "string") {
      throw new MalformedFieldError(path, `Expected version number string, got ${typeof raw}`);
    }
    return parseVersionNumber(raw, path);
  },
  encode: formatVersionNumber,
};
