/**
 * Version number tests
 */
import { describe, expect, it } from "vitest";
import { MalformedFieldError, MalformedVersionNumberError } from "../src/errors.ts";
import {
  compareVersionNumbers,
  createVersionNumber,
  formatVersionNumber,
  parseVersionNumber,
  VersionNumberCodec,
  versionNumbersEqual,
} from "../src/version-number.ts";

describe("VersionNumber", () => {
  it("should parse three components", () => {
    expect(parseVersionNumber("1.18.2")).toEqual({ major: 1, minor: 18, patch: 2 });
  });

  it("should format without padding", () => {
    expect(formatVersionNumber(createVersionNumber(1, 2, 0))).toBe("1.2.0");
  });

  it("should parse its own output", () => {
    const version = createVersionNumber(3, 0, 14);
    expect(parseVersionNumber(formatVersionNumber(version))).toEqual(version);
  });

  it.each(["1.2", "1.2.3.4", "", "a.b.c", "1..2", "1.2.-3", "1.2.3-beta", " 1.2.3"])(
    "should reject %j",
    (input) => {
      expect(() => parseVersionNumber(input)).toThrow(MalformedVersionNumberError);
    }
  );

  it("should explain a wrong component count", () => {
    expect(() => parseVersionNumber("1.2")).toThrow('Malformed version number "1.2": expected 3 components, got 2');
  });

  it("should explain a non-numeric component", () => {
    expect(() => parseVersionNumber("1.x.3")).toThrow(
      'Malformed version number "1.x.3": "x" is not a non-negative integer'
    );
  });

  it("should reject negative components at construction", () => {
    expect(() => createVersionNumber(-1, 0, 0)).toThrow(RangeError);
  });

  it("should order numerically, not lexically", () => {
    const a = parseVersionNumber("1.9.0");
    const b = parseVersionNumber("1.10.0");
    expect(compareVersionNumbers(a, b)).toBeLessThan(0);
    expect(compareVersionNumbers(b, a)).toBeGreaterThan(0);
    expect(versionNumbersEqual(a, parseVersionNumber("1.9.0"))).toBe(true);
  });

  describe("VersionNumberCodec", () => {
    it("should decode and encode strings", () => {
      const version = VersionNumberCodec.decode("0.4.1", "version");
      expect(version).toEqual({ major: 0, minor: 4, patch: 1 });
      expect(VersionNumberCodec.encode(version)).toBe("0.4.1");
    });

    it("should carry the key path on a malformed string", () => {
      try {
        VersionNumberCodec.decode("1.2", "patch.version_number");
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(MalformedVersionNumberError);
        if (error instanceof MalformedVersionNumberError) {
          expect(error.path).toBe("patch.version_number");
          expect(error.reason).toBe("expected 3 components, got 2");
        }
      }
    });

    it("should reject non-strings", () => {
      expect(() => VersionNumberCodec.decode(1, "version")).toThrow(MalformedFieldError);
    });
  });
});
