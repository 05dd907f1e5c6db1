/**
 * Bitfield codec
 *
 * Packs an ordered list of named boolean flags into an integer:
 * flag i occupies bit i, least-significant first.
 *
 * Decoding drops any bit at or above the declared width, so
 * encode(decode(n)) === n only for n in [0, 2^width).
 */

import type { Codec } from "./codec.ts";
import { MalformedFieldError } from "./errors.ts";

/** 32-bit unsigned shifts cap the width */
export const MAX_BITFIELD_WIDTH = 31;

export type BitfieldFlags<F extends string> = Readonly<Record<F, boolean>>;

export interface BitfieldCodec<F extends string> extends Codec<BitfieldFlags<F>, number> {
  /** Flag names in bit order */
  readonly flags: readonly F[];
  /** Number of declared flags */
  readonly width: number;
  /** Integer with every declared bit set */
  readonly mask: number;
  /** Flags with every value false */
  none(): BitfieldFlags<F>;
  /** Build a flag record from the names that should be set */
  of(...set: F[]): BitfieldFlags<F>;
  /** Names of the flags that are set, in bit order */
  setFlags(flags: BitfieldFlags<F>): F[];
}

/**
 * Define a bitfield over an ordered list of flag names
 *
 * @example
 * const Badges = defineBitfield(["unused", "ALPHA_TESTER"] as const);
 * Badges.decode(2, "badges"); // { unused: false, ALPHA_TESTER: true }
 */
export function defineBitfield<const F extends string>(names: readonly F[]): BitfieldCodec<F> {
  if (names.length === 0 || names.length > MAX_BITFIELD_WIDTH) {
    throw new RangeError(`Bitfield width must be 1..${MAX_BITFIELD_WIDTH}, got ${names.length}`);
  }
  if (new Set(names).size !== names.length) {
    throw new RangeError(`Duplicate bitfield flag names: ${names.join(", ")}`);
  }

  const flags = Object.freeze([...names]);
  const width = flags.length;
  const mask = 2 ** width - 1;

  const isComplete = (record: Partial<Record<F, boolean>>): record is Record<F, boolean> =>
    flags.every((name) => typeof record[name] === "boolean");

  const build = (bitAt: (index: number) => boolean): BitfieldFlags<F> => {
    const out: Partial<Record<F, boolean>> = {};
    flags.forEach((name, index) => {
      out[name] = bitAt(index);
    });
    if (!isComplete(out)) {
      throw new Error("Bitfield record is missing flags");
    }
    return Object.freeze(out);
  };

  return {
    flags,
    width,
    mask,

    decode: (raw, path) => {
      if (typeof raw !== "number" || !Number.isSafeInteger(raw) || raw < 0) {
        throw new MalformedFieldError(path, `Expected non-negative integer bitfield, got ${String(raw)}`);
      }
      // >>> keeps the low 32 bits, which hold every declared flag
      return build((index) => ((raw >>> index) & 1) === 1);
    },

    encode: (value) => {
      let out = 0;
      flags.forEach((name, index) => {
        if (value[name]) {
          out |= 1 << index;
        }
      });
      return out >>> 0;
    },

    none: () => build(() => false),

    of: (...set) => {
      const wanted = new Set<F>(set);
      return build((index) => {
        const name = flags[index];
        return name !== undefined && wanted.has(name);
      });
    },

    setFlags: (value) => flags.filter((name) => value[name]),
  };
}
