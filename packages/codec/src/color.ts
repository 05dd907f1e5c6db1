/**
 * RGB colour packed into a 24-bit integer (0xRRGGBB)
 */

import type { Codec } from "./codec.ts";
import { MalformedFieldError } from "./errors.ts";

export interface Color {
  readonly red: number;
  readonly green: number;
  readonly blue: number;
}

const isChannel = (n: number): boolean => Number.isInteger(n) && n >= 0 && n <= 0xff;

export function createColor(red: number, green: number, blue: number): Color {
  if (!isChannel(red) || !isChannel(green) || !isChannel(blue)) {
    throw new RangeError(`Color channels must be integers 0..255, got (${red}, ${green}, ${blue})`);
  }
  return Object.freeze({ red, green, blue });
}

export function colorFromRgbInt(rgb: number): Color {
  return createColor((rgb >> 16) & 0xff, (rgb >> 8) & 0xff, rgb & 0xff);
}

export function colorToRgbInt(color: Color): number {
  return (color.red << 16) | (color.green << 8) | color.blue;
}

export const ColorCodec: Codec<Color, number> = {
  decode: (raw, path) => {
    if (typeof raw !== "number" || !Number.isInteger(raw) || raw < 0 || raw > 0xffffff) {
      throw new MalformedFieldError(path, `Expected RGB integer 0..16777215, got ${String(raw)}`);
    }
    return colorFromRgbInt(raw);
  },
  encode: colorToRgbInt,
};
