import type { Color } from "../types.js";
import { UsageError } from "../errors.js";

function byteToHex(value: number): string {
  return value.toString(16).padStart(2, "0").toUpperCase();
}

/** Convert a Color to an 8-digit "RRGGBBAA" hex string. */
export function colorToHex(c: Color): string {
  return `${byteToHex(c.r)}${byteToHex(c.g)}${byteToHex(c.b)}${byteToHex(c.a)}`;
}

/** Parse an "RRGGBBAA" hex string into a Color, returning null if invalid. */
export function tryParseHexColor(hex: string): Color | null {
  const h = hex.trim();
  if (!/^[0-9a-f]{8}$/i.test(h)) return null;
  return {
    r: parseInt(h.slice(0, 2), 16),
    g: parseInt(h.slice(2, 4), 16),
    b: parseInt(h.slice(4, 6), 16),
    a: parseInt(h.slice(6, 8), 16),
  };
}

/** Like tryParseHexColor, but a malformed value is a usage error rather than black. */
export function parseHexColor(hex: string): Color {
  const color = tryParseHexColor(hex);
  if (!color) {
    throw new UsageError(`Invalid color "${hex}": expected 8 hex digits RRGGBBAA`, {
      value: hex,
    });
  }
  return color;
}

/** Shape used in the parameter report: "RRGGBBAA (r, g, b, a)". */
export function colorToDisplayString(c: Color): string {
  return `${colorToHex(c)} (${c.r}, ${c.g}, ${c.b}, ${c.a})`;
}
