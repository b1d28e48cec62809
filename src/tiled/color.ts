// src/tiled/color.ts
import { TiledParseError } from "./errors.js";

export type Color = Readonly<{
  r: number;
  g: number;
  b: number;
  a: number;
}>;

const HEX_RE = /^[0-9a-fA-F]+$/;

/**
 * Tiled writes colours as `#RRGGBB` or `#AARRGGBB` (alpha first).
 * The leading `#` is optional.
 */
export function parseColor(text: string, context?: string): Color {
  const hex = text.startsWith("#") ? text.slice(1) : text;
  if (!HEX_RE.test(hex) || (hex.length !== 6 && hex.length !== 8)) {
    throw new TiledParseError("MalformedDocument", `Invalid color: "${text}"`, context);
  }

  const bytes: number[] = [];
  for (let i = 0; i < hex.length; i += 2) bytes.push(parseInt(hex.slice(i, i + 2), 16));

  if (bytes.length === 3) {
    const [r = 0, g = 0, b = 0] = bytes;
    return { r, g, b, a: 255 };
  }
  const [a = 0, r = 0, g = 0, b = 0] = bytes;
  return { r, g, b, a };
}

export function formatColor(c: Color): string {
  const hex = (v: number): string => v.toString(16).padStart(2, "0");
  const rgb = `${hex(c.r)}${hex(c.g)}${hex(c.b)}`;
  return c.a === 255 ? `#${rgb}` : `#${hex(c.a)}${rgb}`;
}
