import { describe, expect, it } from "vitest";

import { formatColor, parseColor } from "../src/tiled/color.js";
import { catchParseError } from "./helpers.js";

describe("colors", () => {
  it("reads #RRGGBB with opaque alpha", () => {
    expect(parseColor("#010203")).toEqual({ r: 1, g: 2, b: 3, a: 255 });
    expect(parseColor("336699")).toEqual({ r: 0x33, g: 0x66, b: 0x99, a: 255 });
  });

  it("reads #AARRGGBB with alpha first", () => {
    expect(parseColor("#fcfffefd")).toEqual({ r: 255, g: 254, b: 253, a: 252 });
    expect(parseColor("#04010203")).toEqual({ r: 1, g: 2, b: 3, a: 4 });
  });

  it("rejects other lengths and non-hex digits", () => {
    expect(catchParseError(() => parseColor("#123")).kind).toBe("MalformedDocument");
    expect(catchParseError(() => parseColor("#12345g")).kind).toBe("MalformedDocument");
  });

  it("formats back to Tiled's notation", () => {
    expect(formatColor({ r: 1, g: 2, b: 3, a: 255 })).toBe("#010203");
    expect(formatColor({ r: 255, g: 254, b: 253, a: 252 })).toBe("#fcfffefd");
  });
});
