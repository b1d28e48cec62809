import { describe, expect, it } from "vitest";

import {
  decodeRawGid,
  encodeRawGid,
  FLIP_BYTE_DIAGONAL,
  FLIP_BYTE_HORIZONTAL,
  FLIP_BYTE_VERTICAL,
  GID_MASK,
  isFlippedDiagonal,
  isFlippedHorizontal,
  isFlippedVertical,
} from "../src/tiled/gid.js";

describe("raw gid flip bits", () => {
  it("splits the top 3 bits into a flag byte and clears them from the gid", () => {
    expect(decodeRawGid(0x80000003)).toEqual({ gid: 3, flipFlags: 0b100 });
    expect(decodeRawGid(0x40000003)).toEqual({ gid: 3, flipFlags: 0b010 });
    expect(decodeRawGid(0x20000003)).toEqual({ gid: 3, flipFlags: 0b001 });
    expect(decodeRawGid(0xe0000001)).toEqual({ gid: 1, flipFlags: 0b111 });
    expect(decodeRawGid(0)).toEqual({ gid: 0, flipFlags: 0 });
    expect(decodeRawGid(GID_MASK)).toEqual({ gid: GID_MASK, flipFlags: 0 });
  });

  it("encode inverts decode over gid and flag ranges", () => {
    const gids = [0, 1, 2, 255, 65536, GID_MASK];
    for (const gid of gids) {
      for (let flags = 0; flags < 8; flags++) {
        const raw = encodeRawGid(gid, flags);
        expect(decodeRawGid(raw)).toEqual({ gid, flipFlags: flags });
        expect(encodeRawGid(decodeRawGid(raw).gid, decodeRawGid(raw).flipFlags)).toBe(raw);
      }
    }
  });

  it("rejects values that do not fit", () => {
    expect(() => encodeRawGid(GID_MASK + 1, 0)).toThrow(/out of range/);
    expect(() => encodeRawGid(1, 8)).toThrow(/out of range/);
    expect(() => decodeRawGid(0x100000000)).toThrow(/out of range/);
    expect(() => decodeRawGid(-1)).toThrow(/out of range/);
  });

  it("flag predicates test single bits of the flag byte", () => {
    expect(FLIP_BYTE_HORIZONTAL).toBe(4);
    expect(FLIP_BYTE_VERTICAL).toBe(2);
    expect(FLIP_BYTE_DIAGONAL).toBe(1);

    expect(isFlippedHorizontal(0b100)).toBe(true);
    expect(isFlippedVertical(0b100)).toBe(false);
    expect(isFlippedDiagonal(0b101)).toBe(true);
    expect(isFlippedVertical(0b011)).toBe(true);
  });
});
