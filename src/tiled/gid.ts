// src/tiled/gid.ts
//
// Raw tile values are u32: the top 3 bits are flip flags, the low 29 bits the
// global tile id.
//
//   bit 31 - horizontal flip
//   bit 30 - vertical flip
//   bit 29 - diagonal (anti-diagonal) flip
//
// Flip flags are stored separately as a byte holding those bits shifted to
// the low end: 0b100 horizontal, 0b010 vertical, 0b001 diagonal.

export const FLIPPED_HORIZONTALLY = 0x80000000;
export const FLIPPED_VERTICALLY = 0x40000000;
export const FLIPPED_DIAGONALLY = 0x20000000;

export const FLIP_FLAGS_MASK = 0xe0000000;
export const GID_MASK = 0x1fffffff;
export const FLIP_FLAG_SHIFT = 29;

export const FLIP_BYTE_HORIZONTAL = FLIPPED_HORIZONTALLY >>> FLIP_FLAG_SHIFT;
export const FLIP_BYTE_VERTICAL = FLIPPED_VERTICALLY >>> FLIP_FLAG_SHIFT;
export const FLIP_BYTE_DIAGONAL = FLIPPED_DIAGONALLY >>> FLIP_FLAG_SHIFT;

export type DecodedGid = Readonly<{ gid: number; flipFlags: number }>;

export function decodeRawGid(raw: number): DecodedGid {
  if (!Number.isInteger(raw) || raw < 0 || raw > 0xffffffff) {
    throw new Error(`Raw tile value out of range: ${raw}`);
  }
  return {
    gid: (raw & GID_MASK) >>> 0,
    flipFlags: ((raw & FLIP_FLAGS_MASK) >>> FLIP_FLAG_SHIFT) & 0b111,
  };
}

export function encodeRawGid(gid: number, flipFlags: number): number {
  if (!Number.isInteger(gid) || gid < 0 || gid > GID_MASK) {
    throw new Error(`GID out of range: ${gid}`);
  }
  if (!Number.isInteger(flipFlags) || flipFlags < 0 || flipFlags > 0b111) {
    throw new Error(`Flip flags out of range: ${flipFlags}`);
  }
  return ((flipFlags << FLIP_FLAG_SHIFT) | gid) >>> 0;
}

export function isFlippedHorizontal(flipFlags: number): boolean {
  return (flipFlags & FLIP_BYTE_HORIZONTAL) !== 0;
}

export function isFlippedVertical(flipFlags: number): boolean {
  return (flipFlags & FLIP_BYTE_VERTICAL) !== 0;
}

export function isFlippedDiagonal(flipFlags: number): boolean {
  return (flipFlags & FLIP_BYTE_DIAGONAL) !== 0;
}
