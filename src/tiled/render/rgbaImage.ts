// src/tiled/render/rgbaImage.ts
import { isFlippedDiagonal, isFlippedHorizontal, isFlippedVertical } from "../gid.js";

export type RgbaImage = {
  width: number;
  height: number;
  data: Uint8Array; // length = width*height*4 (RGBA)
};

export function createImage(
  width: number,
  height: number,
  fill: readonly [number, number, number, number] = [0, 0, 0, 0],
): RgbaImage {
  const [r, g, b, a] = fill;
  const data = new Uint8Array(width * height * 4);
  for (let i = 0; i < width * height; i++) {
    const o = i * 4;
    data[o + 0] = r;
    data[o + 1] = g;
    data[o + 2] = b;
    data[o + 3] = a;
  }
  return { width, height, data };
}

export function cropRect(
  src: RgbaImage,
  left: number,
  top: number,
  right: number,
  bottom: number,
): RgbaImage {
  const w = right - left;
  const h = bottom - top;
  if (w <= 0 || h <= 0) throw new Error(`Invalid cropRect w=${w} h=${h}`);
  if (left < 0 || top < 0 || right > src.width || bottom > src.height) {
    throw new Error(
      `cropRect out of bounds: (${left},${top})-(${right},${bottom}) vs ${src.width}x${src.height}`,
    );
  }

  const out = createImage(w, h, [0, 0, 0, 0]);
  for (let y = 0; y < h; y++) {
    const srcRow = (top + y) * src.width * 4;
    const dstRow = y * w * 4;
    const srcStart = srcRow + left * 4;
    const srcEnd = srcStart + w * 4;
    out.data.set(src.data.subarray(srcStart, srcEnd), dstRow);
  }
  return out;
}

function remap(
  src: RgbaImage,
  width: number,
  height: number,
  from: (x: number, y: number) => [number, number],
): RgbaImage {
  const out = createImage(width, height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const [sx, sy] = from(x, y);
      const si = (sy * src.width + sx) * 4;
      out.data.set(src.data.subarray(si, si + 4), (y * width + x) * 4);
    }
  }
  return out;
}

export function flipHorizontal(src: RgbaImage): RgbaImage {
  return remap(src, src.width, src.height, (x, y) => [src.width - 1 - x, y]);
}

export function flipVertical(src: RgbaImage): RgbaImage {
  return remap(src, src.width, src.height, (x, y) => [x, src.height - 1 - y]);
}

/** Mirror across the top-left / bottom-right diagonal. */
export function transpose(src: RgbaImage): RgbaImage {
  return remap(src, src.height, src.width, (x, y) => [y, x]);
}

/** Tiled applies the diagonal flip first, then horizontal, then vertical. */
export function applyFlipFlags(src: RgbaImage, flipFlags: number): RgbaImage {
  let img = src;
  if (isFlippedDiagonal(flipFlags)) img = transpose(img);
  if (isFlippedHorizontal(flipFlags)) img = flipHorizontal(img);
  if (isFlippedVertical(flipFlags)) img = flipVertical(img);
  return img;
}
