// src/tiled/image.ts
import { optionalInt, optionalString, requiredString } from "./attributes.js";
import { parseColor } from "./color.js";
import { describeElement } from "./xml.js";
import type { TiledImage } from "./types.js";

export function parseImage(el: Element): TiledImage {
  const trans = optionalString(el, "trans");
  return Object.freeze({
    source: requiredString(el, "source"),
    width: optionalInt(el, "width") ?? 0,
    height: optionalInt(el, "height") ?? 0,
    ...(trans !== undefined ? { transparentColor: parseColor(trans, describeElement(el)) } : {}),
  });
}
