// src/tiled/objects.ts
import {
  firstChild,
  optionalBool,
  optionalFloat,
  optionalInt,
  optionalString,
  parseFloatToken,
  parseIntToken,
  requiredInt,
  requiredString,
  textOf,
} from "./attributes.js";
import { parseColor } from "./color.js";
import { TiledParseError, type WarnFn } from "./errors.js";
import { decodeRawGid } from "./gid.js";
import { parseProperties } from "./properties.js";
import { describeElement } from "./xml.js";
import type { TiledObject, TiledText, Vec2 } from "./types.js";

/** "x1,y1 x2,y2 ..." */
export function parsePoints(text: string, context?: string): ReadonlyArray<Vec2> {
  const pairs = text.trim().split(/\s+/).filter((p) => p.length > 0);
  return Object.freeze(
    pairs.map((pair, i) => {
      const coords = pair.split(",");
      if (coords.length !== 2) {
        throw new TiledParseError(
          "MalformedDocument",
          `Invalid point #${i} "${pair}": expected "x,y"`,
          context,
        );
      }
      const [x = "", y = ""] = coords;
      return Object.freeze({
        x: parseFloatToken(x, `point #${i} x`, context),
        y: parseFloatToken(y, `point #${i} y`, context),
      });
    }),
  );
}

/** Tile objects carry a raw u32 gid with the same flip bits as layer data. */
export function parseObjectGid(text: string, context?: string): { gid: number; flipFlags: number } {
  const raw = parseIntToken(text, `attribute "gid"`, context);
  if (raw < 0 || raw > 0xffffffff) {
    throw new TiledParseError("MalformedDocument", `Object gid out of u32 range: ${raw}`, context);
  }
  return decodeRawGid(raw);
}

function parseText(el: Element): TiledText {
  const fontFamily = optionalString(el, "fontfamily");
  const pixelSize = optionalInt(el, "pixelsize");
  const color = optionalString(el, "color");
  return Object.freeze({
    text: textOf(el),
    wrap: optionalBool(el, "wrap") ?? false,
    ...(fontFamily !== undefined ? { fontFamily } : {}),
    ...(pixelSize !== undefined ? { pixelSize } : {}),
    ...(color !== undefined ? { color: parseColor(color, describeElement(el)) } : {}),
  });
}

export function parseObject(el: Element, warn: WarnFn): TiledObject {
  const ctx = describeElement(el);

  const name = optionalString(el, "name");
  // Before Tiled 1.9 the class attribute was called "type".
  const cls = optionalString(el, "class") ?? optionalString(el, "type");
  const width = optionalFloat(el, "width");
  const height = optionalFloat(el, "height");
  const template = optionalString(el, "template");

  const common = {
    id: requiredInt(el, "id"),
    x: optionalFloat(el, "x") ?? 0,
    y: optionalFloat(el, "y") ?? 0,
    rotation: optionalFloat(el, "rotation") ?? 0,
    visible: optionalBool(el, "visible") ?? true,
    properties: parseProperties(el, warn),
    ...(name !== undefined ? { name } : {}),
    ...(cls !== undefined ? { class: cls } : {}),
    ...(width !== undefined ? { width } : {}),
    ...(height !== undefined ? { height } : {}),
    ...(template !== undefined ? { template } : {}),
  };

  if (firstChild(el, "point")) return Object.freeze({ ...common, shape: "point" });
  if (firstChild(el, "ellipse")) return Object.freeze({ ...common, shape: "ellipse" });

  const polygon = firstChild(el, "polygon");
  if (polygon) {
    return Object.freeze({ ...common, shape: "polygon", points: parsePoints(requiredString(polygon, "points"), ctx) });
  }

  const polyline = firstChild(el, "polyline");
  if (polyline) {
    return Object.freeze({
      ...common,
      shape: "polyline",
      points: parsePoints(requiredString(polyline, "points"), ctx),
    });
  }

  const text = firstChild(el, "text");
  if (text) return Object.freeze({ ...common, shape: "text", text: parseText(text) });

  const gid = optionalString(el, "gid");
  if (gid !== undefined) return Object.freeze({ ...common, shape: "tile", ...parseObjectGid(gid, ctx) });

  return Object.freeze({ ...common, shape: "rectangle" });
}

export function parseObjects(elements: ReadonlyArray<Element>, warn: WarnFn): ReadonlyArray<TiledObject> {
  return Object.freeze(elements.map((el) => parseObject(el, warn)));
}
