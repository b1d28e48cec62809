// src/tiled/tileset.ts
//
// TSX tilesets, standalone or embedded in a map as <tileset firstgid="...">.

import {
  childElements,
  firstChild,
  nestedChildren,
  optionalFloat,
  optionalInt,
  optionalString,
  parseIntToken,
  requiredInt,
  requiredString,
} from "./attributes.js";
import { parseColor } from "./color.js";
import { TiledParseError, wrapParseError, type WarnFn } from "./errors.js";
import { parseImage } from "./image.js";
import { parseObjects } from "./objects.js";
import { parseProperties } from "./properties.js";
import { describeElement, loadXmlRoot } from "./xml.js";
import type {
  AnimationFrame,
  TerrainAdjacency,
  TerrainColor,
  TerrainSet,
  TerrainSetType,
  TileDefinition,
  Tileset,
  Vec2,
} from "./types.js";

export type ParseOptions = Readonly<{
  warn?: WarnFn;
}>;

const WANG_ID_LENGTH = 8;

function parseOffset(el: Element | undefined): Vec2 {
  if (!el) return Object.freeze({ x: 0, y: 0 });
  return Object.freeze({ x: requiredInt(el, "x"), y: requiredInt(el, "y") });
}

function parseAnimation(el: Element): ReadonlyArray<AnimationFrame> {
  return Object.freeze(
    nestedChildren(el, "animation", "frame").map((f) =>
      Object.freeze({ tileId: requiredInt(f, "tileid"), duration: requiredInt(f, "duration") }),
    ),
  );
}

/** "0,,1,0" -> [0, -1, 1, 0] */
function parseTerrainIndices(text: string, context: string): ReadonlyArray<number> {
  return Object.freeze(
    text.split(",").map((t, i) => (t.trim() === "" ? -1 : parseIntToken(t, `terrain #${i}`, context))),
  );
}

function parseTile(el: Element, warn: WarnFn): TileDefinition {
  const ctx = describeElement(el);
  const cls = optionalString(el, "class") ?? optionalString(el, "type");
  const terrain = optionalString(el, "terrain");
  const probability = optionalFloat(el, "probability");
  const image = firstChild(el, "image");

  return Object.freeze({
    id: requiredInt(el, "id"),
    properties: parseProperties(el, warn),
    animation: parseAnimation(el),
    objects: parseObjects(nestedChildren(el, "objectgroup", "object"), warn),
    ...(cls !== undefined ? { class: cls } : {}),
    ...(terrain !== undefined ? { terrain: parseTerrainIndices(terrain, ctx) } : {}),
    ...(probability !== undefined ? { probability } : {}),
    ...(image ? { image: parseImage(image) } : {}),
  });
}

export function parseTerrainSetType(text: string, context?: string): TerrainSetType {
  if (text === "corner" || text === "edge" || text === "mixed") return text;
  throw new TiledParseError("UnknownElementKind", `Unknown terrain set type "${text}"`, context);
}

/**
 * wangid holds 8 colour numbers clockwise from the top edge. Tiled numbers
 * colours from 1 with 0 for "none"; the model stores the index into
 * TerrainSet.colors, so 0 becomes -1.
 */
export function parseWangId(text: string, context?: string): TerrainAdjacency {
  const parts = text.split(",");
  if (parts.length !== WANG_ID_LENGTH) {
    throw new TiledParseError(
      "MalformedDocument",
      `Invalid wangid "${text}": expected ${WANG_ID_LENGTH} values, got ${parts.length}`,
      context,
    );
  }
  const v = parts.map((p, i) => {
    const n = parseIntToken(p, `wangid #${i}`, context);
    return n <= 0 ? -1 : n - 1;
  });
  const [top = -1, topRight = -1, right = -1, bottomRight = -1, bottom = -1, bottomLeft = -1, left = -1, topLeft = -1] = v;
  return Object.freeze({ top, topRight, right, bottomRight, bottom, bottomLeft, left, topLeft });
}

function parseTerrainColor(el: Element, warn: WarnFn): TerrainColor {
  const cls = optionalString(el, "class");
  return Object.freeze({
    name: requiredString(el, "name"),
    color: parseColor(requiredString(el, "color"), describeElement(el)),
    tile: requiredInt(el, "tile"),
    probability: optionalFloat(el, "probability") ?? 1,
    properties: parseProperties(el, warn),
    ...(cls !== undefined ? { class: cls } : {}),
  });
}

function parseTerrainSet(el: Element, warn: WarnFn): TerrainSet {
  const ctx = describeElement(el);
  const cls = optionalString(el, "class");

  const tiles = new Map<number, TerrainAdjacency>();
  for (const t of childElements(el, "wangtile")) {
    const tileId = requiredInt(t, "tileid");
    tiles.set(tileId, parseWangId(requiredString(t, "wangid"), describeElement(t)));
  }

  return Object.freeze({
    name: requiredString(el, "name"),
    type: parseTerrainSetType(requiredString(el, "type"), ctx),
    tile: optionalInt(el, "tile") ?? -1,
    colors: Object.freeze(childElements(el, "wangcolor").map((c) => parseTerrainColor(c, warn))),
    tiles,
    properties: parseProperties(el, warn),
    ...(cls !== undefined ? { class: cls } : {}),
  });
}

/** Parse a <tileset> element that is already loaded. */
export function parseTilesetElement(el: Element, options: ParseOptions = {}): Tileset {
  const warn = options.warn ?? (() => {});

  const tiledVersion = optionalString(el, "tiledversion");
  const version = optionalString(el, "version");
  const name = optionalString(el, "name");
  const cls = optionalString(el, "class");
  const image = firstChild(el, "image");

  return Object.freeze({
    tileWidth: requiredInt(el, "tilewidth"),
    tileHeight: requiredInt(el, "tileheight"),
    tileCount: requiredInt(el, "tilecount"),
    columns: requiredInt(el, "columns"),
    margin: optionalInt(el, "margin") ?? 0,
    spacing: optionalInt(el, "spacing") ?? 0,
    offset: parseOffset(firstChild(el, "tileoffset")),
    tiles: Object.freeze(childElements(el, "tile").map((t) => parseTile(t, warn))),
    properties: parseProperties(el, warn),
    terrainSets: Object.freeze(nestedChildren(el, "wangsets", "wangset").map((w) => parseTerrainSet(w, warn))),
    ...(tiledVersion !== undefined ? { tiledVersion } : {}),
    ...(version !== undefined ? { version } : {}),
    ...(name !== undefined ? { name } : {}),
    ...(cls !== undefined ? { class: cls } : {}),
    ...(image ? { image: parseImage(image) } : {}),
  });
}

/**
 * Parse TSX text: a whole document or a bare <tileset> fragment.
 * @throws TiledParseError
 */
export function parseTileset(text: string, options: ParseOptions = {}): Tileset {
  try {
    return parseTilesetElement(loadXmlRoot(text, "tileset"), options);
  } catch (err) {
    throw wrapParseError(err, "tileset");
  }
}
