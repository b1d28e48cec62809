// src/tiled/layers.ts
//
// Layer tree: <layer>, <objectgroup>, <imagelayer> and nested <group>s.

import {
  childElements,
  firstChild,
  optionalBool,
  optionalFloat,
  optionalInt,
  optionalString,
  requiredChild,
  requiredInt,
  textOf,
} from "./attributes.js";
import { parseColor, type Color } from "./color.js";
import { TiledParseError, type WarnFn } from "./errors.js";
import { parseImage } from "./image.js";
import { parseObjects } from "./objects.js";
import { parseProperties } from "./properties.js";
import {
  decodeTileData,
  parseTileCompression,
  parseTileEncoding,
  tileLayerFormat,
  type TileLayerFormat,
} from "./tileData.js";
import { describeElement } from "./xml.js";
import type {
  Chunk,
  ImageLayer,
  LayerKind,
  ObjectLayer,
  TileLayer,
  TileLayerData,
  TiledGroup,
  TiledLayer,
  TiledProperty,
  Vec2,
} from "./types.js";

export type LayerParseContext = Readonly<{
  infinite: boolean;
  warn: WarnFn;
  /** Called with the format of every tile data block, in document order. */
  onTileData?: (format: TileLayerFormat) => void;
}>;

const LAYER_TAGS: Readonly<Record<string, LayerKind>> = {
  layer: "tile",
  objectgroup: "object",
  imagelayer: "image",
};

// Children of <map> / <group> that are neither layers nor groups.
const NON_LAYER_TAGS = new Set(["properties", "tileset", "editorsettings", "group"]);

type CommonAttributes = Readonly<{
  id: number;
  name: string;
  class?: string;
  visible: boolean;
  locked: boolean;
  offset: Vec2;
  parallax: Vec2;
  opacity: number;
  tintColor?: Color;
  properties: ReadonlyArray<TiledProperty>;
}>;

function parseCommon(el: Element, warn: WarnFn): CommonAttributes {
  const cls = optionalString(el, "class");
  const tint = optionalString(el, "tintcolor");
  return {
    id: requiredInt(el, "id"),
    name: optionalString(el, "name") ?? "",
    visible: optionalBool(el, "visible") ?? true,
    locked: optionalBool(el, "locked") ?? false,
    offset: Object.freeze({ x: optionalFloat(el, "offsetx") ?? 0, y: optionalFloat(el, "offsety") ?? 0 }),
    parallax: Object.freeze({ x: optionalFloat(el, "parallaxx") ?? 1, y: optionalFloat(el, "parallaxy") ?? 1 }),
    opacity: optionalFloat(el, "opacity") ?? 1,
    properties: parseProperties(el, warn),
    ...(cls !== undefined ? { class: cls } : {}),
    ...(tint !== undefined ? { tintColor: parseColor(tint, describeElement(el)) } : {}),
  };
}

function parseChunk(el: Element, encoding: string, compression: string | undefined, warn: WarnFn): Chunk {
  return Object.freeze({
    x: requiredInt(el, "x"),
    y: requiredInt(el, "y"),
    width: requiredInt(el, "width"),
    height: requiredInt(el, "height"),
    ...decodeTileData(encoding, compression, textOf(el), warn),
  });
}

function parseTileLayerData(dataEl: Element, ctx: LayerParseContext): TileLayerData {
  const encodingName = optionalString(dataEl, "encoding");
  const compressionName = optionalString(dataEl, "compression");

  // Validate up front so that an infinite map without chunks still fails on a bad format.
  const encoding = parseTileEncoding(encodingName);
  const compression = parseTileCompression(compressionName);
  ctx.onTileData?.(tileLayerFormat(encoding, compression));

  if (ctx.infinite) {
    const chunks = childElements(dataEl, "chunk").map((c) => parseChunk(c, encoding, compressionName, ctx.warn));
    return Object.freeze({ kind: "chunked", chunks: Object.freeze(chunks) });
  }

  const data = decodeTileData(encoding, compressionName, textOf(dataEl), ctx.warn);
  return Object.freeze({ kind: "flat", gids: Object.freeze(data.gids), flipFlags: Object.freeze(data.flipFlags) });
}

function parseTileLayer(el: Element, ctx: LayerParseContext): TileLayer {
  const width = optionalInt(el, "width");
  const height = optionalInt(el, "height");
  return Object.freeze({
    ...parseCommon(el, ctx.warn),
    kind: "tile",
    data: parseTileLayerData(requiredChild(el, "data"), ctx),
    ...(width !== undefined ? { width } : {}),
    ...(height !== undefined ? { height } : {}),
  });
}

function parseDrawOrder(el: Element): "topdown" | "index" | undefined {
  const v = optionalString(el, "draworder");
  if (v === undefined || v === "topdown" || v === "index") return v;
  throw new TiledParseError("MalformedDocument", `Invalid draworder "${v}"`, describeElement(el));
}

function parseObjectLayer(el: Element, ctx: LayerParseContext): ObjectLayer {
  const color = optionalString(el, "color");
  const drawOrder = parseDrawOrder(el);
  return Object.freeze({
    ...parseCommon(el, ctx.warn),
    kind: "object",
    objects: parseObjects(childElements(el, "object"), ctx.warn),
    ...(color !== undefined ? { color: parseColor(color, describeElement(el)) } : {}),
    ...(drawOrder !== undefined ? { drawOrder } : {}),
  });
}

function parseImageLayer(el: Element, ctx: LayerParseContext): ImageLayer {
  const image = firstChild(el, "image");
  return Object.freeze({
    ...parseCommon(el, ctx.warn),
    kind: "image",
    repeatX: optionalBool(el, "repeatx") ?? false,
    repeatY: optionalBool(el, "repeaty") ?? false,
    ...(image ? { image: parseImage(image) } : {}),
  });
}

export function parseLayer(el: Element, ctx: LayerParseContext): TiledLayer {
  const kind = LAYER_TAGS[el.tagName];
  if (kind === "tile") return parseTileLayer(el, ctx);
  if (kind === "object") return parseObjectLayer(el, ctx);
  if (kind === "image") return parseImageLayer(el, ctx);
  throw new TiledParseError("UnknownElementKind", `Unknown layer type <${el.tagName}>`, describeElement(el));
}

/** Direct layer children of a <map> or <group>, in document order. */
export function parseLayers(container: Element, ctx: LayerParseContext): ReadonlyArray<TiledLayer> {
  const layers = childElements(container)
    .filter((el) => !NON_LAYER_TAGS.has(el.tagName))
    .map((el) => parseLayer(el, ctx));
  return Object.freeze(layers);
}

export function parseGroup(el: Element, ctx: LayerParseContext): TiledGroup {
  return Object.freeze({
    ...parseCommon(el, ctx.warn),
    layers: parseLayers(el, ctx),
    groups: parseGroups(el, ctx),
  });
}

/** Direct <group> children of a <map> or <group>; recursion has no depth limit. */
export function parseGroups(container: Element, ctx: LayerParseContext): ReadonlyArray<TiledGroup> {
  return Object.freeze(childElements(container, "group").map((g) => parseGroup(g, ctx)));
}

/** Depth-first walk over every layer, groups included. */
export function* walkLayers(
  layers: ReadonlyArray<TiledLayer>,
  groups: ReadonlyArray<TiledGroup>,
): Generator<TiledLayer> {
  yield* layers;
  for (const g of groups) yield* walkLayers(g.layers, g.groups);
}
