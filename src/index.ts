// src/index.ts
export { TiledParseError, type TiledErrorKind, type WarnFn } from "./tiled/errors.js";
export { parseColor, formatColor, type Color } from "./tiled/color.js";
export {
  decodeRawGid,
  encodeRawGid,
  isFlippedDiagonal,
  isFlippedHorizontal,
  isFlippedVertical,
  FLIP_BYTE_DIAGONAL,
  FLIP_BYTE_HORIZONTAL,
  FLIP_BYTE_VERTICAL,
} from "./tiled/gid.js";
export {
  decodeTileData,
  encodeTileData,
  type TileData,
  type TileEncoding,
  type TileCompression,
  type TileLayerFormat,
} from "./tiled/tileData.js";
export { parseTileset, parseTilesetElement, type ParseOptions } from "./tiled/tileset.js";
export { parseMap, TiledMapBuilder, type MapParsePhase } from "./tiled/map.js";
export { walkLayers } from "./tiled/layers.js";
export { findProperty } from "./tiled/properties.js";
export {
  resolveTileset,
  sourceRect,
  sourceRectForGid,
  tileAt,
  tileDefinition,
  type SourceRect,
  type TileRef,
} from "./tiled/lookup.js";
export { loadMapFile, loadTilesetFile } from "./tiled/files.js";
export {
  loadExternalTilesets,
  loadMapWithTilesets,
  resolveExternalTilesets,
  type LoadedMap,
  type TilesetSourceReader,
} from "./tiled/externalTilesets.js";
export type * from "./tiled/types.js";
