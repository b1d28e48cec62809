// src/tiled/tiledJson.ts
import type { TiledMap, Tileset } from "./types.js";

export type TiledMapJsonV1 = Readonly<{
  schema: "tiledtools.map.json.v1";
  map: TiledMap;
  tilesets?: ReadonlyMap<number, Tileset>;
}>;

export type TilesetJsonV1 = Readonly<{
  schema: "tiledtools.tileset.json.v1";
  tileset: Tileset;
}>;

// Maps (embedded tilesets, terrain tiles) become plain objects keyed by id.
function replacer(_key: string, value: unknown): unknown {
  if (value instanceof Map) return Object.fromEntries(value);
  return value;
}

export function stringifyTiledMapJsonV1(map: TiledMap, tilesets?: ReadonlyMap<number, Tileset>): string {
  const doc: TiledMapJsonV1 = {
    schema: "tiledtools.map.json.v1",
    map,
    ...(tilesets !== undefined ? { tilesets } : {}),
  };
  return JSON.stringify(doc, replacer, 2) + "\n";
}

export function stringifyTilesetJsonV1(tileset: Tileset): string {
  const doc: TilesetJsonV1 = { schema: "tiledtools.tileset.json.v1", tileset };
  return JSON.stringify(doc, replacer, 2) + "\n";
}
