// src/tiled/lookup.ts
import type { TileDefinition, TiledLayer, TiledMap, Tileset, TilesetReference } from "./types.js";

export type SourceRect = Readonly<{
  x: number;
  y: number;
  width: number;
  height: number;
}>;

export type TileRef = Readonly<{ gid: number; flipFlags: number }>;

/**
 * Find the tileset reference owning `gid`. References are ordered by
 * firstGid; the last one takes every gid at or above its firstGid.
 */
export function resolveTileset(
  mapOrRefs: TiledMap | ReadonlyArray<TilesetReference>,
  gid: number,
): TilesetReference | undefined {
  const refs = "tilesets" in mapOrRefs ? mapOrRefs.tilesets : mapOrRefs;
  if (gid <= 0) return undefined;

  for (const [i, cur] of refs.entries()) {
    const next = refs[i + 1];
    if (next === undefined) return gid >= cur.firstGid ? cur : undefined;
    if (gid >= cur.firstGid && gid < next.firstGid) return cur;
  }
  return undefined;
}

/**
 * Pixel rectangle of the tile at `localIndex` inside the tileset image, in
 * row-major order. Margin and spacing are 0 for most tilesets.
 */
export function sourceRect(tileset: Tileset, localIndex: number): SourceRect | undefined {
  if (!Number.isInteger(localIndex) || localIndex < 0 || localIndex >= tileset.tileCount) return undefined;
  if (tileset.columns <= 0) return undefined;

  const col = localIndex % tileset.columns;
  const row = Math.floor(localIndex / tileset.columns);
  return {
    x: tileset.margin + col * (tileset.tileWidth + tileset.spacing),
    y: tileset.margin + row * (tileset.tileHeight + tileset.spacing),
    width: tileset.tileWidth,
    height: tileset.tileHeight,
  };
}

export function sourceRectForGid(
  ref: TilesetReference,
  tileset: Tileset,
  gid: number,
): SourceRect | undefined {
  return sourceRect(tileset, gid - ref.firstGid);
}

/** Sparse per-tile data (properties, animation, collision), if the tileset has any for `gid`. */
export function tileDefinition(
  ref: TilesetReference,
  tileset: Tileset,
  gid: number,
): TileDefinition | undefined {
  const id = gid - ref.firstGid;
  return tileset.tiles.find((t) => t.id === id);
}

/**
 * Tile at cell (x, y) of a finite tile layer, or of whichever chunk covers it
 * on an infinite map. Undefined for empty cells and cells outside the data.
 */
export function tileAt(layer: TiledLayer, x: number, y: number, mapWidth: number): TileRef | undefined {
  if (layer.kind !== "tile") {
    throw new Error(`Layer "${layer.name}" is a ${layer.kind} layer, not a tile layer`);
  }

  const data = layer.data;
  if (data.kind === "flat") {
    const width = layer.width ?? mapWidth;
    if (x < 0 || y < 0 || x >= width) return undefined;
    return cell(data.gids, data.flipFlags, y * width + x);
  }

  for (const c of data.chunks) {
    if (x >= c.x && x < c.x + c.width && y >= c.y && y < c.y + c.height) {
      return cell(c.gids, c.flipFlags, (y - c.y) * c.width + (x - c.x));
    }
  }
  return undefined;
}

function cell(gids: ReadonlyArray<number>, flags: ReadonlyArray<number>, i: number): TileRef | undefined {
  const gid = gids[i];
  if (gid === undefined || gid === 0) return undefined;
  return { gid, flipFlags: flags[i] ?? 0 };
}
