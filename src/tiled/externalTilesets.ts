// src/tiled/externalTilesets.ts
//
// Maps only name their external tilesets; these helpers fetch and parse them
// so that every reference has a Tileset keyed by firstGid.

import path from "node:path";

import { TiledParseError, wrapParseError } from "./errors.js";
import { loadMapFile, readTextFile } from "./files.js";
import { parseTileset, type ParseOptions } from "./tileset.js";
import type { TiledMap, Tileset } from "./types.js";

/** Supplies the text of `source` (as written in the map), or undefined when it does not exist. */
export type TilesetSourceReader = (source: string) => string | undefined;

function parseExternal(source: string, text: string, options: ParseOptions): Tileset {
  try {
    return parseTileset(text, options);
  } catch (err) {
    throw wrapParseError(err, `external tileset "${source}"`);
  }
}

/**
 * Resolve every tileset of `map` through `read`. Embedded tilesets are
 * included as-is.
 */
export function resolveExternalTilesets(
  map: TiledMap,
  read: TilesetSourceReader,
  options: ParseOptions = {},
): ReadonlyMap<number, Tileset> {
  const out = new Map<number, Tileset>();
  for (const ref of map.tilesets) {
    if (ref.embedded) {
      const ts = map.embeddedTilesets.get(ref.firstGid);
      if (!ts) throw new Error(`Embedded tileset ${ref.firstGid} missing from map`);
      out.set(ref.firstGid, ts);
      continue;
    }

    const text = read(ref.source);
    if (text === undefined) {
      throw new TiledParseError("ExternalTilesetNotFound", `Cannot locate tileset "${ref.source}"`);
    }
    out.set(ref.firstGid, parseExternal(ref.source, text, options));
  }
  return out;
}

export type LoadedMap = Readonly<{
  mapPath: string;
  map: TiledMap;
  tilesets: ReadonlyMap<number, Tileset>;
  /** Directory that image sources of each tileset are relative to, by firstGid. */
  tilesetDirs: ReadonlyMap<number, string>;
}>;

/** Load a .tmx file together with every tileset it references. */
export async function loadMapWithTilesets(mapPath: string, options: ParseOptions = {}): Promise<LoadedMap> {
  const map = await loadMapFile(mapPath, options);
  const mapDir = path.dirname(mapPath);
  const tilesets = await loadExternalTilesets(map, mapDir, options);

  const tilesetDirs = new Map<number, string>();
  for (const ref of map.tilesets) {
    tilesetDirs.set(ref.firstGid, ref.embedded ? mapDir : path.dirname(path.join(mapDir, ref.source)));
  }
  return { mapPath, map, tilesets, tilesetDirs };
}

/** Load the map's external tilesets from `baseDir/<source>`, one read per file. */
export async function loadExternalTilesets(
  map: TiledMap,
  baseDir: string,
  options: ParseOptions = {},
): Promise<ReadonlyMap<number, Tileset>> {
  const texts = new Map<string, string>();
  for (const ref of map.tilesets) {
    if (ref.embedded || texts.has(ref.source)) continue;
    const full = path.join(baseDir, ref.source);
    texts.set(ref.source, await readTextFile(full, "ExternalTilesetNotFound"));
  }
  return resolveExternalTilesets(map, (source) => texts.get(source), options);
}
