// src/tiled/files.ts
import path from "node:path";
import { readFile } from "node:fs/promises";

import { TiledParseError, type TiledErrorKind } from "./errors.js";
import { parseMap } from "./map.js";
import { parseTileset, type ParseOptions } from "./tileset.js";
import type { TiledMap, Tileset } from "./types.js";

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}

/** Read a whole text file; a missing file raises `missingKind`. */
export async function readTextFile(filePath: string, missingKind: TiledErrorKind = "NotFound"): Promise<string> {
  try {
    return await readFile(filePath, "utf8");
  } catch (err) {
    if (isNotFound(err)) {
      throw new TiledParseError(missingKind, `${filePath} not found`, undefined, { cause: err });
    }
    throw err;
  }
}

function requireExtension(filePath: string, ext: string): void {
  if (path.extname(filePath).toLowerCase() !== ext) {
    throw new TiledParseError("UnsupportedFormat", `Unsupported file format: ${filePath} (expected ${ext})`);
  }
}

export async function loadMapFile(filePath: string, options: ParseOptions = {}): Promise<TiledMap> {
  requireExtension(filePath, ".tmx");
  return parseMap(await readTextFile(filePath), options);
}

export async function loadTilesetFile(filePath: string, options: ParseOptions = {}): Promise<Tileset> {
  requireExtension(filePath, ".tsx");
  return parseTileset(await readTextFile(filePath), options);
}
