// src/tiled/render/tileTool.ts
import path from "node:path";
import { mkdir, stat, writeFile } from "node:fs/promises";

import { TiledParseError } from "../errors.js";
import { loadMapWithTilesets, type LoadedMap } from "../externalTilesets.js";
import { decodeRawGid } from "../gid.js";
import { resolveTileset, sourceRectForGid, tileDefinition, type SourceRect } from "../lookup.js";
import type { TiledImage, Tileset, TilesetReference } from "../types.js";
import { loadPngRgba, writePngRgba } from "./png.js";
import { applyFlipFlags, cropRect, type RgbaImage } from "./rgbaImage.js";

export type TileLocation = Readonly<{
  gid: number;
  flipFlags: number;
  ref: TilesetReference;
  tileset: Tileset;
  localId: number;
  /** Image holding the tile, resolved against the tileset's directory. */
  imagePath: string;
  /** Undefined when the tile has an image of its own (collection tilesets). */
  rect?: SourceRect;
}>;

export type CropTileOptions = Readonly<{
  out: string;
  overwrite?: boolean;
}>;

async function existsPath(p: string): Promise<boolean> {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
}

function imagePathOf(loaded: LoadedMap, ref: TilesetReference, image: TiledImage): string {
  const dir = loaded.tilesetDirs.get(ref.firstGid) ?? path.dirname(loaded.mapPath);
  return path.join(dir, image.source);
}

/** `rawGid` may carry flip bits; they are split off into flipFlags. */
export function locateTile(loaded: LoadedMap, rawGid: number): TileLocation {
  const { gid, flipFlags } = decodeRawGid(rawGid);

  const ref = resolveTileset(loaded.map, gid);
  if (!ref) throw new Error(`GID ${gid} does not belong to any tileset`);
  const tileset = loaded.tilesets.get(ref.firstGid);
  if (!tileset) throw new Error(`Tileset with firstgid ${ref.firstGid} was not loaded`);

  const localId = gid - ref.firstGid;
  const own = tileDefinition(ref, tileset, gid)?.image;
  if (own) return { gid, flipFlags, ref, tileset, localId, imagePath: imagePathOf(loaded, ref, own) };

  if (!tileset.image) {
    throw new TiledParseError("NotFound", `Tileset "${tileset.name ?? ref.firstGid}" has no image for tile ${localId}`);
  }
  const rect = sourceRectForGid(ref, tileset, gid);
  if (!rect) {
    throw new Error(`GID ${gid} is outside tileset "${tileset.name ?? ref.firstGid}" (${tileset.tileCount} tiles)`);
  }
  return { gid, flipFlags, ref, tileset, localId, imagePath: imagePathOf(loaded, ref, tileset.image), rect };
}

export async function cropTile(loc: TileLocation): Promise<RgbaImage> {
  const img = await loadPngRgba(loc.imagePath);
  const r = loc.rect;
  const tile = r ? cropRect(img, r.x, r.y, r.x + r.width, r.y + r.height) : img;
  return applyFlipFlags(tile, loc.flipFlags);
}

export function formatTileLocation(loc: TileLocation): string {
  const where = loc.ref.embedded ? "embedded" : loc.ref.source;
  const lines = [
    `gid=${loc.gid} flipFlags=${loc.flipFlags}`,
    `tileset firstgid=${loc.ref.firstGid} (${where}) name=${loc.tileset.name ?? ""}`,
    `local id=${loc.localId}`,
    `image=${loc.imagePath}`,
  ];
  if (loc.rect) {
    lines.push(`rect x=${loc.rect.x} y=${loc.rect.y} w=${loc.rect.width} h=${loc.rect.height}`);
  }
  return lines.join("\n") + "\n";
}

export async function runTileRectTool(mapPath: string, rawGid: number): Promise<void> {
  const loaded = await loadMapWithTilesets(mapPath, { warn: (m) => console.warn(m) });
  process.stdout.write(formatTileLocation(locateTile(loaded, rawGid)));
}

export async function runCropTileTool(mapPath: string, rawGid: number, opts: CropTileOptions): Promise<void> {
  if (!opts.overwrite && (await existsPath(opts.out))) {
    console.warn(`Skip (exists): ${opts.out}`);
    return;
  }

  const loaded = await loadMapWithTilesets(mapPath, { warn: (m) => console.warn(m) });
  const img = await cropTile(locateTile(loaded, rawGid));

  await mkdir(path.dirname(opts.out), { recursive: true });
  await writeFile(opts.out, writePngRgba(img));
  console.log(`${mapPath} gid ${rawGid} -> ${opts.out} (${img.width}x${img.height})`);
}
