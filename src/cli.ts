#!/usr/bin/env node
// src/cli.ts
import { Command, InvalidArgumentError } from "commander";
import path from "node:path";
import { writeFile } from "node:fs/promises";

import { loadExternalTilesets } from "./tiled/externalTilesets.js";
import { loadMapFile, loadTilesetFile } from "./tiled/files.js";
import { runCropTileTool, runTileRectTool } from "./tiled/render/tileTool.js";
import { stringifyTiledMapJsonV1, stringifyTilesetJsonV1 } from "./tiled/tiledJson.js";

const program = new Command();

function parseGidArg(value: string): number {
  if (!/^\d+$/.test(value)) throw new InvalidArgumentError("Expected a non-negative integer.");
  const n = Number(value);
  if (n > 0xffffffff) throw new InvalidArgumentError("GID must fit in 32 bits.");
  return n;
}

const warn = (m: string): void => console.warn(m);

async function emit(text: string, output: string | undefined): Promise<void> {
  if (output) await writeFile(output, text, "utf8");
  else process.stdout.write(text);
}

program
  .name("tiledtools")
  .description("Tiled TMX/TSX tools (map -> JSON, tile lookup, tile crop)")
  .version("0.1.0");

program
  .command("to-json")
  .description("Parse a .tmx map and print it as JSON")
  .argument("<input>", "Path to .tmx file")
  .option("-o, --output <path>", "Write JSON to a file (default: stdout)")
  .option("--base-dir <dir>", "Directory external tilesets are relative to (default: the map's)")
  .option("--no-tilesets", "Do not load external tilesets")
  .action(async (input: string, opts: { output?: string; baseDir?: string; tilesets: boolean }) => {
    const map = await loadMapFile(input, { warn });
    const tilesets = opts.tilesets
      ? await loadExternalTilesets(map, opts.baseDir ?? path.dirname(input), { warn })
      : undefined;
    await emit(stringifyTiledMapJsonV1(map, tilesets), opts.output);
  });

program
  .command("tileset-json")
  .description("Parse a .tsx tileset and print it as JSON")
  .argument("<input>", "Path to .tsx file")
  .option("-o, --output <path>", "Write JSON to a file (default: stdout)")
  .action(async (input: string, opts: { output?: string }) => {
    const tileset = await loadTilesetFile(input, { warn });
    await emit(stringifyTilesetJsonV1(tileset), opts.output);
  });

program
  .command("tile-rect")
  .description("Show which tileset a GID belongs to and where the tile sits in its image")
  .argument("<input>", "Path to .tmx file")
  .argument("<gid>", "Global tile id (flip bits allowed)", parseGidArg)
  .action(async (input: string, gid: number) => {
    await runTileRectTool(input, gid);
  });

program
  .command("crop-tile")
  .description("Cut one tile out of its tileset image (flips applied) and write it as PNG")
  .argument("<input>", "Path to .tmx file")
  .argument("<gid>", "Global tile id (flip bits allowed)", parseGidArg)
  .requiredOption("-o, --out <path>", "Output PNG path")
  .option("--overwrite", "Overwrite an existing PNG", false)
  .action(async (input: string, gid: number, opts: { out: string; overwrite: boolean }) => {
    await runCropTileTool(input, gid, { out: opts.out, overwrite: opts.overwrite });
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(msg + "\n");
  process.exitCode = 1;
});
