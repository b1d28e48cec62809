// src/tiled/tileData.ts
//
// <data> / <chunk> payload codec. Every tile is one u32 (little-endian when
// binary) whose top 3 bits are flip flags; see gid.ts.

import { gunzipSync, gzipSync, inflateSync, zlibSync } from "fflate";

import { BinaryReader, BinaryWriter } from "./binary.js";
import { parseIntToken } from "./attributes.js";
import { TiledParseError, type WarnFn } from "./errors.js";
import { decodeRawGid, encodeRawGid } from "./gid.js";

export type TileEncoding = "csv" | "base64";
export type TileCompression = "zlib" | "gzip" | "zstd";

/** Format tag of a tile data block, as reported on the map. */
export type TileLayerFormat = "csv" | "base64" | "base64-zlib" | "base64-gzip";

export type TileData = Readonly<{
  gids: ReadonlyArray<number>;
  flipFlags: ReadonlyArray<number>;
}>;

const ZLIB_HEADER_BYTES = 2;

export function parseTileEncoding(name: string | undefined): TileEncoding {
  if (name === "csv" || name === "base64") return name;
  throw new TiledParseError(
    "UnsupportedEncoding",
    `Unsupported tile data encoding "${name ?? "(none)"}": only csv and base64 are supported`,
  );
}

export function parseTileCompression(name: string | undefined): TileCompression | undefined {
  if (name === undefined || name === "") return undefined;
  if (name === "zlib" || name === "gzip") return name;
  if (name === "zstd") {
    throw new TiledParseError("UnsupportedCompression", "Zstandard compression is not supported");
  }
  throw new TiledParseError("UnsupportedCompression", `Unknown tile data compression "${name}"`);
}

export function tileLayerFormat(encoding: TileEncoding, compression?: TileCompression): TileLayerFormat {
  if (encoding === "csv") return "csv";
  if (compression === "zlib") return "base64-zlib";
  if (compression === "gzip") return "base64-gzip";
  return "base64";
}

function fromRawValues(raw: Iterable<number>): TileData {
  const gids: number[] = [];
  const flipFlags: number[] = [];
  for (const v of raw) {
    const d = decodeRawGid(v);
    gids.push(d.gid);
    flipFlags.push(d.flipFlags);
  }
  return { gids, flipFlags };
}

function decodeCsv(text: string): TileData {
  const trimmed = text.trim();
  if (trimmed.length === 0) return { gids: [], flipFlags: [] };

  const tokens = trimmed.split(",");
  // Tiled ends every row with a comma, including the last one in some exports.
  if (tokens.length > 1 && tokens[tokens.length - 1]?.trim() === "") tokens.pop();

  return fromRawValues(
    tokens.map((t, i) => {
      const v = parseIntToken(t, `csv tile value #${i}`);
      if (v < 0 || v > 0xffffffff) {
        throw new TiledParseError("MalformedDocument", `csv tile value #${i} out of u32 range: ${v}`);
      }
      return v;
    }),
  );
}

function decompress(bytes: Uint8Array, compression: TileCompression | undefined): Uint8Array {
  if (compression === undefined) return bytes;
  if (compression === "zlib") {
    if (bytes.length < ZLIB_HEADER_BYTES) {
      throw new TiledParseError("MalformedDocument", "zlib tile data shorter than its header");
    }
    // Raw inflate past the 2-byte zlib header; the adler32 trailer is left unread.
    return inflateSync(bytes.subarray(ZLIB_HEADER_BYTES));
  }
  if (compression === "gzip") return gunzipSync(bytes);
  throw new TiledParseError("UnsupportedCompression", "Zstandard compression is not supported");
}

function* readU32Records(bytes: Uint8Array): Generator<number> {
  const r = BinaryReader.fromBytes(bytes);
  while (r.remaining() >= 4) yield r.readU32LE();
}

/**
 * Decode the text of a <data> or <chunk> element into parallel arrays of
 * cleared GIDs and flip-flag bytes.
 */
export function decodeTileData(
  encodingName: string | undefined,
  compressionName: string | undefined,
  text: string,
  warn: WarnFn = () => {},
): TileData {
  const encoding = parseTileEncoding(encodingName);
  const compression = parseTileCompression(compressionName);

  if (encoding === "csv") {
    if (compression !== undefined) {
      throw new TiledParseError("UnsupportedCompression", `csv tile data cannot be ${compression} compressed`);
    }
    return decodeCsv(text);
  }

  const b64 = text.replace(/\s+/g, "");
  if (!/^[A-Za-z0-9+/]*={0,2}$/.test(b64)) {
    throw new TiledParseError("MalformedDocument", "Invalid base64 tile data");
  }

  let bytes: Uint8Array;
  try {
    bytes = decompress(Buffer.from(b64, "base64"), compression);
  } catch (err) {
    if (err instanceof TiledParseError) throw err;
    const msg = err instanceof Error ? err.message : String(err);
    throw new TiledParseError("MalformedDocument", `Could not decompress ${compression ?? ""} tile data: ${msg}`, undefined, {
      cause: err,
    });
  }

  const extra = bytes.length % 4;
  if (extra !== 0) warn(`Tile data has ${extra} trailing byte(s) after the last tile; ignored`);

  return fromRawValues(readU32Records(bytes));
}

/** Inverse of decodeTileData, for tools and tests. */
export function encodeTileData(
  data: TileData,
  encoding: TileEncoding,
  compression?: Exclude<TileCompression, "zstd">,
): string {
  if (data.gids.length !== data.flipFlags.length) {
    throw new Error(`gids/flipFlags length mismatch: ${data.gids.length} vs ${data.flipFlags.length}`);
  }
  const raw = data.gids.map((gid, i) => encodeRawGid(gid, data.flipFlags[i] ?? 0));

  if (encoding === "csv") {
    if (compression !== undefined) throw new Error("csv tile data cannot be compressed");
    return raw.join(",");
  }

  const w = new BinaryWriter();
  for (const v of raw) w.writeU32LE(v);
  const bytes = w.toBuffer();

  const packed =
    compression === "zlib" ? zlibSync(bytes) : compression === "gzip" ? gzipSync(bytes) : bytes;
  return Buffer.from(packed).toString("base64");
}
