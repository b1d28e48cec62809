import path from "node:path";
import { readFile } from "node:fs/promises";

import { TiledParseError } from "../src/tiled/errors.js";

export const FIXTURES_DIR = path.resolve(process.cwd(), "fixtures", "tiled");

export async function readFixture(name: string): Promise<string> {
  return readFile(path.join(FIXTURES_DIR, name), "utf8");
}

/** Run `fn`, expecting it to throw a TiledParseError, and return that error. */
export function catchParseError(fn: () => unknown): TiledParseError {
  try {
    fn();
  } catch (err) {
    if (err instanceof TiledParseError) return err;
    throw new Error(`Expected TiledParseError, got ${String(err)}`);
  }
  throw new Error("Expected TiledParseError, nothing was thrown");
}

export async function catchParseErrorAsync(fn: () => Promise<unknown>): Promise<TiledParseError> {
  try {
    await fn();
  } catch (err) {
    if (err instanceof TiledParseError) return err;
    throw new Error(`Expected TiledParseError, got ${String(err)}`);
  }
  throw new Error("Expected TiledParseError, nothing was thrown");
}
