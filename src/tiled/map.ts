// src/tiled/map.ts
//
// TMX entry point. Parsing walks the phases below in order; the builder
// collects results and only hands out a frozen TiledMap at Complete.

import { childElements, optionalFloat, optionalString, requiredBool, requiredInt, requiredString } from "./attributes.js";
import { parseColor, type Color } from "./color.js";
import { TiledParseError, wrapParseError, type WarnFn } from "./errors.js";
import { parseGroups, parseLayers, type LayerParseContext } from "./layers.js";
import { parseProperties } from "./properties.js";
import type { TileLayerFormat } from "./tileData.js";
import { parseTilesetElement, type ParseOptions } from "./tileset.js";
import { describeElement, loadXmlRoot } from "./xml.js";
import type { TiledGroup, TiledLayer, TiledMap, TiledProperty, Tileset, TilesetReference } from "./types.js";

export type MapParsePhase =
  | "Unparsed"
  | "ParsingAttributes"
  | "ParsingTilesets"
  | "ParsingLayers"
  | "ParsingGroups"
  | "Complete"
  | "Failed";

const NEXT_PHASE: Readonly<Partial<Record<MapParsePhase, MapParsePhase>>> = {
  Unparsed: "ParsingAttributes",
  ParsingAttributes: "ParsingTilesets",
  ParsingTilesets: "ParsingLayers",
  ParsingLayers: "ParsingGroups",
  ParsingGroups: "Complete",
};

type MapAttributes = {
  tiledVersion?: string;
  mapVersion?: string;
  class?: string;
  orientation: string;
  renderOrder: string;
  width: number;
  height: number;
  tileWidth: number;
  tileHeight: number;
  infinite: boolean;
  parallaxOriginX: number;
  parallaxOriginY: number;
  backgroundColor?: Color;
};

export class TiledMapBuilder {
  private phaseValue: MapParsePhase = "Unparsed";

  private attributes: MapAttributes | undefined;
  private properties: ReadonlyArray<TiledProperty> = [];
  private readonly tilesets: TilesetReference[] = [];
  private readonly embedded = new Map<number, Tileset>();
  private layers: ReadonlyArray<TiledLayer> = [];
  private groups: ReadonlyArray<TiledGroup> = [];
  private tileLayerFormat: TileLayerFormat | undefined;

  public get phase(): MapParsePhase {
    return this.phaseValue;
  }

  /** Move to the next phase; phases cannot be skipped or revisited. */
  public advance(to: MapParsePhase): void {
    const expected = NEXT_PHASE[this.phaseValue];
    if (expected !== to) {
      throw new Error(`Invalid map parse transition ${this.phaseValue} -> ${to}`);
    }
    this.phaseValue = to;
  }

  public fail(): void {
    this.phaseValue = "Failed";
  }

  public setAttributes(attrs: MapAttributes, properties: ReadonlyArray<TiledProperty>): void {
    this.requirePhase("ParsingAttributes");
    this.attributes = attrs;
    this.properties = properties;
  }

  public get infinite(): boolean {
    return this.attributes?.infinite ?? false;
  }

  public addEmbeddedTileset(firstGid: number, tileset: Tileset): void {
    this.requirePhase("ParsingTilesets");
    this.checkFirstGid(firstGid);
    this.tilesets.push(Object.freeze({ firstGid, embedded: true }));
    this.embedded.set(firstGid, tileset);
  }

  public addExternalTileset(firstGid: number, source: string): void {
    this.requirePhase("ParsingTilesets");
    this.checkFirstGid(firstGid);
    this.tilesets.push(Object.freeze({ firstGid, embedded: false, source }));
  }

  public noteTileData(format: TileLayerFormat): void {
    this.tileLayerFormat ??= format;
  }

  public setLayers(layers: ReadonlyArray<TiledLayer>): void {
    this.requirePhase("ParsingLayers");
    this.layers = layers;
  }

  public setGroups(groups: ReadonlyArray<TiledGroup>): void {
    this.requirePhase("ParsingGroups");
    this.groups = groups;
  }

  public build(): TiledMap {
    this.requirePhase("Complete");
    const attrs = this.attributes;
    if (!attrs) throw new Error("Map attributes were never set");

    return Object.freeze({
      ...attrs,
      ...(this.tileLayerFormat !== undefined ? { tileLayerFormat: this.tileLayerFormat } : {}),
      properties: this.properties,
      tilesets: Object.freeze([...this.tilesets]),
      embeddedTilesets: new Map(this.embedded),
      layers: this.layers,
      groups: this.groups,
    });
  }

  private requirePhase(phase: MapParsePhase): void {
    if (this.phaseValue !== phase) {
      throw new Error(`Map builder is in phase ${this.phaseValue}, expected ${phase}`);
    }
  }

  private checkFirstGid(firstGid: number): void {
    if (firstGid < 1) {
      throw new TiledParseError("MalformedDocument", `Invalid firstgid ${firstGid}: must be >= 1`);
    }
    const last = this.tilesets[this.tilesets.length - 1];
    if (last && firstGid <= last.firstGid) {
      throw new TiledParseError(
        "MalformedDocument",
        `Tileset firstgid ${firstGid} is not greater than the previous one (${last.firstGid})`,
      );
    }
  }
}

function readMapAttributes(el: Element): MapAttributes {
  const tiledVersion = optionalString(el, "tiledversion");
  const mapVersion = optionalString(el, "version");
  const cls = optionalString(el, "class");
  const bg = optionalString(el, "backgroundcolor");

  return {
    orientation: requiredString(el, "orientation"),
    renderOrder: optionalString(el, "renderorder") ?? "right-down",
    width: requiredInt(el, "width"),
    height: requiredInt(el, "height"),
    tileWidth: requiredInt(el, "tilewidth"),
    tileHeight: requiredInt(el, "tileheight"),
    infinite: el.hasAttribute("infinite") ? requiredBool(el, "infinite") : false,
    parallaxOriginX: optionalFloat(el, "parallaxoriginx") ?? 0,
    parallaxOriginY: optionalFloat(el, "parallaxoriginy") ?? 0,
    ...(tiledVersion !== undefined ? { tiledVersion } : {}),
    ...(mapVersion !== undefined ? { mapVersion } : {}),
    ...(cls !== undefined ? { class: cls } : {}),
    ...(bg !== undefined ? { backgroundColor: parseColor(bg, describeElement(el)) } : {}),
  };
}

function readTilesets(root: Element, builder: TiledMapBuilder, options: ParseOptions): void {
  for (const el of childElements(root, "tileset")) {
    const firstGid = requiredInt(el, "firstgid");
    const source = optionalString(el, "source");
    if (source === undefined) {
      builder.addEmbeddedTileset(firstGid, parseTilesetElement(el, options));
    } else {
      builder.addExternalTileset(firstGid, source);
    }
  }
}

/**
 * Parse TMX text into a TiledMap. External tilesets are only referenced;
 * see externalTilesets.ts to load them.
 * @throws TiledParseError wrapping the first failure; no partial map is returned.
 */
export function parseMap(text: string, options: ParseOptions = {}): TiledMap {
  const warn: WarnFn = options.warn ?? (() => {});
  const builder = new TiledMapBuilder();

  try {
    builder.advance("ParsingAttributes");
    const root = loadXmlRoot(text, "map");
    builder.setAttributes(readMapAttributes(root), parseProperties(root, warn));

    builder.advance("ParsingTilesets");
    readTilesets(root, builder, { warn });

    const ctx: LayerParseContext = {
      infinite: builder.infinite,
      warn,
      onTileData: (format) => builder.noteTileData(format),
    };

    builder.advance("ParsingLayers");
    builder.setLayers(parseLayers(root, ctx));

    builder.advance("ParsingGroups");
    builder.setGroups(parseGroups(root, ctx));

    builder.advance("Complete");
    return builder.build();
  } catch (err) {
    const phase = builder.phase;
    builder.fail();
    throw wrapParseError(err, `map (${phase})`);
  }
}
