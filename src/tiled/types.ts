// src/tiled/types.ts
//
// Read-only model produced by parseMap / parseTileset. Everything below a
// TiledMap is owned by it; groups hold their children, never their parent.

import type { Color } from "./color.js";
import type { TileData, TileLayerFormat } from "./tileData.js";

export type Vec2 = Readonly<{ x: number; y: number }>;

export type PropertyType = "string" | "bool" | "color" | "file" | "float" | "int" | "object" | "class";

/**
 * Values stay textual; `type` says how to convert them. Class properties
 * carry their members instead, and an empty value.
 */
export type TiledProperty =
  | Readonly<{
      name: string;
      type: Exclude<PropertyType, "class">;
      value: string;
      propertyType?: string;
    }>
  | Readonly<{
      name: string;
      type: "class";
      value: string;
      propertyType?: string; // custom class name
      members: ReadonlyArray<TiledProperty>;
    }>;

export type TiledImage = Readonly<{
  source: string;
  width: number;
  height: number;
  transparentColor?: Color;
}>;

// ---------------------------------------------------------------------------
// Objects

type ObjectCommon = Readonly<{
  id: number;
  name?: string;
  class?: string;
  x: number;
  y: number;
  rotation: number;
  width?: number;
  height?: number;
  visible: boolean;
  template?: string;
  properties: ReadonlyArray<TiledProperty>;
}>;

export type TiledText = Readonly<{
  text: string;
  fontFamily?: string;
  pixelSize?: number;
  wrap: boolean;
  color?: Color;
}>;

export type TiledObject =
  | (ObjectCommon & Readonly<{ shape: "rectangle" }>)
  | (ObjectCommon & Readonly<{ shape: "point" }>)
  | (ObjectCommon & Readonly<{ shape: "ellipse" }>)
  | (ObjectCommon & Readonly<{ shape: "polygon"; points: ReadonlyArray<Vec2> }>)
  | (ObjectCommon & Readonly<{ shape: "polyline"; points: ReadonlyArray<Vec2> }>)
  | (ObjectCommon & Readonly<{ shape: "text"; text: TiledText }>)
  | (ObjectCommon & Readonly<{ shape: "tile"; gid: number; flipFlags: number }>);

export type ObjectShape = TiledObject["shape"];

// ---------------------------------------------------------------------------
// Tilesets

export type AnimationFrame = Readonly<{ tileId: number; duration: number }>;

export type TileDefinition = Readonly<{
  id: number;
  class?: string;
  terrain?: ReadonlyArray<number>; // -1 where the slot is empty
  probability?: number;
  properties: ReadonlyArray<TiledProperty>;
  animation: ReadonlyArray<AnimationFrame>;
  objects: ReadonlyArray<TiledObject>;
  image?: TiledImage;
}>;

export type TerrainSetType = "corner" | "edge" | "mixed";

export type TerrainColor = Readonly<{
  name: string;
  class?: string;
  color: Color;
  tile: number;
  probability: number;
  properties: ReadonlyArray<TiledProperty>;
}>;

/** Index into TerrainSet.colors for each direction, or -1. */
export type TerrainAdjacency = Readonly<{
  top: number;
  topRight: number;
  right: number;
  bottomRight: number;
  bottom: number;
  bottomLeft: number;
  left: number;
  topLeft: number;
}>;

export type TerrainSet = Readonly<{
  name: string;
  class?: string;
  type: TerrainSetType;
  tile: number;
  colors: ReadonlyArray<TerrainColor>;
  tiles: ReadonlyMap<number, TerrainAdjacency>;
  properties: ReadonlyArray<TiledProperty>;
}>;

export type Tileset = Readonly<{
  tiledVersion?: string;
  version?: string;
  name?: string;
  class?: string;
  tileWidth: number;
  tileHeight: number;
  tileCount: number;
  columns: number;
  margin: number;
  spacing: number;
  image?: TiledImage;
  offset: Vec2;
  tiles: ReadonlyArray<TileDefinition>;
  properties: ReadonlyArray<TiledProperty>;
  terrainSets: ReadonlyArray<TerrainSet>;
}>;

export type TilesetReference =
  | Readonly<{ firstGid: number; embedded: true }>
  | Readonly<{ firstGid: number; embedded: false; source: string }>;

// ---------------------------------------------------------------------------
// Layers

type LayerCommon = Readonly<{
  id: number;
  name: string;
  class?: string;
  visible: boolean;
  locked: boolean;
  offset: Vec2;
  parallax: Vec2;
  opacity: number;
  tintColor?: Color;
  width?: number;
  height?: number;
  properties: ReadonlyArray<TiledProperty>;
}>;

export type Chunk = TileData &
  Readonly<{
    x: number;
    y: number;
    width: number;
    height: number;
  }>;

export type TileLayerData =
  | (TileData & Readonly<{ kind: "flat" }>)
  | Readonly<{ kind: "chunked"; chunks: ReadonlyArray<Chunk> }>;

export type TileLayer = LayerCommon & Readonly<{ kind: "tile"; data: TileLayerData }>;

export type ObjectLayer = LayerCommon &
  Readonly<{
    kind: "object";
    color?: Color;
    drawOrder?: "topdown" | "index";
    objects: ReadonlyArray<TiledObject>;
  }>;

export type ImageLayer = LayerCommon &
  Readonly<{
    kind: "image";
    image?: TiledImage;
    repeatX: boolean;
    repeatY: boolean;
  }>;

export type TiledLayer = TileLayer | ObjectLayer | ImageLayer;
export type LayerKind = TiledLayer["kind"];

export type TiledGroup = Readonly<{
  id: number;
  name: string;
  class?: string;
  visible: boolean;
  locked: boolean;
  offset: Vec2;
  parallax: Vec2;
  opacity: number;
  tintColor?: Color;
  properties: ReadonlyArray<TiledProperty>;
  layers: ReadonlyArray<TiledLayer>;
  groups: ReadonlyArray<TiledGroup>;
}>;

// ---------------------------------------------------------------------------
// Map

export type TiledMap = Readonly<{
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
  tileLayerFormat?: TileLayerFormat;
  properties: ReadonlyArray<TiledProperty>;
  tilesets: ReadonlyArray<TilesetReference>;
  embeddedTilesets: ReadonlyMap<number, Tileset>;
  layers: ReadonlyArray<TiledLayer>;
  groups: ReadonlyArray<TiledGroup>;
}>;
