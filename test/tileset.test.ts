import { describe, expect, it } from "vitest";

import { findProperty } from "../src/tiled/properties.js";
import { parseTileset, parseWangId } from "../src/tiled/tileset.js";
import { catchParseError, readFixture } from "./helpers.js";

describe("parseTileset: fixtures", () => {
  it("reads tileset.tsx with tile data and a terrain set", async () => {
    const ts = parseTileset(await readFixture("tileset.tsx"));

    expect(ts.name).toBe("tileset");
    expect(ts.version).toBe("1.10");
    expect(ts.tiledVersion).toBe("1.10.2");
    expect([ts.tileWidth, ts.tileHeight, ts.tileCount, ts.columns]).toEqual([16, 16, 1, 1]);
    expect([ts.margin, ts.spacing]).toEqual([0, 0]);
    expect(ts.offset).toEqual({ x: 0, y: 0 });
    expect(ts.image).toEqual({ source: "tileset.png", width: 16, height: 16 });

    expect(ts.tiles).toHaveLength(1);
    const tile = ts.tiles[0];
    expect(tile?.id).toBe(0);
    expect(tile?.class).toBe("grass");
    expect(tile?.properties).toEqual([{ name: "speed", type: "float", value: "0.5" }]);
    expect(tile?.animation).toEqual([]);
    expect(tile?.objects).toHaveLength(1);
    expect(tile?.objects[0]).toMatchObject({ id: 1, shape: "rectangle", x: 0, y: 8, width: 16, height: 8 });

    expect(ts.terrainSets).toHaveLength(1);
    const set = ts.terrainSets[0];
    expect(set?.name).toBe("Unnamed Set");
    expect(set?.type).toBe("corner");
    expect(set?.tile).toBe(-1);
    expect(set?.colors).toEqual([
      { name: "test123", color: { r: 1, g: 2, b: 3, a: 255 }, tile: -1, probability: 1, properties: [] },
    ]);
    expect(set?.tiles.get(0)).toEqual({
      top: -1,
      topRight: 0,
      right: -1,
      bottomRight: 0,
      bottom: -1,
      bottomLeft: 0,
      left: -1,
      topLeft: 0,
    });
  });

  it("reads sub/terrain.tsx with an offset and legacy terrain indices", async () => {
    const ts = parseTileset(await readFixture("sub/terrain.tsx"));

    expect(ts.name).toBe("terrain");
    expect(ts.tileCount).toBe(64);
    expect(ts.columns).toBe(8);
    expect(ts.offset).toEqual({ x: 2, y: -3 });
    expect(findProperty(ts.properties, "biome")).toEqual({ name: "biome", type: "string", value: "forest" });
    expect(ts.tiles[0]).toMatchObject({ id: 9, probability: 0.5, terrain: [0, -1, 1, 0] });
  });

  it("returns frozen objects", async () => {
    const ts = parseTileset(await readFixture("tileset.tsx"));
    expect(Object.isFrozen(ts)).toBe(true);
    expect(Object.isFrozen(ts.tiles)).toBe(true);
  });
});

describe("parseTileset: fragments", () => {
  it("accepts a bare <tileset> element without an XML declaration", () => {
    const ts = parseTileset(
      `<tileset name="x" tilewidth="8" tileheight="8" tilecount="4" columns="2" margin="1" spacing="2"/>`,
    );
    expect(ts).toMatchObject({ name: "x", tileWidth: 8, tileCount: 4, margin: 1, spacing: 2 });
    expect(ts.image).toBeUndefined();
    expect(ts.tiles).toEqual([]);
  });

  it("reads image-collection tiles with their own images", () => {
    const ts = parseTileset(
      `<tileset name="c" tilewidth="32" tileheight="32" tilecount="1" columns="0">
         <tile id="0"><image source="tree.png" width="32" height="48" trans="ff00ff"/></tile>
       </tileset>`,
    );
    expect(ts.tiles[0]?.image).toEqual({
      source: "tree.png",
      width: 32,
      height: 48,
      transparentColor: { r: 255, g: 0, b: 255, a: 255 },
    });
  });

  it("reports a missing required attribute with its element", () => {
    const err = catchParseError(() => parseTileset(`<tileset name="x" tileheight="8" tilecount="1" columns="1"/>`));
    expect(err.kind).toBe("MissingRequiredAttribute");
    expect(err.message).toBe(
      'Failed to parse tileset: Missing required attribute "tilewidth" (at <tileset name="x">)',
    );
    expect(err.context).toBe('<tileset name="x">');
  });

  it("rejects an unknown terrain set type", () => {
    const err = catchParseError(() =>
      parseTileset(
        `<tileset tilewidth="8" tileheight="8" tilecount="1" columns="1">
           <wangsets><wangset name="w" type="hex" tile="-1"/></wangsets>
         </tileset>`,
      ),
    );
    expect(err.kind).toBe("UnknownElementKind");
  });

  it("rejects a wangid that does not have 8 values", () => {
    const err = catchParseError(() =>
      parseTileset(
        `<tileset tilewidth="8" tileheight="8" tilecount="1" columns="1">
           <wangsets><wangset name="w" type="edge" tile="-1">
             <wangtile tileid="0" wangid="1,2,3"/>
           </wangset></wangsets>
         </tileset>`,
      ),
    );
    expect(err.kind).toBe("MalformedDocument");
  });

  it("rejects a document whose root is not <tileset>", () => {
    const err = catchParseError(() => parseTileset(`<map/>`));
    expect(err.kind).toBe("UnsupportedFormat");
    expect(err.message).toBe("Failed to parse tileset: Unexpected root element <map> (expected <tileset>)");
  });

  it("rejects empty input", () => {
    expect(catchParseError(() => parseTileset("  ")).kind).toBe("MalformedDocument");
  });

  it("warns once per property with an unknown type", () => {
    const warnings: string[] = [];
    parseTileset(
      `<tileset tilewidth="8" tileheight="8" tilecount="1" columns="1">
         <properties><property name="p" type="vec3" value="1,2,3"/></properties>
       </tileset>`,
      { warn: (m) => warnings.push(m) },
    );
    expect(warnings).toEqual(['Property "p": unknown type "vec3", treated as string']);
  });
});

describe("class properties", () => {
  it("keep their nested members", () => {
    const ts = parseTileset(
      `<tileset tilewidth="8" tileheight="8" tilecount="1" columns="1">
         <properties>
           <property name="loot" type="class" propertytype="Chest">
             <properties>
               <property name="gold" type="int" value="25"/>
               <property name="key" type="class" propertytype="Key">
                 <properties><property name="door" value="north"/></properties>
               </property>
             </properties>
           </property>
         </properties>
       </tileset>`,
    );

    expect(ts.properties).toEqual([
      {
        name: "loot",
        type: "class",
        value: "",
        propertyType: "Chest",
        members: [
          { name: "gold", type: "int", value: "25" },
          {
            name: "key",
            type: "class",
            value: "",
            propertyType: "Key",
            members: [{ name: "door", type: "string", value: "north" }],
          },
        ],
      },
    ]);
  });

  it("have no members when the class is left at its defaults", () => {
    const ts = parseTileset(
      `<tileset tilewidth="8" tileheight="8" tilecount="1" columns="1">
         <properties><property name="loot" type="class" propertytype="Chest"/></properties>
       </tileset>`,
    );
    expect(ts.properties).toEqual([{ name: "loot", type: "class", value: "", propertyType: "Chest", members: [] }]);
  });
});

describe("parseWangId", () => {
  it("maps colour numbers to colour indices, 0 to -1", () => {
    expect(parseWangId("1,0,2,0,3,0,0,1")).toEqual({
      top: 0,
      topRight: -1,
      right: 1,
      bottomRight: -1,
      bottom: 2,
      bottomLeft: -1,
      left: -1,
      topLeft: 0,
    });
  });

  it("names the bad value", () => {
    const err = catchParseError(() => parseWangId("1,2,3,4,5,6,7"));
    expect(err.message).toBe('Invalid wangid "1,2,3,4,5,6,7": expected 8 values, got 7');
  });
});
