// src/tiled/properties.ts
import { nestedChildren, optionalString, requiredString, textOf } from "./attributes.js";
import type { WarnFn } from "./errors.js";
import type { PropertyType, TiledProperty } from "./types.js";

const PROPERTY_TYPES: ReadonlySet<string> = new Set<PropertyType>([
  "string",
  "bool",
  "color",
  "file",
  "float",
  "int",
  "object",
  "class",
]);

function isPropertyType(v: string): v is PropertyType {
  return PROPERTY_TYPES.has(v);
}

export function parseProperty(el: Element, warn: WarnFn): TiledProperty {
  const name = requiredString(el, "name");
  const typeAttr = optionalString(el, "type");

  let type: PropertyType = "string";
  if (typeAttr !== undefined) {
    if (isPropertyType(typeAttr)) type = typeAttr;
    else warn(`Property "${name}": unknown type "${typeAttr}", treated as string`);
  }

  const propertyType = optionalString(el, "propertytype");

  if (type === "class") {
    return Object.freeze({
      name,
      type,
      value: "",
      members: parseProperties(el, warn),
      ...(propertyType !== undefined ? { propertyType } : {}),
    });
  }

  // Multi-line strings are stored as element text instead of a value attribute.
  const value = optionalString(el, "value") ?? textOf(el);

  return Object.freeze({
    name,
    type,
    value,
    ...(propertyType !== undefined ? { propertyType } : {}),
  });
}

/** Reads `<properties><property/>...</properties>` under `el`. */
export function parseProperties(el: Element, warn: WarnFn): ReadonlyArray<TiledProperty> {
  return Object.freeze(nestedChildren(el, "properties", "property").map((p) => parseProperty(p, warn)));
}

export function findProperty(
  props: ReadonlyArray<TiledProperty>,
  name: string,
): TiledProperty | undefined {
  return props.find((p) => p.name === name);
}
