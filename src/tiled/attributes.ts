// src/tiled/attributes.ts
//
// Typed attribute access on xml elements. Numbers are parsed with a fixed,
// period-separated grammar; booleans are "1" / "0" only.

import { TiledParseError } from "./errors.js";
import { describeElement, isElement } from "./xml.js";

const INT_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function parseIntToken(token: string, what: string, context?: string): number {
  const t = token.trim();
  if (!INT_RE.test(t)) {
    throw new TiledParseError("MalformedDocument", `Invalid ${what}: expected integer, got "${token}"`, context);
  }
  return Number(t);
}

export function parseFloatToken(token: string, what: string, context?: string): number {
  const t = token.trim();
  if (!FLOAT_RE.test(t)) {
    throw new TiledParseError("MalformedDocument", `Invalid ${what}: expected number, got "${token}"`, context);
  }
  return Number(t);
}

export function optionalString(el: Element, name: string): string | undefined {
  if (!el.hasAttribute(name)) return undefined;
  return el.getAttribute(name) ?? undefined;
}

export function requiredString(el: Element, name: string): string {
  const v = optionalString(el, name);
  if (v === undefined) {
    throw new TiledParseError(
      "MissingRequiredAttribute",
      `Missing required attribute "${name}"`,
      describeElement(el),
    );
  }
  return v;
}

export function optionalInt(el: Element, name: string): number | undefined {
  const v = optionalString(el, name);
  if (v === undefined) return undefined;
  return parseIntToken(v, `attribute "${name}"`, describeElement(el));
}

export function requiredInt(el: Element, name: string): number {
  return parseIntToken(requiredString(el, name), `attribute "${name}"`, describeElement(el));
}

export function optionalFloat(el: Element, name: string): number | undefined {
  const v = optionalString(el, name);
  if (v === undefined) return undefined;
  return parseFloatToken(v, `attribute "${name}"`, describeElement(el));
}

function toBool(v: string, el: Element, name: string): boolean {
  if (v === "1") return true;
  if (v === "0") return false;
  throw new TiledParseError(
    "MalformedDocument",
    `Invalid attribute "${name}": expected "1" or "0", got "${v}"`,
    describeElement(el),
  );
}

export function optionalBool(el: Element, name: string): boolean | undefined {
  const v = optionalString(el, name);
  return v === undefined ? undefined : toBool(v, el, name);
}

export function requiredBool(el: Element, name: string): boolean {
  return toBool(requiredString(el, name), el, name);
}

/** Direct element children, optionally filtered by tag name. */
export function childElements(el: Element, tag?: string): Element[] {
  const out: Element[] = [];
  const nodes = el.childNodes;
  for (let i = 0; i < nodes.length; i++) {
    const n = nodes.item(i);
    if (n !== null && isElement(n) && (tag === undefined || n.tagName === tag)) out.push(n);
  }
  return out;
}

export function firstChild(el: Element, tag: string): Element | undefined {
  return childElements(el, tag)[0];
}

export function requiredChild(el: Element, tag: string): Element {
  const child = firstChild(el, tag);
  if (!child) {
    throw new TiledParseError("MalformedDocument", `Missing required element <${tag}>`, describeElement(el));
  }
  return child;
}

/** `<parent><wrapper><tag/>...</wrapper></parent>`, e.g. properties/property. */
export function nestedChildren(el: Element, wrapper: string, tag: string): Element[] {
  const w = firstChild(el, wrapper);
  return w ? childElements(w, tag) : [];
}

export function textOf(el: Element): string {
  return el.textContent ?? "";
}
