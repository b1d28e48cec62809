// src/tiled/xml.ts
import { DOMParser } from "@xmldom/xmldom";

import { TiledParseError } from "./errors.js";

const ELEMENT_NODE = 1;

export function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

/** `<layer id="3" name="Ground">`, used as error context. */
export function describeElement(el: Element): string {
  const parts = [el.tagName];
  for (const key of ["id", "name", "firstgid"]) {
    if (el.hasAttribute(key)) parts.push(`${key}="${el.getAttribute(key) ?? ""}"`);
  }
  return `<${parts.join(" ")}>`;
}

/**
 * Parse XML text and return the root element, checking its tag name.
 * Every parser message, warnings included, makes the document invalid: the
 * parser only warns about mismatched end tags and unquoted attributes.
 */
export function loadXmlRoot(text: string, expectedTag: string): Element {
  const problems: string[] = [];
  const parser = new DOMParser({
    errorHandler: (_level: string, msg: unknown) => {
      problems.push(String(msg));
    },
  });

  if (text.trim().length === 0) {
    throw new TiledParseError("MalformedDocument", "Invalid XML: empty input");
  }

  const doc = parser.parseFromString(text, "text/xml");
  if (problems.length > 0) {
    throw new TiledParseError("MalformedDocument", `Invalid XML: ${problems[0]}`);
  }

  const root = doc.documentElement;
  if (!root) throw new TiledParseError("MalformedDocument", "Invalid XML: no root element");
  if (root.tagName !== expectedTag) {
    throw new TiledParseError(
      "UnsupportedFormat",
      `Unexpected root element <${root.tagName}> (expected <${expectedTag}>)`,
    );
  }
  return root;
}
