/**
 * Vector Document
 *
 * Immutable in-memory SVG tree plus the loader and writer around it.
 * XML goes through fast-xml-parser in preserveOrder mode so element order
 * and attribute order survive a load/write round trip.
 */

import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";
import { DocumentError } from "../errors.ts";

// ============================================================================
// Types
// ============================================================================

export type Attributes = Readonly<Record<string, string>>;

export interface VectorElement {
  readonly kind: "element";
  readonly tag: string;
  readonly attributes: Attributes;
  readonly children: readonly VectorNode[];
}

export interface VectorText {
  readonly kind: "text";
  readonly value: string;
}

export type VectorNode = VectorElement | VectorText;

export interface ViewBox {
  minX: number;
  minY: number;
  width: number;
  height: number;
}

export const SVG_NAMESPACE = "http://www.w3.org/2000/svg";
export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

// ============================================================================
// Construction
// ============================================================================

export function element(
  tag: string,
  attributes: Record<string, string> = {},
  children: readonly VectorNode[] = [],
): VectorElement {
  return { kind: "element", tag, attributes: { ...attributes }, children: [...children] };
}

export function isElement(node: VectorNode): node is VectorElement {
  return node.kind === "element";
}

export function childElements(el: VectorElement): VectorElement[] {
  return el.children.filter(isElement);
}

/**
 * Depth-first walk over an element and all its descendant elements
 */
export function* walk(el: VectorElement): Generator<VectorElement> {
  yield el;
  for (const child of childElements(el)) {
    yield* walk(child);
  }
}

/**
 * Namespace declarations of an element (`xmlns` and `xmlns:*`)
 */
export function namespaceDeclarations(el: VectorElement): Record<string, string> {
  const declarations: Record<string, string> = {};
  for (const [name, value] of Object.entries(el.attributes)) {
    if (name === "xmlns" || name.startsWith("xmlns:")) {
      declarations[name] = value;
    }
  }
  return declarations;
}

// ============================================================================
// viewBox
// ============================================================================

export function parseViewBox(value: string): ViewBox | null {
  const parts = value.trim().split(/[\s,]+/);
  if (parts.length !== 4) return null;
  const numbers = parts.map(Number);
  if (numbers.some((n) => !Number.isFinite(n))) return null;
  const [minX, minY, width, height] = numbers;
  return { minX, minY, width, height };
}

export function readViewBox(root: VectorElement): ViewBox {
  const raw = root.attributes.viewBox;
  if (raw === undefined) {
    throw new DocumentError("root element has no viewBox", root.tag);
  }
  const viewBox = parseViewBox(raw);
  if (!viewBox) {
    throw new DocumentError(`invalid viewBox "${raw}"`, root.tag);
  }
  return viewBox;
}

// ============================================================================
// Parsing
// ============================================================================

const ATTRIBUTES_KEY = ":@";
const TEXT_KEY = "#text";

const xmlOptions = {
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: "",
  textNodeName: TEXT_KEY,
} as const;

// Text is kept exactly as written: no trimming, no re-indenting
const parser = new XMLParser({
  ...xmlOptions,
  trimValues: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  parseAttributeValue: false,
});

const builder = new XMLBuilder({
  ...xmlOptions,
  suppressEmptyNode: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toAttributes(raw: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (isRecord(raw)) {
    for (const [name, value] of Object.entries(raw)) {
      attributes[name] = String(value);
    }
  }
  return attributes;
}

function toNodes(raw: unknown): VectorNode[] {
  if (!Array.isArray(raw)) return [];

  const nodes: VectorNode[] = [];
  for (const entry of raw) {
    if (!isRecord(entry)) continue;
    for (const [key, value] of Object.entries(entry)) {
      if (key === ATTRIBUTES_KEY) continue;
      if (key === TEXT_KEY) {
        nodes.push({ kind: "text", value: String(value) });
        continue;
      }
      nodes.push(element(key, toAttributes(entry[ATTRIBUTES_KEY]), toNodes(value)));
    }
  }
  return nodes;
}

/**
 * Parse SVG markup into its root element
 *
 * @param origin - Where the markup came from, used in error messages
 */
export function parseDocument(xml: string, origin = "<inline>"): VectorElement {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new DocumentError(`malformed XML at ${line}:${col}: ${msg}`, origin);
  }

  const roots = toNodes(parser.parse(xml)).filter(isElement);
  if (roots.length !== 1) {
    throw new DocumentError(`expected one root element, found ${roots.length}`, origin);
  }

  const [root] = roots;
  if (root.tag !== "svg") {
    throw new DocumentError(`root element is <${root.tag}>, expected <svg>`, origin);
  }
  try {
    readViewBox(root);
  } catch (err) {
    throw new DocumentError("root element needs a numeric viewBox", origin, { cause: err });
  }
  return root;
}

/**
 * Load the canonical source. Always reads from disk; nothing is cached.
 */
export function loadDocument(path: string): VectorElement {
  return parseDocument(readFileSync(path, "utf-8"), path);
}

// ============================================================================
// Writing
// ============================================================================

function toOrdered(node: VectorNode): Record<string, unknown> {
  if (node.kind === "text") {
    return { [TEXT_KEY]: node.value };
  }
  const ordered: Record<string, unknown> = {
    [node.tag]: node.children.map(toOrdered),
  };
  if (Object.keys(node.attributes).length > 0) {
    ordered[ATTRIBUTES_KEY] = { ...node.attributes };
  }
  return ordered;
}

export function serializeDocument(root: VectorElement): string {
  const body = String(builder.build([toOrdered(root)])).trim();
  return `${XML_DECLARATION}\n${body}\n`;
}

/**
 * Write a document as UTF-8, replacing whatever is at `path`
 */
export function writeDocument(path: string, root: VectorElement): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, serializeDocument(root), "utf-8");
}
