/**
 * Tree transforms
 *
 * Every function here takes a tree and returns a new one. Inputs are never
 * modified.
 */

import type { PadLayout } from "../config.ts";
import {
  element,
  isElement,
  namespaceDeclarations,
  readViewBox,
  SVG_NAMESPACE,
  type VectorElement,
  type VectorNode,
} from "./document.ts";

export const PADS_GROUP_ID = "midi-pads";

// ============================================================================
// Pads
// ============================================================================

export interface PadPosition {
  x: number;
  y: number;
}

/**
 * Top-left corners of the 2x2 pad grid, row by row
 */
export function padPositions(layout: PadLayout): PadPosition[] {
  const { size, gap, startY, referenceCanvas } = layout;
  const centerX = Math.round(referenceCanvas.width / 2);
  const startX = centerX - (2 * size + gap) / 2;
  const step = size + gap;

  return [
    { x: startX, y: startY },
    { x: startX + step, y: startY },
    { x: startX, y: startY + step },
    { x: startX + step, y: startY + step },
  ];
}

export function createPads(color: string, layout: PadLayout): VectorElement {
  const pads = padPositions(layout).map(({ x, y }) =>
    element("rect", {
      x: String(x),
      y: String(y),
      width: String(layout.size),
      height: String(layout.size),
      rx: String(layout.radius),
      ry: String(layout.radius),
      fill: color,
    }),
  );
  return element("g", { id: PADS_GROUP_ID }, pads);
}

// ============================================================================
// Recoloring
// ============================================================================

export type FillState = "present-non-none" | "present-none" | "absent";

export function fillState(el: VectorElement): FillState {
  const fill = el.attributes.fill;
  if (fill === undefined) return "absent";
  return fill === "none" ? "present-none" : "present-non-none";
}

/**
 * SVG paints an element black when it has no fill, so "absent" counts as filled
 */
export function isFilled(state: FillState): boolean {
  switch (state) {
    case "present-non-none":
    case "absent":
      return true;
    case "present-none":
      return false;
  }
}

function mapElements(el: VectorElement, fn: (el: VectorElement) => VectorElement): VectorElement {
  const mapped = fn(el);
  return {
    ...mapped,
    children: mapped.children.map((child) => (isElement(child) ? mapElements(child, fn) : child)),
  };
}

function withAttributes(el: VectorElement, changes: Record<string, string>): VectorElement {
  if (Object.keys(changes).length === 0) return el;
  return { ...el, attributes: { ...el.attributes, ...changes } };
}

/**
 * Replace one fill color with another everywhere in the tree, root included.
 * Colors compare case-insensitively.
 */
export function recolorFill(root: VectorElement, from: string, to: string): VectorElement {
  const needle = from.toUpperCase();
  return mapElements(root, (el) => {
    const fill = el.attributes.fill;
    return fill !== undefined && fill.toUpperCase() === needle ? withAttributes(el, { fill: to }) : el;
  });
}

/**
 * Flatten one element (and, separately, each descendant) to a single color
 */
export function silhouette(el: VectorElement, color: string): VectorElement {
  return mapElements(el, (node) => {
    const changes: Record<string, string> = {};
    if (isFilled(fillState(node))) changes.fill = color;
    if (node.attributes.stroke !== undefined) changes.stroke = color;
    return withAttributes(node, changes);
  });
}

/**
 * Silhouette every child of the root and gather them into one body group
 */
export function createTrayBody(root: VectorElement, color: string): VectorElement {
  const body = element(
    "g",
    {},
    root.children.map((child) => (isElement(child) ? silhouette(child, color) : child)),
  );
  return { ...root, children: [body] };
}

export function withChildren(root: VectorElement, children: readonly VectorNode[]): VectorElement {
  return { ...root, children: [...children] };
}

export function appendChild(root: VectorElement, child: VectorNode): VectorElement {
  return withChildren(root, [...root.children, child]);
}

// ============================================================================
// Squaring
// ============================================================================

/**
 * Pad the canvas to a square and center the original artwork in it
 */
export function makeSquare(root: VectorElement): VectorElement {
  const { width, height } = readViewBox(root);
  const side = Math.max(width, height);
  const dx = (side - width) / 2;
  const dy = (side - height) / 2;

  const content = element("g", { transform: `translate(${dx}, ${dy})` }, root.children);

  return element(
    "svg",
    {
      xmlns: SVG_NAMESPACE,
      ...namespaceDeclarations(root),
      viewBox: `0 0 ${side} ${side}`,
      width: String(side),
      height: String(side),
      version: "1.1",
    },
    [content],
  );
}
