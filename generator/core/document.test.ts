import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DocumentError } from "../errors.ts";
import {
  childElements,
  element,
  loadDocument,
  parseDocument,
  parseViewBox,
  serializeDocument,
  walk,
  writeDocument,
  XML_DECLARATION,
} from "./document.ts";

const SAMPLE = `<?xml version="1.0" encoding="UTF-8"?>
<svg xmlns="http://www.w3.org/2000/svg" xmlns:xlink="http://www.w3.org/1999/xlink" viewBox="0 0 401.98 559.472">
  <title>Sample</title>
  <g id="face">
    <circle cx="10" cy="10" r="5" fill="#6AD7E5"/>
    <path d="M0 0 L1 1" fill="none" stroke="#000"/>
  </g>
  <rect width="4" height="4"/>
</svg>
`;

describe("parseViewBox", () => {
  it("reads space and comma separated values", () => {
    expect(parseViewBox("0 0 401.98 559.472")).toEqual({
      minX: 0,
      minY: 0,
      width: 401.98,
      height: 559.472,
    });
    expect(parseViewBox("-5,10, 20 30")).toEqual({ minX: -5, minY: 10, width: 20, height: 30 });
  });

  it("rejects anything but four numbers", () => {
    expect(parseViewBox("0 0 10")).toBeNull();
    expect(parseViewBox("0 0 ten 10")).toBeNull();
  });
});

describe("parseDocument", () => {
  it("builds the element tree", () => {
    const root = parseDocument(SAMPLE);

    expect(root.tag).toBe("svg");
    expect(root.attributes).toEqual({
      xmlns: "http://www.w3.org/2000/svg",
      "xmlns:xlink": "http://www.w3.org/1999/xlink",
      viewBox: "0 0 401.98 559.472",
    });
    expect(childElements(root).map((el) => el.tag)).toEqual(["title", "g", "rect"]);

    const [title, face] = childElements(root);
    expect(title.children).toEqual([{ kind: "text", value: "Sample" }]);
    expect(childElements(face).map((el) => el.attributes.fill)).toEqual(["#6AD7E5", "none"]);
  });

  it("keeps attribute values as strings", () => {
    const root = parseDocument(SAMPLE);
    const rect = childElements(root)[2];
    expect(rect.attributes).toEqual({ width: "4", height: "4" });
  });

  it("rejects malformed XML", () => {
    expect(() => parseDocument('<svg viewBox="0 0 1 1"><g></svg>', "broken.svg")).toThrow(DocumentError);
  });

  it("rejects a root that is not svg", () => {
    expect(() => parseDocument('<g viewBox="0 0 1 1"/>')).toThrow(/expected <svg>/);
  });

  it("rejects a root without a usable viewBox", () => {
    expect(() => parseDocument("<svg/>")).toThrow(/numeric viewBox/);
    expect(() => parseDocument('<svg viewBox="auto"/>')).toThrow(DocumentError);
  });
});

describe("serializeDocument", () => {
  it("starts with an XML declaration", () => {
    const xml = serializeDocument(element("svg", { viewBox: "0 0 1 1" }));
    expect(xml.startsWith(`${XML_DECLARATION}\n<svg`)).toBe(true);
  });

  it("round trips through the parser", () => {
    const root = parseDocument(SAMPLE);
    expect(parseDocument(serializeDocument(root))).toEqual(root);
  });

  it("keeps mixed content text as written", () => {
    const markup = '<svg viewBox="0 0 1 1"><text>Hello <tspan>big</tspan> world</text></svg>';
    expect(serializeDocument(parseDocument(markup))).toBe(`${XML_DECLARATION}\n${markup}\n`);
  });

  it("escapes attribute values", () => {
    const root = element("svg", { viewBox: "0 0 1 1" }, [element("text", { "data-label": 'a & "b"' })]);
    const parsed = parseDocument(serializeDocument(root));
    expect(childElements(parsed)[0].attributes["data-label"]).toBe('a & "b"');
  });
});

describe("files", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "icons-doc-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("loads a fresh tree on every call", () => {
    const path = join(dir, "source.svg");
    writeFileSync(path, SAMPLE);

    const first = loadDocument(path);
    const second = loadDocument(path);

    expect(second).toEqual(first);
    expect(second).not.toBe(first);
  });

  it("fails on a missing file", () => {
    expect(() => loadDocument(join(dir, "missing.svg"))).toThrow();
  });

  it("names the file in parse errors", () => {
    const path = join(dir, "bad.svg");
    writeFileSync(path, "<svg>");
    expect(() => loadDocument(path)).toThrow(path);
  });

  it("writes into missing directories and overwrites", () => {
    const path = join(dir, "nested", "out.svg");
    writeDocument(path, element("svg", { viewBox: "0 0 1 1" }, [element("rect")]));
    writeDocument(path, element("svg", { viewBox: "0 0 2 2" }));

    const written = readFileSync(path, "utf-8");
    expect(written.startsWith(XML_DECLARATION)).toBe(true);
    const root = loadDocument(path);
    expect(root.attributes.viewBox).toBe("0 0 2 2");
    expect([...walk(root)]).toHaveLength(1);
  });
});
