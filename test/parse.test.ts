import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { decodeLossy, loadDocument, LoadError, parseHtml, serializeNode } from "../src/text/parse.js";
import { extractRegion } from "../src/core/region.js";
import { extractText } from "../src/text/extract.js";

describe("decodeLossy", () => {
  it("should drop bytes that are not valid UTF-8", () => {
    const bytes = new Uint8Array([0x3c, 0x70, 0x3e, 0x41, 0xff, 0x42, 0x3c, 0x2f, 0x70, 0x3e]);
    expect(decodeLossy(bytes)).toBe("<p>AB</p>");
  });

  it("should keep multi-byte characters", () => {
    expect(decodeLossy(new TextEncoder().encode("café ↔"))).toBe("café ↔");
  });
});

describe("serializeNode", () => {
  it("should serialize a single element", () => {
    const tree = parseHtml('<p class="x">a <b>b</b></p>');
    const region = extractRegion(tree, "none");
    expect(serializeNode(region.node)).toBe('<body><p class="x">a <b>b</b></p></body>');
  });
});

describe("loadDocument", () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), "html-diff-"));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should parse the file and name it by its base name", () => {
    const path = join(dir, "v1.html");
    writeFileSync(path, "<html><body><p>Hello</p></body></html>");

    const doc = loadDocument(path);

    expect(doc.name).toBe("v1.html");
    expect(doc.path).toBe(path);
    expect(extractText(extractRegion(doc.tree, "none"))).toBe("Hello");
  });

  it("should tolerate invalid bytes in the file", () => {
    const path = join(dir, "broken.html");
    writeFileSync(path, Buffer.from([0x3c, 0x70, 0x3e, 0x41, 0xfe, 0x42, 0x3c, 0x2f, 0x70, 0x3e]));

    const doc = loadDocument(path);

    expect(extractText(extractRegion(doc.tree, "none"))).toBe("AB");
  });

  it("should raise LoadError for a missing file", () => {
    const path = join(dir, "missing.html");

    expect(() => loadDocument(path)).toThrow(LoadError);
    expect(() => loadDocument(path)).toThrow(`Could not load ${path}`);
  });
});
