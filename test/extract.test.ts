import { describe, it, expect } from "vitest";
import { parseHtml } from "../src/text/parse.js";
import { extractRegion } from "../src/core/region.js";
import { extractText, extractTextBlocks, getText } from "../src/text/extract.js";

function bodyRegion(html: string) {
  return extractRegion(parseHtml(html), "no such marker");
}

describe("extractText", () => {
  it("should put each text run on its own line", () => {
    expect(extractText(bodyRegion("<h1>Title</h1><p>First <b>bold</b> rest</p>"))).toBe("Title\nFirst\nbold\nrest");
  });

  it("should skip scripts, styles and comments", () => {
    const region = bodyRegion("<p>Hello</p><script>track()</script><style>p{}</style><!-- note --><p>World</p>");
    expect(extractText(region)).toBe("Hello\nWorld");
  });

  it("should return an empty string for an empty region", () => {
    expect(extractText(bodyRegion(""))).toBe("");
  });
});

describe("getText", () => {
  it("should concatenate raw strings by default", () => {
    const tree = parseHtml("<p>a <i>b</i> c</p>");
    expect(getText(tree)).toBe("a b c");
  });
});

describe("extractTextBlocks", () => {
  it("should keep block elements with more than ten characters", () => {
    const region = bodyRegion(
      "<div><p>Short</p><p>This paragraph is long enough</p><ul><li>Another long list item</li></ul></div>",
    );
    const blocks = extractTextBlocks(region);

    expect(blocks.map((b) => b.tag)).toEqual(["div", "p", "li"]);
    expect(blocks[1]).toEqual({
      tag: "p",
      text: "This paragraph is long enough",
      html: "<p>This paragraph is long enough</p>",
    });
    expect(blocks[2].text).toBe("Another long list item");
  });

  it("should require strictly more than ten characters", () => {
    const blocks = extractTextBlocks(bodyRegion("<p>abcdefghij</p><p>abcdefghijk</p>"));

    expect(blocks.map((b) => b.text)).toEqual(["abcdefghijk"]);
  });

  it("should not count the region root itself", () => {
    const tree = parseHtml("<h2>Syllabus</h2><p>Week one covers the basics</p>");
    const blocks = extractTextBlocks(extractRegion(tree, "Syllabus"));

    expect(blocks.map((b) => b.tag)).toEqual(["p"]);
  });
});
