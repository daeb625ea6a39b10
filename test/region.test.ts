import { describe, it, expect } from "vitest";
import type { Element } from "hast";
import { parseHtml, findBody, serializeNode } from "../src/text/parse.js";
import { extractRegion, normalizeForMatch } from "../src/core/region.js";
import { extractText } from "../src/text/extract.js";

function childTags(el: Element): string[] {
  return el.children.flatMap((c) => (c.type === "element" ? [c.tagName] : []));
}

describe("extractRegion", () => {
  it("should collect the siblings after the marker inside body", () => {
    const tree = parseHtml('<p>Intro</p><b>Course Syllabus</b><p>Link: <a href="/a">A</a></p><ul><li>x</li></ul>');
    const region = extractRegion(tree, "Course Syllabus");

    expect(region.anchor).toEqual({ tagName: "b", level: "sibling" });
    expect(region.node.tagName).toBe("div");
    expect(childTags(region.node)).toEqual(["p", "ul"]);
    expect(extractText(region)).toBe("Link:\nA\nx");
  });

  it("should match the marker case-insensitively", () => {
    const tree = parseHtml("<h1>COURSE SYLLABUS</h1><p>Week one</p>");
    const region = extractRegion(tree, "Syllabus");

    expect(region.anchor?.tagName).toBe("h1");
    expect(extractText(region)).toBe("Week one");
  });

  it("should match across line breaks inside the marker element", () => {
    const tree = parseHtml("<b>Course\n    Syllabus</b><p>Body</p>");
    const region = extractRegion(tree, "course syllabus");

    expect(region.anchor).not.toBeNull();
    expect(extractText(region)).toBe("Body");
  });

  it("should use the first marker in document order", () => {
    const tree = parseHtml("<h2>Syllabus</h2><p>first</p><h2>Syllabus again</h2><p>second</p>");
    const region = extractRegion(tree, "Syllabus");

    expect(extractText(region)).toBe("first\nSyllabus again\nsecond");
  });

  it("should take the candidate that opens first when candidates nest", () => {
    const tree = parseHtml(
      "<div><table><tr><td><p><b>Course Syllabus</b></p><ul><li>one</li></ul></td></tr></table></div>",
    );
    const region = extractRegion(tree, "Course Syllabus");

    expect(region.anchor).toEqual({ tagName: "p", level: "sibling" });
    expect(childTags(region.node)).toEqual(["ul"]);
  });

  it("should climb out of non-container wrappers", () => {
    const tree = parseHtml("<section><h2><span>Course Syllabus</span></h2></section><p>after</p>");
    const region = extractRegion(tree, "Course Syllabus");

    expect(region.anchor?.tagName).toBe("h2");
    expect(extractText(region)).toBe("after");
  });

  it("should stop climbing at a table cell", () => {
    const tree = parseHtml(
      "<table><tr><td><span><b>Syllabus</b></span><p>in cell</p></td></tr></table><p>outside</p>",
    );
    const region = extractRegion(tree, "Syllabus");

    expect(extractText(region)).toBe("in cell");
  });

  it("should ignore text nodes that follow the marker", () => {
    const tree = parseHtml("<b>Syllabus</b> loose text <p>kept</p>");
    const region = extractRegion(tree, "Syllabus");

    expect(extractText(region)).toBe("kept");
  });

  it("should retry one level up when the marker has no following siblings", () => {
    const tree = parseHtml("<div><p><b>Syllabus</b></p></div><p>After</p>");
    const region = extractRegion(tree, "Syllabus");

    expect(region.anchor).toEqual({ tagName: "p", level: "parent" });
    expect(extractText(region)).toBe("After");
  });

  it("should return an empty region when nothing follows even one level up", () => {
    const tree = parseHtml("<div><p><b>Syllabus</b></p></div>");
    const region = extractRegion(tree, "Syllabus");

    expect(region.anchor).toEqual({ tagName: "p", level: "parent" });
    expect(region.node.children).toEqual([]);
    expect(extractText(region)).toBe("");
  });

  it("should fall back to the body when the marker is missing", () => {
    const tree = parseHtml("<p>Hello</p><p>World</p>");
    const region = extractRegion(tree, "Course Syllabus");

    expect(region.anchor).toBeNull();
    expect(region.node.tagName).toBe("body");
    expect(extractText(region)).toBe("Hello\nWorld");
  });

  it("should treat an empty marker as missing", () => {
    const tree = parseHtml("<b>Anything</b><p>x</p>");
    const region = extractRegion(tree, "   ");

    expect(region.anchor).toBeNull();
    expect(region.node.tagName).toBe("body");
  });

  it("should not modify the parsed tree", () => {
    const tree = parseHtml("<b>Syllabus</b><p>one</p><p>two</p>");
    const before = serializeNode(tree);
    const region = extractRegion(tree, "Syllabus");

    expect(serializeNode(tree)).toBe(before);
    const body = findBody(tree);
    if (!body) throw new Error("expected a body element");
    expect(childTags(body)).toEqual(["b", "p", "p"]);
    expect(region.node.children[0]).not.toBe(body.children[1]);
  });
});

describe("normalizeForMatch", () => {
  it("should lowercase and collapse whitespace", () => {
    expect(normalizeForMatch("Course \n\t Syllabus")).toBe("course syllabus");
  });
});
