import { describe, it, expect } from "vitest";
import { charDiff, getOpcodes, similarity, truncateChars } from "../src/core/sequence.js";

/** Strip highlight spans and undo escaping, recovering the plain text of one side */
function plainText(html: string): string {
  return html
    .replace(/<\/?span[^>]*>/g, "")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&amp;/g, "&");
}

describe("getOpcodes", () => {
  it("should return a single equal segment for identical texts", () => {
    expect(getOpcodes("abc", "abc")).toEqual([{ tag: "equal", left: "abc", right: "abc" }]);
  });

  it("should fold a removal and an addition into a replace", () => {
    expect(getOpcodes("abc", "abd")).toEqual([
      { tag: "equal", left: "ab", right: "ab" },
      { tag: "replace", left: "c", right: "d" },
    ]);
  });

  it("should rebuild both texts from the segments", () => {
    const a = "The quick brown fox";
    const b = "A quick red fox jumps";
    const segments = getOpcodes(a, b);

    expect(segments.map((s) => s.left).join("")).toBe(a);
    expect(segments.map((s) => s.right).join("")).toBe(b);
  });
});

describe("similarity", () => {
  it("should be 1 for identical texts", () => {
    expect(similarity("abc", "abc")).toBe(1);
    expect(similarity("", "")).toBe(1);
  });

  it("should be 0 when nothing matches", () => {
    expect(similarity("abc", "xyz")).toBe(0);
    expect(similarity("abc", "")).toBe(0);
  });

  it("should count matched characters twice over the total length", () => {
    expect(similarity("abcd", "abxd")).toBe(0.75);
    expect(similarity("Link:\nA", "Link:\nB")).toBe(12 / 14);
  });

  it("should be symmetric", () => {
    const pairs: Array<[string, string]> = [
      ["kitten", "sitting"],
      ["Week 1: intro", "Week 2: intro and setup"],
      ["a < b", "a > b"],
    ];
    for (const [a, b] of pairs) {
      expect(similarity(a, b)).toBe(similarity(b, a));
    }
  });
});

describe("charDiff", () => {
  it("should mark replacements on both sides", () => {
    expect(charDiff("abc", "abd")).toEqual([
      'ab<span class="diff-changed">c</span>',
      'ab<span class="diff-changed">d</span>',
    ]);
  });

  it("should mark deletions on the left only", () => {
    expect(charDiff("hello world", "hello")).toEqual(['hello<span class="diff-removed"> world</span>', "hello"]);
  });

  it("should mark insertions on the right only", () => {
    expect(charDiff("ab", "aXb")).toEqual(["ab", 'a<span class="diff-added">X</span>b']);
  });

  it("should escape document text", () => {
    expect(charDiff("<b>", "<i>")).toEqual([
      '&lt;<span class="diff-changed">b</span>&gt;',
      '&lt;<span class="diff-changed">i</span>&gt;',
    ]);
  });

  it("should recover the inputs once spans and escaping are removed", () => {
    const pairs: Array<[string, string]> = [
      ["a < b & c", "a > b && c"],
      ['say "hi"', "say 'hi' <span>"],
      ["", "only right"],
      ["only left", ""],
    ];
    for (const [a, b] of pairs) {
      const [left, right] = charDiff(a, b);
      expect(plainText(left)).toBe(a);
      expect(plainText(right)).toBe(b);
    }
  });
});

describe("truncateChars", () => {
  it("should keep short texts as they are", () => {
    expect(truncateChars("abc", 5)).toBe("abc");
  });

  it("should cut at the limit", () => {
    expect(truncateChars("abcdef", 3)).toBe("abc");
  });

  it("should count code points, not code units", () => {
    expect(truncateChars("a😀b", 2)).toBe("a😀");
  });
});
