import { describe, it, expect } from "vitest";
import { parseHtml, type LoadedDocument } from "../src/text/parse.js";
import { compareDocuments } from "../src/core/pipeline.js";
import { computeStats, formatStats } from "../src/cli/stats.js";
import { generateJson } from "../src/cli/output.js";

function doc(name: string, html: string): LoadedDocument {
  return { path: name, name, tree: parseHtml(html) };
}

const comparison = compareDocuments(
  doc("v1.html", '<h2>Syllabus</h2><p>Readings for the first week</p><a href="/a">A</a><a href="/shared">Shared</a>'),
  doc("v2.html", '<p>No marker here</p><a href="/b">B</a><a href="/shared/">Shared</a>'),
  { marker: "Syllabus" },
);

describe("computeStats", () => {
  it("should count links and blocks on each side", () => {
    expect(computeStats(comparison, 0.5)).toEqual({
      similarity: 0.5,
      linksV1: 2,
      linksV2: 2,
      linksRemoved: 1,
      linksAdded: 1,
      linksCommon: 1,
      blocksV1: 1,
      blocksV2: 1,
    });
  });
});

describe("formatStats", () => {
  it("should print one row per statistic", () => {
    const text = formatStats(computeStats(comparison, 0.5));

    expect(text).toContain(`${"Text similarity:".padEnd(26)}50.0%`);
    expect(text).toContain(`${"Links unchanged:".padEnd(26)}1`);
    expect(text).toContain(`${"Total changes:".padEnd(26)}2`);
    expect(text).toContain(`${"Text blocks (V1/V2):".padEnd(26)}1/1`);
  });
});

describe("generateJson", () => {
  it("should summarize the comparison", () => {
    const json: unknown = JSON.parse(generateJson(comparison, 0.5, "1.0.0"));

    expect(json).toMatchObject({
      version: "1.0.0",
      file1: "v1.html",
      file2: "v2.html",
      marker: "Syllabus",
      markerFound: { v1: true, v2: false },
      stats: { linksRemoved: 1, linksAdded: 1, linksCommon: 1 },
      links: {
        removed: [{ url: "/a", text: "A", key: ":///a" }],
        added: [{ url: "/b", text: "B", key: ":///b" }],
        common: [{ url: "/shared", text: "Shared", key: ":///shared" }],
      },
    });
  });
});
