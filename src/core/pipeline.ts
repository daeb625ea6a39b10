/**
 * Comparison pipeline - runs extraction and link comparison for two loaded documents.
 *
 * Stages (each side):
 * 1. Region - content after the marker (or the body)
 * 2. Links - anchors with an href, document order
 * 3. Text - plain text with block boundaries as newlines
 * 4. Blocks - block-level elements with enough text
 * Then the links of both sides are compared by normalized key.
 */
import type { LoadedDocument } from "../text/parse.js";
import { extractText, extractTextBlocks, type TextBlock } from "../text/extract.js";
import { createTimer } from "../debug.js";
import { extractRegion, type ContentRegion } from "./region.js";
import { extractLinks, compareLinks, type LinkComparison, type LinkRecord } from "./links.js";

export interface CompareOptions {
  marker: string;
  /** Base url for resolving relative links of the first document */
  baseUrl1?: string;
  /** Base url for resolving relative links of the second document */
  baseUrl2?: string;
}

/** Everything extracted from one document */
export interface SideExtraction {
  name: string;
  region: ContentRegion;
  links: LinkRecord[];
  text: string;
  blocks: TextBlock[];
}

export interface Comparison {
  marker: string;
  v1: SideExtraction;
  v2: SideExtraction;
  links: LinkComparison;
}

function extractSide(doc: LoadedDocument, marker: string): SideExtraction {
  const timer = createTimer(doc.name);
  const region = timer.time("region", () => extractRegion(doc.tree, marker));
  const links = timer.time("links", () => extractLinks(region));
  const text = timer.time("text", () => extractText(region));
  const blocks = timer.time("blocks", () => extractTextBlocks(region));
  timer.done();
  return { name: doc.name, region, links, text, blocks };
}

export function compareDocuments(
  doc1: LoadedDocument,
  doc2: LoadedDocument,
  options: CompareOptions,
): Comparison {
  const v1 = extractSide(doc1, options.marker);
  const v2 = extractSide(doc2, options.marker);
  const links = createTimer("compare").time("links", () =>
    compareLinks(v1.links, v2.links, options.baseUrl1, options.baseUrl2),
  );
  return { marker: options.marker, v1, v2, links };
}
