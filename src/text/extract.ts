/**
 * Plain-text extraction from hast subtrees.
 */
import type { Element, ElementContent, Root, RootContent } from "hast";
import { TEXT_CONFIG } from "../config.js";
import type { ContentRegion } from "../core/region.js";
import { isElement, serializeNode } from "./parse.js";

export interface TextOptions {
  /** Inserted between consecutive strings */
  separator?: string;
  /** Trim each string and skip the ones left empty */
  strip?: boolean;
}

/** A block-level element with enough visible text to be worth comparing */
export interface TextBlock {
  tag: string;
  text: string;
  html: string;
}

const NON_TEXT_TAGS: ReadonlySet<string> = new Set(TEXT_CONFIG.NON_TEXT_TAGS);
const BLOCK_TAGS: ReadonlySet<string> = new Set(TEXT_CONFIG.BLOCK_TAGS);

function collectStrings(node: RootContent | ElementContent | Root, out: string[]): void {
  switch (node.type) {
    case "text":
      out.push(node.value);
      return;
    case "element":
      if (NON_TEXT_TAGS.has(node.tagName)) return;
      for (const child of node.children) collectStrings(child, out);
      return;
    case "root":
      for (const child of node.children) collectStrings(child, out);
      return;
    default:
      // comments, doctypes
      return;
  }
}

/**
 * Concatenate the text under a node in document order.
 */
export function getText(node: Element | Root, options: TextOptions = {}): string {
  const { separator = "", strip = false } = options;
  let strings: string[] = [];
  collectStrings(node, strings);
  if (strip) {
    strings = strings.map((s) => s.trim()).filter((s) => s.length > 0);
  }
  return strings.join(separator);
}

/** Flatten a region to plain text, one line per text run */
export function extractText(region: ContentRegion): string {
  return getText(region.node, { separator: "\n", strip: true });
}

/**
 * Collect block-level elements below the region root whose visible text is
 * longer than MIN_TEXT_BLOCK_LENGTH. Nested blocks each produce an entry.
 */
export function extractTextBlocks(region: ContentRegion): TextBlock[] {
  const blocks: TextBlock[] = [];

  const visit = (el: Element) => {
    for (const child of el.children) {
      if (!isElement(child)) continue;
      if (BLOCK_TAGS.has(child.tagName)) {
        const text = getText(child, { strip: true });
        if (text.length > TEXT_CONFIG.MIN_TEXT_BLOCK_LENGTH) {
          blocks.push({ tag: child.tagName, text, html: serializeNode(child) });
        }
      }
      visit(child);
    }
  };

  visit(region.node);
  return blocks;
}
