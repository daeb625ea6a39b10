/**
 * Marker-based region extraction.
 *
 * Finds the first headline-like element containing the marker phrase, climbs
 * to the child of the nearest structural container, and copies everything that
 * follows it at that level into a synthetic <div>.
 */
import type { Element, ElementContent, Root, RootContent } from "hast";
import { REGION_CONFIG } from "../config.js";
import { createDebugLogger } from "../debug.js";
import { getText } from "../text/extract.js";
import { findBody, isElement } from "../text/parse.js";

const debug = createDebugLogger("region");

export interface RegionAnchor {
  /** Tag of the element that contained the marker */
  tagName: string;
  /** Where the collected siblings came from */
  level: "sibling" | "parent";
}

export interface ContentRegion {
  /** Root of the region; a synthetic div, or the body when the marker is missing */
  node: Element;
  /** null when the marker was not found and the region fell back to the body */
  anchor: RegionAnchor | null;
}

type Parent = Element | Root;

interface AnchorMatch {
  element: Element;
  /** Ancestors from the document root down to the direct parent */
  ancestors: Parent[];
}

const MARKER_TAGS: ReadonlySet<string> = new Set(REGION_CONFIG.MARKER_TAGS);
const CONTAINER_TAGS: ReadonlySet<string> = new Set(REGION_CONFIG.CONTAINER_TAGS);

/** Lowercase and collapse whitespace so markers match across line breaks and case */
export function normalizeForMatch(text: string): string {
  return text.replace(/\s+/g, " ").toLowerCase();
}

/**
 * Find the first marker candidate, in document order, whose text contains the marker.
 */
export function findMarker(tree: Root, marker: string): AnchorMatch | null {
  const needle = normalizeForMatch(marker).trim();
  if (needle === "") return null;

  const ancestors: Parent[] = [tree];

  const visit = (parent: Parent): AnchorMatch | null => {
    for (const child of parent.children) {
      if (!isElement(child)) continue;
      if (MARKER_TAGS.has(child.tagName) && normalizeForMatch(getText(child)).includes(needle)) {
        return { element: child, ancestors: [...ancestors] };
      }
      ancestors.push(child);
      const found = visit(child);
      ancestors.pop();
      if (found) return found;
    }
    return null;
  };

  return visit(tree);
}

/**
 * Climb from the anchor while the parent is an element that is not a
 * structural container. Returns the element reached and its ancestors.
 */
export function climbToContainer(match: AnchorMatch): AnchorMatch {
  let element = match.element;
  const ancestors = [...match.ancestors];

  for (;;) {
    const parent = ancestors[ancestors.length - 1];
    if (!parent || parent.type === "root" || CONTAINER_TAGS.has(parent.tagName)) break;
    ancestors.pop();
    element = parent;
  }

  return { element, ancestors };
}

/** Element siblings after `node` within `parent`, in order */
export function followingElementSiblings(parent: Parent, node: Element): Element[] {
  const children: Array<RootContent | ElementContent> = parent.children;
  const index = children.indexOf(node);
  if (index === -1) return [];
  return children.slice(index + 1).filter(isElement);
}

function isElementContent(node: RootContent): node is ElementContent {
  return node.type !== "doctype";
}

function syntheticDiv(children: ElementContent[]): Element {
  return { type: "element", tagName: "div", properties: {}, children };
}

function fallbackRegion(tree: Root): ContentRegion {
  const body = findBody(tree);
  if (body) return { node: body, anchor: null };
  const children = tree.children.filter(isElementContent).map((child) => structuredClone(child));
  return { node: syntheticDiv(children), anchor: null };
}

/**
 * Extract the content that follows the marker phrase.
 * Never fails: a missing marker yields the body, a marker with nothing after it
 * yields an empty div. The parsed tree is not modified.
 */
export function extractRegion(tree: Root, marker: string): ContentRegion {
  const match = findMarker(tree, marker);
  if (!match) {
    debug(`marker "${marker}" not found, falling back to body`);
    return fallbackRegion(tree);
  }

  const tagName = match.element.tagName;
  const { element, ancestors } = climbToContainer(match);
  const parent = ancestors[ancestors.length - 1];
  debug(`marker found in <${tagName}>, collecting after <${element.tagName}>`);

  let level: RegionAnchor["level"] = "sibling";
  let collected = parent ? followingElementSiblings(parent, element) : [];

  // Only one level up, even when that is still empty
  const grandparent = ancestors[ancestors.length - 2];
  if (collected.length === 0 && parent && parent.type === "element" && grandparent) {
    collected = followingElementSiblings(grandparent, parent);
    level = "parent";
  }

  debug(`collected ${collected.length} element(s) at ${level} level`);
  return {
    node: syntheticDiv(collected.map((el) => structuredClone(el))),
    anchor: { tagName, level },
  };
}
