/**
 * Character-level alignment of two texts.
 *
 * jsdiff's diffChars computes a minimal edit script (Myers), so its unchanged
 * parts form a longest common subsequence. Consecutive removed/added parts
 * between two unchanged parts are folded into one "replace" segment.
 */
import { diffChars } from "diff";
import { wrapSpan, escapeHtml } from "../text/html.js";

export type SegmentTag = "equal" | "delete" | "insert" | "replace";

export interface DiffSegment {
  tag: SegmentTag;
  /** Text on the v1 side ("" for insert) */
  left: string;
  /** Text on the v2 side ("" for delete) */
  right: string;
}

/** CSS classes used for highlighted runs */
export const DIFF_CLASSES = {
  removed: "diff-removed",
  added: "diff-added",
  changed: "diff-changed",
} as const;

/**
 * Align two texts and return the segments in order.
 * Joining `left` over all segments gives `a`; joining `right` gives `b`.
 */
export function getOpcodes(a: string, b: string): DiffSegment[] {
  const segments: DiffSegment[] = [];
  let removed = "";
  let added = "";

  const flush = () => {
    if (removed && added) {
      segments.push({ tag: "replace", left: removed, right: added });
    } else if (removed) {
      segments.push({ tag: "delete", left: removed, right: "" });
    } else if (added) {
      segments.push({ tag: "insert", left: "", right: added });
    }
    removed = "";
    added = "";
  };

  for (const part of diffChars(a, b)) {
    if (part.removed) {
      removed += part.value;
    } else if (part.added) {
      added += part.value;
    } else {
      flush();
      const last = segments[segments.length - 1];
      if (last && last.tag === "equal") {
        last.left += part.value;
        last.right += part.value;
      } else {
        segments.push({ tag: "equal", left: part.value, right: part.value });
      }
    }
  }
  flush();

  return segments;
}

/** Number of characters the two texts have in common under the alignment */
export function matchedLength(segments: DiffSegment[]): number {
  return segments.reduce((sum, s) => (s.tag === "equal" ? sum + s.left.length : sum), 0);
}

/**
 * Similarity ratio in [0, 1]: twice the matched characters over the total.
 * 1 for identical texts (including two empty ones), 0 when nothing matches.
 */
export function similarity(a: string, b: string): number {
  if (a === b) return 1;
  const total = a.length + b.length;
  return (2 * matchedLength(getOpcodes(a, b))) / total;
}

/**
 * Render both sides of a character diff as escaped HTML.
 * Deletions are marked on the left, insertions on the right and replacements on both.
 */
export function charDiff(a: string, b: string): [string, string] {
  const left: string[] = [];
  const right: string[] = [];

  for (const segment of getOpcodes(a, b)) {
    switch (segment.tag) {
      case "equal":
        left.push(escapeHtml(segment.left));
        right.push(escapeHtml(segment.right));
        break;
      case "delete":
        left.push(wrapSpan(DIFF_CLASSES.removed, segment.left));
        break;
      case "insert":
        right.push(wrapSpan(DIFF_CLASSES.added, segment.right));
        break;
      case "replace":
        left.push(wrapSpan(DIFF_CLASSES.changed, segment.left));
        right.push(wrapSpan(DIFF_CLASSES.changed, segment.right));
        break;
    }
  }

  return [left.join(""), right.join("")];
}

/** Keep the first `limit` code points, never splitting a surrogate pair */
export function truncateChars(text: string, limit: number): string {
  if (text.length <= limit) return text;
  return Array.from(text).slice(0, limit).join("");
}
