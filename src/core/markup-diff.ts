/**
 * Line-by-line diff of raw markup, rendered as side-by-side rows.
 * Only hunks with their context lines are kept; unchanged runs between them are omitted.
 */
import { structuredPatch } from "diff";
import { DIFF_CONFIG } from "../config.js";
import { escapeHtml, wrapSpan } from "../text/html.js";
import { charDiff, DIFF_CLASSES } from "./sequence.js";

export type MarkupRowKind = "context" | "changed" | "removed" | "added" | "separator";

export interface MarkupDiffRow {
  kind: MarkupRowKind;
  /** 1-based line number on the v1 side */
  leftLine?: number;
  /** 1-based line number on the v2 side */
  rightLine?: number;
  leftHtml: string;
  rightHtml: string;
}

function rangeLabel(start: number, count: number): string {
  if (count === 0) return "(none)";
  if (count === 1) return `Line ${start}`;
  return `Lines ${start}–${start + count - 1}`;
}

/**
 * Diff two markup strings line by line with `contextLines` of unchanged lines
 * around each change. Adjacent removed and added lines are paired positionally
 * and highlighted at character level. Identical input yields no rows.
 */
export function diffMarkup(
  markup1: string,
  markup2: string,
  contextLines: number = DIFF_CONFIG.MARKUP_CONTEXT_LINES,
): MarkupDiffRow[] {
  const patch = structuredPatch("v1", "v2", markup1, markup2, "", "", { context: contextLines });
  const rows: MarkupDiffRow[] = [];

  for (const hunk of patch?.hunks ?? []) {
    rows.push({
      kind: "separator",
      leftHtml: rangeLabel(hunk.oldStart, hunk.oldLines),
      rightHtml: rangeLabel(hunk.newStart, hunk.newLines),
    });

    let leftNo = hunk.oldStart;
    let rightNo = hunk.newStart;
    // "\ No newline at end of file" markers carry no content
    const lines = hunk.lines.filter((line) => !line.startsWith("\\"));

    let i = 0;
    while (i < lines.length) {
      const line = lines[i];
      if (line.startsWith(" ")) {
        const text = escapeHtml(line.slice(1));
        rows.push({ kind: "context", leftLine: leftNo++, rightLine: rightNo++, leftHtml: text, rightHtml: text });
        i++;
        continue;
      }

      const removed: string[] = [];
      const added: string[] = [];
      while (i < lines.length && !lines[i].startsWith(" ")) {
        (lines[i].startsWith("-") ? removed : added).push(lines[i].slice(1));
        i++;
      }

      const paired = Math.min(removed.length, added.length);
      for (let k = 0; k < paired; k++) {
        const [leftHtml, rightHtml] = charDiff(removed[k], added[k]);
        rows.push({ kind: "changed", leftLine: leftNo++, rightLine: rightNo++, leftHtml, rightHtml });
      }
      for (const text of removed.slice(paired)) {
        rows.push({ kind: "removed", leftLine: leftNo++, leftHtml: wrapSpan(DIFF_CLASSES.removed, text), rightHtml: "" });
      }
      for (const text of added.slice(paired)) {
        rows.push({ kind: "added", rightLine: rightNo++, leftHtml: "", rightHtml: wrapSpan(DIFF_CLASSES.added, text) });
      }
    }
  }

  return rows;
}
