/**
 * Report composition: computes similarity and both diffs, then hands a view
 * model to the page template. Deterministic for a given clock.
 */
import type { Comparison } from "../core/pipeline.js";
import { charDiff, similarity, truncateChars } from "../core/sequence.js";
import { diffMarkup } from "../core/markup-diff.js";
import { serializeNode } from "../text/parse.js";
import { DIFF_CONFIG } from "../config.js";
import { generateReportHtml, type ReportView } from "../ui/template.js";
import type { ThemeName } from "../ui/themes.js";
import { formatTimestamp } from "./format.js";

/** Source of the report's generation timestamp */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export interface ReportOptions {
  clock?: Clock;
  theme?: ThemeName;
}

export function buildReportView(comparison: Comparison, options: ReportOptions = {}): ReportView {
  const { clock = systemClock, theme = "light" } = options;
  const { v1, v2 } = comparison;

  const limit = DIFF_CONFIG.TEXT_DIFF_CHAR_LIMIT;
  const [textDiffLeft, textDiffRight] = charDiff(truncateChars(v1.text, limit), truncateChars(v2.text, limit));

  return {
    file1: v1.name,
    file2: v2.name,
    marker: comparison.marker,
    generatedAt: formatTimestamp(clock.now()),
    theme,
    similarity: similarity(v1.text, v2.text),
    links: comparison.links,
    textDiff: { left: textDiffLeft, right: textDiffRight },
    markupRows: diffMarkup(serializeNode(v1.region.node), serializeNode(v2.region.node)),
    text1: v1.text,
    text2: v2.text,
    blocks: { v1: v1.blocks.length, v2: v2.blocks.length },
  };
}

/** Render the complete self-contained report page */
export function renderReport(comparison: Comparison, options: ReportOptions = {}): string {
  return generateReportHtml(buildReportView(comparison, options));
}
