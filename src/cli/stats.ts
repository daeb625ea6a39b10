/**
 * Comparison statistics computation and formatting.
 */

import type { Comparison } from "../core/pipeline.js";
import { formatPercent } from "../render/format.js";
import { c } from "./colors.js";

export interface ComparisonStats {
  similarity: number;
  linksV1: number;
  linksV2: number;
  linksRemoved: number;
  linksAdded: number;
  linksCommon: number;
  blocksV1: number;
  blocksV2: number;
}

export function computeStats(comparison: Comparison, similarity: number): ComparisonStats {
  const { links, v1, v2 } = comparison;
  return {
    similarity,
    linksV1: links.totalV1,
    linksV2: links.totalV2,
    linksRemoved: links.onlyInV1.length,
    linksAdded: links.onlyInV2.length,
    linksCommon: links.inBoth.length,
    blocksV1: v1.blocks.length,
    blocksV2: v2.blocks.length,
  };
}

/** Summary block printed after the report is written */
export function formatStats(stats: ComparisonStats): string {
  const rule = "=".repeat(60);
  const row = (label: string, value: string) => `${label.padEnd(26)}${value}`;
  const totalChanges = stats.linksRemoved + stats.linksAdded;

  return [
    rule,
    `${c.bold}SUMMARY${c.reset}`,
    rule,
    row("Text similarity:", formatPercent(stats.similarity)),
    row("Links removed (V1→V2):", `${c.red}${stats.linksRemoved}${c.reset}`),
    row("Links added (V1→V2):", `${c.green}${stats.linksAdded}${c.reset}`),
    row("Links unchanged:", String(stats.linksCommon)),
    row("Total changes:", String(totalChanges)),
    row("Text blocks (V1/V2):", `${stats.blocksV1}/${stats.blocksV2}`),
    rule,
  ].join("\n");
}
