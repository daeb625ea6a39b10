/**
 * Output handlers for the report and the JSON summary.
 */

import { writeFileSync } from "node:fs";
import { resolve } from "node:path";
import type { Comparison } from "../core/pipeline.js";
import type { KeyedLink } from "../core/links.js";
import { generateReportHtml, type ReportView } from "../ui/template.js";
import { c, logSuccess } from "./colors.js";
import { computeStats, formatStats } from "./stats.js";

export interface OutputOptions {
  /** Target path; "-" means stdout */
  outFile: string;
  quiet: boolean;
  json: boolean;
  open: boolean;
}

// ─── JSON Output ────────────────────────────────────────────────────────────

function linkEntry(link: KeyedLink) {
  return { url: link.url, text: link.text, key: link.key };
}

export function generateJson(comparison: Comparison, similarity: number, version: string): string {
  const { v1, v2, links } = comparison;
  return JSON.stringify(
    {
      version,
      file1: v1.name,
      file2: v2.name,
      marker: comparison.marker,
      markerFound: { v1: v1.region.anchor !== null, v2: v2.region.anchor !== null },
      stats: computeStats(comparison, similarity),
      links: {
        removed: links.onlyInV1.map(linkEntry),
        added: links.onlyInV2.map(linkEntry),
        common: links.inBoth.map(linkEntry),
      },
    },
    null,
    2,
  );
}

// ─── Output Handlers ────────────────────────────────────────────────────────

function log(msg: string, quiet: boolean): void {
  if (!quiet) console.log(msg);
}

function emit(content: string, opts: OutputOptions, what: string): string | undefined {
  if (opts.outFile === "-") {
    process.stdout.write(content);
    return;
  }
  const outputPath = resolve(opts.outFile);
  writeFileSync(outputPath, content, "utf-8");
  if (!opts.quiet) logSuccess(`${what} written to: ${outputPath}`);
  return outputPath;
}

/**
 * Write the report (or the JSON summary) and print the summary block.
 * Returns the written path, or undefined when writing to stdout.
 */
export function outputComparison(
  comparison: Comparison,
  view: ReportView,
  opts: OutputOptions,
  version: string,
): string | undefined {
  if (opts.json) {
    return emit(generateJson(comparison, view.similarity, version) + "\n", opts, "JSON");
  }

  const outputPath = emit(generateReportHtml(view), opts, "Report");
  if (outputPath) {
    log(`\n${formatStats(computeStats(comparison, view.similarity))}`, opts.quiet);
    log(`${c.dim}Open the report in a browser to see the interactive comparison.${c.reset}`, opts.quiet || opts.open);
  }
  return outputPath;
}

export async function openInBrowser(path: string): Promise<void> {
  const mod = await import("open");
  await mod.default(path);
}
