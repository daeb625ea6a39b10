#!/usr/bin/env node

/**
 * CLI entry point using commander.js.
 * Wires together loading, comparison, report rendering and output.
 */

import { program } from "commander";
import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { loadDocument, LoadError, type LoadedDocument } from "../text/parse.js";
import { compareDocuments, type Comparison } from "../core/pipeline.js";
import { buildReportView } from "../render/report.js";
import { isThemeName } from "../ui/themes.js";
import { DEFAULT_MARKER, DEFAULT_OUTPUT_FILE, EXIT_CODES } from "../config.js";
import { createTimer, setDebugFlag } from "../debug.js";
import { c, logError, logInfo, logWarn } from "./colors.js";
import { outputComparison, openInBrowser, type OutputOptions } from "./output.js";

interface CliOptions {
  out: string;
  base1?: string;
  base2?: string;
  json?: boolean;
  theme: string;
  open?: boolean;
  quiet?: boolean;
  verbose?: boolean;
  debug?: boolean;
}

// ─── Version ─────────────────────────────────────────────────────────────────

function getVersion(): string {
  // Sources live two levels below the package root, compiled output three
  for (const rel of ["../../package.json", "../../../package.json"]) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(new URL(rel, import.meta.url), "utf-8"));
      if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
        return pkg.version;
      }
    } catch {
      // try the next location
    }
  }
  return "unknown";
}

const VERSION = getVersion();

// ─── Steps ───────────────────────────────────────────────────────────────────

function loadBoth(file1: string, file2: string): [LoadedDocument, LoadedDocument] | null {
  try {
    return [loadDocument(resolve(file1)), loadDocument(resolve(file2))];
  } catch (err) {
    if (err instanceof LoadError) {
      logError(err.message, "Check that both files exist and are readable");
      return null;
    }
    throw err;
  }
}

function reportMarker(comparison: Comparison, quiet: boolean): void {
  for (const side of [comparison.v1, comparison.v2]) {
    const anchor = side.region.anchor;
    if (!anchor) {
      logWarn(`Marker "${comparison.marker}" not found in ${side.name}; comparing the whole body`);
    } else if (!quiet) {
      logInfo(`  ${side.name}: marker found in <${anchor.tagName}>`);
    }
  }
}

// ─── Command Setup ───────────────────────────────────────────────────────────

program
  .name("html-diff")
  .description("Side-by-side comparison of two HTML snapshots, starting at a marker phrase")
  .version(VERSION, "-v, --version")
  .argument("[args...]", "<file1> <file2> [marker]")
  .option("-o, --out <file>", "Write the report to file (use - for stdout)", DEFAULT_OUTPUT_FILE)
  .option("--base1 <url>", "Base URL for resolving relative links in file1")
  .option("--base2 <url>", "Base URL for resolving relative links in file2")
  .option("-j, --json", "Write a JSON summary instead of the HTML report")
  .option("-t, --theme <name>", "Report theme: light (default) or dark", "light")
  .option("--open", "Open the report in the browser")
  .option("-q, --quiet", "Suppress non-essential output")
  .option("--verbose", "Show timing info for each stage")
  .option("--debug", "Enable granular debug output");

program.addHelpText(
  "after",
  `
${c.bold}Arguments${c.reset}
  file1     Original version of the page
  file2     Updated version of the page
  marker    Phrase after which content is compared (default: "${DEFAULT_MARKER}")

${c.bold}Examples${c.reset}
  ${c.dim}# Compare two snapshots after the default marker${c.reset}
  html-diff version1.html version2.html

  ${c.dim}# Custom marker, resolve relative links, dark report${c.reset}
  html-diff --base1 https://example.com/ --base2 https://example.com/ -t dark old.html new.html "Reading List"

  ${c.dim}# Summary as JSON on stdout${c.reset}
  html-diff --json -o - old.html new.html
`,
);

// ─── Main ────────────────────────────────────────────────────────────────────

async function main() {
  program.parse();

  const options = program.opts<CliOptions>();
  const args = program.args;

  if (args.length < 2) {
    program.outputHelp();
    return;
  }

  if (options.verbose) setDebugFlag("__HTML_DIFF_VERBOSE__", true);
  if (options.debug) setDebugFlag("__HTML_DIFF_DEBUG__", true);

  const theme = options.theme;
  if (!isThemeName(theme)) {
    logError(`Unknown theme "${theme}"`, "Available themes: light, dark");
    process.exitCode = EXIT_CODES.ERROR;
    return;
  }

  const [file1, file2] = args;
  const marker = args[2] ?? DEFAULT_MARKER;
  const outputOpts: OutputOptions = {
    outFile: options.out,
    // stdout carries the artifact, keep it clean
    quiet: Boolean(options.quiet) || options.out === "-",
    json: Boolean(options.json),
    open: Boolean(options.open),
  };
  const quiet = outputOpts.quiet;

  if (!quiet) console.log(`${c.bold}Side-by-Side HTML Comparison${c.reset}\n`);

  const docs = loadBoth(file1, file2);
  if (!docs) {
    process.exitCode = EXIT_CODES.LOAD_FAILURE;
    return;
  }
  const [doc1, doc2] = docs;
  if (!quiet) logInfo(`Loaded ${doc1.name} and ${doc2.name}`);

  const timer = createTimer("run");
  if (!quiet) logInfo(`Extracting content after marker: "${marker}"`);
  const comparison = timer.time("compare", () =>
    compareDocuments(doc1, doc2, { marker, baseUrl1: options.base1, baseUrl2: options.base2 }),
  );
  reportMarker(comparison, quiet);

  if (!quiet) {
    logInfo(`  Links: ${comparison.v1.links.length} in ${doc1.name}, ${comparison.v2.links.length} in ${doc2.name}`);
    logInfo(`  Text: ${comparison.v1.text.length} / ${comparison.v2.text.length} characters`);
  }

  const view = timer.time("render", () => buildReportView(comparison, { theme }));
  const outputPath = outputComparison(comparison, view, outputOpts, VERSION);
  timer.done();

  if (outputOpts.open && outputPath && !outputOpts.json) {
    await openInBrowser(outputPath);
  }
}

main().catch((err: unknown) => {
  logError(err instanceof Error ? err.message : String(err));
  process.exitCode = EXIT_CODES.ERROR;
});
