import type { PropsWithChildren } from "@kitajs/html";
import type { KeyedLink, LinkComparison } from "../core/links.js";
import type { MarkupDiffRow } from "../core/markup-diff.js";
import { DIFF_CONFIG } from "../config.js";
import { formatPercent } from "../render/format.js";
import { themes, themeVars, type ThemeName } from "./themes.js";

/** Everything the page shows; built by renderReport */
export interface ReportView {
  file1: string;
  file2: string;
  marker: string;
  generatedAt: string;
  theme: ThemeName;
  /** Ratio in [0, 1] */
  similarity: number;
  links: LinkComparison;
  /** Pre-escaped character diff markup for each side */
  textDiff: { left: string; right: string };
  markupRows: MarkupDiffRow[];
  text1: string;
  text2: string;
  /** Number of text blocks found on each side */
  blocks: { v1: number; v2: number };
}

export const TABS = [
  { id: "side-by-side", label: "Side-by-Side Text" },
  { id: "links", label: "Links Comparison" },
  { id: "html-diff", label: "HTML Diff" },
  { id: "full-text", label: "Full Text" },
] as const;

// ── Components ─────────────────────────────────────────────────

function Header({ view }: { view: ReportView }) {
  return (
    <header class="header">
      <div class="header-top">
        <h1>Side-by-Side HTML Comparison</h1>
        <button class="theme-toggle" id="themeToggle" type="button" title="Switch theme" aria-label="Switch theme">
          ◐
        </button>
      </div>
      <p>
        <strong>File 1:</strong> <span safe>{view.file1}</span>
      </p>
      <p>
        <strong>File 2:</strong> <span safe>{view.file2}</span>
      </p>
      <p>
        <strong>Marker:</strong> <span safe>{view.marker}</span>
      </p>
      <p>
        <strong>Generated:</strong> <span safe>{view.generatedAt}</span>
      </p>
    </header>
  );
}

function StatBox({ label, value }: { label: string; value: string }) {
  return (
    <div class="stat-box">
      <div class="stat-label" safe>{label}</div>
      <div class="stat-value" safe>{value}</div>
    </div>
  );
}

function StatsBar({ view }: { view: ReportView }) {
  const { links } = view;
  return (
    <div class="stats-bar">
      <StatBox label="Text Similarity" value={formatPercent(view.similarity)} />
      <StatBox label="Links V1" value={String(links.totalV1)} />
      <StatBox label="Links V2" value={String(links.totalV2)} />
      <StatBox label="Common" value={String(links.inBoth.length)} />
      <StatBox label="Removed" value={String(links.onlyInV1.length)} />
      <StatBox label="Added" value={String(links.onlyInV2.length)} />
    </div>
  );
}

function SimilarityGauge({ similarity }: { similarity: number }) {
  const percent = formatPercent(similarity);
  return (
    <div class="similarity-bar">
      <div class="similarity-fill" style={`width: ${percent}`} safe>
        {percent + " Similar"}
      </div>
    </div>
  );
}

function TabBar() {
  return (
    <nav class="tabs">
      {TABS.map((tab, i) => (
        <button class={i === 0 ? "tab active" : "tab"} data-tab={tab.id} type="button" safe>
          {tab.label}
        </button>
      ))}
    </nav>
  );
}

function TabPanel({ id, children }: PropsWithChildren<{ id: string }>) {
  return (
    <section id={id} class={id === TABS[0].id ? "tab-content active" : "tab-content"}>
      {children}
    </section>
  );
}

function VersionPanel({
  side,
  title,
  children,
}: PropsWithChildren<{ side: "v1" | "v2"; title: string }>) {
  return (
    <div class={`version-panel ${side}`}>
      <div class="panel-header" safe>{title}</div>
      {children}
    </div>
  );
}

function Legend() {
  return (
    <div class="legend">
      <div class="legend-item">
        <div class="legend-box diff-removed"></div>
        <span>Removed from V1</span>
      </div>
      <div class="legend-item">
        <div class="legend-box diff-added"></div>
        <span>Added in V2</span>
      </div>
      <div class="legend-item">
        <div class="legend-box diff-changed"></div>
        <span>Changed</span>
      </div>
    </div>
  );
}

function SideBySideTab({ view }: { view: ReportView }) {
  return (
    <TabPanel id="side-by-side">
      <h2 class="section-title">Side-by-Side Text Comparison</h2>
      <Legend />
      <div class="comparison-grid">
        <VersionPanel side="v1" title="Version 1 (Original)">
          <div class="content-box">{view.textDiff.left as "safe"}</div>
        </VersionPanel>
        <VersionPanel side="v2" title="Version 2 (Updated)">
          <div class="content-box">{view.textDiff.right as "safe"}</div>
        </VersionPanel>
      </div>
    </TabPanel>
  );
}

function LinkItem({ link, kind }: { link: KeyedLink; kind: "removed" | "added" | "common" }) {
  return (
    <li class={`link-item ${kind}`} data-key={link.key}>
      <div class="link-text" safe>{link.text || "(no text)"}</div>
      <div class="link-url" safe>{link.url}</div>
    </li>
  );
}

function LinkList({
  links,
  kind,
  empty,
}: {
  links: KeyedLink[];
  kind: "removed" | "added";
  empty: string;
}) {
  return (
    <ul class="link-list">
      {links.length === 0 ? (
        <li class="link-item empty" safe>{empty}</li>
      ) : (
        links.map((link) => <LinkItem link={link} kind={kind} />)
      )}
    </ul>
  );
}

function CommonLinkList({ links }: { links: KeyedLink[] }) {
  const limit = DIFF_CONFIG.COMMON_LINKS_LIMIT;
  const hidden = links.length - limit;
  return (
    <ul class="link-list">
      {links.slice(0, limit).map((link) => <LinkItem link={link} kind="common" />)}
      {hidden > 0 && <li class="link-item more" safe>{`… and ${hidden} more`}</li>}
    </ul>
  );
}

function LinksTab({ links }: { links: LinkComparison }) {
  return (
    <TabPanel id="links">
      <h2 class="section-title">Links Comparison</h2>
      <div class="comparison-grid">
        <VersionPanel side="v1" title="Removed Links">
          <span class="badge badge-danger">{String(links.onlyInV1.length)}</span>
          <div class="scrollable-section">
            <LinkList links={links.onlyInV1} kind="removed" empty="No links removed" />
          </div>
        </VersionPanel>
        <VersionPanel side="v2" title="Added Links">
          <span class="badge badge-success">{String(links.onlyInV2.length)}</span>
          <div class="scrollable-section">
            <LinkList links={links.onlyInV2} kind="added" empty="No links added" />
          </div>
        </VersionPanel>
      </div>
      <h3 class="section-title">
        Common Links <span class="badge badge-info">{String(links.inBoth.length)}</span>
      </h3>
      <div class="scrollable-section">
        <CommonLinkList links={links.inBoth} />
      </div>
    </TabPanel>
  );
}

function MarkupRow({ row }: { row: MarkupDiffRow }) {
  if (row.kind === "separator") {
    return (
      <tr class="diff-separator">
        <td colspan="2">{row.leftHtml as "safe"}</td>
        <td colspan="2">{row.rightHtml as "safe"}</td>
      </tr>
    );
  }
  return (
    <tr class={`diff-line ${row.kind}`}>
      <td class="diff-lineno">{row.leftLine === undefined ? "" : String(row.leftLine)}</td>
      <td class="diff-code">{row.leftHtml as "safe"}</td>
      <td class="diff-lineno">{row.rightLine === undefined ? "" : String(row.rightLine)}</td>
      <td class="diff-code">{row.rightHtml as "safe"}</td>
    </tr>
  );
}

function MarkupDiffTab({ rows }: { rows: MarkupDiffRow[] }) {
  return (
    <TabPanel id="html-diff">
      <h2 class="section-title">HTML Source Diff</h2>
      <div class="note">
        <strong>Note:</strong> This shows a line-by-line comparison of the HTML source code,
        with three lines of context around each change. Colors indicate additions, deletions, and changes.
      </div>
      <div class="table-scroll">
        <table class="diff">
          <thead>
            <tr>
              <th class="diff-lineno"></th>
              <th>Version 1</th>
              <th class="diff-lineno"></th>
              <th>Version 2</th>
            </tr>
          </thead>
          <tbody>
            {rows.length === 0 ? (
              <tr class="diff-separator">
                <td colspan="4">No Differences Found</td>
              </tr>
            ) : (
              rows.map((row) => <MarkupRow row={row} />)
            )}
          </tbody>
        </table>
      </div>
    </TabPanel>
  );
}

function FullTextTab({ view }: { view: ReportView }) {
  return (
    <TabPanel id="full-text">
      <h2 class="section-title">Full Text Content</h2>
      <p class="summary-line" safe>
        {`Text blocks: ${view.blocks.v1} in version 1, ${view.blocks.v2} in version 2`}
      </p>
      <div class="comparison-grid">
        <VersionPanel side="v1" title="Version 1 Full Text">
          <div class="content-box" safe>{view.text1}</div>
        </VersionPanel>
        <VersionPanel side="v2" title="Version 2 Full Text">
          <div class="content-box" safe>{view.text2}</div>
        </VersionPanel>
      </div>
    </TabPanel>
  );
}

// ── Public API ──────────────────────────────────────────────────

export function generateReportHtml(view: ReportView): string {
  const lightVars = themeVars(themes.light);
  const darkVars = themeVars(themes.dark);

  const page = (
    <html lang="en" data-theme={view.theme}>
      <head>
        <meta charset="UTF-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1.0" />
        <title safe>{"Side-by-Side HTML Comparison: " + view.file1 + " ↔ " + view.file2}</title>
        <style>{cssText(lightVars, darkVars) as "safe"}</style>
      </head>
      <body>
        <Header view={view} />
        <main class="container">
          <StatsBar view={view} />
          <SimilarityGauge similarity={view.similarity} />
          <TabBar />
          <SideBySideTab view={view} />
          <LinksTab links={view.links} />
          <MarkupDiffTab rows={view.markupRows} />
          <FullTextTab view={view} />
        </main>
        <script>{SCRIPT as "safe"}</script>
      </body>
    </html>
  );

  return "<!DOCTYPE html>" + page;
}

// ── CSS ─────────────────────────────────────────────────────────

function cssText(lightVars: string, darkVars: string): string {
  return `
  [data-theme="light"] { ${lightVars} }
  [data-theme="dark"] { ${darkVars} }

  * { box-sizing: border-box; }

  body {
    font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, Oxygen, Ubuntu, Cantarell, sans-serif;
    margin: 0;
    padding: 0;
    background: var(--hd-bg);
    color: var(--hd-text);
    transition: background 0.3s ease, color 0.3s ease;
  }

  .header {
    background: linear-gradient(135deg, var(--hd-accent-start) 0%, var(--hd-accent-end) 100%);
    color: var(--hd-accent-text);
    padding: 30px;
    box-shadow: 0 2px 10px rgba(0,0,0,0.1);
  }
  .header-top { display: flex; justify-content: space-between; align-items: center; }
  .header h1 { margin: 0 0 10px 0; font-size: 2.5em; }
  .header p { margin: 5px 0; opacity: 0.9; }

  .theme-toggle {
    background: rgba(255,255,255,0.15);
    color: inherit;
    border: 1px solid rgba(255,255,255,0.4);
    border-radius: 50%;
    width: 36px;
    height: 36px;
    font-size: 18px;
    cursor: pointer;
  }

  .container { max-width: 1800px; margin: 0 auto; padding: 20px; }

  .stats-bar {
    background: var(--hd-surface);
    padding: 20px;
    border-radius: 10px;
    margin-bottom: 20px;
    box-shadow: 0 2px 10px rgba(0,0,0,0.1);
    display: flex;
    justify-content: space-around;
    flex-wrap: wrap;
    gap: 15px;
  }

  .stat-box {
    text-align: center;
    padding: 15px 25px;
    background: linear-gradient(135deg, var(--hd-stat-start) 0%, var(--hd-stat-end) 100%);
    border-radius: 8px;
    min-width: 140px;
  }
  .stat-label {
    font-size: 0.85em;
    color: var(--hd-text-muted);
    text-transform: uppercase;
    letter-spacing: 1px;
    margin-bottom: 5px;
  }
  .stat-value { font-size: 2em; font-weight: bold; color: var(--hd-heading); }

  .similarity-bar {
    width: 100%;
    height: 40px;
    background: var(--hd-gauge-track);
    border-radius: 20px;
    overflow: hidden;
    margin: 20px 0;
  }
  .similarity-fill {
    height: 100%;
    background: linear-gradient(90deg, #e74c3c 0%, #f39c12 30%, #f1c40f 50%, #2ecc71 100%);
    display: flex;
    align-items: center;
    justify-content: center;
    color: white;
    font-weight: bold;
    font-size: 1.1em;
    white-space: nowrap;
  }

  .tabs {
    display: flex;
    gap: 10px;
    margin-bottom: 20px;
    background: var(--hd-surface);
    padding: 15px;
    border-radius: 10px;
    box-shadow: 0 2px 10px rgba(0,0,0,0.1);
  }
  .tab {
    padding: 12px 25px;
    background: var(--hd-surface-alt);
    color: var(--hd-text);
    border: 1px solid var(--hd-border);
    border-radius: 8px;
    cursor: pointer;
    font-size: 1em;
    font-weight: 600;
  }
  .tab:hover { border-color: var(--hd-accent-start); }
  .tab.active {
    background: linear-gradient(135deg, var(--hd-accent-start) 0%, var(--hd-accent-end) 100%);
    color: var(--hd-accent-text);
  }

  .tab-content {
    display: none;
    background: var(--hd-surface);
    padding: 30px;
    border-radius: 10px;
    box-shadow: 0 2px 10px rgba(0,0,0,0.1);
  }
  .tab-content.active { display: block; }

  .comparison-grid { display: grid; grid-template-columns: 1fr 1fr; gap: 20px; margin-top: 20px; }

  .version-panel {
    background: var(--hd-surface-alt);
    border-radius: 10px;
    padding: 20px;
    border: 2px solid var(--hd-border);
  }
  .version-panel.v1 { border-left: 4px solid var(--hd-v1); }
  .version-panel.v2 { border-left: 4px solid var(--hd-v2); }
  .panel-header {
    display: inline-block;
    font-size: 1.3em;
    font-weight: bold;
    margin-bottom: 15px;
    padding-bottom: 10px;
  }
  .version-panel.v1 .panel-header { color: var(--hd-v1); }
  .version-panel.v2 .panel-header { color: var(--hd-v2); }

  .content-box {
    background: var(--hd-surface);
    padding: 20px;
    border-radius: 8px;
    max-height: 600px;
    overflow-y: auto;
    font-family: 'Courier New', monospace;
    font-size: 0.9em;
    line-height: 1.6;
    white-space: pre-wrap;
    word-wrap: break-word;
  }

  .diff-removed {
    background: var(--hd-removed-bg);
    color: var(--hd-removed-text);
    border-radius: 3px;
    text-decoration: line-through;
  }
  .diff-added {
    background: var(--hd-added-bg);
    color: var(--hd-added-text);
    border-radius: 3px;
    font-weight: 600;
  }
  .diff-changed {
    background: var(--hd-changed-bg);
    color: var(--hd-changed-text);
    border-radius: 3px;
  }

  .link-list { list-style: none; padding: 0; margin: 0; }
  .link-item {
    padding: 12px;
    margin: 8px 0;
    background: var(--hd-surface);
    border-radius: 6px;
    border-left: 4px solid var(--hd-info);
  }
  .link-item.removed { border-left-color: var(--hd-v1); background: var(--hd-removed-bg); }
  .link-item.added { border-left-color: var(--hd-v2); background: var(--hd-added-bg); }
  .link-text { font-weight: 600; margin-bottom: 4px; }
  .link-url {
    font-family: 'Courier New', monospace;
    font-size: 0.85em;
    color: var(--hd-text-muted);
    word-break: break-all;
  }

  .section-title {
    font-size: 1.5em;
    font-weight: bold;
    margin: 30px 0 15px 0;
    color: var(--hd-heading);
    border-bottom: 3px solid var(--hd-info);
    padding-bottom: 10px;
  }
  .summary-line { color: var(--hd-text-muted); }

  .badge {
    display: inline-block;
    padding: 4px 10px;
    border-radius: 12px;
    font-size: 0.8em;
    font-weight: 600;
    margin-left: 10px;
    color: white;
  }
  .badge-danger { background: var(--hd-v1); }
  .badge-success { background: var(--hd-v2); }
  .badge-info { background: var(--hd-info); }

  .note {
    background: var(--hd-note-bg);
    border-left: 4px solid var(--hd-note-border);
    padding: 15px;
    margin: 20px 0;
    border-radius: 5px;
  }

  .legend {
    display: flex;
    gap: 20px;
    margin: 20px 0;
    padding: 15px;
    background: var(--hd-surface-alt);
    border-radius: 8px;
  }
  .legend-item { display: flex; align-items: center; gap: 8px; }
  .legend-box { width: 20px; height: 20px; border-radius: 4px; }

  .scrollable-section {
    max-height: 500px;
    overflow-y: auto;
    padding: 15px;
    background: var(--hd-surface-alt);
    border-radius: 8px;
    margin: 10px 0;
  }

  .table-scroll { overflow-x: auto; }
  table.diff {
    width: 100%;
    border-collapse: collapse;
    font-family: 'Courier New', monospace;
    font-size: 0.85em;
    table-layout: fixed;
  }
  table.diff th { text-align: left; padding: 6px 8px; border-bottom: 2px solid var(--hd-border); }
  table.diff td { padding: 2px 8px; vertical-align: top; white-space: pre-wrap; word-break: break-all; }
  table.diff .diff-lineno {
    width: 4em;
    background: var(--hd-line-number-bg);
    color: var(--hd-text-muted);
    text-align: right;
  }
  table.diff tr.diff-separator td {
    background: var(--hd-separator-bg);
    color: var(--hd-text-muted);
    font-weight: bold;
    text-align: center;
  }
  table.diff tr.removed td:nth-child(2) { background: var(--hd-removed-bg); }
  table.diff tr.added td:nth-child(4) { background: var(--hd-added-bg); }
`;
}

// ── Client Script ───────────────────────────────────────────────

const SCRIPT = `
(function() {
  const tabs = document.querySelectorAll('.tab');
  const panels = document.querySelectorAll('.tab-content');

  tabs.forEach(tab => {
    tab.addEventListener('click', () => {
      tabs.forEach(t => t.classList.remove('active'));
      panels.forEach(p => p.classList.remove('active'));
      tab.classList.add('active');
      const panel = document.getElementById(tab.getAttribute('data-tab'));
      if (panel) panel.classList.add('active');
    });
  });

  const root = document.documentElement;
  document.getElementById('themeToggle').addEventListener('click', () => {
    root.setAttribute('data-theme', root.getAttribute('data-theme') === 'dark' ? 'light' : 'dark');
  });
})();
`;
