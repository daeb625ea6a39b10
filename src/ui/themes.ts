export interface Theme {
  // Surfaces
  bg: string;
  surface: string;
  surfaceAlt: string;
  // Text
  text: string;
  textMuted: string;
  heading: string;
  // Borders
  border: string;
  // Header and active tab gradient
  accentStart: string;
  accentEnd: string;
  accentText: string;
  // Stat boxes
  statStart: string;
  statEnd: string;
  // Version panels
  v1: string;
  v2: string;
  // Diff: removed
  removedBg: string;
  removedText: string;
  // Diff: added
  addedBg: string;
  addedText: string;
  // Diff: changed
  changedBg: string;
  changedText: string;
  // Links and badges
  info: string;
  // Notes
  noteBg: string;
  noteBorder: string;
  // Similarity gauge
  gaugeTrack: string;
  // Markup diff table
  lineNumberBg: string;
  separatorBg: string;
}

// ── Light theme ──────────────────────────────────────────────────
// Violet header on a pale gray page
export const light: Theme = {
  bg: "#f5f5f5",
  surface: "#ffffff",
  surfaceAlt: "#fafafa",
  text: "#2c3e50",
  textMuted: "#666666",
  heading: "#2c3e50",
  border: "#e0e0e0",
  accentStart: "#667eea",
  accentEnd: "#764ba2",
  accentText: "#ffffff",
  statStart: "#f5f7fa",
  statEnd: "#c3cfe2",
  v1: "#e74c3c",
  v2: "#2ecc71",
  removedBg: "#ffecec",
  removedText: "#c0392b",
  addedBg: "#e8f5e9",
  addedText: "#27ae60",
  changedBg: "#fff3cd",
  changedText: "#856404",
  info: "#3498db",
  noteBg: "#fff3cd",
  noteBorder: "#ffc107",
  gaugeTrack: "#e0e0e0",
  lineNumberBg: "#eeeeee",
  separatorBg: "#e8eaf6",
};

// ── Dark theme ───────────────────────────────────────────────────
// Charcoal surfaces, same accent hues toned down
export const dark: Theme = {
  bg: "#1f1f23",
  surface: "#2a2a30",
  surfaceAlt: "#25252a",
  text: "#d8d8de",
  textMuted: "#9a9aa6",
  heading: "#e6e6ee",
  border: "#3c3c44",
  accentStart: "#4f5fc4",
  accentEnd: "#5e3c86",
  accentText: "#f4f4fa",
  statStart: "#2f3240",
  statEnd: "#3a3f57",
  v1: "#d9645a",
  v2: "#4fbf7f",
  removedBg: "rgba(217, 100, 90, 0.18)",
  removedText: "#f0a39c",
  addedBg: "rgba(79, 191, 127, 0.18)",
  addedText: "#8ee0b0",
  changedBg: "rgba(230, 190, 80, 0.18)",
  changedText: "#f0d48a",
  info: "#5aa7de",
  noteBg: "rgba(230, 190, 80, 0.12)",
  noteBorder: "#c9a227",
  gaugeTrack: "#3c3c44",
  lineNumberBg: "#303036",
  separatorBg: "#33354a",
};

export const themes = { light, dark } as const;
export type ThemeName = keyof typeof themes;

export function isThemeName(name: string): name is ThemeName {
  return Object.prototype.hasOwnProperty.call(themes, name);
}

/** Generate CSS custom-property declarations for a theme. */
export function themeVars(t: Theme): string {
  return Object.entries(t)
    .map(([k, v]) => `--hd-${camel2kebab(k)}: ${v};`)
    .join("\n    ");
}

function camel2kebab(s: string): string {
  return s.replace(/[A-Z]/g, (m) => `-${m.toLowerCase()}`);
}
