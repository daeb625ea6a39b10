/**
 * HTML utilities for rendering diff output.
 */

/**
 * Escape HTML entities so document text can never be read as report markup.
 */
export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/** Wrap escaped text in a span with the given class; empty text yields nothing */
export function wrapSpan(className: string, text: string): string {
  if (text === "") return "";
  return `<span class="${className}">${escapeHtml(text)}</span>`;
}
