/**
 * Configuration constants for extraction, comparison and rendering.
 * Centralizes magic numbers and tag policies for easier tuning and documentation.
 */

/** Marker phrase used when none is given on the command line */
export const DEFAULT_MARKER = "Course Syllabus";

/** Report file written when --out is not given */
export const DEFAULT_OUTPUT_FILE = "sidebyside_comparison.html";

/**
 * Region extraction policy
 */
export const REGION_CONFIG = {
  /** Elements that may hold the marker phrase, checked in document order */
  MARKER_TAGS: ["b", "strong", "h1", "h2", "h3", "h4", "p", "font"],
  /**
   * Structural containers, in the order they are listed in the climb rule.
   * Climbing from the marker stops at the child of the first ancestor in this list.
   */
  CONTAINER_TAGS: ["td", "div", "body", "html"],
} as const;

/**
 * Text extraction thresholds
 */
export const TEXT_CONFIG = {
  /** Tags that yield a text block */
  BLOCK_TAGS: ["p", "h1", "h2", "h3", "h4", "h5", "h6", "li", "td", "th", "div"],
  /** Blocks need strictly more visible characters than this */
  MIN_TEXT_BLOCK_LENGTH: 10,
  /** Elements whose contents never count as visible text */
  NON_TEXT_TAGS: ["script", "style", "template"],
} as const;

/**
 * Diff and report thresholds
 */
export const DIFF_CONFIG = {
  /** Code points of each text fed to the character-level diff */
  TEXT_DIFF_CHAR_LIMIT: 5000,
  /** Unchanged lines shown around each change in the markup diff */
  MARKUP_CONTEXT_LINES: 3,
  /** Entries shown in the common links list before the "more" suffix */
  COMMON_LINKS_LIMIT: 50,
} as const;

/**
 * Process exit codes
 */
export const EXIT_CODES = {
  OK: 0,
  ERROR: 1,
  LOAD_FAILURE: 2,
} as const;
