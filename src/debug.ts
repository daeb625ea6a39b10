/**
 * Shared debug logging utility.
 * Enable with --debug flag or by setting globalThis.__HTML_DIFF_DEBUG__ = true
 */

type DebugFlag = "__HTML_DIFF_DEBUG__" | "__HTML_DIFF_VERBOSE__";

function isFlagSet(flag: DebugFlag): boolean {
  return !!(globalThis as Record<string, unknown>)[flag];
}

export function setDebugFlag(flag: DebugFlag, enabled: boolean): void {
  (globalThis as Record<string, unknown>)[flag] = enabled;
}

/**
 * Check if debug mode is enabled.
 */
function isDebugEnabled(): boolean {
  return isFlagSet("__HTML_DIFF_DEBUG__");
}

/**
 * Check if stage timings should be printed (--verbose or --debug).
 */
function isVerboseEnabled(): boolean {
  return isFlagSet("__HTML_DIFF_VERBOSE__") || isDebugEnabled();
}

/**
 * Create a debug logger with an optional module prefix.
 * @param prefix Optional prefix to identify the module (e.g., "region")
 */
export function createDebugLogger(prefix?: string) {
  const tag = prefix ? `[DEBUG ${prefix}]` : "[DEBUG]";
  return (...args: unknown[]) => {
    if (isDebugEnabled()) {
      console.error(tag, ...args);
    }
  };
}

/**
 * Format a timestamp as HH:MM:SS.mmm
 */
function formatTimestamp(date: Date): string {
  const h = date.getHours().toString().padStart(2, "0");
  const m = date.getMinutes().toString().padStart(2, "0");
  const s = date.getSeconds().toString().padStart(2, "0");
  const ms = date.getMilliseconds().toString().padStart(3, "0");
  return `${h}:${m}:${s}.${ms}`;
}

/**
 * Format duration in milliseconds to a readable string.
 */
function formatDuration(ms: number): string {
  if (ms < 1) return `${(ms * 1000).toFixed(0)}µs`;
  if (ms < 1000) return `${ms.toFixed(1)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

/**
 * Time a synchronous function and log the result in verbose mode.
 * @param label Label for the timing output
 * @param fn Function to time
 * @param prefix Optional prefix for the log (stage owner)
 */
function timeSync<T>(label: string, fn: () => T, prefix?: string): T {
  if (!isVerboseEnabled()) {
    return fn();
  }

  const tag = prefix ? `[TIME ${prefix}]` : "[TIME]";
  const start = performance.now();
  const startTime = new Date();

  try {
    const result = fn();
    const elapsed = performance.now() - start;
    console.error(`${tag} ${formatTimestamp(startTime)} ${label}: ${formatDuration(elapsed)}`);
    return result;
  } catch (err) {
    const elapsed = performance.now() - start;
    console.error(`${tag} ${formatTimestamp(startTime)} ${label}: FAILED after ${formatDuration(elapsed)}`);
    throw err;
  }
}

/**
 * Create a scoped timer for measuring multiple stages.
 * @param prefix Optional prefix for all logs
 */
export function createTimer(prefix?: string) {
  const tag = prefix ? `[TIME ${prefix}]` : "[TIME]";
  const overallStart = performance.now();

  return {
    /**
     * Time a synchronous stage.
     */
    time<T>(label: string, fn: () => T): T {
      return timeSync(label, fn, prefix);
    },

    /**
     * Log total elapsed time.
     */
    done(label = "Total"): void {
      if (isVerboseEnabled()) {
        const elapsed = performance.now() - overallStart;
        console.error(`${tag} ${formatTimestamp(new Date())} ${label}: ${formatDuration(elapsed)}`);
      }
    },
  };
}
