/**
 * Link extraction, URL normalization and presence-based link comparison.
 */
import type { Element } from "hast";
import { getText } from "../text/extract.js";
import { isElement } from "../text/parse.js";
import type { ContentRegion } from "./region.js";

export interface LinkRecord {
  /** href as authored */
  url: string;
  /** Visible anchor text, possibly empty */
  text: string;
}

export interface KeyedLink extends LinkRecord {
  /** Normalized url used for comparison */
  key: string;
}

export interface LinkComparison {
  onlyInV1: KeyedLink[];
  onlyInV2: KeyedLink[];
  /** Links present on both sides, represented by the v1 record */
  inBoth: KeyedLink[];
  /** Distinct normalized keys on each side */
  totalV1: number;
  totalV2: number;
}

/** Raised when a url cannot be broken into scheme, host and path */
export class NormalizationError extends Error {
  readonly url: string;

  constructor(url: string, reason: string) {
    super(`Cannot normalize url "${url}": ${reason}`);
    this.name = "NormalizationError";
    this.url = url;
  }
}

// ─── Extraction ──────────────────────────────────────────────────────────────

/**
 * Collect every <a> with a non-empty href below the region root, in document
 * order. Duplicates are kept; deduplication happens by normalized key.
 */
export function extractLinks(region: ContentRegion): LinkRecord[] {
  const links: LinkRecord[] = [];

  const visit = (el: Element) => {
    for (const child of el.children) {
      if (!isElement(child)) continue;
      if (child.tagName === "a") {
        const href = child.properties["href"];
        if (typeof href === "string" && href.trim() !== "") {
          links.push({ url: href, text: getText(child, { strip: true }) });
        }
      }
      visit(child);
    }
  };

  visit(region.node);
  return links;
}

// ─── Normalization ───────────────────────────────────────────────────────────

interface UrlParts {
  scheme: string;
  host: string;
  path: string;
  query: string;
}

interface ParsedUrl extends UrlParts {
  /** The url carried a `//` authority, possibly empty */
  hasAuthority: boolean;
}

const SCHEME_RE = /^[a-zA-Z][a-zA-Z0-9+.-]*$/;
// RFC 3986, appendix B
const URL_RE = /^(?:([^:/?#]+):)?(\/\/([^/?#]*))?([^?#]*)(?:\?([^#]*))?(?:#.*)?$/s;
const SCHEMELESS_RE = /^(\/\/([^/?#]*))?([^?#]*)(?:\?([^#]*))?(?:#.*)?$/s;

function parseUrl(url: string): ParsedUrl {
  let parsed: ParsedUrl;

  const full = URL_RE.exec(url);
  if (full && full[1] !== undefined && SCHEME_RE.test(full[1])) {
    parsed = {
      scheme: full[1].toLowerCase(),
      host: full[3] ?? "",
      path: full[4] ?? "",
      query: full[5] ?? "",
      hasAuthority: full[2] !== undefined,
    };
  } else {
    const rest = SCHEMELESS_RE.exec(url);
    if (!rest) throw new NormalizationError(url, "unparseable");
    parsed = {
      scheme: "",
      host: rest[2] ?? "",
      path: rest[3] ?? "",
      query: rest[4] ?? "",
      hasAuthority: rest[1] !== undefined,
    };
  }

  if (parsed.host.includes("[") !== parsed.host.includes("]")) {
    throw new NormalizationError(url, "invalid IPv6 host");
  }
  return parsed;
}

/**
 * Split a url into scheme, host, path and query. Relative urls are valid and
 * yield empty scheme and host.
 */
export function splitUrl(url: string): UrlParts {
  const { scheme, host, path, query } = parseUrl(url);
  return { scheme, host, path, query };
}

/** Resolve `.` and `..` segments (RFC 3986, 5.2.4) */
export function removeDotSegments(path: string): string {
  const input = path.split("/");
  const output: string[] = [];

  input.forEach((segment, i) => {
    const last = i === input.length - 1;
    if (segment === "." || segment === "..") {
      // never pop the empty segment that marks an absolute path
      if (segment === ".." && output.length > 0 && !(output.length === 1 && output[0] === "")) {
        output.pop();
      }
      if (last) output.push("");
      return;
    }
    output.push(segment);
  });

  return output.join("/");
}

function mergePaths(base: ParsedUrl, refPath: string): string {
  if (base.hasAuthority && base.path === "") return `/${refPath}`;
  return base.path.slice(0, base.path.lastIndexOf("/") + 1) + refPath;
}

/**
 * Resolve a reference against a base (RFC 3986, 5.2.2) without re-encoding
 * either. A reference with its own, different scheme is returned as is; a base
 * without scheme or host leaves relative references relative.
 */
export function resolveReference(ref: string, baseUrl: string): UrlParts {
  const r = parseUrl(ref);
  const base = parseUrl(baseUrl);
  if (r.scheme && r.scheme !== base.scheme) {
    return { scheme: r.scheme, host: r.host, path: r.path, query: r.query };
  }

  if (r.hasAuthority) {
    return { scheme: base.scheme, host: r.host, path: removeDotSegments(r.path), query: r.query };
  }

  let path: string;
  let query = r.query;
  if (r.path === "") {
    path = base.path;
    query = r.query || base.query;
  } else if (r.path.startsWith("/")) {
    path = removeDotSegments(r.path);
  } else {
    path = removeDotSegments(mergePaths(base, r.path));
  }

  return { scheme: base.scheme, host: base.host, path, query };
}

/** Drop `;params` from the last path segment */
function stripParams(path: string): string {
  const semicolon = path.indexOf(";", path.lastIndexOf("/") + 1);
  return semicolon === -1 ? path : path.slice(0, semicolon);
}

/**
 * Canonical comparison key for a url: scheme://host/path[?query], fragment
 * and `;params` dropped, trailing slashes stripped, lowercased. Relative urls
 * are resolved against `baseUrl` when one is given.
 */
export function normalizeUrl(url: string, baseUrl = ""): string {
  const cleaned = url.replace(/[\t\r\n]/g, "").trim();
  const base = baseUrl.trim();
  const absolute = cleaned.startsWith("http://") || cleaned.startsWith("https://");
  const { scheme, host, path, query } = absolute || !base ? splitUrl(cleaned) : resolveReference(cleaned, base);

  let normalized = `${scheme}://${host}${stripParams(path)}`;
  if (query) {
    normalized += `?${query}`;
  }
  return normalized.replace(/\/+$/, "").toLowerCase();
}

// ─── Comparison ──────────────────────────────────────────────────────────────

/** Map normalized key to the last record with that key; unnormalizable links are dropped */
function keyLinks(links: LinkRecord[], baseUrl: string): Map<string, KeyedLink> {
  const byKey = new Map<string, KeyedLink>();
  for (const link of links) {
    let key: string;
    try {
      key = normalizeUrl(link.url, baseUrl);
    } catch (err) {
      if (err instanceof NormalizationError) continue;
      throw err;
    }
    byKey.set(key, { ...link, key });
  }
  return byKey;
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Order by anchor text (empty first), then by key */
export function compareLinkOrder(a: KeyedLink, b: KeyedLink): number {
  return compareCodeUnits(a.text, b.text) || compareCodeUnits(a.key, b.key);
}

/**
 * Classify links by normalized key into removed (v1 only), added (v2 only) and
 * common. Presence-based: duplicates within a side count once.
 */
export function compareLinks(
  links1: LinkRecord[],
  links2: LinkRecord[],
  baseUrl1 = "",
  baseUrl2 = "",
): LinkComparison {
  const v1 = keyLinks(links1, baseUrl1);
  const v2 = keyLinks(links2, baseUrl2);

  const onlyInV1: KeyedLink[] = [];
  const inBoth: KeyedLink[] = [];
  for (const [key, link] of v1) {
    (v2.has(key) ? inBoth : onlyInV1).push(link);
  }
  const onlyInV2 = [...v2.values()].filter((link) => !v1.has(link.key));

  return {
    onlyInV1: onlyInV1.sort(compareLinkOrder),
    onlyInV2: onlyInV2.sort(compareLinkOrder),
    inBoth: inBoth.sort(compareLinkOrder),
    totalV1: v1.size,
    totalV2: v2.size,
  };
}
