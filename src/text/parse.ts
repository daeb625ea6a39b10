import { readFileSync } from "node:fs";
import { basename } from "node:path";
import { unified } from "unified";
import rehypeParse from "rehype-parse";
import rehypeStringify from "rehype-stringify";
import type { Element, Root, RootContent } from "hast";

const parser = unified().use(rehypeParse);
const serializer = unified().use(rehypeStringify);

/** A parsed input file. The tree is shared and never mutated after load. */
export interface LoadedDocument {
  path: string;
  /** File name shown in the report */
  name: string;
  tree: Root;
}

/** Raised when an input file cannot be read */
export class LoadError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Could not load ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "LoadError";
    this.path = path;
  }
}

export function parseHtml(source: string): Root {
  return parser.parse(source);
}

/** Serialize a node back to markup, keeping the authored whitespace */
export function serializeNode(node: Element | Root): string {
  const root: Root = node.type === "root" ? node : { type: "root", children: [node] };
  return serializer.stringify(root);
}

/** Decode UTF-8, dropping byte sequences that are not valid UTF-8 */
export function decodeLossy(bytes: Uint8Array): string {
  return new TextDecoder("utf-8", { fatal: false }).decode(bytes).replace(/\uFFFD/g, "");
}

export function loadDocument(path: string): LoadedDocument {
  let source: string;
  try {
    source = decodeLossy(readFileSync(path));
  } catch (err) {
    throw new LoadError(path, err);
  }
  return { path, name: basename(path), tree: parseHtml(source) };
}

export function isElement(node: RootContent | Root): node is Element {
  return node.type === "element";
}

/** Find the first element with the given tag name, in document order */
export function findElement(node: Element | Root, tagName: string): Element | null {
  for (const child of node.children) {
    if (!isElement(child)) continue;
    if (child.tagName === tagName) return child;
    const found = findElement(child, tagName);
    if (found) return found;
  }
  return null;
}

export function findBody(tree: Root): Element | null {
  return findElement(tree, "body");
}
