import * as path from "node:path";
import { XMLParser } from "fast-xml-parser";
import JSZip from "jszip";

/**
 * One element from fast-xml-parser's `preserveOrder` output: a single tag key
 * holding the child list, plus `:@` for attributes. Text nodes are
 * `{ "#text": string }`.
 */
export type XmlNode = Record<string, unknown>;

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: "",
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
});

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asNodes(value: unknown): XmlNode[] {
  return Array.isArray(value) ? value.filter(isNode) : [];
}

export function parseXml(xml: string): XmlNode[] {
  return asNodes(parser.parse(xml));
}

export function tagOf(node: XmlNode): string | undefined {
  return Object.keys(node).find((key) => key !== ":@" && key !== "#text");
}

export function childrenOf(node: XmlNode): XmlNode[] {
  const tag = tagOf(node);
  return tag ? asNodes(node[tag]) : [];
}

export function attrOf(node: XmlNode, name: string): string | undefined {
  const attrs = node[":@"];
  if (!isNode(attrs)) return undefined;
  const value = attrs[name];
  return typeof value === "string" ? value : undefined;
}

export function findChild(node: XmlNode, tag: string): XmlNode | undefined {
  return childrenOf(node).find((child) => tagOf(child) === tag);
}

export function findChildren(node: XmlNode, tag: string): XmlNode[] {
  return childrenOf(node).filter((child) => tagOf(child) === tag);
}

/** Follows a chain of child tags, e.g. `["p:cSld", "p:spTree"]`. */
export function findPath(node: XmlNode, tags: string[]): XmlNode | undefined {
  let current: XmlNode | undefined = node;
  for (const tag of tags) {
    if (!current) return undefined;
    current = findChild(current, tag);
  }
  return current;
}

/** Root element of a parsed part, skipping the `?xml` declaration. */
export function rootOf(nodes: XmlNode[], tag: string): XmlNode | undefined {
  return nodes.find((node) => tagOf(node) === tag);
}

/**
 * Descendants with the given tag, in document order. Does not look inside a
 * match.
 */
export function findAll(node: XmlNode, tag: string): XmlNode[] {
  const found: XmlNode[] = [];
  const walk = (current: XmlNode) => {
    for (const child of childrenOf(current)) {
      if (tagOf(child) === tag) found.push(child);
      else walk(child);
    }
  };
  walk(node);
  return found;
}

/** Direct text children only, e.g. the value of `<v>42</v>`. */
export function ownText(node: XmlNode): string {
  const tag = tagOf(node);
  if (!tag) return "";
  return asNodes(node[tag])
    .map((child) => child["#text"])
    .filter((value): value is string => typeof value === "string")
    .join("");
}

export interface TextTags {
  /** Element whose text children carry the run text (`w:t`, `a:t`, `t`) */
  text: string;
  tab?: string;
  breaks?: string[];
  /** Subtrees to ignore entirely, e.g. phonetic runs */
  skip?: string[];
}

export function collectText(node: XmlNode, tags: TextTags): string {
  const parts: string[] = [];
  const walk = (current: XmlNode) => {
    for (const child of childrenOf(current)) {
      const tag = tagOf(child);
      if (tag === undefined) continue;
      if (tags.skip?.includes(tag)) continue;
      if (tag === tags.text) {
        for (const textNode of asNodes(child[tag])) {
          const value = textNode["#text"];
          if (typeof value === "string") parts.push(value);
        }
      } else if (tag === tags.tab) {
        parts.push("\t");
      } else if (tags.breaks?.includes(tag)) {
        parts.push("\n");
      } else {
        walk(child);
      }
    }
  };
  walk(node);
  return parts.join("");
}

export async function loadPackage(bytes: Buffer): Promise<JSZip> {
  return JSZip.loadAsync(bytes);
}

export async function readPart(
  zip: JSZip,
  partPath: string,
): Promise<XmlNode[] | null> {
  const file = zip.file(partPath);
  if (!file) return null;
  return parseXml(await file.async("string"));
}

export async function requirePart(zip: JSZip, partPath: string): Promise<XmlNode[]> {
  const part = await readPart(zip, partPath);
  if (!part) throw new Error(`Missing ${partPath} in package`);
  return part;
}

export interface Relationship {
  id: string;
  type: string;
  /** Package path of the target, resolved against the source part */
  target: string;
}

function relsPathFor(partPath: string): string {
  const dir = path.posix.dirname(partPath);
  const base = path.posix.basename(partPath);
  return path.posix.join(dir, "_rels", `${base}.rels`);
}

/**
 * Reads `<dir>/_rels/<part>.rels` for a part. Missing rels yield an empty map.
 */
export async function readRelationships(
  zip: JSZip,
  partPath: string,
): Promise<Map<string, Relationship>> {
  const relationships = new Map<string, Relationship>();
  const nodes = await readPart(zip, relsPathFor(partPath));
  const root = nodes ? rootOf(nodes, "Relationships") : undefined;
  if (!root) return relationships;

  const baseDir = path.posix.dirname(partPath);
  for (const rel of findChildren(root, "Relationship")) {
    const id = attrOf(rel, "Id");
    const target = attrOf(rel, "Target");
    if (!id || !target) continue;
    const resolved = target.startsWith("/")
      ? target.slice(1)
      : path.posix.normalize(path.posix.join(baseDir, target));
    relationships.set(id, { id, type: attrOf(rel, "Type") ?? "", target: resolved });
  }
  return relationships;
}
