import type { ContentBlock } from "../types";
import {
  attrOf,
  collectText,
  findAll,
  findChild,
  findChildren,
  findPath,
  loadPackage,
  requirePart,
  rootOf,
  tagOf,
  childrenOf,
  type XmlNode,
} from "../ooxml";

const RUN_TEXT = { text: "w:t", tab: "w:tab", breaks: ["w:br", "w:cr"] };

function headingLevel(styleId: string | undefined): number | null {
  if (!styleId) return null;
  if (/^title$/i.test(styleId)) return 1;
  const match = /^heading\s*(\d)$/i.exec(styleId);
  return match ? Math.min(Number(match[1]), 6) : null;
}

function paragraphText(paragraph: XmlNode): string {
  return collectText(paragraph, RUN_TEXT).trim();
}

function tableRows(table: XmlNode): string[][] {
  return findChildren(table, "w:tr").map((row) =>
    findChildren(row, "w:tc").map((cell) =>
      findAll(cell, "w:p")
        .map(paragraphText)
        .filter(Boolean)
        .join(" "),
    ),
  );
}

function collectBlocks(container: XmlNode, blocks: ContentBlock[]): void {
  for (const child of childrenOf(container)) {
    switch (tagOf(child)) {
      case "w:p": {
        const text = paragraphText(child);
        if (!text) break;
        const styleId = attrOf(
          findPath(child, ["w:pPr", "w:pStyle"]) ?? {},
          "w:val",
        );
        const level = headingLevel(styleId);
        blocks.push(
          level === null
            ? { kind: "paragraph", text }
            : { kind: "heading", level, text },
        );
        break;
      }
      case "w:tbl": {
        const rows = tableRows(child);
        if (rows.length > 0) blocks.push({ kind: "table", rows });
        break;
      }
      case "w:sdt": {
        const inner = findChild(child, "w:sdtContent");
        if (inner) collectBlocks(inner, blocks);
        break;
      }
      default:
        break;
    }
  }
}

/**
 * Headings, paragraphs and tables of `word/document.xml`, in body order.
 */
export async function extractDocxBlocks(bytes: Buffer): Promise<ContentBlock[]> {
  const zip = await loadPackage(bytes);
  const documentPart = await requirePart(zip, "word/document.xml");
  const body = findPath(rootOf(documentPart, "w:document") ?? {}, ["w:body"]);
  if (!body) throw new Error("word/document.xml has no body");

  const blocks: ContentBlock[] = [];
  collectBlocks(body, blocks);
  return blocks;
}
