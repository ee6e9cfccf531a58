import type JSZip from "jszip";
import type { Slide } from "../types";
import {
  attrOf,
  collectText,
  findAll,
  findChild,
  findChildren,
  findPath,
  loadPackage,
  readPart,
  readRelationships,
  requirePart,
  rootOf,
  tagOf,
  childrenOf,
  type XmlNode,
} from "../ooxml";

const PRESENTATION_PART = "ppt/presentation.xml";
const DRAWING_TEXT = { text: "a:t", breaks: ["a:br"] };
const TITLE_PLACEHOLDERS = new Set(["title", "ctrTitle"]);

function placeholderType(shape: XmlNode): string | undefined {
  const placeholder = findPath(shape, ["p:nvSpPr", "p:nvPr", "p:ph"]);
  return placeholder ? attrOf(placeholder, "type") ?? "body" : undefined;
}

function shapeParagraphs(shape: XmlNode): string[] {
  const body = findChild(shape, "p:txBody");
  if (!body) return [];
  return findChildren(body, "a:p")
    .map((paragraph) => collectText(paragraph, DRAWING_TEXT).trim())
    .filter(Boolean);
}

function tableRows(table: XmlNode): string[][] {
  return findChildren(table, "a:tr").map((row) =>
    findChildren(row, "a:tc").map((cell) =>
      findAll(cell, "a:p")
        .map((paragraph) => collectText(paragraph, DRAWING_TEXT).trim())
        .filter(Boolean)
        .join(" "),
    ),
  );
}

function walkShapes(tree: XmlNode, slide: Slide): void {
  for (const shape of childrenOf(tree)) {
    switch (tagOf(shape)) {
      case "p:sp": {
        const paragraphs = shapeParagraphs(shape);
        const type = placeholderType(shape);
        if (type && TITLE_PLACEHOLDERS.has(type) && !slide.title) {
          slide.title = paragraphs.join(" ");
        } else {
          slide.paragraphs.push(...paragraphs);
        }
        break;
      }
      case "p:grpSp":
        walkShapes(shape, slide);
        break;
      case "p:graphicFrame":
        for (const table of findAll(shape, "a:tbl")) {
          const rows = tableRows(table);
          if (rows.length > 0) slide.tables.push(rows);
        }
        break;
      default:
        break;
    }
  }
}

async function readNotes(zip: JSZip, slidePath: string): Promise<string> {
  const relationships = await readRelationships(zip, slidePath);
  const notesRel = Array.from(relationships.values()).find((rel) =>
    rel.type.endsWith("/notesSlide"),
  );
  if (!notesRel) return "";
  const part = await readPart(zip, notesRel.target);
  const tree = part
    ? findPath(rootOf(part, "p:notes") ?? {}, ["p:cSld", "p:spTree"])
    : undefined;
  if (!tree) return "";

  return findAll(tree, "p:sp")
    .filter((shape) => placeholderType(shape) === "body")
    .flatMap(shapeParagraphs)
    .join("\n");
}

/**
 * Slides in presentation order with title, body text, tables and notes.
 */
export async function extractPptxSlides(bytes: Buffer): Promise<Slide[]> {
  const zip = await loadPackage(bytes);
  const presentation = rootOf(
    await requirePart(zip, PRESENTATION_PART),
    "p:presentation",
  );
  const slideIds = presentation ? findChild(presentation, "p:sldIdLst") : undefined;
  if (!slideIds) return [];

  const relationships = await readRelationships(zip, PRESENTATION_PART);
  const slides: Slide[] = [];
  for (const entry of findChildren(slideIds, "p:sldId")) {
    const relId = attrOf(entry, "r:id");
    const slidePath = relId ? relationships.get(relId)?.target : undefined;
    if (!slidePath) continue;
    const part = await readPart(zip, slidePath);
    const tree = part
      ? findPath(rootOf(part, "p:sld") ?? {}, ["p:cSld", "p:spTree"])
      : undefined;
    if (!tree) continue;

    const slide: Slide = {
      number: slides.length + 1,
      title: "",
      paragraphs: [],
      tables: [],
      notes: "",
    };
    walkShapes(tree, slide);
    slide.notes = await readNotes(zip, slidePath);
    slides.push(slide);
  }
  return slides;
}
