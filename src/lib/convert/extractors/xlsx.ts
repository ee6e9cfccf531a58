import type JSZip from "jszip";
import type { Sheet } from "../types";
import {
  attrOf,
  collectText,
  findChild,
  findChildren,
  loadPackage,
  ownText,
  readPart,
  readRelationships,
  requirePart,
  rootOf,
  type XmlNode,
} from "../ooxml";

const WORKBOOK_PART = "xl/workbook.xml";
const CELL_TEXT = { text: "t", skip: ["rPh"] };
/** Zero-based index of column XFD, the widest a worksheet can be. */
export const MAX_COLUMN_INDEX = 16383;

/** `"AB12"` → 27 (zero-based column index). */
export function columnIndex(ref: string): number | null {
  const letters = /^([A-Z]+)/i.exec(ref)?.[1];
  if (!letters) return null;
  let index = 0;
  for (const char of letters.toUpperCase()) {
    index = index * 26 + (char.charCodeAt(0) - 64);
  }
  return index - 1;
}

async function readSharedStrings(
  zip: JSZip,
  target: string | undefined,
): Promise<string[]> {
  const nodes = await readPart(zip, target ?? "xl/sharedStrings.xml");
  const root = nodes ? rootOf(nodes, "sst") : undefined;
  if (!root) return [];
  return findChildren(root, "si").map((item) => collectText(item, CELL_TEXT));
}

function valueText(cell: XmlNode): string {
  const v = findChild(cell, "v");
  return v ? ownText(v) : "";
}

function cellValue(cell: XmlNode, sharedStrings: string[]): string {
  switch (attrOf(cell, "t")) {
    case "s": {
      const index = Number.parseInt(valueText(cell), 10);
      return Number.isInteger(index) ? sharedStrings[index] ?? "" : "";
    }
    case "inlineStr": {
      const inline = findChild(cell, "is");
      return inline ? collectText(inline, CELL_TEXT) : "";
    }
    case "b":
      return valueText(cell) === "1" ? "TRUE" : "FALSE";
    default:
      return valueText(cell);
  }
}

function readRows(worksheet: XmlNode, sharedStrings: string[]): string[][] {
  const sheetData = findChild(worksheet, "sheetData");
  if (!sheetData) return [];

  const rows: string[][] = [];
  for (const row of findChildren(sheetData, "row")) {
    const values: string[] = [];
    let position = 0;
    for (const cell of findChildren(row, "c")) {
      const ref = attrOf(cell, "r");
      const column = (ref ? columnIndex(ref) : null) ?? position;
      if (column > MAX_COLUMN_INDEX) {
        throw new Error(`Cell ${ref ?? `#${position + 1}`} lies beyond column XFD`);
      }
      while (values.length < column) values.push("");
      values[column] = cellValue(cell, sharedStrings).trim();
      position = column + 1;
    }
    if (values.some((value) => value !== "")) rows.push(values);
  }
  return rows;
}

/**
 * Splits rows into header and data rows. Data rows are padded to the header
 * width so they can be keyed by header.
 */
export function toSheet(name: string, rows: string[][]): Sheet {
  const [headers = [], ...data] = rows;
  const width = data.reduce((max, row) => Math.max(max, row.length), headers.length);
  const pad = (row: string[]) =>
    row.length >= width ? row : [...row, ...Array<string>(width - row.length).fill("")];
  return { name, headers: pad(headers), rows: data.map(pad) };
}

/**
 * Every worksheet in workbook order. Empty rows are dropped and the first
 * remaining row becomes the header.
 */
export async function extractXlsxSheets(bytes: Buffer): Promise<Sheet[]> {
  const zip = await loadPackage(bytes);
  const workbook = rootOf(await requirePart(zip, WORKBOOK_PART), "workbook");
  const sheetList = workbook ? findChild(workbook, "sheets") : undefined;
  if (!sheetList) throw new Error("Workbook lists no sheets");

  const relationships = await readRelationships(zip, WORKBOOK_PART);
  const sharedStringsRel = Array.from(relationships.values()).find((rel) =>
    rel.type.endsWith("/sharedStrings"),
  );
  const sharedStrings = await readSharedStrings(zip, sharedStringsRel?.target);

  const sheets: Sheet[] = [];
  for (const entry of findChildren(sheetList, "sheet")) {
    const name = attrOf(entry, "name") ?? `Sheet${sheets.length + 1}`;
    const relId = attrOf(entry, "r:id");
    const target = relId ? relationships.get(relId)?.target : undefined;
    if (!target) continue;
    const part = await readPart(zip, target);
    const worksheet = part ? rootOf(part, "worksheet") : undefined;
    if (!worksheet) continue;
    sheets.push(toSheet(name, readRows(worksheet, sharedStrings)));
  }
  return sheets;
}
