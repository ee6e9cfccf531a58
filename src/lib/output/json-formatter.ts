import type {
  ContentBlock,
  DocumentContent,
  ImageContent,
  PresentationContent,
  Serializer,
  SpreadsheetContent,
  StructuredContent,
  VisionAnalysis,
} from "../convert/types";

/** One output row as ordered key/value pairs, in column order. */
export type RowEntries = Array<[key: string, value: string]>;

export const SHEET_KEY = "__sheet";

export interface ImageJson {
  source: string;
  mimeType: string;
  width: number | null;
  height: number | null;
  ocrText: string;
  base64: string;
  dataUri: string;
  /** Only present when vision analysis is enabled */
  visionAnalysis?: VisionAnalysis;
}

function countWords(texts: string[]): number {
  return texts.join(" ").split(/\s+/).filter(Boolean).length;
}

/**
 * Header names made usable as object keys: blanks become `column_N`,
 * repeats get `_2`, `_3`, ... Reserved names are never handed out.
 */
export function uniqueKeys(headers: string[], reserved: readonly string[] = []): string[] {
  const used = new Set(reserved);
  return headers.map((header, index) => {
    const base = header.trim() || `column_${index + 1}`;
    let key = base;
    for (let n = 2; used.has(key); n += 1) key = `${base}_${n}`;
    used.add(key);
    return key;
  });
}

/**
 * Rows across all sheets. With more than one sheet each row starts with the
 * sheet name under `__sheet`.
 */
export function spreadsheetRows(content: SpreadsheetContent): RowEntries[] {
  const tagSheet = content.sheets.length > 1;
  return content.sheets.flatMap((sheet) => {
    const keys = uniqueKeys(sheet.headers, tagSheet ? [SHEET_KEY] : []);
    const tag: RowEntries = tagSheet ? [[SHEET_KEY, sheet.name]] : [];
    return sheet.rows.map((row): RowEntries => [
      ...tag,
      ...keys.map((key, i): [string, string] => [key, row[i] ?? ""]),
    ]);
  });
}

/**
 * Same layout as `JSON.stringify(rows, null, 2)` but keys stay in column
 * order; plain objects would move integer-like headers to the front.
 */
export function formatRows(rows: RowEntries[]): string {
  if (rows.length === 0) return "[]";
  const objects = rows.map((row) => {
    if (row.length === 0) return "  {}";
    const fields = row.map(
      ([key, value]) => `    ${JSON.stringify(key)}: ${JSON.stringify(value)}`,
    );
    return `  {\n${fields.join(",\n")}\n  }`;
  });
  return `[\n${objects.join(",\n")}\n]`;
}

function imageJson(content: ImageContent, filename: string): ImageJson {
  return {
    source: filename,
    mimeType: content.mimeType,
    width: content.width ?? null,
    height: content.height ?? null,
    ocrText: content.ocrText,
    base64: content.base64,
    dataUri: `data:${content.mimeType};base64,${content.base64}`,
    visionAnalysis: content.vision,
  };
}

function blockText(block: ContentBlock): string[] {
  switch (block.kind) {
    case "heading":
    case "paragraph":
      return [block.text];
    case "table":
      return block.rows.flat();
    case "page":
      return [];
  }
}

function documentJson(content: DocumentContent, filename: string) {
  const count = (kind: ContentBlock["kind"]) =>
    content.blocks.filter((block) => block.kind === kind).length;
  return {
    source: filename,
    type: content.sourceType,
    blocks: content.blocks,
    metadata: {
      pageCount: content.pageCount ?? null,
      headingCount: count("heading"),
      paragraphCount: count("paragraph"),
      tableCount: count("table"),
      wordCount: countWords(content.blocks.flatMap(blockText)),
    },
  };
}

function presentationJson(content: PresentationContent, filename: string) {
  return {
    source: filename,
    type: content.sourceType,
    slides: content.slides,
    metadata: {
      slideCount: content.slides.length,
      wordCount: countWords(
        content.slides.flatMap((slide) => [slide.title, ...slide.paragraphs]),
      ),
    },
  };
}

export function toJsonValue(
  content: Exclude<StructuredContent, SpreadsheetContent>,
  filename: string,
): unknown {
  switch (content.category) {
    case "image":
      return imageJson(content, filename);
    case "document":
      return documentJson(content, filename);
    case "presentation":
      return presentationJson(content, filename);
  }
}

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

export function renderJson(content: StructuredContent, filename: string): string {
  return content.category === "spreadsheet"
    ? formatRows(spreadsheetRows(content))
    : formatJson(toJsonValue(content, filename));
}

export const jsonSerializer: Serializer = {
  format: "json",
  extension: ".json",
  supports: () => true,
  serialize: (content, source) => renderJson(content, source.filename),
};
