import type { ContentBlock } from "../types";

export interface PdfTextItem {
  str: string;
  transform: number[];
  width: number;
  height: number;
  hasEOL: boolean;
}

export interface PdfCell {
  text: string;
  /** Left edge in PDF user space */
  x: number;
}

export interface PdfLine {
  text: string;
  /** Baseline y in PDF user space (grows upwards) */
  y: number;
  height: number;
  /** Runs of text separated by wide horizontal gaps */
  cells: PdfCell[];
}

// A vertical gap this many line-heights wide starts a new paragraph.
const PARAGRAPH_GAP_RATIO = 1.6;
// A horizontal gap this many line-heights wide starts a new cell.
const CELL_GAP_RATIO = 1;
// Cells whose left edges differ by less than this many line-heights share a column.
const COLUMN_TOLERANCE_RATIO = 0.5;
const MIN_TABLE_ROWS = 2;

function isTextItem<T extends object>(item: T): item is T & PdfTextItem {
  return "str" in item;
}

/**
 * Folds text items into lines, ending a line at `hasEOL`. Items further
 * apart than a line height become separate cells.
 */
export function itemsToLines(items: PdfTextItem[]): PdfLine[] {
  const lines: PdfLine[] = [];
  let current: PdfLine | null = null;
  let lastEnd = 0;

  const finish = (line: PdfLine) => {
    line.text = line.cells.map((cell) => cell.text).join(" ");
    lines.push(line);
  };

  for (const item of items) {
    if (!current) {
      current = { text: "", y: Number(item.transform[5]), height: item.height, cells: [] };
    }
    const x = Number(item.transform[4]);
    const lastCell = current.cells[current.cells.length - 1];
    const gap = x - lastEnd;
    const blank = !item.str.trim();
    if (lastCell && (blank || gap <= Math.max(item.height, 1) * CELL_GAP_RATIO)) {
      lastCell.text += item.str;
    } else if (!blank) {
      current.cells.push({ text: item.str, x });
    }
    lastEnd = x + item.width;
    current.height = Math.max(current.height, item.height);
    if (item.hasEOL) {
      finish(current);
      current = null;
      lastEnd = 0;
    }
  }
  if (current) finish(current);
  return lines;
}

function alignedColumns(a: PdfLine, b: PdfLine): boolean {
  if (a.cells.length !== b.cells.length) return false;
  const tolerance = Math.max(a.height, b.height, 1) * COLUMN_TOLERANCE_RATIO;
  return a.cells.every((cell, i) => Math.abs(cell.x - b.cells[i].x) <= tolerance);
}

/** Number of consecutive lines from `start` that line up as table rows. */
function tableRunAt(lines: PdfLine[], start: number): number {
  const first = lines[start];
  if (first.cells.length < 2) return 0;
  let end = start + 1;
  while (end < lines.length && alignedColumns(first, lines[end])) end += 1;
  return end - start;
}

/**
 * Paragraphs and tables in reading order. Two or more consecutive lines
 * with the same column layout form a table; its first row is the header.
 */
export function linesToBlocks(lines: PdfLine[]): ContentBlock[] {
  const blocks: ContentBlock[] = [];
  let pending: PdfLine[] = [];

  const flushText = () => {
    for (const text of linesToParagraphs(pending)) blocks.push({ kind: "paragraph", text });
    pending = [];
  };

  let index = 0;
  while (index < lines.length) {
    const run = tableRunAt(lines, index);
    if (run >= MIN_TABLE_ROWS) {
      flushText();
      const rows = lines
        .slice(index, index + run)
        .map((line) => line.cells.map((cell) => cell.text.replace(/\s+/g, " ").trim()));
      blocks.push({ kind: "table", rows });
      index += run;
    } else {
      pending.push(lines[index]);
      index += 1;
    }
  }
  flushText();
  return blocks;
}

/**
 * Groups lines into paragraphs. Blank lines and wide vertical gaps break
 * paragraphs; wrapped lines inside a paragraph are joined with a space.
 */
export function linesToParagraphs(lines: PdfLine[]): string[] {
  const paragraphs: string[] = [];
  let buffer: string[] = [];
  let previous: PdfLine | null = null;

  const flush = () => {
    if (buffer.length > 0) paragraphs.push(buffer.join(" "));
    buffer = [];
  };

  for (const line of lines) {
    const text = line.text.replace(/\s+/g, " ").trim();
    if (!text) {
      flush();
      previous = null;
      continue;
    }
    if (previous) {
      const gap = Math.abs(previous.y - line.y);
      const lineHeight = Math.max(previous.height, line.height, 1);
      if (gap > lineHeight * PARAGRAPH_GAP_RATIO) flush();
    }
    buffer.push(text);
    previous = line;
  }
  flush();
  return paragraphs;
}

/**
 * Page markers followed by that page's paragraphs and tables. The legacy
 * pdfjs-dist build is the one meant for Node; it is loaded on first use.
 */
export async function extractPdfBlocks(
  bytes: Buffer,
): Promise<{ blocks: ContentBlock[]; pageCount: number }> {
  const pdfjs = await import("pdfjs-dist/legacy/build/pdf");
  const loadingTask = pdfjs.getDocument({
    data: new Uint8Array(bytes),
    isEvalSupported: false,
    disableFontFace: true,
    verbosity: pdfjs.VerbosityLevel.ERRORS,
  });
  const pdf = await loadingTask.promise;
  try {
    const blocks: ContentBlock[] = [];
    for (let number = 1; number <= pdf.numPages; number += 1) {
      const page = await pdf.getPage(number);
      const textContent = await page.getTextContent();
      const items = textContent.items.filter(isTextItem);
      blocks.push({ kind: "page", number }, ...linesToBlocks(itemsToLines(items)));
    }
    return { blocks, pageCount: pdf.numPages };
  } finally {
    await pdf.destroy();
  }
}
