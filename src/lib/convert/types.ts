export type InputCategory = "document" | "spreadsheet" | "presentation" | "image";

export type OutputFormat = "markdown" | "json";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["markdown", "json"];

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === "markdown" || value === "json";
}

/**
 * What an extractor is given. `extension` is lower-case with the leading dot.
 */
export interface SourceFile {
  filename: string;
  extension: string;
  mimeType: string;
  bytes: Buffer;
}

export type ContentBlock =
  | { kind: "page"; number: number }
  | { kind: "heading"; level: number; text: string }
  | { kind: "paragraph"; text: string }
  | { kind: "table"; rows: string[][] };

export interface DocumentContent {
  category: "document";
  /** Human-readable source type, e.g. "PDF document" */
  sourceType: string;
  blocks: ContentBlock[];
  pageCount?: number;
}

export interface Sheet {
  name: string;
  headers: string[];
  /** Data rows, header row excluded */
  rows: string[][];
}

export interface SpreadsheetContent {
  category: "spreadsheet";
  sourceType: string;
  sheets: Sheet[];
}

export interface Slide {
  number: number;
  title: string;
  paragraphs: string[];
  tables: string[][][];
  notes: string;
}

export interface PresentationContent {
  category: "presentation";
  sourceType: string;
  slides: Slide[];
}

/**
 * Outcome of asking a vision model to describe an image. A failure is
 * recorded here instead of failing the conversion.
 */
export type VisionAnalysis =
  | { success: true; provider: string; model: string; analysis: Record<string, unknown> }
  | { success: false; provider: string; model: string; error: string };

export interface ImageContent {
  category: "image";
  sourceType: string;
  mimeType: string;
  width?: number;
  height?: number;
  ocrText: string;
  base64: string;
  /** Absent when vision analysis is turned off */
  vision?: VisionAnalysis;
}

export type StructuredContent =
  | DocumentContent
  | SpreadsheetContent
  | PresentationContent
  | ImageContent;

/**
 * Turns raw bytes into structured content for one input category.
 * Throwing is the failure signal; the dispatcher wraps it.
 */
export interface Extractor {
  readonly category: InputCategory;
  extract(source: SourceFile): Promise<StructuredContent>;
}

export interface Serializer {
  readonly format: OutputFormat;
  /** Output file extension including the dot */
  readonly extension: string;
  supports(category: InputCategory): boolean;
  serialize(content: StructuredContent, source: { filename: string }): string;
}

export interface RenderedOutput {
  outputFilename: string;
  output: string;
}
