import * as path from "node:path";
import type { InputCategory, OutputFormat } from "../convert/types";

type FormatEntry = {
  category: InputCategory;
  mimeType: string;
};

// Extensions we accept for upload. Legacy binary Office formats are left out.
const SUPPORTED_FORMATS: ReadonlyMap<string, FormatEntry> = new Map([
  [".pdf", { category: "document", mimeType: "application/pdf" }],
  [
    ".docx",
    {
      category: "document",
      mimeType:
        "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
    },
  ],
  [
    ".xlsx",
    {
      category: "spreadsheet",
      mimeType:
        "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
    },
  ],
  [".csv", { category: "spreadsheet", mimeType: "text/csv" }],
  [
    ".pptx",
    {
      category: "presentation",
      mimeType:
        "application/vnd.openxmlformats-officedocument.presentationml.presentation",
    },
  ],
  [".png", { category: "image", mimeType: "image/png" }],
  [".jpg", { category: "image", mimeType: "image/jpeg" }],
  [".jpeg", { category: "image", mimeType: "image/jpeg" }],
  [".gif", { category: "image", mimeType: "image/gif" }],
  [".bmp", { category: "image", mimeType: "image/bmp" }],
  [".tif", { category: "image", mimeType: "image/tiff" }],
  [".tiff", { category: "image", mimeType: "image/tiff" }],
  [".webp", { category: "image", mimeType: "image/webp" }],
]);

const DEFAULT_OUTPUT_FORMATS: Record<InputCategory, OutputFormat> = {
  document: "markdown",
  presentation: "markdown",
  spreadsheet: "json",
  image: "json",
};

export function getExtension(filename: string): string {
  return path.extname(filename).toLowerCase();
}

/** File name without directory or extension, e.g. `reports/q1.pdf` → `q1`. */
export function getBaseName(filename: string): string {
  const base = path.basename(filename.replace(/\\/g, "/"));
  const ext = path.extname(base);
  const stem = ext ? base.slice(0, -ext.length) : base;
  return stem || "file";
}

export function getSupportedExtensions(): string[] {
  return Array.from(SUPPORTED_FORMATS.keys());
}

export function getDefaultFormat(category: InputCategory): OutputFormat {
  return DEFAULT_OUTPUT_FORMATS[category];
}

/**
 * Sniffs the leading bytes. Returns the MIME type the content actually looks
 * like, or null when nothing we know matches.
 */
export function sniffMimeType(bytes: Buffer): string | null {
  const head = bytes.subarray(0, 12);
  if (head.length >= 4 && head.toString("latin1", 0, 4) === "%PDF") {
    return "application/pdf";
  }
  if (
    head.length >= 8 &&
    head[0] === 0x89 &&
    head.toString("latin1", 1, 4) === "PNG"
  ) {
    return "image/png";
  }
  if (head.length >= 3 && head[0] === 0xff && head[1] === 0xd8 && head[2] === 0xff) {
    return "image/jpeg";
  }
  if (head.length >= 6 && head.toString("latin1", 0, 4) === "GIF8") {
    return "image/gif";
  }
  if (head.length >= 2 && head.toString("latin1", 0, 2) === "BM") {
    return "image/bmp";
  }
  if (
    head.length >= 12 &&
    head.toString("latin1", 0, 4) === "RIFF" &&
    head.toString("latin1", 8, 12) === "WEBP"
  ) {
    return "image/webp";
  }
  if (
    head.length >= 4 &&
    ((head[0] === 0x49 && head[1] === 0x49 && head[2] === 0x2a && head[3] === 0x00) ||
      (head[0] === 0x4d && head[1] === 0x4d && head[2] === 0x00 && head[3] === 0x2a))
  ) {
    return "image/tiff";
  }
  if (
    head.length >= 4 &&
    head[0] === 0x50 &&
    head[1] === 0x4b &&
    head[2] === 0x03 &&
    head[3] === 0x04
  ) {
    return "application/zip";
  }
  return null;
}

/**
 * Resolves category and MIME type from the extension, then lets the content
 * refine the MIME type for images (a `.jpg` that is really a PNG gets
 * `image/png`). Returns null for unsupported extensions.
 */
export function classifyUpload(
  filename: string,
  bytes: Buffer,
): { extension: string; category: InputCategory; mimeType: string } | null {
  const extension = getExtension(filename);
  const entry = SUPPORTED_FORMATS.get(extension);
  if (!entry) return null;

  const sniffed = sniffMimeType(bytes);
  const mimeType =
    entry.category === "image" && sniffed?.startsWith("image/")
      ? sniffed
      : entry.mimeType;
  return { extension, category: entry.category, mimeType };
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}
