import type { InputCategory, OutputFormat } from "../convert/types";

export type FileStatus = "uploaded" | "converting" | "converted" | "error";

export interface FileRecord {
  id: string;
  filename: string;
  extension: string;
  category: InputCategory;
  mimeType: string;
  size: number;
  outputFormat: OutputFormat;
  status: FileStatus;
  uploadedAt: number;
  /** Raw upload. `null` once released. */
  content: Buffer | null;
  outputFilename?: string;
  output?: string;
  error?: string;
  convertedAt?: number;
}

/** Wire-safe view of a record: no bytes, no rendered output. */
export interface FileInfo {
  id: string;
  filename: string;
  extension: string;
  category: InputCategory;
  size: number;
  outputFormat: OutputFormat;
  status: FileStatus;
  outputFilename?: string;
  error?: string;
  convertedAt?: string;
}

export interface Session {
  readonly id: string;
  readonly createdAt: number;
  lastActivityAt: number;
  /** Insertion-ordered, keyed by file id */
  readonly files: Map<string, FileRecord>;
  totalBytes: number;
}

export interface SessionSummary {
  id: string;
  createdAt: number;
  lastActivityAt: number;
  fileCount: number;
  totalBytes: number;
}

export interface ConversionResult {
  fileId: string;
  filename: string;
  status: "converted" | "error";
  outputFilename?: string;
  outputFormat?: OutputFormat;
  error?: string;
  convertedAt: string;
}

export function toFileInfo(record: FileRecord): FileInfo {
  return {
    id: record.id,
    filename: record.filename,
    extension: record.extension,
    category: record.category,
    size: record.size,
    outputFormat: record.outputFormat,
    status: record.status,
    outputFilename: record.outputFilename,
    error: record.error,
    convertedAt:
      record.convertedAt === undefined
        ? undefined
        : new Date(record.convertedAt).toISOString(),
  };
}

/**
 * Drops the record's hold on its upload bytes. Safe to call more than once;
 * only the first call has an effect. Returns the number of bytes released.
 */
export function releaseContent(record: FileRecord): number {
  if (record.content === null) return 0;
  const released = record.content.length;
  record.content = null;
  return released;
}
