import { CONFIG } from "../config";
import { ArchiveAssembler, type ArchiveWriter } from "./archive/archive";
import { ConversionDispatcher } from "./convert/dispatcher";
import { createDefaultExtractors, createDefaultSerializers } from "./convert/registry";
import type { OcrEngine } from "./convert/extractors";
import type { OutputFormat } from "./convert/types";
import type { VisionProvider } from "./vision/analysis";
import { InvalidStateTransitionError } from "./errors";
import { FileManager, requireFile, type FileManagerOptions } from "./session/file-manager";
import { BatchOrchestrator } from "./session/orchestrator";
import { SessionStore } from "./session/session-store";
import type { ConversionResult, FileInfo, FileRecord } from "./session/types";

export const ARCHIVE_FILENAME = "converted_files.zip";
const TRUNCATION_MARKER = "\n\n... [truncated]";

const CONTENT_TYPES: Record<OutputFormat, string> = {
  markdown: "text/markdown; charset=utf-8",
  json: "application/json; charset=utf-8",
};

export interface ServiceOptions extends FileManagerOptions {
  store?: SessionStore;
  dispatcher?: ConversionDispatcher;
  ocr?: OcrEngine;
  vision?: VisionProvider | null;
  concurrency?: number;
  previewChars?: number;
  createArchiveWriter?: () => ArchiveWriter;
}

export interface SessionHandle {
  sessionId: string;
  created: boolean;
  files: FileInfo[];
}

export interface FilePreview {
  fileId: string;
  filename: string;
  format: OutputFormat;
  preview: string;
  truncated: boolean;
  fullSize: number;
}

export interface Download {
  filename: string;
  contentType: string;
  body: Buffer;
}

/**
 * Everything a client can do with a session, in one place. The HTTP handler
 * and the `convert` command both sit on top of this.
 */
export class ConversionService {
  readonly store: SessionStore;
  private readonly files: FileManager;
  private readonly orchestrator: BatchOrchestrator;
  private readonly archives: ArchiveAssembler;
  private readonly previewChars: number;

  constructor(options: ServiceOptions = {}) {
    this.store = options.store ?? new SessionStore({ now: options.now });
    const dispatcher =
      options.dispatcher ??
      new ConversionDispatcher(
        createDefaultExtractors({ ocr: options.ocr, vision: options.vision }),
        createDefaultSerializers(),
      );
    this.files = new FileManager(this.store, options);
    this.orchestrator = new BatchOrchestrator(this.store, dispatcher, {
      concurrency: options.concurrency,
      now: options.now,
    });
    this.archives = new ArchiveAssembler(this.store, options.createArchiveWriter);
    this.previewChars = options.previewChars ?? CONFIG.PREVIEW_CHARS;
  }

  get limits(): { maxFileBytes: number; maxSessionBytes: number } {
    return this.files.limits;
  }

  /** An absent, unknown or expired token starts a new session. */
  async createOrResumeSession(token?: string | null): Promise<SessionHandle> {
    const session = this.store.getOrCreate(token);
    return {
      sessionId: session.id,
      created: session.id !== token,
      files: await this.files.list(session.id),
    };
  }

  uploadFile(sessionId: string, filename: string, bytes: Buffer): Promise<FileInfo> {
    return this.files.upload(sessionId, filename, bytes);
  }

  setOutputFormat(sessionId: string, fileId: string, format: string): Promise<FileInfo> {
    return this.files.setFormat(sessionId, fileId, format);
  }

  deleteFile(sessionId: string, fileId: string): Promise<void> {
    return this.files.delete(sessionId, fileId);
  }

  async clearSession(sessionId: string): Promise<void> {
    await this.files.clear(sessionId);
  }

  convertAll(sessionId: string): Promise<ConversionResult[]> {
    return this.orchestrator.convertAll(sessionId);
  }

  listFiles(sessionId: string): Promise<FileInfo[]> {
    return this.files.list(sessionId);
  }

  async getFilePreview(sessionId: string, fileId: string): Promise<FilePreview> {
    return this.store.withSession(sessionId, "read", (session) => {
      const { record, output } = converted(requireFile(session, fileId));
      const truncated = output.length > this.previewChars;
      return {
        fileId: record.id,
        filename: record.outputFilename ?? record.filename,
        format: record.outputFormat,
        preview: truncated
          ? output.slice(0, this.previewChars) + TRUNCATION_MARKER
          : output,
        truncated,
        fullSize: output.length,
      };
    });
  }

  async downloadFile(sessionId: string, fileId: string): Promise<Download> {
    return this.store.withSession(sessionId, "read", (session) => {
      const { record, output } = converted(requireFile(session, fileId));
      return {
        filename: record.outputFilename ?? record.filename,
        contentType: CONTENT_TYPES[record.outputFormat],
        body: Buffer.from(output, "utf-8"),
      };
    });
  }

  async downloadArchive(sessionId: string): Promise<Download> {
    return {
      filename: ARCHIVE_FILENAME,
      contentType: "application/zip",
      body: await this.archives.buildArchive(sessionId),
    };
  }

  close(): Promise<void> {
    return this.store.close();
  }
}

function converted(record: FileRecord): { record: FileRecord; output: string } {
  if (record.status !== "converted" || record.output === undefined) {
    throw new InvalidStateTransitionError(`File not yet converted: ${record.filename}`);
  }
  return { record, output: record.output };
}
