import { v4 as uuidv4 } from "uuid";
import { CONFIG } from "../../config";
import {
  FileTooLargeError,
  InvalidStateTransitionError,
  NotFoundError,
  SessionQuotaExceededError,
  UnsupportedFormatError,
} from "../errors";
import { isOutputFormat, OUTPUT_FORMATS } from "../convert/types";
import {
  classifyUpload,
  getDefaultFormat,
  getSupportedExtensions,
} from "../utils/file-utils";
import type { SessionStore } from "./session-store";
import {
  releaseContent,
  toFileInfo,
  type FileInfo,
  type FileRecord,
  type Session,
} from "./types";

export interface FileManagerOptions {
  maxFileBytes?: number;
  maxSessionBytes?: number;
  now?: () => number;
  newFileId?: () => string;
}

function shortId(): string {
  return uuidv4().replace(/-/g, "").slice(0, 8);
}

export function requireFile(session: Session, fileId: string): FileRecord {
  const record = session.files.get(fileId);
  if (!record) throw new NotFoundError("file", fileId);
  return record;
}

/**
 * Upload validation and per-file state changes. Every mutation runs inside
 * the session's exclusive scope; reads take the shared scope.
 */
export class FileManager {
  private readonly maxFileBytes: number;
  private readonly maxSessionBytes: number;
  private readonly now: () => number;
  private readonly newFileId: () => string;

  constructor(
    private readonly store: SessionStore,
    options: FileManagerOptions = {},
  ) {
    this.maxFileBytes = options.maxFileBytes ?? CONFIG.MAX_FILE_BYTES;
    this.maxSessionBytes = options.maxSessionBytes ?? CONFIG.MAX_SESSION_BYTES;
    this.now = options.now ?? Date.now;
    this.newFileId = options.newFileId ?? shortId;
  }

  get limits(): { maxFileBytes: number; maxSessionBytes: number } {
    return { maxFileBytes: this.maxFileBytes, maxSessionBytes: this.maxSessionBytes };
  }

  /**
   * Validates and stores an upload. Nothing is added on failure.
   */
  async upload(sessionId: string, filename: string, bytes: Buffer): Promise<FileInfo> {
    return this.store.withSession(sessionId, "write", (session) => {
      const classified = classifyUpload(filename, bytes);
      if (!classified) {
        throw new UnsupportedFormatError(
          `Unsupported file type: ${filename}. Supported: ${getSupportedExtensions().join(", ")}`,
        );
      }
      if (bytes.length === 0) {
        throw new UnsupportedFormatError(`${filename} is empty`);
      }
      if (bytes.length > this.maxFileBytes) {
        throw new FileTooLargeError(bytes.length, this.maxFileBytes);
      }
      if (session.totalBytes + bytes.length > this.maxSessionBytes) {
        throw new SessionQuotaExceededError(
          session.totalBytes + bytes.length,
          this.maxSessionBytes,
        );
      }

      let id = this.newFileId();
      while (session.files.has(id)) id = this.newFileId();

      const record: FileRecord = {
        id,
        filename,
        extension: classified.extension,
        category: classified.category,
        mimeType: classified.mimeType,
        size: bytes.length,
        outputFormat: getDefaultFormat(classified.category),
        status: "uploaded",
        uploadedAt: this.now(),
        content: bytes,
      };
      session.files.set(id, record);
      session.totalBytes += record.size;
      return toFileInfo(record);
    });
  }

  async setFormat(sessionId: string, fileId: string, format: string): Promise<FileInfo> {
    if (!isOutputFormat(format)) {
      throw new UnsupportedFormatError(
        `Unknown output format '${format}'. Expected one of: ${OUTPUT_FORMATS.join(", ")}`,
      );
    }
    return this.store.withSession(sessionId, "write", (session) => {
      const record = requireFile(session, fileId);
      if (record.status !== "uploaded") {
        throw new InvalidStateTransitionError(
          `Cannot change the output format of ${record.filename} once it is ${record.status}`,
        );
      }
      record.outputFormat = format;
      return toFileInfo(record);
    });
  }

  async delete(sessionId: string, fileId: string): Promise<void> {
    await this.store.withSession(sessionId, "write", (session) => {
      const record = requireFile(session, fileId);
      session.files.delete(fileId);
      session.totalBytes -= record.size;
      releaseContent(record);
    });
  }

  /**
   * Empties the session. Waits for an in-flight batch to finish first.
   */
  async clear(sessionId: string): Promise<number> {
    return this.store.withSession(sessionId, "write", (session) => {
      const removed = session.files.size;
      for (const record of session.files.values()) {
        releaseContent(record);
      }
      session.files.clear();
      session.totalBytes = 0;
      return removed;
    });
  }

  async get(sessionId: string, fileId: string): Promise<FileInfo> {
    return this.store.withSession(sessionId, "read", (session) =>
      toFileInfo(requireFile(session, fileId)),
    );
  }

  async list(sessionId: string): Promise<FileInfo[]> {
    return this.store.withSession(sessionId, "read", (session) =>
      Array.from(session.files.values(), toFileInfo),
    );
  }
}
