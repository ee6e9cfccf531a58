import JSZip from "jszip";
import { NothingToArchiveError } from "../errors";
import type { SessionStore } from "../session/session-store";
import type { FileRecord, Session } from "../session/types";

export interface ArchiveWriter {
  add(name: string, bytes: Buffer, date: Date): void;
  finalize(): Promise<Buffer>;
}

export class ZipArchiveWriter implements ArchiveWriter {
  private zip = new JSZip();

  add(name: string, bytes: Buffer, date: Date): void {
    this.zip.file(name, bytes, { date, binary: true });
  }

  finalize(): Promise<Buffer> {
    return this.zip.generateAsync({
      type: "nodebuffer",
      compression: "DEFLATE",
      compressionOptions: { level: 6 },
      platform: "UNIX",
    });
  }
}

type ArchivedRecord = FileRecord & {
  outputFilename: string;
  output: string;
  convertedAt: number;
};

function isArchivable(record: FileRecord): record is ArchivedRecord {
  return (
    record.status === "converted" &&
    record.outputFilename !== undefined &&
    record.output !== undefined &&
    record.convertedAt !== undefined
  );
}

/** Converted records by completion time, ties by file id. */
export function archiveEntries(session: Session): ArchivedRecord[] {
  return Array.from(session.files.values())
    .filter(isArchivable)
    .sort(
      (a, b) =>
        a.convertedAt - b.convertedAt || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0),
    );
}

export async function writeArchive(
  session: Session,
  writer: ArchiveWriter = new ZipArchiveWriter(),
): Promise<Buffer> {
  const entries = archiveEntries(session);
  if (entries.length === 0) throw new NothingToArchiveError();
  for (const record of entries) {
    writer.add(
      record.outputFilename,
      Buffer.from(record.output, "utf-8"),
      new Date(record.convertedAt),
    );
  }
  return writer.finalize();
}

export class ArchiveAssembler {
  constructor(
    private readonly store: SessionStore,
    private readonly createWriter: () => ArchiveWriter = () => new ZipArchiveWriter(),
  ) {}

  /**
   * Zips every converted output of the session. Same session state, same
   * bytes.
   */
  async buildArchive(sessionId: string): Promise<Buffer> {
    return this.store.withSession(sessionId, "write", (session) =>
      writeArchive(session, this.createWriter()),
    );
  }
}
