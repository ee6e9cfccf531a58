import pLimit from "p-limit";
import { CONFIG, DEBUG } from "../../config";
import { ConversionDispatcher } from "../convert/dispatcher";
import type { RenderedOutput } from "../convert/types";
import { describeCause } from "../errors";
import type { SessionStore } from "./session-store";
import type { ConversionResult, FileRecord } from "./types";

export interface OrchestratorOptions {
  concurrency?: number;
  now?: () => number;
}

/**
 * Converts every pending file of a session. One file failing never stops or
 * undoes the others.
 */
export class BatchOrchestrator {
  private readonly concurrency: number;
  private readonly now: () => number;

  constructor(
    private readonly store: SessionStore,
    private readonly dispatcher: ConversionDispatcher = new ConversionDispatcher(),
    options: OrchestratorOptions = {},
  ) {
    this.concurrency = Math.max(1, options.concurrency ?? CONFIG.CONVERT_CONCURRENCY);
    this.now = options.now ?? Date.now;
  }

  async convertAll(sessionId: string): Promise<ConversionResult[]> {
    return this.store.withSession(sessionId, "write", async (session) => {
      const pending = Array.from(session.files.values()).filter(
        (record) => record.status === "uploaded",
      );
      if (pending.length === 0) return [];

      // Names are reserved up front in selection order so suffixes do not
      // depend on which conversion finishes first.
      const taken = new Set<string>();
      for (const record of session.files.values()) {
        if (record.outputFilename) taken.add(record.outputFilename);
      }
      const reservations = new Map<string, Set<string>>();
      for (const record of pending) {
        reservations.set(record.id, new Set(taken));
        const planned = this.dispatcher.planOutputName(record, taken);
        if (planned) taken.add(planned);
        record.status = "converting";
      }

      try {
        const limit = pLimit(this.concurrency);
        const outcomes = await Promise.all(
          pending.map((record) =>
            limit(() => this.convertOne(record, reservations.get(record.id) ?? taken)),
          ),
        );
        return outcomes.map((outcome) => outcome.result);
      } finally {
        for (const record of pending) {
          if (record.status === "converting") record.status = "uploaded";
        }
      }
    });
  }

  private async convertOne(
    record: FileRecord,
    reserved: Set<string>,
  ): Promise<{ record: FileRecord; result: ConversionResult }> {
    let rendered: RenderedOutput | null = null;
    let error = "";
    try {
      if (!record.content) throw new Error("upload data is no longer available");
      rendered = await this.dispatcher.convert(
        {
          filename: record.filename,
          extension: record.extension,
          mimeType: record.mimeType,
          bytes: record.content,
          category: record.category,
          outputFormat: record.outputFormat,
        },
        reserved,
      );
    } catch (err) {
      error = describeCause(err);
      console.warn(`[convert] ${record.filename}: ${error}`);
    }

    // Nothing on the record changes until the outcome is complete.
    const convertedAt = this.now();
    const result: ConversionResult = {
      fileId: record.id,
      filename: record.filename,
      status: rendered ? "converted" : "error",
      convertedAt: new Date(convertedAt).toISOString(),
    };
    record.convertedAt = convertedAt;
    if (rendered) {
      record.status = "converted";
      record.outputFilename = rendered.outputFilename;
      record.output = rendered.output;
      record.error = undefined;
      result.outputFilename = rendered.outputFilename;
      result.outputFormat = record.outputFormat;
    } else {
      record.status = "error";
      record.error = error;
      record.output = undefined;
      record.outputFilename = undefined;
      result.error = error;
    }
    if (DEBUG) {
      console.log(`[convert] ${record.id} ${record.filename} -> ${record.status}`);
    }
    return { record, result };
  }
}
