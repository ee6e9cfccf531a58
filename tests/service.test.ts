import JSZip from "jszip";
import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("pdfjs-dist/legacy/build/pdf", () => {
  const item = (str: string, y: number) => ({
    str,
    transform: [11, 0, 0, 11, 72, y],
    width: 100,
    height: 11,
    hasEOL: true,
  });
  const items = [item("First paragraph", 720), item("here", 707), item("Second paragraph", 660)];
  return {
    VerbosityLevel: { ERRORS: 0 },
    getDocument: () => ({
      promise: Promise.resolve({
        numPages: 1,
        getPage: async () => ({ getTextContent: async () => ({ items }) }),
        destroy: async () => {},
      }),
    }),
  };
});

import { InvalidStateTransitionError, NothingToArchiveError } from "../src/lib/errors";
import { ConversionService } from "../src/lib/service";
import { buildSalesXlsx, FakeOcr, GatedOcr, pngBytes } from "./fixtures";

const PDF_BYTES = Buffer.from("%PDF-1.4\n% test fixture\n");

describe("ConversionService", () => {
  let service: ConversionService;
  let sessionId: string;

  beforeEach(async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    service = new ConversionService({ ocr: new FakeOcr("Invoice 42\n"), concurrency: 2 });
    sessionId = (await service.createOrResumeSession()).sessionId;
  });

  it("creates, resumes and replaces sessions by token", async () => {
    const resumed = await service.createOrResumeSession(sessionId);
    expect(resumed).toEqual({ sessionId, created: false, files: [] });

    const fresh = await service.createOrResumeSession("stale-token");
    expect(fresh.created).toBe(true);
    expect(fresh.sessionId).not.toBe(sessionId);
  });

  it("converts a workbook to a JSON array of rows", async () => {
    const { id } = await service.uploadFile(sessionId, "sales.xlsx", await buildSalesXlsx());
    await service.setOutputFormat(sessionId, id, "json");
    const [result] = await service.convertAll(sessionId);
    expect(result).toMatchObject({ status: "converted", outputFilename: "sales.json" });

    const download = await service.downloadFile(sessionId, id);
    expect(download.filename).toBe("sales.json");
    expect(download.contentType).toBe("application/json; charset=utf-8");
    expect(JSON.parse(download.body.toString("utf-8"))).toEqual([
      { Region: "North", Units: "120" },
      { Region: "South", Units: "95" },
    ]);
  });

  it("renders a PDF as markdown paragraphs", async () => {
    const { id, outputFormat } = await service.uploadFile(sessionId, "report.pdf", PDF_BYTES);
    expect(outputFormat).toBe("markdown");
    await service.convertAll(sessionId);

    const download = await service.downloadFile(sessionId, id);
    expect(download.filename).toBe("report.md");
    expect(download.body.toString("utf-8")).toBe(
      "# report.pdf\n\n> Converted from PDF document\n\n---\n\n" +
        "## Page 1\n\nFirst paragraph here\n\nSecond paragraph\n",
    );
  });

  it("describes a scanned image with OCR text and base64", async () => {
    const { id } = await service.uploadFile(sessionId, "scan.png", pngBytes());
    await service.convertAll(sessionId);

    const download = await service.downloadFile(sessionId, id);
    const base64 = pngBytes().toString("base64");
    expect(JSON.parse(download.body.toString("utf-8"))).toEqual({
      source: "scan.png",
      mimeType: "image/png",
      width: 1,
      height: 1,
      ocrText: "Invoice 42",
      base64,
      dataUri: `data:image/png;base64,${base64}`,
    });
  });

  it("bundles three converted files into one archive", async () => {
    await service.uploadFile(sessionId, "sales.xlsx", await buildSalesXlsx());
    await service.uploadFile(sessionId, "report.pdf", PDF_BYTES);
    await service.uploadFile(sessionId, "scan.png", pngBytes());
    const results = await service.convertAll(sessionId);
    expect(results.every((r) => r.status === "converted")).toBe(true);

    const archive = await service.downloadArchive(sessionId);
    expect(archive.filename).toBe("converted_files.zip");
    expect(archive.contentType).toBe("application/zip");
    const zip = await JSZip.loadAsync(archive.body);
    expect(Object.keys(zip.files).sort()).toEqual(["report.md", "sales.json", "scan.json"]);
  });

  it("truncates long previews and reports the full size", async () => {
    const short = new ConversionService({ previewChars: 10 });
    const sid = (await short.createOrResumeSession()).sessionId;
    const { id } = await short.uploadFile(sid, "data.csv", Buffer.from("name\nAda\n"));
    await short.setOutputFormat(sid, id, "json");
    await short.convertAll(sid);

    const output = '[\n  {\n    "name": "Ada"\n  }\n]';
    expect(await short.getFilePreview(sid, id)).toEqual({
      fileId: id,
      filename: "data.json",
      format: "json",
      preview: `${output.slice(0, 10)}\n\n... [truncated]`,
      truncated: true,
      fullSize: output.length,
    });
  });

  it("refuses previews and downloads before conversion", async () => {
    const { id } = await service.uploadFile(sessionId, "data.csv", Buffer.from("a\n1\n"));
    await expect(service.getFilePreview(sessionId, id)).rejects.toBeInstanceOf(
      InvalidStateTransitionError,
    );
    await expect(service.downloadFile(sessionId, id)).rejects.toThrow(
      "File not yet converted: data.csv",
    );
    await expect(service.downloadArchive(sessionId)).rejects.toBeInstanceOf(
      NothingToArchiveError,
    );
  });

  it("records a failed file without failing the batch", async () => {
    await service.uploadFile(sessionId, "broken.xlsx", Buffer.from("PK\x03\x04 not a zip"));
    await service.uploadFile(sessionId, "ok.csv", Buffer.from("a\n1\n"));
    const results = await service.convertAll(sessionId);
    expect(results.map((r) => r.status)).toEqual(["error", "converted"]);

    const files = await service.listFiles(sessionId);
    expect(files.map((f) => f.status)).toEqual(["error", "converted"]);
    expect(files[0].error).toMatch(/^Could not read broken\.xlsx: /);
  });

  it("clears a session and frees its quota", async () => {
    await service.uploadFile(sessionId, "ok.csv", Buffer.from("a\n1\n"));
    await service.clearSession(sessionId);
    expect(await service.listFiles(sessionId)).toEqual([]);
    expect(service.store.get(sessionId).totalBytes).toBe(0);
  });
});

describe("ConversionService while a batch is running", () => {
  let ocr: GatedOcr;
  let service: ConversionService;
  let sessionId: string;

  beforeEach(async () => {
    ocr = new GatedOcr("Held");
    service = new ConversionService({ ocr, concurrency: 2 });
    sessionId = (await service.createOrResumeSession()).sessionId;
    await service.uploadFile(sessionId, "scan.png", pngBytes());
  });

  it("runs a clear only after the batch has finished", async () => {
    const events: string[] = [];
    const batch = service.convertAll(sessionId).then((results) => {
      events.push("batch");
      return results;
    });
    await ocr.started;
    const clearing = service.clearSession(sessionId).then(() => events.push("clear"));

    await Promise.resolve();
    expect(events).toEqual([]);
    ocr.open();
    const results = await batch;
    await clearing;

    expect(events).toEqual(["batch", "clear"]);
    expect(results.map((r) => r.status)).toEqual(["converted"]);
    expect(await service.listFiles(sessionId)).toEqual([]);
    expect(service.store.get(sessionId).totalBytes).toBe(0);
  });

  it("leaves a file uploaded mid-batch for the next batch", async () => {
    const batch = service.convertAll(sessionId);
    await ocr.started;
    const upload = service.uploadFile(sessionId, "late.csv", Buffer.from("a\n1\n"));
    ocr.open();

    const results = await batch;
    const late = await upload;
    expect(results.map((r) => r.filename)).toEqual(["scan.png"]);
    expect(late.status).toBe("uploaded");

    const files = await service.listFiles(sessionId);
    expect(files.map((f) => [f.filename, f.status])).toEqual([
      ["scan.png", "converted"],
      ["late.csv", "uploaded"],
    ]);

    const next = await service.convertAll(sessionId);
    expect(next.map((r) => r.filename)).toEqual(["late.csv"]);
  });

  it("converts each file once when two batches overlap", async () => {
    await service.uploadFile(sessionId, "data.csv", Buffer.from("a\n1\n"));
    const first = service.convertAll(sessionId);
    await ocr.started;
    const second = service.convertAll(sessionId);
    ocr.open();

    const [firstResults, secondResults] = await Promise.all([first, second]);
    expect(firstResults.map((r) => [r.filename, r.status])).toEqual([
      ["scan.png", "converted"],
      ["data.csv", "converted"],
    ]);
    expect(secondResults).toEqual([]);
    expect(ocr.calls).toBe(1);
  });
});
