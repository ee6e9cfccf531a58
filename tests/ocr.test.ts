import * as path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { resolveLangPath, TesseractOcrEngine } from "../src/lib/convert/extractors/image";

const { recognize } = vi.hoisted(() => ({ recognize: vi.fn() }));

vi.mock("tesseract.js", () => ({ default: { recognize } }));

afterEach(() => {
  recognize.mockReset();
});

describe("resolveLangPath", () => {
  const installed = (id: string) => {
    if (id !== "@tesseract.js-data/eng/package.json") throw new Error(`Cannot find module '${id}'`);
    return "/deps/node_modules/@tesseract.js-data/eng/package.json";
  };

  it("points at the packaged traineddata directory", () => {
    expect(resolveLangPath("eng", undefined, installed)).toBe(
      path.join("/deps/node_modules/@tesseract.js-data/eng", "4.0.0_best_int"),
    );
  });

  it("prefers a configured directory", () => {
    expect(resolveLangPath("eng+deu", "/srv/tessdata", installed)).toBe("/srv/tessdata");
  });

  it("names the package to install for a missing language", () => {
    expect(() => resolveLangPath("fra", undefined, installed)).toThrow(
      "No OCR data for \"fra\": install @tesseract.js-data/fra (Cannot find module '@tesseract.js-data/fra/package.json')",
    );
  });

  it("needs a configured directory for combined languages", () => {
    expect(() => resolveLangPath("eng+deu", undefined, installed)).toThrow(
      'OCR languages "eng+deu" need DOC2AI_OCR_LANG_PATH set to a directory of .traineddata.gz files',
    );
  });
});

describe("TesseractOcrEngine", () => {
  it("reads language data from disk without caching it", async () => {
    recognize.mockResolvedValue({ data: { text: "Invoice 42\n" } });
    const image = Buffer.from("image-bytes");

    await expect(new TesseractOcrEngine("eng", "/srv/tessdata").recognize(image)).resolves.toBe(
      "Invoice 42\n",
    );
    expect(recognize).toHaveBeenCalledWith(image, "eng", {
      langPath: "/srv/tessdata",
      cacheMethod: "none",
    });
  });

  it("propagates recognizer failures", async () => {
    recognize.mockRejectedValue(new Error("corrupt traineddata"));
    await expect(
      new TesseractOcrEngine("eng", "/srv/tessdata").recognize(Buffer.alloc(1)),
    ).rejects.toThrow("corrupt traineddata");
  });
});
