import { analyzeImage, type VisionProvider } from "../../vision/analysis";
import type {
  DocumentContent,
  Extractor,
  ImageContent,
  PresentationContent,
  SourceFile,
  SpreadsheetContent,
} from "../types";
import { parseCsv } from "./csv";
import { extractDocxBlocks } from "./docx";
import { readImageDimensions, TesseractOcrEngine, type OcrEngine } from "./image";
import { extractPdfBlocks } from "./pdf";
import { extractPptxSlides } from "./pptx";
import { extractXlsxSheets, toSheet } from "./xlsx";

export { TesseractOcrEngine, type OcrEngine } from "./image";

function unexpectedExtension(source: SourceFile, category: string): Error {
  return new Error(`No ${category} reader for ${source.extension} files`);
}

export const documentExtractor: Extractor = {
  category: "document",
  async extract(source): Promise<DocumentContent> {
    if (source.extension === ".pdf") {
      const { blocks, pageCount } = await extractPdfBlocks(source.bytes);
      return { category: "document", sourceType: "PDF document", blocks, pageCount };
    }
    if (source.extension === ".docx") {
      const blocks = await extractDocxBlocks(source.bytes);
      return { category: "document", sourceType: "Word document", blocks };
    }
    throw unexpectedExtension(source, "document");
  },
};

export const spreadsheetExtractor: Extractor = {
  category: "spreadsheet",
  async extract(source): Promise<SpreadsheetContent> {
    if (source.extension === ".csv") {
      const rows = parseCsv(source.bytes.toString("utf-8"));
      return {
        category: "spreadsheet",
        sourceType: "CSV spreadsheet",
        sheets: [toSheet("Sheet1", rows)],
      };
    }
    if (source.extension === ".xlsx") {
      const sheets = await extractXlsxSheets(source.bytes);
      return { category: "spreadsheet", sourceType: "Excel spreadsheet", sheets };
    }
    throw unexpectedExtension(source, "spreadsheet");
  },
};

export const presentationExtractor: Extractor = {
  category: "presentation",
  async extract(source): Promise<PresentationContent> {
    if (source.extension !== ".pptx") {
      throw unexpectedExtension(source, "presentation");
    }
    const slides = await extractPptxSlides(source.bytes);
    return {
      category: "presentation",
      sourceType: "PowerPoint presentation",
      slides,
    };
  },
};

/**
 * OCR text plus the image itself as base64, so the output can embed it.
 * An OCR engine failure fails the extraction; a vision failure is recorded
 * on the content instead.
 */
export function createImageExtractor(
  ocr: OcrEngine = new TesseractOcrEngine(),
  vision: VisionProvider | null = null,
): Extractor {
  return {
    category: "image",
    async extract(source): Promise<ImageContent> {
      const ocrText = (await ocr.recognize(source.bytes, source.mimeType)).trim();
      const dimensions = readImageDimensions(source.bytes, source.mimeType);
      const analysis = vision
        ? await analyzeImage(vision, source.bytes, source.mimeType)
        : undefined;
      return {
        category: "image",
        sourceType: `${source.mimeType.replace("image/", "").toUpperCase()} image`,
        mimeType: source.mimeType,
        width: dimensions?.width,
        height: dimensions?.height,
        ocrText,
        base64: source.bytes.toString("base64"),
        vision: analysis,
      };
    },
  };
}
