import * as path from "node:path";
import { CONFIG } from "../../../config";
import { describeCause } from "../../errors";

/**
 * OCR backend. Implementations return the recognised text, possibly empty,
 * and throw when the engine itself fails.
 */
export interface OcrEngine {
  recognize(image: Buffer, mimeType: string): Promise<string>;
}

const TRAINEDDATA_VARIANT = "4.0.0_best_int";

/**
 * Local directory holding `<lang>.traineddata.gz`, taken from the
 * `@tesseract.js-data/<lang>` package unless a directory is configured.
 * Combined languages ("eng+deu") need the configured directory.
 */
export function resolveLangPath(
  language: string,
  configured: string | undefined = CONFIG.OCR_LANG_PATH,
  resolvePackage: (id: string) => string = (id) => require.resolve(id),
): string {
  if (configured) return configured;
  if (language.includes("+")) {
    throw new Error(
      `OCR languages "${language}" need DOC2AI_OCR_LANG_PATH set to a directory of .traineddata.gz files`,
    );
  }
  const pkg = `@tesseract.js-data/${language}`;
  try {
    return path.join(path.dirname(resolvePackage(`${pkg}/package.json`)), TRAINEDDATA_VARIANT);
  } catch (err) {
    throw new Error(`No OCR data for "${language}": install ${pkg} (${describeCause(err)})`);
  }
}

/**
 * tesseract.js, loaded on first use so nothing pays for it until an image is
 * converted. Language data is read from disk, never downloaded or cached.
 */
export class TesseractOcrEngine implements OcrEngine {
  constructor(
    private readonly language: string = CONFIG.OCR_LANGUAGE,
    private readonly langPath?: string,
  ) {}

  async recognize(image: Buffer): Promise<string> {
    const langPath = this.langPath ?? resolveLangPath(this.language);
    const tesseract = await import("tesseract.js");
    const result = await tesseract.default.recognize(image, this.language, {
      langPath,
      cacheMethod: "none",
    });
    return result.data.text;
  }
}

export interface ImageDimensions {
  width: number;
  height: number;
}

function jpegDimensions(bytes: Buffer): ImageDimensions | null {
  let offset = 2;
  while (offset + 9 < bytes.length) {
    if (bytes[offset] !== 0xff) return null;
    const marker = bytes[offset + 1];
    const length = bytes.readUInt16BE(offset + 2);
    const isStartOfFrame =
      marker >= 0xc0 && marker <= 0xcf && marker !== 0xc4 && marker !== 0xc8 && marker !== 0xcc;
    if (isStartOfFrame) {
      return {
        height: bytes.readUInt16BE(offset + 5),
        width: bytes.readUInt16BE(offset + 7),
      };
    }
    offset += 2 + length;
  }
  return null;
}

/**
 * Width and height from the file header for PNG, GIF, BMP and JPEG. Other
 * formats, or truncated headers, give null.
 */
export function readImageDimensions(
  bytes: Buffer,
  mimeType: string,
): ImageDimensions | null {
  switch (mimeType) {
    case "image/png":
      return bytes.length >= 24
        ? { width: bytes.readUInt32BE(16), height: bytes.readUInt32BE(20) }
        : null;
    case "image/gif":
      return bytes.length >= 10
        ? { width: bytes.readUInt16LE(6), height: bytes.readUInt16LE(8) }
        : null;
    case "image/bmp":
      return bytes.length >= 26
        ? {
            width: bytes.readInt32LE(18),
            height: Math.abs(bytes.readInt32LE(22)),
          }
        : null;
    case "image/jpeg":
      return jpegDimensions(bytes);
    default:
      return null;
  }
}
