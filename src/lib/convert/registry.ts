import { CONFIG } from "../../config";
import type { VisionProvider } from "../vision/analysis";
import { createVisionProvider } from "../vision/openai-provider";
import { jsonSerializer } from "../output/json-formatter";
import { markdownSerializer } from "../output/markdown-formatter";
import {
  createImageExtractor,
  documentExtractor,
  presentationExtractor,
  spreadsheetExtractor,
  type OcrEngine,
} from "./extractors";
import type { Extractor, InputCategory, OutputFormat, Serializer } from "./types";

export class ExtractorRegistry {
  private extractors = new Map<InputCategory, Extractor>();

  register(extractor: Extractor): this {
    this.extractors.set(extractor.category, extractor);
    return this;
  }

  get(category: InputCategory): Extractor | undefined {
    return this.extractors.get(category);
  }
}

export class SerializerRegistry {
  private serializers = new Map<OutputFormat, Serializer>();

  register(serializer: Serializer): this {
    this.serializers.set(serializer.format, serializer);
    return this;
  }

  get(format: OutputFormat): Serializer | undefined {
    return this.serializers.get(format);
  }
}

export interface ExtractorOptions {
  ocr?: OcrEngine;
  /** null turns vision off; undefined falls back to the configured provider */
  vision?: VisionProvider | null;
}

export function createDefaultExtractors(options: ExtractorOptions = {}): ExtractorRegistry {
  const vision =
    options.vision === undefined
      ? createVisionProvider({
          enabled: CONFIG.VISION_ENABLED,
          provider: CONFIG.VISION_PROVIDER,
          model: CONFIG.VISION_MODEL,
        })
      : options.vision;
  return new ExtractorRegistry()
    .register(documentExtractor)
    .register(spreadsheetExtractor)
    .register(presentationExtractor)
    .register(createImageExtractor(options.ocr, vision));
}

export function createDefaultSerializers(): SerializerRegistry {
  return new SerializerRegistry()
    .register(markdownSerializer)
    .register(jsonSerializer);
}
