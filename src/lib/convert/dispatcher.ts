import { ExtractionError, UnsupportedFormatError } from "../errors";
import { getBaseName } from "../utils/file-utils";
import {
  createDefaultExtractors,
  createDefaultSerializers,
  type ExtractorRegistry,
  type SerializerRegistry,
} from "./registry";
import type {
  InputCategory,
  OutputFormat,
  RenderedOutput,
  Serializer,
  SourceFile,
  StructuredContent,
} from "./types";

export interface ConvertInput extends SourceFile {
  category: InputCategory;
  outputFormat: OutputFormat;
}

/**
 * `base + ext`, or `base_2 + ext`, `base_3 + ext`, ... when taken.
 */
export function uniqueOutputName(
  baseName: string,
  extension: string,
  taken: ReadonlySet<string>,
): string {
  let candidate = `${baseName}${extension}`;
  for (let n = 2; taken.has(candidate); n += 1) {
    candidate = `${baseName}_${n}${extension}`;
  }
  return candidate;
}

/**
 * Picks the extractor for the input category and the serializer for the
 * output format, then runs them. No retries: the output depends only on the
 * bytes, the filename and the format.
 */
export class ConversionDispatcher {
  constructor(
    private readonly extractors: ExtractorRegistry = createDefaultExtractors(),
    private readonly serializers: SerializerRegistry = createDefaultSerializers(),
  ) {}

  private serializerFor(input: Pick<ConvertInput, "category" | "outputFormat">): Serializer {
    const serializer = this.serializers.get(input.outputFormat);
    if (!serializer || !serializer.supports(input.category)) {
      throw new UnsupportedFormatError(
        `Cannot render ${input.category} files as ${input.outputFormat}`,
      );
    }
    return serializer;
  }

  /**
   * The name `convert` would give this input against the same reserved set,
   * or undefined when no serializer can render it.
   */
  planOutputName(
    input: Pick<ConvertInput, "filename" | "category" | "outputFormat">,
    reservedNames: ReadonlySet<string>,
  ): string | undefined {
    const serializer = this.serializers.get(input.outputFormat);
    if (!serializer?.supports(input.category)) return undefined;
    return uniqueOutputName(getBaseName(input.filename), serializer.extension, reservedNames);
  }

  async convert(
    input: ConvertInput,
    reservedNames: ReadonlySet<string> = new Set(),
  ): Promise<RenderedOutput> {
    const extractor = this.extractors.get(input.category);
    if (!extractor) {
      throw new UnsupportedFormatError(`No extractor for ${input.category} files`);
    }
    const serializer = this.serializerFor(input);

    let content: StructuredContent;
    try {
      content = await extractor.extract(input);
    } catch (err) {
      throw new ExtractionError(input.filename, err);
    }

    return {
      outputFilename: uniqueOutputName(
        getBaseName(input.filename),
        serializer.extension,
        reservedNames,
      ),
      output: serializer.serialize(content, { filename: input.filename }),
    };
  }
}
