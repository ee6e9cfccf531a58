import type {
  ContentBlock,
  DocumentContent,
  ImageContent,
  PresentationContent,
  Serializer,
  SpreadsheetContent,
  StructuredContent,
  VisionAnalysis,
} from "../convert/types";
import { isRecord } from "../vision/analysis";

function escapeCell(value: string): string {
  return value.replace(/\r?\n/g, " ").replace(/\|/g, "\\|").trim();
}

/**
 * GitHub pipe table. The first row is the header; other rows are padded or
 * cut to its width.
 */
export function renderTable(headers: string[], rows: string[][]): string {
  const width = headers.length;
  if (width === 0) return "";
  const line = (cells: string[]) => {
    const fitted = Array.from({ length: width }, (_, i) => escapeCell(cells[i] ?? ""));
    return `| ${fitted.join(" | ")} |`;
  };
  return [
    line(headers),
    `| ${Array<string>(width).fill("---").join(" | ")} |`,
    ...rows.map(line),
  ].join("\n");
}

function renderBlock(block: ContentBlock): string {
  switch (block.kind) {
    case "page":
      return `## Page ${block.number}`;
    case "heading":
      return `${"#".repeat(Math.min(Math.max(block.level, 1), 6))} ${block.text}`;
    case "paragraph":
      return block.text;
    case "table": {
      const [headers = [], ...rows] = block.rows;
      return renderTable(headers, rows);
    }
  }
}

function renderDocument(content: DocumentContent): string[] {
  return content.blocks.map(renderBlock).filter(Boolean);
}

function renderSpreadsheet(content: SpreadsheetContent): string[] {
  return content.sheets.flatMap((sheet) => {
    const table = renderTable(sheet.headers, sheet.rows);
    return [`## ${sheet.name}`, table || "*Empty sheet*"];
  });
}

function renderPresentation(content: PresentationContent): string[] {
  return content.slides.flatMap((slide) => {
    const parts = [`## Slide ${slide.number}`];
    if (slide.title) parts.push(`### ${slide.title}`);
    if (slide.paragraphs.length > 0) {
      parts.push(slide.paragraphs.map((text) => `- ${text}`).join("\n"));
    }
    for (const table of slide.tables) {
      const [headers = [], ...rows] = table;
      const rendered = renderTable(headers, rows);
      if (rendered) parts.push(rendered);
    }
    if (slide.notes) parts.push(`**Speaker Notes:** ${slide.notes}`);
    return parts;
  });
}

function textField(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  if (typeof value === "string") return value.trim() || undefined;
  return typeof value === "number" ? String(value) : undefined;
}

const STYLE_LABELS: Array<[key: string, label: string]> = [
  ["artistic_style", "Artistic Style"],
  ["mood", "Mood"],
  ["atmosphere", "Atmosphere"],
];
const MAX_LISTED_COLORS = 5;

function renderColors(colors: Record<string, unknown>): string[] {
  const dominant: unknown = colors.dominant_colors;
  const entries: unknown[] = Array.isArray(dominant) ? dominant : [];
  const lines = entries
    .filter(isRecord)
    .slice(0, MAX_LISTED_COLORS)
    .map((color) => {
      const name = textField(color, "name") ?? "unnamed";
      const hex = textField(color, "hex");
      const share = textField(color, "percentage");
      return `- ${name}${hex ? ` (${hex})` : ""}${share ? ` - ${share}%` : ""}`;
    });
  const palette = textField(colors, "palette_type");
  if (palette) lines.push(`**Palette Type:** ${palette}`);
  return lines;
}

/** The model's answer is free-form JSON; only fields of the expected shape are shown. */
export function renderVision(vision: VisionAnalysis): string[] {
  if (!vision.success) {
    return ["## AI Vision Analysis", `*Analysis unavailable: ${vision.error}*`];
  }
  const { analysis } = vision;
  const parts = [
    "## AI Vision Analysis",
    `*Analyzed by: ${vision.provider} (${vision.model})*`,
  ];
  const summary = textField(analysis, "summary");
  if (summary) parts.push("### Summary", summary);
  const prompt = textField(analysis, "reproduction_prompt");
  if (prompt) parts.push("### Reproduction Prompt", `\`\`\`text\n${prompt}\n\`\`\``);
  const style = analysis.style;
  if (isRecord(style)) {
    const lines = STYLE_LABELS.flatMap(([key, label]) => {
      const value = textField(style, key);
      return value ? [`- **${label}:** ${value}`] : [];
    });
    if (lines.length > 0) parts.push("### Style & Mood", lines.join("\n"));
  }
  const colors = analysis.colors;
  if (isRecord(colors)) {
    const lines = renderColors(colors);
    if (lines.length > 0) parts.push("### Colors", lines.join("\n"));
  }
  return parts;
}

function renderImage(content: ImageContent, filename: string): string[] {
  const info = [`- **Format:** ${content.mimeType}`];
  if (content.width !== undefined && content.height !== undefined) {
    info.push(`- **Dimensions:** ${content.width} x ${content.height} pixels`);
  }
  const alt = filename.replace(/[[\]]/g, "\\$&");
  return [
    "## Image Information",
    info.join("\n"),
    "## Extracted Text (OCR)",
    content.ocrText ? `\`\`\`text\n${content.ocrText}\n\`\`\`` : "*No text detected*",
    ...(content.vision ? renderVision(content.vision) : []),
    "## Image",
    `![${alt}](data:${content.mimeType};base64,${content.base64})`,
  ];
}

function renderBody(content: StructuredContent, filename: string): string[] {
  switch (content.category) {
    case "document":
      return renderDocument(content);
    case "spreadsheet":
      return renderSpreadsheet(content);
    case "presentation":
      return renderPresentation(content);
    case "image":
      return renderImage(content, filename);
  }
}

export function formatMarkdown(
  content: StructuredContent,
  filename: string,
): string {
  const header = [`# ${filename}`, `> Converted from ${content.sourceType}`, "---"];
  return `${[...header, ...renderBody(content, filename)].join("\n\n")}\n`;
}

export const markdownSerializer: Serializer = {
  format: "markdown",
  extension: ".md",
  supports: () => true,
  serialize: (content, source) => formatMarkdown(content, source.filename),
};
