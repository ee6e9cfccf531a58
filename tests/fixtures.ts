import JSZip from "jszip";
import type { OcrEngine } from "../src/lib/convert/extractors";
import type { VisionProvider } from "../src/lib/vision/analysis";

const XML_DECL = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>';
const W_NS = 'xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main"';
const SS_NS = 'xmlns="http://schemas.openxmlformats.org/spreadsheetml/2006/main"';
const R_NS = 'xmlns:r="http://schemas.openxmlformats.org/officeDocument/2006/relationships"';
const P_NS = 'xmlns:p="http://schemas.openxmlformats.org/presentationml/2006/main"';
const A_NS = 'xmlns:a="http://schemas.openxmlformats.org/drawingml/2006/main"';
const PKG_RELS_NS = 'xmlns="http://schemas.openxmlformats.org/package/2006/relationships"';
const REL_TYPE = "http://schemas.openxmlformats.org/officeDocument/2006/relationships";

/** 1x1 PNG */
const PNG_BASE64 =
  "iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNkYPhfDwAChwGA60e6kgAAAABJRU5ErkJggg==";

export function pngBytes(): Buffer {
  return Buffer.from(PNG_BASE64, "base64");
}

export class FakeOcr implements OcrEngine {
  calls = 0;
  constructor(private readonly text: string | Error = "") {}

  async recognize(): Promise<string> {
    this.calls += 1;
    if (this.text instanceof Error) throw this.text;
    return this.text;
  }
}

/**
 * Holds every recognize() call until open() is called, so a test can act
 * while a batch is mid-conversion.
 */
export class GatedOcr implements OcrEngine {
  calls = 0;
  readonly started: Promise<void>;
  readonly open: () => void;
  private readonly gate: Promise<void>;
  private markStarted: () => void = () => {};

  constructor(private readonly text = "gated") {
    let open: () => void = () => {};
    this.gate = new Promise<void>((resolve) => {
      open = resolve;
    });
    this.open = open;
    this.started = new Promise<void>((resolve) => {
      this.markStarted = resolve;
    });
  }

  async recognize(): Promise<string> {
    this.calls += 1;
    this.markStarted();
    await this.gate;
    return this.text;
  }
}

export class FakeVision implements VisionProvider {
  readonly name = "fake";
  readonly model = "fake-vision-1";
  calls: string[] = [];
  constructor(private readonly answer: Record<string, unknown> | Error) {}

  async analyze(_image: Buffer, mimeType: string): Promise<Record<string, unknown>> {
    this.calls.push(mimeType);
    if (this.answer instanceof Error) throw this.answer;
    return this.answer;
  }
}

function relationships(rels: Array<{ id: string; type: string; target: string }>): string {
  const items = rels
    .map(
      (rel) =>
        `<Relationship Id="${rel.id}" Type="${REL_TYPE}/${rel.type}" Target="${rel.target}"/>`,
    )
    .join("");
  return `${XML_DECL}<Relationships ${PKG_RELS_NS}>${items}</Relationships>`;
}

// --- DOCX ---

export function wParagraph(text: string, style?: string): string {
  const props = style ? `<w:pPr><w:pStyle w:val="${style}"/></w:pPr>` : "";
  return `<w:p>${props}<w:r><w:t xml:space="preserve">${text}</w:t></w:r></w:p>`;
}

export function wTable(rows: string[][]): string {
  const body = rows
    .map(
      (row) =>
        `<w:tr>${row.map((cell) => `<w:tc>${wParagraph(cell)}</w:tc>`).join("")}</w:tr>`,
    )
    .join("");
  return `<w:tbl><w:tblPr/>${body}</w:tbl>`;
}

export async function buildDocx(bodyXml: string): Promise<Buffer> {
  const zip = new JSZip();
  zip.file(
    "word/document.xml",
    `${XML_DECL}<w:document ${W_NS}><w:body>${bodyXml}<w:sectPr/></w:body></w:document>`,
  );
  return zip.generateAsync({ type: "nodebuffer" });
}

// --- XLSX ---

export type CellSpec =
  | { ref: string; shared: number }
  | { ref: string; value: string }
  | { ref: string; inline: string }
  | { ref: string; bool: boolean };

function cellXml(cell: CellSpec): string {
  if ("shared" in cell) return `<c r="${cell.ref}" t="s"><v>${cell.shared}</v></c>`;
  if ("inline" in cell) {
    return `<c r="${cell.ref}" t="inlineStr"><is><t>${cell.inline}</t></is></c>`;
  }
  if ("bool" in cell) return `<c r="${cell.ref}" t="b"><v>${cell.bool ? 1 : 0}</v></c>`;
  return `<c r="${cell.ref}"><v>${cell.value}</v></c>`;
}

export interface SheetSpec {
  name: string;
  rows: CellSpec[][];
}

export async function buildXlsx(sheets: SheetSpec[], sharedStrings: string[]): Promise<Buffer> {
  const zip = new JSZip();
  const sheetEntries = sheets
    .map((sheet, i) => `<sheet name="${sheet.name}" sheetId="${i + 1}" r:id="rId${i + 1}"/>`)
    .join("");
  zip.file(
    "xl/workbook.xml",
    `${XML_DECL}<workbook ${SS_NS} ${R_NS}><sheets>${sheetEntries}</sheets></workbook>`,
  );
  zip.file(
    "xl/_rels/workbook.xml.rels",
    relationships([
      ...sheets.map((_, i) => ({
        id: `rId${i + 1}`,
        type: "worksheet",
        target: `worksheets/sheet${i + 1}.xml`,
      })),
      { id: "rIdStrings", type: "sharedStrings", target: "sharedStrings.xml" },
    ]),
  );
  zip.file(
    "xl/sharedStrings.xml",
    `${XML_DECL}<sst ${SS_NS} count="${sharedStrings.length}">${sharedStrings
      .map((text) => `<si><t>${text}</t></si>`)
      .join("")}</sst>`,
  );
  sheets.forEach((sheet, i) => {
    const rows = sheet.rows
      .map((cells, r) => `<row r="${r + 1}">${cells.map(cellXml).join("")}</row>`)
      .join("");
    zip.file(
      `xl/worksheets/sheet${i + 1}.xml`,
      `${XML_DECL}<worksheet ${SS_NS}><sheetData>${rows}</sheetData></worksheet>`,
    );
  });
  return zip.generateAsync({ type: "nodebuffer" });
}

/** Region/Units workbook: North 120, South 95. */
export function buildSalesXlsx(): Promise<Buffer> {
  return buildXlsx(
    [
      {
        name: "Sales",
        rows: [
          [
            { ref: "A1", shared: 0 },
            { ref: "B1", shared: 1 },
          ],
          [
            { ref: "A2", shared: 2 },
            { ref: "B2", value: "120" },
          ],
          [],
          [
            { ref: "A4", shared: 3 },
            { ref: "B4", value: "95" },
          ],
        ],
      },
    ],
    ["Region", "Units", "North", "South"],
  );
}

// --- PPTX ---

function drawingParagraphs(lines: string[]): string {
  return lines.map((line) => `<a:p><a:r><a:t>${line}</a:t></a:r></a:p>`).join("");
}

function shape(placeholder: string, lines: string[]): string {
  return (
    `<p:sp><p:nvSpPr><p:cNvPr id="2" name="Shape"/><p:cNvSpPr/><p:nvPr>${placeholder}</p:nvPr></p:nvSpPr>` +
    `<p:spPr/><p:txBody><a:bodyPr/>${drawingParagraphs(lines)}</p:txBody></p:sp>`
  );
}

function drawingTable(rows: string[][]): string {
  const body = rows
    .map(
      (row) =>
        `<a:tr h="370840">${row
          .map((cell) => `<a:tc><a:txBody><a:bodyPr/>${drawingParagraphs([cell])}</a:txBody></a:tc>`)
          .join("")}</a:tr>`,
    )
    .join("");
  return (
    `<p:graphicFrame><p:nvGraphicFramePr/><a:graphic><a:graphicData>` +
    `<a:tbl><a:tblGrid/>${body}</a:tbl></a:graphicData></a:graphic></p:graphicFrame>`
  );
}

export interface SlideSpec {
  title?: string;
  bullets?: string[];
  table?: string[][];
  notes?: string;
}

export async function buildPptx(slides: SlideSpec[]): Promise<Buffer> {
  const zip = new JSZip();
  const ids = slides
    .map((_, i) => `<p:sldId id="${256 + i}" r:id="rId${i + 1}"/>`)
    .join("");
  zip.file(
    "ppt/presentation.xml",
    `${XML_DECL}<p:presentation ${P_NS} ${R_NS}><p:sldIdLst>${ids}</p:sldIdLst></p:presentation>`,
  );
  zip.file(
    "ppt/_rels/presentation.xml.rels",
    relationships(
      slides.map((_, i) => ({ id: `rId${i + 1}`, type: "slide", target: `slides/slide${i + 1}.xml` })),
    ),
  );

  slides.forEach((slide, i) => {
    const n = i + 1;
    const shapes = [
      slide.title !== undefined ? shape('<p:ph type="title"/>', [slide.title]) : "",
      slide.bullets ? shape('<p:ph idx="1"/>', slide.bullets) : "",
      slide.table ? drawingTable(slide.table) : "",
    ].join("");
    zip.file(
      `ppt/slides/slide${n}.xml`,
      `${XML_DECL}<p:sld ${A_NS} ${P_NS}><p:cSld><p:spTree><p:nvGrpSpPr/><p:grpSpPr/>${shapes}</p:spTree></p:cSld></p:sld>`,
    );
    if (slide.notes !== undefined) {
      zip.file(
        `ppt/slides/_rels/slide${n}.xml.rels`,
        relationships([
          { id: "rId2", type: "notesSlide", target: `../notesSlides/notesSlide${n}.xml` },
        ]),
      );
      zip.file(
        `ppt/notesSlides/notesSlide${n}.xml`,
        `${XML_DECL}<p:notes ${A_NS} ${P_NS}><p:cSld><p:spTree>` +
          shape('<p:ph type="sldImg"/>', []) +
          shape('<p:ph type="body" idx="1"/>', [slide.notes]) +
          `</p:spTree></p:cSld></p:notes>`,
      );
    }
  });
  return zip.generateAsync({ type: "nodebuffer" });
}
