import { describe, expect, it, vi } from "vitest";

const pdf = vi.hoisted(() => {
  const item = (str: string, y: number, hasEOL = true, x = 72, width = 100) => ({
    str,
    transform: [12, 0, 0, 12, x, y],
    width,
    height: 12,
    dir: "ltr",
    fontName: "g_d0_f1",
    hasEOL,
  });
  const pages = [
    [
      { type: "beginMarkedContent" },
      item("Annual", 700, false),
      item(" review", 700),
      item("continues here", 686),
      item("Second   paragraph", 650),
    ],
    [
      item("Page two text", 700),
      item("Item", 680, false, 72, 30),
      item("Qty", 680, true, 200, 20),
      item("Bolt", 668, false, 72, 30),
      item("12", 668, true, 200, 15),
    ],
  ];
  const destroy = vi.fn(async () => {});
  const getDocument = vi.fn(() => ({
    promise: Promise.resolve({
      numPages: pages.length,
      getPage: async (n: number) => ({
        getTextContent: async () => ({ items: pages[n - 1] }),
      }),
      destroy,
    }),
  }));
  return { getDocument, destroy };
});

vi.mock("pdfjs-dist/legacy/build/pdf", () => ({
  getDocument: pdf.getDocument,
  VerbosityLevel: { ERRORS: 0, WARNINGS: 1, INFOS: 5 },
}));

import {
  extractPdfBlocks,
  itemsToLines,
  linesToBlocks,
  linesToParagraphs,
  type PdfLine,
} from "../src/lib/convert/extractors/pdf";

describe("PDF extraction", () => {
  it("emits a marker per page followed by its paragraphs and tables", async () => {
    const result = await extractPdfBlocks(Buffer.from("%PDF-1.7"));
    expect(result).toEqual({
      pageCount: 2,
      blocks: [
        { kind: "page", number: 1 },
        { kind: "paragraph", text: "Annual review continues here" },
        { kind: "paragraph", text: "Second paragraph" },
        { kind: "page", number: 2 },
        { kind: "paragraph", text: "Page two text" },
        {
          kind: "table",
          rows: [
            ["Item", "Qty"],
            ["Bolt", "12"],
          ],
        },
      ],
    });
    expect(pdf.destroy).toHaveBeenCalledTimes(1);
  });

  it("folds items into lines at end-of-line markers", () => {
    const lines = itemsToLines([
      { str: "a", transform: [1, 0, 0, 1, 0, 50], width: 5, height: 10, hasEOL: false },
      { str: "b", transform: [1, 0, 0, 1, 5, 50], width: 5, height: 14, hasEOL: true },
      { str: "c", transform: [1, 0, 0, 1, 0, 30], width: 5, height: 10, hasEOL: false },
    ]);
    expect(lines).toEqual([
      { text: "ab", y: 50, height: 14, cells: [{ text: "ab", x: 0 }] },
      { text: "c", y: 30, height: 10, cells: [{ text: "c", x: 0 }] },
    ]);
  });

  it("starts a new cell after a gap wider than the line height", () => {
    const [line] = itemsToLines([
      { str: "Name", transform: [10, 0, 0, 10, 72, 500], width: 30, height: 10, hasEOL: false },
      { str: " ", transform: [10, 0, 0, 10, 102, 500], width: 3, height: 10, hasEOL: false },
      { str: "Qty", transform: [10, 0, 0, 10, 200, 500], width: 20, height: 10, hasEOL: true },
    ]);
    expect(line.cells).toEqual([
      { text: "Name ", x: 72 },
      { text: "Qty", x: 200 },
    ]);
    expect(line.text).toBe("Name  Qty");
  });

  it("breaks paragraphs at blank lines", () => {
    expect(
      linesToParagraphs([
        { text: "one", y: 100, height: 10, cells: [] },
        { text: "  ", y: 90, height: 10, cells: [] },
        { text: "two", y: 80, height: 10, cells: [] },
      ]),
    ).toEqual(["one", "two"]);
  });
});

describe("PDF table detection", () => {
  const line = (y: number, ...cells: Array<[text: string, x: number]>): PdfLine => ({
    text: cells.map(([text]) => text).join(" "),
    y,
    height: 10,
    cells: cells.map(([text, x]) => ({ text, x })),
  });

  it("turns aligned multi-column lines into a table with a header row", () => {
    expect(
      linesToBlocks([
        line(700, ["Stock report", 72]),
        line(680, ["Item", 72], ["Qty", 200]),
        line(668, ["Bolt", 72], ["12", 201]),
        line(656, [" Nut ", 73], ["30", 200]),
        line(620, ["End of list", 72]),
      ]),
    ).toEqual([
      { kind: "paragraph", text: "Stock report" },
      {
        kind: "table",
        rows: [
          ["Item", "Qty"],
          ["Bolt", "12"],
          ["Nut", "30"],
        ],
      },
      { kind: "paragraph", text: "End of list" },
    ]);
  });

  it("keeps a lone two-column line or misaligned lines as text", () => {
    expect(linesToBlocks([line(700, ["Total", 72], ["42", 300])])).toEqual([
      { kind: "paragraph", text: "Total 42" },
    ]);
    expect(
      linesToBlocks([
        line(700, ["Left", 72], ["Right", 300]),
        line(688, ["Left", 72], ["Shifted", 360]),
      ]),
    ).toEqual([{ kind: "paragraph", text: "Left Right Left Shifted" }]);
  });
});
