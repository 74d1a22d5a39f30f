import { describe, expect, it } from "vitest";
import {
  parseInlineRuns,
  renderDocx,
  toDocumentBlocks,
  toExportFilename
} from "../../src/modules/export/docx-exporter.js";

describe("modules/export/docx-exporter", () => {
  it("splits bold first and italics inside every segment", () => {
    expect(parseInlineRuns("Plain *soft* and **strong *mixed* words**")).toEqual([
      { text: "Plain ", bold: false, italic: false },
      { text: "soft", bold: false, italic: true },
      { text: " and ", bold: false, italic: false },
      { text: "strong ", bold: true, italic: false },
      { text: "mixed", bold: true, italic: true },
      { text: " words", bold: true, italic: false }
    ]);
    expect(parseInlineRuns("no emphasis")).toEqual([{ text: "no emphasis", bold: false, italic: false }]);
  });

  it("maps headings, bullets, blanks and paragraphs line by line", () => {
    expect(toDocumentBlocks("# Title\r\n## Sub\n### Small\n#### deep\n\n- item with **bold** text")).toEqual([
      { kind: "heading", level: 1, text: "Title" },
      { kind: "heading", level: 2, text: "Sub" },
      { kind: "heading", level: 3, text: "Small" },
      { kind: "paragraph", runs: [{ text: "#### deep", bold: false, italic: false }] },
      { kind: "blank" },
      {
        kind: "bullet",
        runs: [
          { text: "item with ", bold: false, italic: false },
          { text: "bold", bold: true, italic: false },
          { text: " text", bold: false, italic: false }
        ]
      }
    ]);
  });

  it("builds attachment filenames from the title", () => {
    expect(toExportFilename("Spring appeal 2025")).toBe("Spring_appeal_2025.docx");
    expect(toExportFilename('Say "thanks"')).toBe("Say_thanks.docx");
    expect(toExportFilename("   ")).toBe("export.docx");
  });

  it("renders a zip-packaged document", async () => {
    const buffer = await renderDocx("Appeal", "# Need\n- Roofs **now**");

    expect(buffer.subarray(0, 2).toString("latin1")).toBe("PK");
  });
});
