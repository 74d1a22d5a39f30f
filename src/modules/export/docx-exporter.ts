import { Document, HeadingLevel, Packer, Paragraph, TextRun } from "docx";

export const DOCX_CONTENT_TYPE = "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

export interface InlineRun {
  text: string;
  bold: boolean;
  italic: boolean;
}

export type DocumentBlock =
  | { kind: "heading"; level: 1 | 2 | 3; text: string }
  | { kind: "bullet"; runs: InlineRun[] }
  | { kind: "paragraph"; runs: InlineRun[] }
  | { kind: "blank" };

const BOLD_PATTERN = /\*\*(.+?)\*\*/g;
const ITALIC_PATTERN = /\*(.+?)\*/g;
const HEADING_PATTERN = /^(#{1,3}) (.*)$/;

const HEADING_LEVELS = {
  1: HeadingLevel.HEADING_1,
  2: HeadingLevel.HEADING_2,
  3: HeadingLevel.HEADING_3
} as const;

const splitItalic = (text: string, bold: boolean): InlineRun[] => {
  const runs: InlineRun[] = [];
  let position = 0;
  for (const match of text.matchAll(ITALIC_PATTERN)) {
    const start = match.index ?? 0;
    if (start > position) {
      runs.push({ text: text.slice(position, start), bold, italic: false });
    }
    runs.push({ text: match[1], bold, italic: true });
    position = start + match[0].length;
  }
  if (position < text.length) {
    runs.push({ text: text.slice(position), bold, italic: false });
  }
  return runs;
};

/** Splits a line into runs on `**bold**` first, then `*italic*` inside every segment. */
export const parseInlineRuns = (text: string): InlineRun[] => {
  const runs: InlineRun[] = [];
  let position = 0;
  for (const match of text.matchAll(BOLD_PATTERN)) {
    const start = match.index ?? 0;
    runs.push(...splitItalic(text.slice(position, start), false));
    runs.push(...splitItalic(match[1], true));
    position = start + match[0].length;
  }
  runs.push(...splitItalic(text.slice(position), false));
  return runs;
};

/**
 * Line-oriented markdown subset: `#`..`###` headings, `- ` bullets, blank lines
 * and paragraphs with inline emphasis. Anything else stays literal text.
 */
export const toDocumentBlocks = (markdown: string): DocumentBlock[] =>
  markdown
    .replace(/\r\n/g, "\n")
    .split("\n")
    .map((rawLine): DocumentBlock => {
      const line = rawLine.trimEnd();
      if (line.trim().length === 0) {
        return { kind: "blank" };
      }

      const heading = HEADING_PATTERN.exec(line);
      if (heading) {
        const hashes = heading[1].length;
        return { kind: "heading", level: hashes === 1 ? 1 : hashes === 2 ? 2 : 3, text: heading[2].trim() };
      }

      if (line.startsWith("- ")) {
        return { kind: "bullet", runs: parseInlineRuns(line.slice(2).trim()) };
      }

      return { kind: "paragraph", runs: parseInlineRuns(line) };
    });

const toTextRuns = (runs: InlineRun[]): TextRun[] =>
  runs.map((run) => new TextRun({ text: run.text, bold: run.bold, italics: run.italic }));

const toParagraph = (block: DocumentBlock): Paragraph => {
  switch (block.kind) {
    case "heading":
      return new Paragraph({ text: block.text, heading: HEADING_LEVELS[block.level] });
    case "bullet":
      return new Paragraph({ children: toTextRuns(block.runs), bullet: { level: 0 } });
    case "paragraph":
      return new Paragraph({ children: toTextRuns(block.runs) });
    case "blank":
      return new Paragraph({ children: [] });
  }
};

export const renderDocx = async (title: string, markdown: string): Promise<Buffer> => {
  const heading = title.trim();
  const children = [
    ...(heading.length > 0 ? [new Paragraph({ text: heading, heading: HeadingLevel.HEADING_1 })] : []),
    ...toDocumentBlocks(markdown).map(toParagraph)
  ];

  return Packer.toBuffer(new Document({ sections: [{ children }] }));
};

/** `Spring appeal` becomes `Spring_appeal.docx`; quotes and control characters are dropped. */
export const toExportFilename = (title: string): string => {
  const base = title.trim().replace(/["\\\u0000-\u001f\u007f]/g, "").replace(/ /g, "_");
  return `${base.length > 0 ? base : "export"}.docx`;
};
