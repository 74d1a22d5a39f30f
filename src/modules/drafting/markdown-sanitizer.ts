export const NARRATIVE_SECTION_LABELS = [
  "Need/Problem",
  "Program/Intervention",
  "Budget Summary & Unit Economics",
  "Outcomes & Reporting Plan",
  "Equity & Community Context",
  "Organizational Capacity"
] as const;

export type NarrativeSectionLabel = (typeof NARRATIVE_SECTION_LABELS)[number];

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const normalizeCharacters = (value: string): string =>
  value
    .replace(/\r\n?/g, "\n")
    .replace(/[\u00a0\u2000-\u200a\u202f\u205f\u3000]/g, " ")
    .replace(/[\u200b-\u200d\u2060\ufeff]/g, "")
    .replace(/[\u2013\u2014]/g, "-");

const normalizeNumbers = (value: string): string => {
  let result = value.replace(/\$\s+(?=\d)/g, "$");

  // "$1, 250, 000" -> "$1,250,000"; only money, so "In 2024, 300 families" is left alone.
  let previous: string;
  do {
    previous = result;
    result = result.replace(/(\$[\d,]*\d),[ \t]*\n?[ \t]*(\d{3})(?!\d)/g, "$1,$2");
  } while (result !== previous);

  return result
    .replace(/(\d)[ \t]*-[ \t]*(?=\d)/g, "$1-")
    .replace(/(\d)[ \t]+([kmb])\b/gi, (_match, digit: string, unit: string) => `${digit}${unit.toLowerCase()}`)
    .replace(/(\d),(?=\d{4}\b)/g, "$1, ");
};

const joinSoftLineBreaks = (value: string): string =>
  value
    .replace(/(\w)-\n(\w)/g, "$1$2")
    .replace(/([^\n])\n(?!\n|[ \t]*(?:[#*>-]|\d+\.|(?:\*\*)?(?:P\.[ \t]?S\b|PS[ \t]*[:.]))|$)/gi, "$1 ");

/**
 * Normalizes typography and number formatting in generated markdown without
 * touching its paragraph structure.
 */
export const sanitizeMarkdown = (markdown: string): string => {
  const normalized = joinSoftLineBreaks(normalizeNumbers(normalizeCharacters(markdown)))
    .replace(/\*\*([^*\n]+?)\.[ \t]+\*\*/g, "**$1.**")
    .replace(/[ \t]{2,}/g, " ")
    .split("\n")
    .map((line) => line.trimEnd())
    .join("\n");

  return normalized.trim();
};

/**
 * Like `sanitizeMarkdown`, and also turns the narrative section labels into
 * inline `**Label.**` paragraph openers, whatever shape the model gave them.
 */
export const sanitizeNarrativeMarkdown = (markdown: string): string => {
  let result = normalizeCharacters(markdown);

  for (const label of NARRATIVE_SECTION_LABELS) {
    const escaped = escapeRegExp(label);
    result = result
      .replace(new RegExp(`^[ \\t]*#{1,6}[ \\t]*(?:\\*\\*)?${escaped}[.:]?(?:\\*\\*)?[ \\t]*$`, "gim"), `**${label}.**`)
      .replace(new RegExp(`^[ \\t]*${escaped}[ \\t]*[:.][ \\t]*$`, "gim"), `**${label}.**`)
      .replace(new RegExp(`^[ \\t]*\\*\\*[ \\t]*${escaped}[ \\t]*[.:]?[ \\t]*\\*\\*[ \\t]*$`, "gim"), `**${label}.**`);
  }

  // A label left on its own line joins the paragraph that follows it.
  result = result.replace(/^(\*\*[^*\n]+?\.\*\*)[ \t]*\n(?!\n)/gm, "$1 ");

  return sanitizeMarkdown(result);
};

export const detectNarrativeSections = (markdown: string): NarrativeSectionLabel[] =>
  NARRATIVE_SECTION_LABELS.filter((label) =>
    new RegExp(`^\\*\\*${escapeRegExp(label)}\\.\\*\\*`, "m").test(markdown)
  );

/** Cleans a short user-supplied field and forces it onto a single line. */
export const sanitizeInlineText = (value: string | null | undefined): string => {
  if (!value) {
    return "";
  }
  return sanitizeMarkdown(value).replace(/\s*\n\s*/g, " ").trim();
};
