import type { Chunk } from "../knowledge/types.js";
import type { SourceItem } from "./types.js";

export const POSTSCRIPT_PREFIX = "P.S.:";
export const SUBJECT_LINE_COUNT = 3;

export const DEFAULT_POSTSCRIPT = "Reply to this message if you have questions about how your support is used.";

export const DEFAULT_SUBJECT_LINE_FALLBACKS: readonly string[] = [
  "An update on recovery in our community",
  "Your support keeps neighbors moving forward",
  "Will you stand with us this season?"
];

// "P.S", "P. S." or a bare "PS" followed by ":" or "."; "Ps and Qs" is body text.
const POSTSCRIPT_LINE_PATTERN =
  /^[ \t]*(?:\*\*)?(?:P\.[ \t]?S\b\.?|PS[ \t]*[:.])(?:\*\*)?[ \t]*[:\-\u2013\u2014]?(?:\*\*)?[ \t]*/i;
const SOURCES_HEADING_PATTERN = /^[ \t]*(?:#{1,6}[ \t]*)?(?:\*\*)?(?:sources|references)(?:\*\*)?[ \t]*:?[ \t]*(?:\*\*)?[ \t]*$/i;
const MARKER_PATTERN = /\[(\d+)\]/g;

export interface ReconcileDraftInput {
  body_md: string;
  postscript?: string | null;
  subject_lines?: readonly unknown[] | null;
}

export interface ReconcileOptions {
  defaultPostscript?: string;
  subjectLineFallbacks?: readonly string[];
}

export interface ReconciledDraft {
  markdown: string;
  sources: SourceItem[];
  /** Present only when the draft carried a subject-line list; always exactly three entries. */
  subjectLines?: string[];
}

const collapseWhitespace = (value: string): string => value.replace(/\s+/g, " ").trim();

export const isPostscriptLine = (line: string): boolean => POSTSCRIPT_LINE_PATTERN.test(line);

const stripPostscriptPrefix = (value: string): string => collapseWhitespace(value.replace(POSTSCRIPT_LINE_PATTERN, ""));

const tidyBlankLines = (markdown: string): string =>
  markdown
    .split("\n")
    .map((line) => line.replace(/[ \t]+$/, ""))
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();

/**
 * Drops a model-written "Sources"/"References" section and everything after it,
 * except postscript lines, which are handled separately.
 */
export const stripModelSourcesSection = (markdown: string): string => {
  const lines = markdown.replace(/\r\n/g, "\n").split("\n");
  const headingIndex = lines.findIndex((line, index) => index > 0 && SOURCES_HEADING_PATTERN.test(line));
  if (headingIndex < 0) {
    return markdown;
  }

  const kept = lines.slice(0, headingIndex);
  const trailingPostscripts = lines.slice(headingIndex + 1).filter(isPostscriptLine);
  return [...kept, ...(trailingPostscripts.length > 0 ? ["", ...trailingPostscripts] : [])].join("\n");
};

/**
 * Leaves exactly one postscript line, formatted `P.S.: ...`, as the final
 * paragraph. The first postscript in the body wins; otherwise the draft's own
 * postscript, otherwise the default.
 */
export const enforceSinglePostscript = (
  markdown: string,
  draftPostscript: string | null | undefined,
  defaultPostscript: string
): string => {
  const lines = markdown.replace(/\r\n/g, "\n").split("\n");
  const bodyLines: string[] = [];
  let firstPostscript: string | null = null;

  for (const line of lines) {
    if (!isPostscriptLine(line)) {
      bodyLines.push(line);
      continue;
    }
    if (firstPostscript === null) {
      firstPostscript = stripPostscriptPrefix(line);
    }
  }

  const candidates = [firstPostscript ?? "", stripPostscriptPrefix(draftPostscript ?? ""), collapseWhitespace(defaultPostscript)];
  const postscript = candidates.find((candidate) => candidate.length > 0) ?? DEFAULT_POSTSCRIPT;
  const body = tidyBlankLines(bodyLines.join("\n"));
  const postscriptLine = `${POSTSCRIPT_PREFIX} ${postscript}`;

  return body.length > 0 ? `${body}\n\n${postscriptLine}` : postscriptLine;
};

/** Tidies a line after markers were cut out of it, keeping its original indentation. */
const closeMarkerGaps = (original: string, replaced: string): string => {
  const indent = /^[ \t]*/.exec(original)?.[0] ?? "";
  const rest = replaced
    .replace(/\(\s*\)/g, "")
    .replace(/[ \t]{2,}/g, " ")
    .replace(/[ \t]+([.,;:!?)])/g, "$1")
    .trim();
  return rest.length > 0 ? `${indent}${rest}` : "";
};

export interface RenumberedMarkers {
  markdown: string;
  referenced: Chunk[];
}

/**
 * Renumbers `[n]` markers to 1..m in first-seen order. A marker survives only
 * if n points into `chunks`; anything else is removed together with the
 * whitespace around it.
 */
export const renumberMarkers = (markdown: string, chunks: readonly Chunk[]): RenumberedMarkers => {
  const assigned = new Map<number, number>();
  const referenced: Chunk[] = [];

  for (const match of markdown.matchAll(MARKER_PATTERN)) {
    const original = Number(match[1]);
    if (original < 1 || original > chunks.length || assigned.has(original)) {
      continue;
    }
    assigned.set(original, assigned.size + 1);
    referenced.push(chunks[original - 1]);
  }

  const rewritten = markdown
    .split("\n")
    .map((line) => {
      let dropped = false;
      const replaced = line.replace(MARKER_PATTERN, (_match: string, digits: string) => {
        const next = assigned.get(Number(digits));
        if (next === undefined) {
          dropped = true;
          return "";
        }
        return `[${next}]`;
      });
      return dropped ? closeMarkerGaps(line, replaced) : replaced;
    })
    .join("\n");

  return { markdown: rewritten, referenced };
};

export const toSourceItem = (chunk: Chunk, n: number): SourceItem => ({
  n,
  doc_id: chunk.doc_id,
  title: chunk.title,
  url: chunk.url,
  date: chunk.date,
  county: chunk.county,
  topics: [...chunk.topics]
});

const cleanSubjectLine = (value: unknown): string | null => {
  if (typeof value !== "string") {
    return null;
  }
  const cleaned = collapseWhitespace(
    value
      .replace(/\s*\[\d+\]/g, "")
      .replace(/^\s*subject\s*(?:line)?\s*\d*\s*:\s*/i, "")
      .replace(/^["'\u201c\u2018]+|["'\u201d\u2019]+$/g, "")
  );
  return cleaned.length > 0 ? cleaned : null;
};

/**
 * Returns exactly three subject lines, or undefined when the draft supplied no
 * list at all. Short lists are padded from the fallbacks in order.
 */
export const normalizeSubjectLines = (
  subjects: readonly unknown[] | null | undefined,
  fallbacks: readonly string[] = DEFAULT_SUBJECT_LINE_FALLBACKS
): string[] | undefined => {
  if (!Array.isArray(subjects)) {
    return undefined;
  }

  const lines: string[] = [];
  const seen = new Set<string>();
  const push = (line: string): void => {
    const key = line.toLowerCase();
    if (lines.length < SUBJECT_LINE_COUNT && !seen.has(key)) {
      seen.add(key);
      lines.push(line);
    }
  };

  for (const subject of subjects) {
    const cleaned = cleanSubjectLine(subject);
    if (cleaned) {
      push(cleaned);
    }
  }
  for (const fallback of [...fallbacks, ...DEFAULT_SUBJECT_LINE_FALLBACKS]) {
    push(fallback);
  }

  return lines;
};

export const countDistinctMarkers = (markdown: string): number =>
  new Set(Array.from(markdown.matchAll(MARKER_PATTERN), (match) => match[1])).size;

/**
 * Reconciles an untrusted draft with the chunks that were actually supplied to
 * the generator. Pure: the same input always yields the same output.
 */
export const reconcile = (
  draft: ReconcileDraftInput,
  chunks: readonly Chunk[],
  options: ReconcileOptions = {}
): ReconciledDraft => {
  const withoutModelSources = stripModelSourcesSection(draft.body_md);
  const withPostscript = enforceSinglePostscript(
    withoutModelSources,
    draft.postscript,
    options.defaultPostscript ?? DEFAULT_POSTSCRIPT
  );
  const { markdown, referenced } = renumberMarkers(withPostscript, chunks);
  const subjectLines = normalizeSubjectLines(draft.subject_lines, options.subjectLineFallbacks);

  return {
    markdown: tidyBlankLines(markdown),
    sources: referenced.map((chunk, index) => toSourceItem(chunk, index + 1)),
    ...(subjectLines ? { subjectLines } : {})
  };
};
