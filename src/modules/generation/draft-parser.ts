import { z } from "zod";
import type { Draft } from "./types.js";

const emailDraftSchema = z.object({
  // A subject list of the wrong shape counts as absent.
  subjects: z.array(z.unknown()).optional().catch(undefined),
  subject_lines: z.array(z.unknown()).optional().catch(undefined),
  body_md: z.string().optional(),
  body: z.string().optional(),
  ps: z.string().optional(),
  postscript: z.string().optional()
});

const narrativeDraftSchema = z.object({
  body_md: z.string()
});

const stripCodeFences = (raw: string): string =>
  raw
    .trim()
    .replace(/^```[a-zA-Z]*\s*\n?/, "")
    .replace(/\n?```\s*$/, "")
    .trim();

/** Parses a JSON object, or the outermost `{...}` embedded in surrounding prose. */
export const parseLooseJson = (raw: string): unknown => {
  const cleaned = stripCodeFences(raw);
  try {
    return JSON.parse(cleaned);
  } catch {
    const embedded = /\{[\s\S]*\}/.exec(cleaned);
    if (!embedded) {
      return null;
    }
    try {
      return JSON.parse(embedded[0]);
    } catch {
      return null;
    }
  }
};

export const parseEmailDraft = (raw: string): Draft => {
  const parsed = emailDraftSchema.safeParse(parseLooseJson(raw));
  if (!parsed.success) {
    return { body_md: stripCodeFences(raw) };
  }

  const data = parsed.data;
  const body = data.body_md ?? data.body;
  const subjects = data.subjects ?? data.subject_lines;
  const postscript = data.ps ?? data.postscript;

  return {
    body_md: body ?? "",
    ...(postscript !== undefined ? { postscript } : {}),
    ...(subjects !== undefined ? { subject_lines: subjects } : {})
  };
};

export const parseNarrativeDraft = (raw: string): Draft => {
  const trimmed = stripCodeFences(raw);
  if (trimmed.startsWith("{")) {
    const parsed = narrativeDraftSchema.safeParse(parseLooseJson(trimmed));
    if (parsed.success) {
      return { body_md: parsed.data.body_md };
    }
  }
  return { body_md: trimmed };
};
