import type { Chunk } from "../modules/knowledge/types.js";

const CONTEXT_SNIPPET_MAX_CHARS = 600;

export const DRAFTING_SYSTEM_GUARDRAILS = [
  "You are a nonprofit fundraising writer supporting community disaster recovery.",
  "Ground every factual claim in the provided context; if the context lacks a fact, be transparent rather than inventing numbers.",
  "Write clearly and respectfully, avoid making promises, and keep a community-first tone.",
  "When you use a fact from the context, cite it with the bracketed number of its context block, like [1] or [2].",
  "Only cite numbers that appear in the context list. If no context is available, do not use bracketed numbers at all.",
  "Do not write a Sources or References section.",
  "Do not insert hard line breaks inside a sentence or a number."
].join(" ");

export const EMAIL_SYSTEM_PROMPT = [
  DRAFTING_SYSTEM_GUARDRAILS,
  "Return ONLY valid JSON with keys:",
  "- subjects (array of exactly 3 short strings)",
  "- body_md (string; 150-220 words, includes [n] markers; do not include a P.S. here)",
  "- ps (string; one sentence with a concrete next step; do not prefix it with 'P.S.')",
  "No extra prose, no markdown fences."
].join("\n");

export const NARRATIVE_SYSTEM_PROMPT = [
  DRAFTING_SYSTEM_GUARDRAILS,
  "Output ONLY plain Markdown (no JSON). Do not use headings (#, ##, ###).",
  "Write six paragraphs in this exact order, each starting with a bold label followed by a period:",
  "",
  "**Need/Problem.** ...",
  "**Program/Intervention.** ...",
  "**Budget Summary & Unit Economics.** ...",
  "**Outcomes & Reporting Plan.** ...",
  "**Equity & Community Context.** ...",
  "**Organizational Capacity.** ...",
  "",
  "Finish with a single line starting with 'P.S.:' inviting the funder to follow up.",
  "Keep normal paragraph wrapping."
].join("\n");

export const buildContextBlocks = (chunks: readonly Chunk[]): string => {
  if (chunks.length === 0) {
    return "No context available.";
  }

  return chunks
    .map((chunk, index) =>
      [
        `[${index + 1}] ${chunk.title} (${chunk.date})`,
        chunk.text.slice(0, CONTEXT_SNIPPET_MAX_CHARS),
        `URL: ${chunk.url ?? "n/a"}`
      ].join("\n")
    )
    .join("\n\n");
};

export interface DraftPromptFields {
  campaignBrief: string;
  orgBrief: string;
  audience: string;
  tone: string;
  ask?: string;
  deadline?: string;
  contextBlocks: string;
}

export const buildEmailUserPrompt = (fields: DraftPromptFields): string =>
  [
    "Return ONLY valid JSON with these keys:",
    "- subjects: list of exactly 3 concise subject lines",
    "- body_md: the email body (150-220 words)",
    "- ps: a one-sentence P.S. with a concrete next step",
    "",
    `Audience: ${fields.audience}`,
    `Tone: ${fields.tone}`,
    `Ask amount or range: ${fields.ask || "not specified"}`,
    `Deadline/urgency note: ${fields.deadline || "not specified"}`,
    "",
    "ORG BRIEF",
    "---",
    fields.orgBrief || "(none)",
    "",
    "CAMPAIGN BRIEF",
    "---",
    fields.campaignBrief || "(none)",
    "",
    "RETRIEVED CONTEXT",
    "---",
    fields.contextBlocks
  ].join("\n");

export const buildNarrativeUserPrompt = (fields: DraftPromptFields): string =>
  [
    "Write a grant-style narrative (350-650 words) with the exact section labels specified in the system prompt.",
    "Ground your writing in the retrieved context. Do not add a sources section.",
    "",
    `Audience: ${fields.audience}`,
    `Tone: ${fields.tone}`,
    `Ask amount or range: ${fields.ask || "not specified"}`,
    "",
    "ORG BRIEF",
    "---",
    fields.orgBrief || "(none)",
    "",
    "CAMPAIGN BRIEF",
    "---",
    fields.campaignBrief || "(none)",
    "",
    "RETRIEVED CONTEXT",
    "---",
    fields.contextBlocks
  ].join("\n");
