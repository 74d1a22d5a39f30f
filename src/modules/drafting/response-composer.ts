import type { DraftResponse, DraftResult, EmailResponse, NarrativeResponse } from "./types.js";

export const composeEmailResponse = (result: DraftResult): EmailResponse => ({
  email_md: result.markdown,
  email_sources: result.sources,
  ...(result.subjectLines
    ? {
        email: {
          subject_lines: result.subjectLines,
          body_md: result.markdown,
          sources: result.sources
        }
      }
    : {})
});

export const composeNarrativeResponse = (result: DraftResult): NarrativeResponse => ({
  narrative_md: result.markdown,
  narrative_sources: result.sources,
  ...(result.sections && result.sections.length > 0
    ? {
        narrative: {
          sections: result.sections,
          body_md: result.markdown,
          sources: result.sources
        }
      }
    : {})
});

/** Serializes a result under the legacy flat keys, plus the typed object when it has content. */
export const composeResponse = (result: DraftResult): DraftResponse =>
  result.route === "email" ? composeEmailResponse(result) : composeNarrativeResponse(result);
