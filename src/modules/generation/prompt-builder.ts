import {
  EMAIL_SYSTEM_PROMPT,
  NARRATIVE_SYSTEM_PROMPT,
  buildContextBlocks,
  buildEmailUserPrompt,
  buildNarrativeUserPrompt,
  type DraftPromptFields
} from "../../prompts/index.js";
import type { GenerationInput, PromptBuildOutput } from "./types.js";

export const buildPrompt = (input: GenerationInput): PromptBuildOutput => {
  const fields: DraftPromptFields = {
    ...input.brief,
    contextBlocks: buildContextBlocks(input.chunks)
  };

  if (input.route === "email") {
    return {
      systemPrompt: EMAIL_SYSTEM_PROMPT,
      jsonMode: true,
      messages: [
        { role: "system", content: EMAIL_SYSTEM_PROMPT },
        { role: "user", content: buildEmailUserPrompt(fields) }
      ]
    };
  }

  return {
    systemPrompt: NARRATIVE_SYSTEM_PROMPT,
    jsonMode: false,
    messages: [
      { role: "system", content: NARRATIVE_SYSTEM_PROMPT },
      { role: "user", content: buildNarrativeUserPrompt(fields) }
    ]
  };
};
