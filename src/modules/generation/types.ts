import type OpenAI from "openai";
import type { Chunk } from "../knowledge/types.js";

export type DraftRoute = "email" | "narrative";

export interface GenerationBrief {
  campaignBrief: string;
  orgBrief: string;
  audience: string;
  tone: string;
  ask?: string;
  deadline?: string;
}

export interface GenerationInput {
  route: DraftRoute;
  brief: GenerationBrief;
  /** Position i may be cited by the generator as `[i+1]`. */
  chunks: readonly Chunk[];
  requestId?: string;
}

export interface GenerationOptions {
  signal?: AbortSignal;
}

/** Raw generator output. Nothing about its structure is trusted downstream. */
export interface Draft {
  body_md: string;
  postscript?: string;
  subject_lines?: unknown[];
}

export interface DraftGenerator {
  generate(input: GenerationInput, options?: GenerationOptions): Promise<Draft>;
}

export interface PromptBuildOutput {
  systemPrompt: string;
  messages: OpenAI.ChatCompletionMessageParam[];
  jsonMode: boolean;
}
