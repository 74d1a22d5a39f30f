import type { DraftRoute } from "../generation/types.js";
import type { RetrievalFilter, SourceItem } from "../rag/types.js";
import type { NarrativeSectionLabel } from "./markdown-sanitizer.js";

export interface DraftRequest {
  route: DraftRoute;
  campaignBrief: string;
  orgBrief: string;
  filter?: RetrievalFilter;
  k: number;
  audience: string;
  tone: string;
  ask?: string;
  deadline?: string;
}

export interface DraftRunOptions {
  requestId?: string;
  signal?: AbortSignal;
}

/** Canonical result of one drafting request, before route-specific serialization. */
export interface DraftResult {
  route: DraftRoute;
  markdown: string;
  sources: SourceItem[];
  subjectLines?: string[];
  sections?: NarrativeSectionLabel[];
}

export interface EmailDraftBody {
  subject_lines: string[];
  body_md: string;
  sources: SourceItem[];
}

export interface NarrativeDraftBody {
  sections: NarrativeSectionLabel[];
  body_md: string;
  sources: SourceItem[];
}

export interface EmailResponse {
  email_md: string;
  email_sources: SourceItem[];
  email?: EmailDraftBody;
}

export interface NarrativeResponse {
  narrative_md: string;
  narrative_sources: SourceItem[];
  narrative?: NarrativeDraftBody;
}

export type DraftResponse = EmailResponse | NarrativeResponse;
