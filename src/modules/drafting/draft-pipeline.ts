import { logDebug, logInfo } from "../../observability/logger.js";
import { OpenAIDraftGenerator } from "../generation/draft-generator.js";
import type { DraftGenerator, DraftRoute } from "../generation/types.js";
import type { ChunkStorePort } from "../knowledge/types.js";
import { DEFAULT_POSTSCRIPT, reconcile } from "../rag/citation-reconciler.js";
import { retrieve as defaultRetrieve } from "../rag/retriever.js";
import type { RelevanceScorer } from "../rag/scoring.js";
import {
  detectNarrativeSections,
  sanitizeInlineText,
  sanitizeMarkdown,
  sanitizeNarrativeMarkdown
} from "./markdown-sanitizer.js";
import type { DraftRequest, DraftResult, DraftRunOptions } from "./types.js";

export const DEFAULT_POSTSCRIPTS: Readonly<Record<DraftRoute, string>> = {
  email: DEFAULT_POSTSCRIPT,
  narrative: "We would welcome the chance to walk you through this proposal and answer any questions."
};

export interface DraftPipelineDependencies {
  store: ChunkStorePort;
  scorer?: RelevanceScorer;
  fallbackScorer?: RelevanceScorer;
  generator?: DraftGenerator;
  retrieve?: typeof defaultRetrieve;
  now?: () => number;
  logInfo?: typeof logInfo;
  logDebug?: typeof logDebug;
}

const resolveDependencies = (dependencies: DraftPipelineDependencies) => ({
  store: dependencies.store,
  scorer: dependencies.scorer,
  fallbackScorer: dependencies.fallbackScorer,
  generator: dependencies.generator ?? new OpenAIDraftGenerator(),
  retrieve: dependencies.retrieve ?? defaultRetrieve,
  now: dependencies.now ?? Date.now,
  logInfo: dependencies.logInfo ?? logInfo,
  logDebug: dependencies.logDebug ?? logDebug
});

export const buildBriefText = (campaignBrief: string, orgBrief: string): string =>
  [campaignBrief, orgBrief].filter((part) => part.length > 0).join("\n\n");

/**
 * One drafting request end to end: retrieve, generate, clean up, reconcile.
 * The route only picks the prompt template, the default postscript and the
 * response noun; grounding works the same way for both.
 */
export class DraftPipeline {
  private readonly dependencies: ReturnType<typeof resolveDependencies>;

  constructor(dependencies: DraftPipelineDependencies) {
    this.dependencies = resolveDependencies(dependencies);
  }

  async run(request: DraftRequest, options: DraftRunOptions = {}): Promise<DraftResult> {
    const deps = this.dependencies;
    const context = { requestId: options.requestId ?? null, route: request.route };
    const startedAt = deps.now();

    const brief = {
      campaignBrief: sanitizeInlineText(request.campaignBrief),
      orgBrief: sanitizeInlineText(request.orgBrief),
      audience: sanitizeInlineText(request.audience),
      tone: sanitizeInlineText(request.tone),
      ...(request.ask ? { ask: sanitizeInlineText(request.ask) } : {}),
      ...(request.deadline ? { deadline: sanitizeInlineText(request.deadline) } : {})
    };

    const retrieval = await deps.retrieve(
      {
        briefText: buildBriefText(brief.campaignBrief, brief.orgBrief),
        filter: request.filter,
        k: request.k,
        requestId: options.requestId,
        signal: options.signal
      },
      { store: deps.store, scorer: deps.scorer, fallbackScorer: deps.fallbackScorer }
    );
    const chunks = retrieval.hits.map((hit) => hit.chunk);
    deps.logDebug("draft.pipeline.retrieved", context, {
      chunk_ids: chunks.map((chunk) => chunk.id),
      scorer: retrieval.scorer
    });

    const draft = await deps.generator.generate(
      { route: request.route, brief, chunks, requestId: options.requestId },
      { signal: options.signal }
    );

    const body =
      request.route === "narrative" ? sanitizeNarrativeMarkdown(draft.body_md) : sanitizeMarkdown(draft.body_md);
    const reconciled = reconcile(
      {
        body_md: body,
        postscript: draft.postscript === undefined ? undefined : sanitizeInlineText(draft.postscript),
        subject_lines: request.route === "email" ? draft.subject_lines : undefined
      },
      chunks,
      { defaultPostscript: DEFAULT_POSTSCRIPTS[request.route] }
    );
    const sections = request.route === "narrative" ? detectNarrativeSections(reconciled.markdown) : undefined;

    deps.logInfo("draft.pipeline.complete", context, {
      latency_ms: deps.now() - startedAt,
      retrieved_count: chunks.length,
      cited_count: reconciled.sources.length,
      subject_lines: reconciled.subjectLines?.length ?? 0,
      section_count: sections?.length ?? 0
    });

    return {
      route: request.route,
      markdown: reconciled.markdown,
      sources: reconciled.sources,
      ...(reconciled.subjectLines ? { subjectLines: reconciled.subjectLines } : {}),
      ...(sections ? { sections } : {})
    };
  }
}
