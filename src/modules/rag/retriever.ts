import { logInfo, logWarn } from "../../observability/logger.js";
import { recordRetrievalLatency } from "../../observability/metrics.js";
import type { Chunk, ChunkStorePort } from "../knowledge/types.js";
import { LexicalScorer, type RelevanceScorer, type ScoringQuery } from "./scoring.js";
import type { RetrievalFilter, RetrievalQuery, RetrievalResult, RetrievedChunk } from "./types.js";

export interface RetrieverDependencies {
  store: ChunkStorePort;
  scorer?: RelevanceScorer;
  /** Used when `scorer` fails to prepare a query, e.g. an embedding timeout. */
  fallbackScorer?: RelevanceScorer;
  now?: () => number;
  recordRetrievalLatency?: typeof recordRetrievalLatency;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
}

const resolveDependencies = (dependencies: RetrieverDependencies) => {
  const fallbackScorer = dependencies.fallbackScorer ?? new LexicalScorer();
  return {
    store: dependencies.store,
    scorer: dependencies.scorer ?? fallbackScorer,
    fallbackScorer,
    now: dependencies.now ?? Date.now,
    recordRetrievalLatency: dependencies.recordRetrievalLatency ?? recordRetrievalLatency,
    logInfo: dependencies.logInfo ?? logInfo,
    logWarn: dependencies.logWarn ?? logWarn
  };
};

const normalizeValues = (values: string[] | undefined): Set<string> | null => {
  const normalized = (values ?? []).map((value) => value.trim().toLowerCase()).filter((value) => value.length > 0);
  return normalized.length > 0 ? new Set(normalized) : null;
};

/**
 * Builds the chunk predicate for a filter. Dates are compared as YYYY-MM-DD
 * strings, both bounds inclusive.
 */
export const buildChunkPredicate = (filter: RetrievalFilter | undefined): ((chunk: Chunk) => boolean) => {
  const dateFrom = filter?.date_from;
  const dateTo = filter?.date_to;
  const counties = normalizeValues(filter?.county);
  const topics = normalizeValues(filter?.topics);

  return (chunk) => {
    if (dateFrom && chunk.date < dateFrom) {
      return false;
    }
    if (dateTo && chunk.date > dateTo) {
      return false;
    }
    if (counties && (!chunk.county || !counties.has(chunk.county.toLowerCase()))) {
      return false;
    }
    if (topics && !chunk.topics.some((topic) => topics.has(topic.toLowerCase()))) {
      return false;
    }
    return true;
  };
};

export const rankChunks = (
  candidates: readonly Chunk[],
  score: (chunk: Chunk) => number,
  k: number
): RetrievedChunk[] =>
  candidates
    .map((chunk) => ({ chunk, score: score(chunk) }))
    .sort((a, b) => b.score - a.score || a.chunk.ordinal - b.chunk.ordinal)
    .slice(0, Math.max(1, Math.floor(k)));

export const retrieve = async (
  query: RetrievalQuery,
  dependencies: RetrieverDependencies
): Promise<RetrievalResult> => {
  const resolved = resolveDependencies(dependencies);
  const startedAt = resolved.now();
  const context = { requestId: query.requestId ?? null };

  const candidates = resolved.store.chunks.filter(buildChunkPredicate(query.filter));

  let scorer = resolved.scorer;
  let prepared: ScoringQuery | null = null;
  if (candidates.length > 0) {
    try {
      prepared = await scorer.prepare(query.briefText, { signal: query.signal });
    } catch (error) {
      if (scorer === resolved.fallbackScorer || query.signal?.aborted) {
        throw error;
      }
      resolved.logWarn("rag.scorer.fallback", context, {
        scorer: scorer.name,
        fallback: resolved.fallbackScorer.name,
        error: error instanceof Error ? error.message : String(error)
      });
      scorer = resolved.fallbackScorer;
      prepared = await scorer.prepare(query.briefText, { signal: query.signal });
    }
  }

  const scoringQuery = prepared;
  const hits = scoringQuery ? rankChunks(candidates, (chunk) => scorer.score(scoringQuery, chunk), query.k) : [];
  const latencyMs = resolved.now() - startedAt;
  resolved.recordRetrievalLatency(latencyMs);

  resolved.logInfo("rag.retrieve.complete", context, {
    latency_ms: latencyMs,
    scorer: scorer.name,
    store_size: resolved.store.size,
    candidate_count: candidates.length,
    result_count: hits.length,
    k: query.k,
    date_from: query.filter?.date_from ?? null,
    date_to: query.filter?.date_to ?? null
  });

  return {
    hits,
    candidateCount: candidates.length,
    scorer: scorer.name,
    latencyMs
  };
};
