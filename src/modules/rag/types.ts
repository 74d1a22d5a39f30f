import type { Chunk } from "../knowledge/types.js";

export type RetrievalFilter = {
  /** Inclusive lower bound, YYYY-MM-DD. */
  date_from?: string;
  /** Inclusive upper bound, YYYY-MM-DD. */
  date_to?: string;
  county?: string[];
  topics?: string[];
};

export type RetrievalQuery = {
  briefText: string;
  filter?: RetrievalFilter;
  k: number;
  requestId?: string;
  signal?: AbortSignal;
};

export type RetrievedChunk = {
  chunk: Chunk;
  score: number;
};

export type RetrievalResult = {
  hits: RetrievedChunk[];
  candidateCount: number;
  scorer: string;
  latencyMs: number;
};

export type SourceItem = {
  n: number;
  doc_id: string;
  title: string;
  url: string | null;
  date: string;
  county: string | null;
  topics: string[];
};
