import { getOpenAIClient } from "../../clients/openai.js";
import { withTimeout } from "../../clients/request-control.js";
import type { Chunk } from "../knowledge/types.js";

export type ScoringQuery = {
  text: string;
  terms: ReadonlyMap<string, number>;
  vector?: number[];
};

export interface PrepareQueryOptions {
  signal?: AbortSignal;
}

/**
 * A relevance strategy. `prepare` runs once per request (and may do I/O);
 * `score` is pure and deterministic for a given prepared query and chunk.
 */
export interface RelevanceScorer {
  readonly name: string;
  prepare(text: string, options?: PrepareQueryOptions): Promise<ScoringQuery>;
  score(query: ScoringQuery, chunk: Chunk): number;
}

const STOPWORDS = new Set([
  "a", "an", "and", "are", "as", "at", "be", "by", "for", "from", "has", "have", "in", "is", "it",
  "its", "of", "on", "or", "our", "that", "the", "their", "this", "to", "was", "we", "were", "will",
  "with", "you", "your"
]);

export const tokenize = (text: string): string[] =>
  text
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length > 1 && !STOPWORDS.has(token));

export const termFrequencies = (text: string): Map<string, number> => {
  const frequencies = new Map<string, number>();
  for (const token of tokenize(text)) {
    frequencies.set(token, (frequencies.get(token) ?? 0) + 1);
  }
  return frequencies;
};

const termCosine = (a: ReadonlyMap<string, number>, b: ReadonlyMap<string, number>): number => {
  if (a.size === 0 || b.size === 0) {
    return 0;
  }

  let dot = 0;
  for (const [term, weight] of a) {
    dot += weight * (b.get(term) ?? 0);
  }
  if (dot === 0) {
    return 0;
  }

  const norm = (vector: ReadonlyMap<string, number>): number => {
    let sum = 0;
    for (const weight of vector.values()) {
      sum += weight * weight;
    }
    return Math.sqrt(sum);
  };

  return dot / (norm(a) * norm(b));
};

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || b.length === 0 || a.length !== b.length) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export class LexicalScorer implements RelevanceScorer {
  readonly name = "lexical";
  // Chunks are frozen for the process lifetime, so their term vectors can be memoized.
  private readonly chunkTerms = new WeakMap<Chunk, Map<string, number>>();

  async prepare(text: string): Promise<ScoringQuery> {
    return { text, terms: termFrequencies(text) };
  }

  score(query: ScoringQuery, chunk: Chunk): number {
    let terms = this.chunkTerms.get(chunk);
    if (!terms) {
      terms = termFrequencies(`${chunk.title}\n${chunk.text}`);
      this.chunkTerms.set(chunk, terms);
    }
    return termCosine(query.terms, terms);
  }
}

export class EmbeddingScorerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EmbeddingScorerError";
  }
}

export interface EmbeddingScorerOptions {
  model: string;
  timeoutMs: number;
  getOpenAIClient?: typeof getOpenAIClient;
}

export class EmbeddingScorer implements RelevanceScorer {
  readonly name = "embedding";
  private readonly options: Required<EmbeddingScorerOptions>;

  constructor(options: EmbeddingScorerOptions) {
    this.options = {
      getOpenAIClient,
      ...options
    };
  }

  async prepare(text: string, options?: PrepareQueryOptions): Promise<ScoringQuery> {
    const { client } = await this.options.getOpenAIClient();
    const response = await withTimeout(
      (signal) =>
        client.embeddings.create({ model: this.options.model, input: text }, { signal, maxRetries: 0 }),
      { timeoutMs: this.options.timeoutMs, label: "query embedding", signal: options?.signal }
    );

    const vector = response.data[0]?.embedding;
    if (!vector || vector.length === 0) {
      throw new EmbeddingScorerError("Embedding response missing vector payload.");
    }

    return { text, terms: termFrequencies(text), vector };
  }

  score(query: ScoringQuery, chunk: Chunk): number {
    if (!query.vector || !chunk.embedding) {
      return 0;
    }
    return cosineSimilarity(query.vector, chunk.embedding);
  }
}

export type ScorerName = "lexical" | "embedding";

export const createRelevanceScorer = (
  name: ScorerName,
  options: { embeddingModel: string; embeddingTimeoutMs: number }
): RelevanceScorer =>
  name === "embedding"
    ? new EmbeddingScorer({ model: options.embeddingModel, timeoutMs: options.embeddingTimeoutMs })
    : new LexicalScorer();
