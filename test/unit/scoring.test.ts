import { describe, expect, it, vi } from "vitest";
import { OperationTimeoutError } from "../../src/clients/request-control.js";
import {
  EmbeddingScorer,
  EmbeddingScorerError,
  LexicalScorer,
  cosineSimilarity,
  createRelevanceScorer,
  termFrequencies,
  tokenize
} from "../../src/modules/rag/scoring.js";
import { createFakeOpenAI, embeddingResponse, makeChunk, type EmbeddingsCreate } from "../helpers/fixtures.js";

describe("modules/rag/scoring", () => {
  it("tokenizes into lower-case alphanumeric terms without stopwords or accents", () => {
    expect(tokenize("The Caf\u00e9's 2024 flood-recovery, a CA")).toEqual(["cafe", "2024", "flood", "recovery", "ca"]);
  });

  it("counts term frequencies", () => {
    expect(termFrequencies("flood flood homes")).toEqual(new Map([["flood", 2], ["homes", 1]]));
  });

  it("computes cosine similarity and treats mismatched vectors as unrelated", () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1, 10);
    expect(cosineSimilarity([1, 2], [1, 2, 3])).toBe(0);
    expect(cosineSimilarity([], [])).toBe(0);
  });

  describe("LexicalScorer", () => {
    it("scores overlapping chunks above unrelated ones and is deterministic", async () => {
      const scorer = new LexicalScorer();
      const query = await scorer.prepare("flood homes");
      const related = makeChunk({ id: "a#0", title: "Flood repairs", text: "Homes repaired after the flood" });
      const unrelated = makeChunk({ id: "b#0", title: "Bakery", text: "Fresh bread every morning" });

      const relatedScore = scorer.score(query, related);
      expect(relatedScore).toBeGreaterThan(0);
      expect(scorer.score(query, unrelated)).toBe(0);
      expect(scorer.score(query, related)).toBe(relatedScore);
    });

    it("gives an identical chunk a score of one", async () => {
      const scorer = new LexicalScorer();
      const query = await scorer.prepare("flood homes");
      const chunk = makeChunk({ id: "a#0", title: "flood", text: "homes" });

      expect(scorer.score(query, chunk)).toBeCloseTo(1, 10);
    });

    it("scores zero for a brief with only stopwords", async () => {
      const scorer = new LexicalScorer();
      const query = await scorer.prepare("the and of");

      expect(scorer.score(query, makeChunk({ id: "a#0" }))).toBe(0);
    });
  });

  describe("EmbeddingScorer", () => {
    it("embeds the brief once and scores by vector cosine", async () => {
      const embeddingsCreate = vi.fn<EmbeddingsCreate>().mockResolvedValue(embeddingResponse([1, 0]));
      const scorer = new EmbeddingScorer({
        model: "test-embedding-model",
        timeoutMs: 1000,
        getOpenAIClient: async () => createFakeOpenAI({ embeddingsCreate })
      });

      const query = await scorer.prepare("flood homes");

      expect(embeddingsCreate).toHaveBeenCalledWith(
        { model: "test-embedding-model", input: "flood homes" },
        expect.objectContaining({ maxRetries: 0 })
      );
      expect(scorer.score(query, makeChunk({ id: "a#0", embedding: [2, 0] }))).toBeCloseTo(1, 10);
      expect(scorer.score(query, makeChunk({ id: "b#0", embedding: [0, 3] }))).toBe(0);
      expect(scorer.score(query, makeChunk({ id: "c#0" }))).toBe(0);
    });

    it("rejects an empty embedding payload", async () => {
      const scorer = new EmbeddingScorer({
        model: "test-embedding-model",
        timeoutMs: 1000,
        getOpenAIClient: async () =>
          createFakeOpenAI({ embeddingsCreate: vi.fn<EmbeddingsCreate>().mockResolvedValue(embeddingResponse([])) })
      });

      await expect(scorer.prepare("flood")).rejects.toBeInstanceOf(EmbeddingScorerError);
    });

    it("times out when the provider does not answer", async () => {
      const scorer = new EmbeddingScorer({
        model: "test-embedding-model",
        timeoutMs: 10,
        getOpenAIClient: async () =>
          createFakeOpenAI({ embeddingsCreate: () => new Promise(() => undefined) })
      });

      await expect(scorer.prepare("flood")).rejects.toBeInstanceOf(OperationTimeoutError);
    });
  });

  it("builds the configured scorer", () => {
    const options = { embeddingModel: "test-embedding-model", embeddingTimeoutMs: 1000 };

    expect(createRelevanceScorer("lexical", options).name).toBe("lexical");
    expect(createRelevanceScorer("embedding", options).name).toBe("embedding");
  });
});
