import type OpenAI from "openai";
import type { OpenAIClientPort, OpenAISingleton } from "../../src/clients/openai.js";
import { ChunkStore } from "../../src/modules/knowledge/chunk-store.js";
import type { Chunk } from "../../src/modules/knowledge/types.js";

let ordinalCounter = 0;

export const makeChunk = (overrides: Partial<Chunk> & Pick<Chunk, "id">): Chunk => ({
  doc_id: overrides.id.split("#")[0],
  date: "2024-05-01",
  url: `https://example.org/${overrides.id}`,
  county: null,
  topics: [],
  title: `Title ${overrides.id}`,
  text: `Text for ${overrides.id}`,
  ordinal: ordinalCounter++,
  ...overrides
});

export const makeStore = (chunks: Chunk[]): ChunkStore =>
  new ChunkStore(chunks.map((chunk, ordinal) => ({ ...chunk, ordinal })));

export const chatCompletion = (content: string | null, usage?: OpenAI.CompletionUsage): OpenAI.ChatCompletion => ({
  id: "test-completion",
  object: "chat.completion",
  created: 0,
  model: "test-model",
  choices: [
    {
      index: 0,
      finish_reason: "stop",
      logprobs: null,
      message: { role: "assistant", refusal: null, content }
    }
  ],
  ...(usage ? { usage } : {})
});

export const embeddingResponse = (vector: number[]): OpenAI.CreateEmbeddingResponse => ({
  object: "list",
  model: "test-embedding",
  usage: { prompt_tokens: 1, total_tokens: 1 },
  data: [{ index: 0, object: "embedding", embedding: vector }]
});

export type ChatCreate = OpenAIClientPort["chat"]["completions"]["create"];
export type EmbeddingsCreate = OpenAIClientPort["embeddings"]["create"];

export const createFakeOpenAI = (
  overrides: { chatCreate?: ChatCreate; embeddingsCreate?: EmbeddingsCreate } = {}
): OpenAISingleton => ({
  client: {
    chat: {
      completions: {
        create: overrides.chatCreate ?? (async () => chatCompletion("stub"))
      }
    },
    embeddings: {
      create:
        overrides.embeddingsCreate ??
        (async () => {
          throw new Error("embeddings are not stubbed in this test");
        })
    },
    models: {
      retrieve: async (model) => ({ id: model, object: "model", created: 0, owned_by: "test" })
    }
  },
  healthCheck: async () => ({ status: "ok" })
});
