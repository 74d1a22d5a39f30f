import OpenAI from "openai";
import { config } from "../config/index.js";
import { logInfo } from "../observability/logger.js";

type HealthStatus = "ok" | "error";

export interface OpenAICallOptions {
  signal?: AbortSignal;
  timeout?: number;
  maxRetries?: number;
}

/**
 * The slice of the OpenAI SDK the service calls. The real client satisfies it
 * structurally; the mock client below implements it by hand.
 */
export interface OpenAIClientPort {
  chat: {
    completions: {
      create(
        body: OpenAI.ChatCompletionCreateParamsNonStreaming,
        options?: OpenAICallOptions
      ): Promise<OpenAI.ChatCompletion>;
    };
  };
  embeddings: {
    create(body: OpenAI.EmbeddingCreateParams, options?: OpenAICallOptions): Promise<OpenAI.CreateEmbeddingResponse>;
  };
  models: {
    retrieve(model: string, options?: OpenAICallOptions): Promise<OpenAI.Model>;
  };
}

export interface OpenAISingleton {
  client: OpenAIClientPort;
  healthCheck: () => Promise<{ status: HealthStatus; details?: string }>;
}

const HEALTH_CHECK_TIMEOUT_MS = 7000;

let singleton: OpenAISingleton | null = null;

const MOCK_EMAIL_DRAFT = {
  subjects: ["Rebuilding together", "Your gift reaches neighbors", "Help us finish the job"],
  body_md:
    "Families across the region are still recovering [1]. Small businesses have reopened with local support [2].\n\nYour gift keeps that momentum going.",
  ps: "Reply to this email to learn where your gift goes."
};

const MOCK_NARRATIVE_DRAFT = [
  "**Need/Problem.** Recovery needs remain high across the service area [1].",
  "**Program/Intervention.** Microgrants help businesses reopen [2].",
  "**Budget Summary & Unit Economics.** Each grant averages $5k.",
  "**Outcomes & Reporting Plan.** Grantees report quarterly.",
  "**Equity & Community Context.** Priority goes to rural counties [1].",
  "**Organizational Capacity.** Our team has delivered relief programs since 2016."
].join("\n\n");

const createMockClient = (): OpenAIClientPort => ({
  chat: {
    completions: {
      async create(body) {
        const wantsJson = body.response_format?.type === "json_object";
        return {
          id: "mock-completion",
          object: "chat.completion",
          created: 0,
          model: body.model,
          choices: [
            {
              index: 0,
              finish_reason: "stop",
              logprobs: null,
              message: {
                role: "assistant",
                refusal: null,
                content: wantsJson ? JSON.stringify(MOCK_EMAIL_DRAFT) : MOCK_NARRATIVE_DRAFT
              }
            }
          ]
        };
      }
    }
  },
  embeddings: {
    async create(body) {
      const values = Array.isArray(body.input) ? body.input : [body.input];
      return {
        object: "list",
        model: body.model,
        usage: { prompt_tokens: 0, total_tokens: 0 },
        data: values.map((_, index) => ({
          index,
          object: "embedding",
          embedding: [0.01, 0.02, 0.03]
        }))
      };
    }
  },
  models: {
    async retrieve(model) {
      return { id: model, object: "model", created: 0, owned_by: "mock" };
    }
  }
});

function initialize(): OpenAISingleton {
  if (config.MOCK_INFRA_CLIENTS) {
    logInfo("clients.openai.initialized", {}, { mock: true });
    return {
      client: createMockClient(),
      async healthCheck() {
        return { status: "ok" };
      }
    };
  }

  // Retries are owned by the callers so that each concern can decide its own policy.
  const client = new OpenAI({
    apiKey: config.OPENAI_API_KEY,
    maxRetries: 0,
    timeout: config.GENERATION_TIMEOUT_MS
  });

  logInfo("clients.openai.initialized", {}, { mock: false, model: config.OPENAI_MODEL });

  return {
    client,
    async healthCheck() {
      try {
        await client.models.retrieve(config.OPENAI_MODEL, { timeout: HEALTH_CHECK_TIMEOUT_MS });
        return { status: "ok" };
      } catch (error) {
        const details = error instanceof Error ? error.message : "unknown error";
        return { status: "error", details };
      }
    }
  };
}

export async function getOpenAIClient(): Promise<OpenAISingleton> {
  if (!singleton) {
    singleton = initialize();
  }

  return singleton;
}

export async function shutdownOpenAIClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  singleton = null;
  logInfo("clients.openai.shutdown", {});
}

export function resetOpenAIClientForTests(): void {
  singleton = null;
}
