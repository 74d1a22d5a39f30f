import OpenAI, { APIConnectionError, APIError, APIUserAbortError } from "openai";
import { getOpenAIClient } from "../../clients/openai.js";
import {
  OperationAbortedError,
  OperationTimeoutError,
  delay,
  withRetries,
  withTimeout
} from "../../clients/request-control.js";
import { config } from "../../config/index.js";
import { logInfo, logWarn } from "../../observability/logger.js";
import { recordGenerationLatency, recordOpenAIUsage } from "../../observability/metrics.js";
import { parseEmailDraft, parseNarrativeDraft } from "./draft-parser.js";
import { buildPrompt as defaultBuildPrompt } from "./prompt-builder.js";
import type { Draft, DraftGenerator, GenerationInput, GenerationOptions, PromptBuildOutput } from "./types.js";

export class GenerationProviderError extends Error {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, { cause: options?.cause });
    this.name = "GenerationProviderError";
    this.status = options?.status;
  }
}

export class GenerationTimeoutError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GenerationTimeoutError";
  }
}

export class GenerationAbortedError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GenerationAbortedError";
  }
}

const TRANSIENT_STATUS_CODES = new Set([408, 409, 429]);
const DEFAULT_RETRY_DELAY_MS = 300;

export const isTransientGenerationError = (error: unknown): boolean => {
  if (error instanceof OperationTimeoutError) {
    return true;
  }
  if (error instanceof OperationAbortedError || error instanceof APIUserAbortError) {
    return false;
  }
  if (error instanceof APIConnectionError) {
    return true;
  }
  if (error instanceof APIError) {
    const status = error.status;
    return status !== undefined && (TRANSIENT_STATUS_CODES.has(status) || status >= 500);
  }
  return false;
};

export const toGenerationError = (error: unknown): Error => {
  if (
    error instanceof GenerationProviderError ||
    error instanceof GenerationTimeoutError ||
    error instanceof GenerationAbortedError
  ) {
    return error;
  }
  if (error instanceof OperationTimeoutError) {
    return new GenerationTimeoutError(`Draft generation timed out after ${error.timeoutMs}ms`, { cause: error });
  }
  if (error instanceof OperationAbortedError || error instanceof APIUserAbortError) {
    return new GenerationAbortedError("Draft generation was cancelled", { cause: error });
  }
  if (error instanceof APIError) {
    return new GenerationProviderError(`Generation provider error (${error.status ?? "no status"}): ${error.message}`, {
      cause: error,
      status: error.status
    });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new GenerationProviderError(`Generation provider error: ${message}`, { cause: error });
};

export interface DraftGeneratorDependencies {
  getOpenAIClient?: typeof getOpenAIClient;
  buildPrompt?: (input: GenerationInput) => PromptBuildOutput;
  model?: string;
  temperature?: number;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  recordGenerationLatency?: typeof recordGenerationLatency;
  recordOpenAIUsage?: typeof recordOpenAIUsage;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
}

const resolveDependencies = (dependencies?: DraftGeneratorDependencies) => ({
  getOpenAIClient: dependencies?.getOpenAIClient ?? getOpenAIClient,
  buildPrompt: dependencies?.buildPrompt ?? defaultBuildPrompt,
  model: dependencies?.model ?? config.OPENAI_MODEL,
  temperature: dependencies?.temperature ?? config.GENERATION_TEMPERATURE,
  timeoutMs: dependencies?.timeoutMs ?? config.GENERATION_TIMEOUT_MS,
  maxRetries: dependencies?.maxRetries ?? config.GENERATION_MAX_RETRIES,
  retryDelayMs: dependencies?.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS,
  sleep: dependencies?.sleep ?? delay,
  now: dependencies?.now ?? Date.now,
  recordGenerationLatency: dependencies?.recordGenerationLatency ?? recordGenerationLatency,
  recordOpenAIUsage: dependencies?.recordOpenAIUsage ?? recordOpenAIUsage,
  logInfo: dependencies?.logInfo ?? logInfo,
  logWarn: dependencies?.logWarn ?? logWarn
});

/**
 * Production generator backed by OpenAI chat completions. Provider failures
 * are retried while transient and then surface as typed errors; a failed call
 * never yields a draft.
 */
export class OpenAIDraftGenerator implements DraftGenerator {
  private readonly dependencies: ReturnType<typeof resolveDependencies>;

  constructor(dependencies?: DraftGeneratorDependencies) {
    this.dependencies = resolveDependencies(dependencies);
  }

  async generate(input: GenerationInput, options: GenerationOptions = {}): Promise<Draft> {
    const deps = this.dependencies;
    const context = { requestId: input.requestId ?? null, route: input.route };
    const prompt = deps.buildPrompt(input);
    const startedAt = deps.now();
    const { client } = await deps.getOpenAIClient();

    const callOnce = (jsonMode: boolean) =>
      withTimeout(
        (signal) =>
          client.chat.completions.create(
            {
              model: deps.model,
              temperature: deps.temperature,
              messages: prompt.messages,
              ...(jsonMode ? { response_format: { type: "json_object" as const } } : {})
            },
            { signal, maxRetries: 0, timeout: deps.timeoutMs }
          ),
        { timeoutMs: deps.timeoutMs, label: "draft generation", signal: options.signal }
      );

    let jsonMode = prompt.jsonMode;
    let completion: OpenAI.ChatCompletion;
    try {
      completion = await withRetries(
        async () => {
          try {
            return await callOnce(jsonMode);
          } catch (error) {
            // Some models reject response_format; fall back to plain text once.
            if (jsonMode && error instanceof APIError && error.status === 400) {
              deps.logWarn("generation.json_mode.unsupported", context, { model: deps.model });
              jsonMode = false;
              return await callOnce(false);
            }
            throw error;
          }
        },
        {
          retries: deps.maxRetries,
          retryDelayMs: deps.retryDelayMs,
          shouldRetry: isTransientGenerationError,
          sleep: deps.sleep,
          onRetry: (error, attempt) => {
            deps.logWarn("generation.retry", context, {
              attempt,
              max_retries: deps.maxRetries,
              error: error instanceof Error ? error.message : String(error)
            });
          }
        }
      );
    } catch (error) {
      throw toGenerationError(error);
    }

    const content = completion.choices[0]?.message?.content ?? "";
    if (content.trim().length === 0) {
      throw new GenerationProviderError("Generation provider returned empty content.");
    }

    const latencyMs = deps.now() - startedAt;
    deps.recordGenerationLatency(latencyMs);
    deps.recordOpenAIUsage({
      promptTokens: completion.usage?.prompt_tokens,
      completionTokens: completion.usage?.completion_tokens,
      totalTokens: completion.usage?.total_tokens
    });
    deps.logInfo("generation.complete", context, {
      latency_ms: latencyMs,
      model: deps.model,
      json_mode: jsonMode,
      chunk_count: input.chunks.length,
      content_chars: content.length
    });

    return input.route === "email" ? parseEmailDraft(content) : parseNarrativeDraft(content);
  }
}
