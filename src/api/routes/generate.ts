import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { OperationAbortedError } from "../../clients/request-control.js";
import { config } from "../../config/index.js";
import type { DraftPipeline } from "../../modules/drafting/draft-pipeline.js";
import { composeResponse } from "../../modules/drafting/response-composer.js";
import type { DraftRequest } from "../../modules/drafting/types.js";
import {
  GenerationAbortedError,
  GenerationProviderError,
  GenerationTimeoutError
} from "../../modules/generation/draft-generator.js";
import type { DraftRoute } from "../../modules/generation/types.js";
import { parseCalendarDate } from "../../modules/knowledge/calendar-date.js";
import type { RetrievalFilter } from "../../modules/rag/types.js";
import { logError, logInfo, logWarn, serializeError } from "../../observability/logger.js";
import { recordErrorRate } from "../../observability/metrics.js";

export const MAX_TOP_K = 50;
export const DEFAULT_AUDIENCE = "major_donor";
export const DEFAULT_TONE = "hopeful";

const isoDateSchema = z.string().transform((value, context) => {
  const parsed = parseCalendarDate(value);
  if (!parsed) {
    context.addIssue({ code: z.ZodIssueCode.custom, message: "must be an ISO date (YYYY-MM-DD)" });
    return z.NEVER;
  }
  return parsed;
});

const retrieveFiltersSchema = z.object({
  date_from: isoDateSchema.nullable().optional(),
  date_to: isoDateSchema.nullable().optional(),
  county: z.array(z.string()).nullable().optional(),
  topics: z.array(z.string()).nullable().optional()
});

export const generateBodySchema = z
  .object({
    campaign_brief: z.string().nullable().optional(),
    org_brief: z.string().nullable().optional(),
    retrieve_filters: retrieveFiltersSchema.nullable().optional(),
    filters: retrieveFiltersSchema.nullable().optional(),
    k: z.number().int("k must be an integer").positive("k must be positive").max(MAX_TOP_K).optional(),
    audience: z.string().nullable().optional(),
    tone: z.string().nullable().optional(),
    ask: z.string().nullable().optional(),
    deadline: z.string().nullable().optional()
  })
  .superRefine((body, context) => {
    const hasBrief = [body.campaign_brief, body.org_brief].some((brief) => (brief ?? "").trim().length > 0);
    if (!hasBrief) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["campaign_brief"],
        message: "campaign_brief or org_brief is required"
      });
    }
  });

type GenerateBody = z.infer<typeof generateBodySchema>;

export const toValidationError = (error: z.ZodError) => ({
  detail: error.issues.map((issue) => ({
    type: issue.code,
    loc: ["body", ...issue.path],
    msg: issue.message
  }))
});

export const resolveRequestId = (request: FastifyRequest): string => {
  const headerRequestId = request.headers["x-request-id"];
  if (typeof headerRequestId === "string" && headerRequestId.trim().length > 0) {
    return headerRequestId.trim();
  }
  return request.id;
};

const toRetrievalFilter = (body: GenerateBody): RetrievalFilter | undefined => {
  const filters = body.retrieve_filters ?? body.filters;
  if (!filters) {
    return undefined;
  }
  return {
    ...(filters.date_from ? { date_from: filters.date_from } : {}),
    ...(filters.date_to ? { date_to: filters.date_to } : {}),
    ...(filters.county && filters.county.length > 0 ? { county: filters.county } : {}),
    ...(filters.topics && filters.topics.length > 0 ? { topics: filters.topics } : {})
  };
};

const nonBlank = (value: string | null | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

export const toDraftRequest = (route: DraftRoute, body: GenerateBody, defaultTopK: number): DraftRequest => {
  const ask = nonBlank(body.ask);
  const deadline = nonBlank(body.deadline);
  return {
    route,
    campaignBrief: body.campaign_brief?.trim() ?? "",
    orgBrief: body.org_brief?.trim() ?? "",
    filter: toRetrievalFilter(body),
    k: body.k ?? defaultTopK,
    audience: nonBlank(body.audience) ?? DEFAULT_AUDIENCE,
    tone: nonBlank(body.tone) ?? DEFAULT_TONE,
    ...(ask ? { ask } : {}),
    ...(deadline ? { deadline } : {})
  };
};

export interface GenerateRoutesDependencies {
  pipeline: Pick<DraftPipeline, "run">;
  defaultTopK?: number;
}

const buildGenerateHandler = (route: DraftRoute, dependencies: GenerateRoutesDependencies) => {
  const defaultTopK = dependencies.defaultTopK ?? config.DEFAULT_TOP_K;

  return async (request: FastifyRequest, reply: FastifyReply) => {
    const requestId = resolveRequestId(request);
    const context = { requestId, route: request.routeOptions.url ?? null };
    const parsed = generateBodySchema.safeParse(request.body);
    if (!parsed.success) {
      recordErrorRate("validation_422");
      return reply.code(422).send(toValidationError(parsed.error));
    }

    const draftRequest = toDraftRequest(route, parsed.data, defaultTopK);
    logInfo("generate.request.start", context, {
      k: draftRequest.k,
      has_filter: draftRequest.filter !== undefined,
      audience: draftRequest.audience,
      tone: draftRequest.tone
    });

    // The response stream closes without finishing only when the client went away.
    const controller = new AbortController();
    const onClose = (): void => {
      if (!reply.raw.writableEnded) {
        controller.abort();
      }
    };
    reply.raw.once("close", onClose);

    try {
      const result = await dependencies.pipeline.run(draftRequest, { requestId, signal: controller.signal });
      return reply.code(200).send(composeResponse(result));
    } catch (error) {
      if (error instanceof GenerationAbortedError || error instanceof OperationAbortedError) {
        recordErrorRate("generation_aborted");
        logWarn("generate.request.aborted", context, serializeError(error));
        return reply.code(499).send({ detail: "Client closed request" });
      }

      logError("generate.request.error", context, serializeError(error));
      if (error instanceof GenerationTimeoutError) {
        recordErrorRate("generation_timeout_504");
        return reply.code(504).send({ detail: error.message });
      }
      if (error instanceof GenerationProviderError) {
        recordErrorRate("generation_provider_502");
        return reply.code(502).send({ detail: error.message });
      }
      throw error;
    } finally {
      reply.raw.off("close", onClose);
    }
  };
};

export async function registerGenerateRoutes(
  app: FastifyInstance,
  dependencies: GenerateRoutesDependencies
): Promise<void> {
  app.post("/generate/email", buildGenerateHandler("email", dependencies));
  app.post("/generate/narrative", buildGenerateHandler("narrative", dependencies));
}
