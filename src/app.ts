import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import { registerApiRoutes } from "./api/routes/index.js";
import { registerClientLifecycle, type ClientLifecycleOptions } from "./clients/lifecycle.js";
import { config } from "./config/index.js";
import { DraftPipeline } from "./modules/drafting/draft-pipeline.js";
import type { DraftGenerator } from "./modules/generation/types.js";
import type { ChunkStorePort } from "./modules/knowledge/types.js";
import type { RelevanceScorer } from "./modules/rag/scoring.js";
import { registerMetricsRoutes, registerRequestMetricsHooks } from "./observability/metrics.js";

export interface BuildAppOptions {
  store: ChunkStorePort;
  scorer?: RelevanceScorer;
  generator?: DraftGenerator;
  /** Replaces the whole pipeline; `scorer` and `generator` are then ignored. */
  pipeline?: Pick<DraftPipeline, "run">;
  defaultTopK?: number;
  frontendOrigin?: string;
  logger?: boolean;
  lifecycle?: ClientLifecycleOptions;
}

export function buildAllowedFrontendOrigins(rawOrigin: string | undefined): string[] {
  const configured = rawOrigin
    ?.split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);

  const origins = new Set<string>(
    configured && configured.length > 0 ? configured : ["http://localhost:8501", "http://127.0.0.1:8501"]
  );

  for (const origin of [...origins]) {
    if (!URL.canParse(origin)) {
      continue;
    }
    const url = new URL(origin);
    if (url.hostname === "localhost") {
      url.hostname = "127.0.0.1";
      origins.add(url.toString().replace(/\/$/, ""));
    } else if (url.hostname === "127.0.0.1") {
      url.hostname = "localhost";
      origins.add(url.toString().replace(/\/$/, ""));
    }
  }

  return [...origins];
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({ logger: options.logger ?? true });

  await app.register(cors, {
    origin: buildAllowedFrontendOrigins(options.frontendOrigin ?? config.FRONTEND_ORIGIN),
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "X-Request-Id"]
  });

  const pipeline =
    options.pipeline ??
    new DraftPipeline({ store: options.store, scorer: options.scorer, generator: options.generator });

  registerRequestMetricsHooks(app);
  registerClientLifecycle(app, options.lifecycle);
  await registerMetricsRoutes(app);
  await registerApiRoutes(app, {
    health: { store: options.store },
    generate: { pipeline, defaultTopK: options.defaultTopK }
  });

  return app;
}
