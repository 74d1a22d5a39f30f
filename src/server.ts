import { fileURLToPath } from "node:url";
import type { FastifyInstance } from "fastify";
import { buildApp, type BuildAppOptions } from "./app.js";
import { config } from "./config/index.js";
import { loadChunkStore } from "./modules/knowledge/chunk-store.js";
import { createRelevanceScorer } from "./modules/rag/scoring.js";
import { logError, logInfo, serializeError } from "./observability/logger.js";

export interface BootstrapDependencies {
  loadChunkStore?: typeof loadChunkStore;
  buildApp?: (options: BuildAppOptions) => Promise<Pick<FastifyInstance, "listen">>;
  setExitCode?: (code: number) => void;
}

/**
 * Loads the knowledge base and starts listening. A knowledge base that cannot
 * be read is fatal: the server never listens and the process exits non-zero.
 */
export async function bootstrap(dependencies?: BootstrapDependencies): Promise<boolean> {
  const load = dependencies?.loadChunkStore ?? loadChunkStore;
  const build = dependencies?.buildApp ?? buildApp;
  const setExitCode =
    dependencies?.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });

  try {
    const store = await load({ path: config.KB_PATH });
    const scorer = createRelevanceScorer(config.RETRIEVAL_SCORER, {
      embeddingModel: config.OPENAI_EMBEDDING_MODEL,
      embeddingTimeoutMs: config.EMBEDDING_TIMEOUT_MS
    });

    const app = await build({ store, scorer, defaultTopK: config.DEFAULT_TOP_K });
    await app.listen({ host: "0.0.0.0", port: config.PORT });
    logInfo("server.listening", {}, { port: config.PORT, scorer: scorer.name, chunks: store.size });
    return true;
  } catch (error) {
    logError("server.startup.failed", {}, serializeError(error));
    setExitCode(1);
    return false;
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  bootstrap().catch((error: unknown) => {
    logError("server.startup.failed", {}, serializeError(error));
    process.exitCode = 1;
  });
}
