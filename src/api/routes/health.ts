import type { FastifyInstance } from "fastify";
import type { ChunkStorePort } from "../../modules/knowledge/types.js";

export const SERVICE_NAME = "grounded-appeals-api";

export interface HealthRouteDependencies {
  store: Pick<ChunkStorePort, "size" | "rejectedCount">;
}

export async function registerHealthRoute(app: FastifyInstance, dependencies: HealthRouteDependencies): Promise<void> {
  app.get("/", async () => ({ service: SERVICE_NAME, status: "ok" }));

  app.get("/health", async () => ({
    status: "ok",
    knowledge_base: {
      chunks: dependencies.store.size,
      rejected: dependencies.store.rejectedCount
    }
  }));
}
