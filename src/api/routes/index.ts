import type { FastifyInstance } from "fastify";
import { config } from "../../config/index.js";
import { registerExportRoute, type ExportRouteDependencies } from "./export.js";
import { registerGenerateRoutes, type GenerateRoutesDependencies } from "./generate.js";
import { registerHealthRoute, type HealthRouteDependencies } from "./health.js";
import { registerOpenApiRoute } from "./openapi.js";

export interface ApiRoutesDependencies {
  health: HealthRouteDependencies;
  generate: GenerateRoutesDependencies;
  export?: ExportRouteDependencies;
}

export async function registerApiRoutes(app: FastifyInstance, dependencies: ApiRoutesDependencies): Promise<void> {
  await registerHealthRoute(app, dependencies.health);
  await registerGenerateRoutes(app, dependencies.generate);
  await registerExportRoute(app, dependencies.export);
  await registerOpenApiRoute(app, { defaultTopK: dependencies.generate.defaultTopK ?? config.DEFAULT_TOP_K });
}
