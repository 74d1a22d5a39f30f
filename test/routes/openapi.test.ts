import Fastify from "fastify";
import { describe, expect, it } from "vitest";
import { buildOpenApiDocument, registerOpenApiRoute } from "../../src/api/routes/openapi.js";

describe("registerOpenApiRoute", () => {
  it("serves the document with every public path", async () => {
    const app = Fastify();
    try {
      await registerOpenApiRoute(app, { defaultTopK: 6 });

      const response = await app.inject({ method: "GET", url: "/openapi.json" });
      const document = response.json();

      expect(response.statusCode).toBe(200);
      expect(document.openapi).toBe("3.1.0");
      expect(document.info).toMatchObject({ title: "Grounded Appeals API", version: "0.1.0" });
      expect(Object.keys(document.paths)).toEqual([
        "/",
        "/health",
        "/generate/email",
        "/generate/narrative",
        "/export/docx"
      ]);
    } finally {
      await app.close();
    }
  });

  it("documents the configured default k", () => {
    const document = buildOpenApiDocument(9);

    expect(document.components.schemas.GenerateRequest.properties.k).toEqual({
      type: "integer",
      minimum: 1,
      maximum: 50,
      default: 9
    });
  });
});
