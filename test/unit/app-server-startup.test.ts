import { describe, expect, it, vi } from "vitest";
import { buildAllowedFrontendOrigins, buildApp } from "../../src/app.js";
import type { DraftPipeline } from "../../src/modules/drafting/draft-pipeline.js";
import { bootstrap } from "../../src/server.js";
import { makeChunk, makeStore } from "../helpers/fixtures.js";

describe("app.ts", () => {
  it("buildAllowedFrontendOrigins returns defaults and localhost aliases", () => {
    expect(buildAllowedFrontendOrigins(undefined)).toEqual(["http://localhost:8501", "http://127.0.0.1:8501"]);
    expect(buildAllowedFrontendOrigins("http://localhost:3000, invalid-url, http://localhost:3000")).toEqual([
      "http://localhost:3000",
      "invalid-url",
      "http://127.0.0.1:3000"
    ]);
  });

  it("buildApp serves health, metrics and drafting routes", async () => {
    const run = vi.fn<DraftPipeline["run"]>().mockResolvedValue({
      route: "email",
      markdown: "Body.\n\nP.S.: Reply today",
      sources: []
    });
    const app = await buildApp({
      store: makeStore([makeChunk({ id: "a#0" })]),
      pipeline: { run },
      logger: false,
      lifecycle: { enableBootstrap: false }
    });

    try {
      const health = await app.inject({ method: "GET", url: "/health" });
      const draft = await app.inject({ method: "POST", url: "/generate/email", payload: { org_brief: "Relief fund" } });
      const metrics = await app.inject({ method: "GET", url: "/metrics" });

      expect(health.json()).toEqual({ status: "ok", knowledge_base: { chunks: 1, rejected: 0 } });
      expect(health.headers["x-request-id"]).toEqual(expect.any(String));
      expect(draft.json()).toEqual({ email_md: "Body.\n\nP.S.: Reply today", email_sources: [] });
      expect(metrics.json().request_latency.count).toBe(2);
    } finally {
      await app.close();
    }
  });

  it("buildApp answers CORS preflight for the configured frontend", async () => {
    const app = await buildApp({
      store: makeStore([]),
      frontendOrigin: "http://localhost:9999",
      logger: false,
      lifecycle: { enableBootstrap: false }
    });

    try {
      const response = await app.inject({
        method: "OPTIONS",
        url: "/generate/email",
        headers: {
          origin: "http://127.0.0.1:9999",
          "access-control-request-method": "POST"
        }
      });

      expect(response.statusCode).toBe(204);
      expect(response.headers["access-control-allow-origin"]).toBe("http://127.0.0.1:9999");
    } finally {
      await app.close();
    }
  });
});

describe("server.ts", () => {
  it("bootstrap loads the knowledge base and listens on the configured port", async () => {
    const store = makeStore([makeChunk({ id: "a#0" })]);
    const loadChunkStore = vi.fn().mockResolvedValue(store);
    const listen = vi.fn().mockResolvedValue("http://0.0.0.0:3000");
    const buildAppMock = vi.fn().mockResolvedValue({ listen });
    const setExitCode = vi.fn();

    const started = await bootstrap({ loadChunkStore, buildApp: buildAppMock, setExitCode });

    expect(started).toBe(true);
    expect(loadChunkStore).toHaveBeenCalledWith({ path: "data/processed/chunks.jsonl" });
    expect(buildAppMock).toHaveBeenCalledWith({
      store,
      scorer: expect.objectContaining({ name: "lexical" }),
      defaultTopK: 6
    });
    expect(listen).toHaveBeenCalledWith({ host: "0.0.0.0", port: 3000 });
    expect(setExitCode).not.toHaveBeenCalled();
  });

  it("bootstrap never listens when the knowledge base cannot be read", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const loadChunkStore = vi.fn().mockRejectedValue(new Error("Knowledge base not found: missing.jsonl"));
    const buildAppMock = vi.fn();
    const setExitCode = vi.fn();

    const started = await bootstrap({ loadChunkStore, buildApp: buildAppMock, setExitCode });

    expect(started).toBe(false);
    expect(buildAppMock).not.toHaveBeenCalled();
    expect(setExitCode).toHaveBeenCalledWith(1);
  });
});
