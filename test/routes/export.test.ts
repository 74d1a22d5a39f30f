import Fastify from "fastify";
import { describe, expect, it, vi } from "vitest";
import { registerExportRoute } from "../../src/api/routes/export.js";
import { DOCX_CONTENT_TYPE, type renderDocx } from "../../src/modules/export/docx-exporter.js";

describe("POST /export/docx", () => {
  it("rejects blank content", async () => {
    const render = vi.fn<typeof renderDocx>();
    const app = Fastify();
    try {
      await registerExportRoute(app, { renderDocx: render });

      const response = await app.inject({
        method: "POST",
        url: "/export/docx",
        payload: { title: "Spring appeal", content: " \n " }
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ detail: "No content to export." });
      expect(render).not.toHaveBeenCalled();
    } finally {
      await app.close();
    }
  });

  it("validates the body shape", async () => {
    const app = Fastify();
    try {
      await registerExportRoute(app);

      const response = await app.inject({ method: "POST", url: "/export/docx", payload: { content: "Body" } });

      expect(response.statusCode).toBe(422);
      expect(response.json().detail[0].loc).toEqual(["body", "title"]);
    } finally {
      await app.close();
    }
  });

  it("returns the document as an attachment named after the title", async () => {
    const app = Fastify();
    try {
      await registerExportRoute(app);

      const response = await app.inject({
        method: "POST",
        url: "/export/docx",
        payload: { title: "Spring appeal", content: "# Need\n\nRoofs are leaking [1].\n- Harlan **first**" }
      });

      expect(response.statusCode).toBe(200);
      expect(response.headers["content-type"]).toBe(DOCX_CONTENT_TYPE);
      expect(response.headers["content-disposition"]).toBe('attachment; filename="Spring_appeal.docx"');
      expect(response.rawPayload.subarray(0, 2).toString("latin1")).toBe("PK");
    } finally {
      await app.close();
    }
  });
});
