import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { DOCX_CONTENT_TYPE, renderDocx, toExportFilename } from "../../modules/export/docx-exporter.js";
import { logInfo } from "../../observability/logger.js";
import { recordErrorRate } from "../../observability/metrics.js";
import { resolveRequestId, toValidationError } from "./generate.js";

const exportBodySchema = z.object({
  title: z.string(),
  content: z.string()
});

export interface ExportRouteDependencies {
  renderDocx?: typeof renderDocx;
}

export async function registerExportRoute(app: FastifyInstance, dependencies: ExportRouteDependencies = {}): Promise<void> {
  const render = dependencies.renderDocx ?? renderDocx;

  app.post("/export/docx", async (request, reply) => {
    const requestId = resolveRequestId(request);
    const parsed = exportBodySchema.safeParse(request.body);
    if (!parsed.success) {
      recordErrorRate("validation_422");
      return reply.code(422).send(toValidationError(parsed.error));
    }
    if (parsed.data.content.trim().length === 0) {
      return reply.code(400).send({ detail: "No content to export." });
    }

    const document = await render(parsed.data.title, parsed.data.content);
    logInfo("export.docx.complete", { requestId, route: "/export/docx" }, { bytes: document.length });

    return reply
      .code(200)
      .header("content-type", DOCX_CONTENT_TYPE)
      .header("content-disposition", `attachment; filename="${toExportFilename(parsed.data.title)}"`)
      .send(document);
  });
}
