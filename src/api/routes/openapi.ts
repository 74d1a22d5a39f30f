import type { FastifyInstance } from "fastify";
import { NARRATIVE_SECTION_LABELS } from "../../modules/drafting/markdown-sanitizer.js";
import { DOCX_CONTENT_TYPE } from "../../modules/export/docx-exporter.js";
import { DEFAULT_AUDIENCE, DEFAULT_TONE, MAX_TOP_K } from "./generate.js";
import { SERVICE_NAME } from "./health.js";

const ref = (name: string) => ({ $ref: `#/components/schemas/${name}` });

const errorResponses = {
  "422": {
    description: "Request body failed validation",
    content: { "application/json": { schema: ref("ValidationError") } }
  },
  "502": {
    description: "The generation provider failed after retries",
    content: { "application/json": { schema: ref("ErrorDetail") } }
  },
  "504": {
    description: "The generation provider did not answer in time",
    content: { "application/json": { schema: ref("ErrorDetail") } }
  }
};

const generateOperation = (noun: "email" | "narrative", summary: string, typedSchema: string) => ({
  summary,
  operationId: `generate_${noun}`,
  requestBody: {
    required: true,
    content: { "application/json": { schema: ref("GenerateRequest") } }
  },
  responses: {
    "200": {
      description: `Grounded ${noun} draft`,
      content: {
        "application/json": {
          schema: {
            type: "object",
            required: [`${noun}_md`, `${noun}_sources`],
            properties: {
              [`${noun}_md`]: { type: "string" },
              [`${noun}_sources`]: { type: "array", items: ref("SourceItem") },
              [noun]: ref(typedSchema)
            }
          }
        }
      }
    },
    ...errorResponses
  }
});

export const buildOpenApiDocument = (defaultTopK: number) => ({
  openapi: "3.1.0",
  info: {
    title: "Grounded Appeals API",
    version: "0.1.0",
    description: "Drafts donor emails and grant narratives grounded in a local knowledge base."
  },
  paths: {
    "/": {
      get: {
        summary: "Liveness",
        operationId: "liveness",
        responses: {
          "200": {
            description: "Service is up",
            content: {
              "application/json": {
                schema: {
                  type: "object",
                  properties: { service: { type: "string", const: SERVICE_NAME }, status: { type: "string" } }
                }
              }
            }
          }
        }
      }
    },
    "/health": {
      get: {
        summary: "Knowledge base summary",
        operationId: "health",
        responses: { "200": { description: "Loaded chunk counts" } }
      }
    },
    "/generate/email": {
      post: generateOperation("email", "Draft a donor email", "EmailDraft")
    },
    "/generate/narrative": {
      post: generateOperation("narrative", "Draft a grant narrative", "NarrativeDraft")
    },
    "/export/docx": {
      post: {
        summary: "Export markdown as a Word document",
        operationId: "export_docx",
        requestBody: {
          required: true,
          content: { "application/json": { schema: ref("ExportRequest") } }
        },
        responses: {
          "200": {
            description: "Word document attachment",
            content: { [DOCX_CONTENT_TYPE]: { schema: { type: "string", format: "binary" } } }
          },
          "400": {
            description: "Content was blank",
            content: { "application/json": { schema: ref("ErrorDetail") } }
          },
          "422": errorResponses["422"]
        }
      }
    }
  },
  components: {
    schemas: {
      RetrieveFilters: {
        type: "object",
        properties: {
          date_from: { type: ["string", "null"], format: "date" },
          date_to: { type: ["string", "null"], format: "date" },
          county: { type: ["array", "null"], items: { type: "string" } },
          topics: { type: ["array", "null"], items: { type: "string" } }
        }
      },
      GenerateRequest: {
        type: "object",
        description: "At least one of campaign_brief or org_brief must be non-blank.",
        properties: {
          campaign_brief: { type: ["string", "null"] },
          org_brief: { type: ["string", "null"] },
          retrieve_filters: ref("RetrieveFilters"),
          filters: { ...ref("RetrieveFilters"), description: "Alias of retrieve_filters" },
          k: { type: "integer", minimum: 1, maximum: MAX_TOP_K, default: defaultTopK },
          audience: { type: ["string", "null"], default: DEFAULT_AUDIENCE },
          tone: { type: ["string", "null"], default: DEFAULT_TONE },
          ask: { type: ["string", "null"] },
          deadline: { type: ["string", "null"] }
        }
      },
      ExportRequest: {
        type: "object",
        required: ["title", "content"],
        properties: {
          title: { type: "string" },
          content: { type: "string", description: "Markdown with #-### headings, - bullets, **bold** and *italic*" }
        }
      },
      SourceItem: {
        type: "object",
        required: ["n", "doc_id", "title", "url", "date", "county", "topics"],
        properties: {
          n: { type: "integer", minimum: 1 },
          doc_id: { type: "string" },
          title: { type: "string" },
          url: { type: ["string", "null"] },
          date: { type: "string", format: "date" },
          county: { type: ["string", "null"] },
          topics: { type: "array", items: { type: "string" } }
        }
      },
      EmailDraft: {
        type: "object",
        required: ["subject_lines", "body_md", "sources"],
        properties: {
          subject_lines: { type: "array", items: { type: "string" }, minItems: 3, maxItems: 3 },
          body_md: { type: "string" },
          sources: { type: "array", items: ref("SourceItem") }
        }
      },
      NarrativeDraft: {
        type: "object",
        required: ["sections", "body_md", "sources"],
        properties: {
          sections: { type: "array", items: { type: "string", enum: [...NARRATIVE_SECTION_LABELS] } },
          body_md: { type: "string" },
          sources: { type: "array", items: ref("SourceItem") }
        }
      },
      ErrorDetail: {
        type: "object",
        properties: { detail: { type: "string" } }
      },
      ValidationError: {
        type: "object",
        properties: {
          detail: {
            type: "array",
            items: {
              type: "object",
              properties: {
                type: { type: "string" },
                loc: { type: "array", items: { type: ["string", "integer"] } },
                msg: { type: "string" }
              }
            }
          }
        }
      }
    }
  }
});

export async function registerOpenApiRoute(app: FastifyInstance, options: { defaultTopK: number }): Promise<void> {
  const document = buildOpenApiDocument(options.defaultTopK);
  app.get("/openapi.json", async () => document);
}
