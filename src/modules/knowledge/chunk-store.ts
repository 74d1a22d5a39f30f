import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { logInfo, logWarn } from "../../observability/logger.js";
import { parseCalendarDate } from "./calendar-date.js";
import type { Chunk, ChunkStorePort, RejectedRecord } from "./types.js";

export class KnowledgeBaseLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "KnowledgeBaseLoadError";
  }
}

const optionalText = z
  .string()
  .nullable()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed && trimmed.length > 0 ? trimmed : null;
  });

const knowledgeRecordSchema = z.object({
  doc_id: z.string({ required_error: "doc_id is required" }).trim().min(1, "doc_id is required"),
  date: z.string({ required_error: "date is required" }).transform((value, ctx) => {
    const parsed = parseCalendarDate(value);
    if (!parsed) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `date "${value}" is not a calendar date` });
      return z.NEVER;
    }
    return parsed;
  }),
  chunk_id: z.union([z.string(), z.number()]).optional(),
  id: z.union([z.string(), z.number()]).optional(),
  url: optionalText,
  source: optionalText,
  county: optionalText,
  title: optionalText,
  topic: optionalText,
  topics: z.array(z.string()).nullable().optional(),
  text: z.string().nullable().optional(),
  embedding: z.array(z.number()).nullable().optional()
});

type KnowledgeRecord = z.infer<typeof knowledgeRecordSchema>;

export interface ParsedKnowledgeBase {
  chunks: Chunk[];
  rejected: RejectedRecord[];
}

const toChunk = (record: KnowledgeRecord, line: number, ordinal: number): Chunk => {
  const rawId = record.chunk_id ?? record.id;
  const topics = [...(record.topics ?? []), ...(record.topic ? [record.topic] : [])]
    .map((topic) => topic.trim())
    .filter((topic) => topic.length > 0);

  return {
    id: rawId !== undefined && String(rawId).trim().length > 0 ? String(rawId).trim() : `${record.doc_id}#${line}`,
    doc_id: record.doc_id,
    date: record.date,
    url: record.url ?? record.source,
    county: record.county,
    topics,
    title: record.title ?? record.doc_id,
    text: record.text ?? "",
    ...(record.embedding && record.embedding.length > 0 ? { embedding: record.embedding } : {}),
    ordinal
  };
};

const describeIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message)).join("; ");

/**
 * Parses newline-delimited JSON knowledge records. Invalid lines are reported
 * in `rejected` and never abort the parse.
 */
export const parseKnowledgeBase = (content: string): ParsedKnowledgeBase => {
  const chunks: Chunk[] = [];
  const rejected: RejectedRecord[] = [];

  content.split(/\r?\n/).forEach((rawLine, index) => {
    const line = index + 1;
    if (rawLine.trim().length === 0) {
      return;
    }

    let json: unknown;
    try {
      json = JSON.parse(rawLine);
    } catch (error) {
      const message = error instanceof Error ? error.message : "invalid json";
      rejected.push({ line, reason: `invalid JSON: ${message}` });
      return;
    }

    const parsed = knowledgeRecordSchema.safeParse(json);
    if (!parsed.success) {
      rejected.push({ line, reason: describeIssues(parsed.error) });
      return;
    }

    chunks.push(toChunk(parsed.data, line, chunks.length));
  });

  return { chunks, rejected };
};

const freezeChunk = (chunk: Chunk): Chunk => {
  Object.freeze(chunk.topics);
  if (chunk.embedding) {
    Object.freeze(chunk.embedding);
  }
  return Object.freeze(chunk);
};

export class ChunkStore implements ChunkStorePort {
  readonly chunks: readonly Chunk[];
  readonly rejectedCount: number;
  readonly sourcePath: string;

  constructor(chunks: Chunk[], options: { rejectedCount?: number; sourcePath?: string } = {}) {
    this.chunks = Object.freeze(chunks.map(freezeChunk));
    this.rejectedCount = options.rejectedCount ?? 0;
    this.sourcePath = options.sourcePath ?? "memory";
  }

  get size(): number {
    return this.chunks.length;
  }
}

export interface LoadChunkStoreOptions {
  path: string;
  cwd?: string;
  readFile?: (filePath: string) => Promise<string>;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
}

export const resolveKnowledgeBasePath = (configured: string, cwd: string = process.cwd()): string =>
  path.isAbsolute(configured) ? configured : path.resolve(cwd, configured);

export const loadChunkStore = async (options: LoadChunkStoreOptions): Promise<ChunkStore> => {
  const readFile = options.readFile ?? ((filePath: string) => fs.readFile(filePath, "utf8"));
  const info = options.logInfo ?? logInfo;
  const warn = options.logWarn ?? logWarn;
  const filePath = resolveKnowledgeBasePath(options.path, options.cwd);

  let content: string;
  try {
    content = await readFile(filePath);
  } catch (error) {
    const code = error instanceof Error && "code" in error ? error.code : undefined;
    const reason = code === "ENOENT" ? "file not found" : error instanceof Error ? error.message : "unreadable";
    throw new KnowledgeBaseLoadError(`Knowledge base could not be loaded from ${filePath}: ${reason}`, {
      cause: error
    });
  }

  const { chunks, rejected } = parseKnowledgeBase(content);
  for (const record of rejected) {
    warn("kb.record.invalid", {}, { path: filePath, line: record.line, reason: record.reason });
  }

  const store = new ChunkStore(chunks, { rejectedCount: rejected.length, sourcePath: filePath });
  info("kb.load.complete", {}, {
    path: filePath,
    chunk_count: store.size,
    rejected_count: store.rejectedCount,
    document_count: new Set(chunks.map((chunk) => chunk.doc_id)).size
  });

  return store;
};
