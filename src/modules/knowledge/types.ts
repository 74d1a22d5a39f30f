export type Chunk = {
  id: string;
  doc_id: string;
  /** Calendar date, normalized to YYYY-MM-DD. */
  date: string;
  url: string | null;
  county: string | null;
  topics: string[];
  title: string;
  text: string;
  embedding?: number[];
  /** Zero-based position in the knowledge-base file after invalid records are dropped. */
  ordinal: number;
};

export type RejectedRecord = {
  line: number;
  reason: string;
};

export interface ChunkStorePort {
  readonly chunks: readonly Chunk[];
  readonly size: number;
  readonly rejectedCount: number;
  readonly sourcePath: string;
}
