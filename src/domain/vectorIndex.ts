import type { Candidate, DocType, LegalChunk, SourceRecord } from "./types.js";

export interface IndexedChunkInput {
  chunk: LegalChunk;
  embedding: number[] | null;
}

export interface UpsertSourceInput {
  sourceId: string;
  docType: DocType;
  chunks: IndexedChunkInput[];
}

export interface VectorSearchInput {
  query: string;
  queryEmbedding: number[] | null;
  k: number;
  docType?: DocType;
}

export interface ClearIndexResult {
  cleared_sources: number;
  cleared_chunks: number;
}

/** Exact, non-semantic fetch path used by citation expansion. */
export interface CitationLookup {
  getByCitationKey(key: string): Promise<LegalChunk | null>;
}

export interface VectorIndex extends CitationLookup {
  /** Replaces every chunk previously stored for `sourceId`. */
  upsertSource(input: UpsertSourceInput): Promise<SourceRecord>;
  listSources(): Promise<SourceRecord[]>;
  /** Nearest chunks first; semanticScore is clamped to [0, 1]. */
  search(input: VectorSearchInput): Promise<Candidate[]>;
  clear(): Promise<ClearIndexResult>;
}
