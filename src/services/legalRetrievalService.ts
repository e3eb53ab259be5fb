import { promises as fs } from "node:fs";
import path from "node:path";
import type { AnswerMode, RetrievalConfig } from "../config/env.js";
import {
  AppError,
  describeError,
  EmbeddingFailedError,
  EmptyQueryError,
  IndexUnavailableError,
  type ErrorCode,
} from "../domain/errors.js";
import type {
  Candidate,
  DocType,
  LegalDocument,
  QueryReferences,
  ResultSet,
  SourceRecord,
} from "../domain/types.js";
import type { ClearIndexResult, VectorIndex } from "../domain/vectorIndex.js";
import type { AiClient } from "../infra/ai/types.js";
import {
  isDocxDocument,
  isHtmlDocument,
  isSupportedDocumentExtension,
  loadDocumentText,
} from "../infra/parsers/documentLoader.js";
import {
  PersistentInMemoryVectorIndex,
  type InMemoryIndexStorageInfo,
} from "../infra/store/persistentInMemoryVectorIndex.js";
import {
  buildDeterministicAnswer,
  toGroundingContexts,
  toSources,
  type QuerySource,
} from "../pipelines/answering.js";
import { expandCitations } from "../pipelines/citationExpansion.js";
import { chunkDocument, type ChunkingOptions } from "../pipelines/chunking.js";
import { classifyDocument } from "../pipelines/classification.js";
import { scoreCandidates } from "../pipelines/hybridScoring.js";
import { extractReferences, type Lexicon } from "../pipelines/referenceExtraction.js";
import { truncate } from "../utils/text.js";

export type RetrievalMode = "semantic" | "lexical";

export interface LegalRetrievalServiceOptions {
  retrieval?: Partial<RetrievalConfig>;
  chunking?: Partial<ChunkingOptions>;
  lexicon?: Lexicon;
}

export const DEFAULT_RETRIEVAL_CONFIG: RetrievalConfig = {
  topN: 5,
  candidateK: 15,
  crossRefLimit: 2,
  crossRefScoreFactor: 0.9,
};

export interface FailedIndexing {
  path: string;
  reason: string;
  code?: ErrorCode;
}

export interface IngestResult {
  indexed_count: number;
  chunk_count: number;
  embedding_enabled: boolean;
  reset: ClearIndexResult | null;
  skipped: string[];
  failed: FailedIndexing[];
}

export interface RawDocumentInput {
  source: string;
  content: string;
  doc_type?: DocType;
}

export interface QueryInput {
  question: string;
  docTypeFilter?: DocType;
}

export interface QueryResult {
  answer: string;
  sources: QuerySource[];
  confidence: number;
  retrieval_mode: RetrievalMode;
  answer_generation_mode: AnswerMode;
  latency_ms: number;
}

export interface SearchHit {
  chunk_id: string;
  source: string;
  doc_type: DocType;
  section_number: string | null;
  semantic_score: number;
  statute_matches: number;
  term_matches: number;
  boost: number;
  final_score: number;
  is_cross_ref: boolean;
  cited_by: string | null;
  snippet: string;
}

export interface SearchChunksResult {
  query: string;
  retrieval_mode: RetrievalMode;
  references: {
    citation_refs: string[];
    terms: string[];
  };
  confidence: number;
  hits: SearchHit[];
}

export interface RetrievalOutcome {
  references: QueryReferences;
  resultSet: ResultSet;
  retrievalMode: RetrievalMode;
}

const SNIPPET_CHARS = 240;

/**
 * Query path: reference extraction, candidate fetch, hybrid scoring and one
 * level of citation expansion. Ingestion path: classify, load, chunk, embed
 * and upsert. Ingestion must not run against an index serving queries.
 */
export class LegalRetrievalService {
  private readonly retrieval: RetrievalConfig;

  private readonly chunking: Partial<ChunkingOptions>;

  private readonly lexicon: Lexicon | undefined;

  constructor(
    private readonly index: VectorIndex,
    private readonly aiClient: AiClient,
    options: LegalRetrievalServiceOptions = {},
  ) {
    this.retrieval = { ...DEFAULT_RETRIEVAL_CONFIG, ...options.retrieval };
    this.chunking = options.chunking ?? {};
    this.lexicon = options.lexicon;
  }

  async ingestDirectory(input: { directory: string; reset?: boolean }): Promise<IngestResult> {
    const root = path.resolve(input.directory);
    const entries = await fs.readdir(root, { withFileTypes: true });
    const reset = input.reset ? await this.resetIndex() : null;
    if (reset) {
      console.error(
        `[ingest] cleared ${reset.cleared_sources} sources / ${reset.cleared_chunks} chunks`,
      );
    }

    const skipped: string[] = [];
    const failed: FailedIndexing[] = [];
    let indexedCount = 0;
    let chunkCount = 0;

    const fileNames = entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort((a, b) => a.localeCompare(b));

    for (const fileName of fileNames) {
      if (!isSupportedDocumentExtension(fileName)) {
        console.error(`[ingest] skipping unsupported format: ${fileName}`);
        skipped.push(fileName);
        continue;
      }

      try {
        const docType = classifyDocument(fileName, fallbackDocType(fileName));
        const text = await loadDocumentText(path.join(root, fileName));
        const saved = await this.indexDocument({ sourceId: fileName, docType, text });
        console.error(`[ingest] ${fileName}: ${docType}, ${saved.chunkCount} chunks`);
        indexedCount += 1;
        chunkCount += saved.chunkCount;
      } catch (error) {
        console.error(`[ingest] failed ${fileName}:`, describeError(error));
        failed.push(toFailure(fileName, error));
      }
    }

    console.error(
      `[ingest] done: ${indexedCount} documents, ${chunkCount} chunks, ${failed.length} failed, ${skipped.length} skipped`,
    );

    return {
      indexed_count: indexedCount,
      chunk_count: chunkCount,
      embedding_enabled: this.aiClient.isEmbeddingConfigured(),
      reset,
      skipped,
      failed,
    };
  }

  async ingestRawDocuments(documents: RawDocumentInput[]): Promise<IngestResult> {
    const failed: FailedIndexing[] = [];
    let indexedCount = 0;
    let chunkCount = 0;

    for (let index = 0; index < documents.length; index += 1) {
      const item = documents[index];
      const source = normalizeSourceName(item.source, index);
      try {
        if (!item.content.trim()) {
          throw new Error("Empty content.");
        }
        const docType = item.doc_type ?? classifyDocument(source);
        const saved = await this.indexDocument({ sourceId: source, docType, text: item.content });
        indexedCount += 1;
        chunkCount += saved.chunkCount;
      } catch (error) {
        failed.push(toFailure(source, error));
      }
    }

    return {
      indexed_count: indexedCount,
      chunk_count: chunkCount,
      embedding_enabled: this.aiClient.isEmbeddingConfigured(),
      reset: null,
      skipped: [],
      failed,
    };
  }

  async retrieve(input: QueryInput): Promise<RetrievalOutcome> {
    if (!input.question.trim()) {
      throw new EmptyQueryError();
    }
    const references = extractReferences(input.question, this.lexicon);

    let queryEmbedding: number[] | null = null;
    if (this.aiClient.isEmbeddingConfigured()) {
      try {
        queryEmbedding = await this.aiClient.embedQuery(input.question);
      } catch (error) {
        throw new EmbeddingFailedError(`Query embedding failed: ${describeError(error)}`, error);
      }
    }

    let candidates: Candidate[];
    try {
      candidates = await this.index.search({
        query: input.question,
        queryEmbedding,
        k: this.retrieval.candidateK,
        docType: input.docTypeFilter,
      });
    } catch (error) {
      throw new IndexUnavailableError(`Vector index search failed: ${describeError(error)}`, error);
    }

    const scored = scoreCandidates(candidates, references, { topN: this.retrieval.topN });
    const resultSet = await expandCitations(scored, this.index, {
      limit: this.retrieval.crossRefLimit,
      scoreFactor: this.retrieval.crossRefScoreFactor,
      docTypeFilter: input.docTypeFilter,
    });

    return {
      references,
      resultSet,
      retrievalMode: queryEmbedding ? "semantic" : "lexical",
    };
  }

  async query(input: QueryInput): Promise<QueryResult> {
    const startedAt = Date.now();
    const { resultSet, retrievalMode } = await this.retrieve(input);

    let answer = buildDeterministicAnswer(input.question, resultSet);
    let answerGenerationMode: AnswerMode = "client_llm";

    const configuredMode = this.aiClient.getAnswerMode();
    if (configuredMode !== "client_llm" && resultSet.results.length > 0) {
      try {
        const generated = await this.aiClient.generateGroundedAnswer(
          input.question,
          toGroundingContexts(resultSet),
        );
        if (generated) {
          answer = generated;
          answerGenerationMode = configuredMode;
        }
      } catch (error) {
        console.error(
          `[query] ${configuredMode} answer generation failed, using deterministic answer:`,
          describeError(error),
        );
      }
    }

    return {
      answer,
      sources: toSources(resultSet),
      confidence: resultSet.confidence,
      retrieval_mode: retrievalMode,
      answer_generation_mode: answerGenerationMode,
      latency_ms: Date.now() - startedAt,
    };
  }

  async searchChunks(input: QueryInput): Promise<SearchChunksResult> {
    const { references, resultSet, retrievalMode } = await this.retrieve(input);

    return {
      query: input.question,
      retrieval_mode: retrievalMode,
      references: {
        citation_refs: [...references.citationRefs],
        terms: [...references.terms],
      },
      confidence: resultSet.confidence,
      hits: resultSet.results.map((result) => ({
        chunk_id: result.chunk.id,
        source: result.chunk.sourceId,
        doc_type: result.chunk.docType,
        section_number: result.chunk.sectionNumber,
        semantic_score: round4(result.semanticScore),
        statute_matches: result.statuteMatches,
        term_matches: result.termMatches,
        boost: result.boost,
        final_score: round4(result.finalScore),
        is_cross_ref: result.isCrossRef,
        cited_by: result.citedBy,
        snippet: truncate(result.chunk.text, SNIPPET_CHARS),
      })),
    };
  }

  async listSources(): Promise<SourceRecord[]> {
    return this.index.listSources();
  }

  async resetIndex(): Promise<ClearIndexResult> {
    return this.index.clear();
  }

  async getIndexStorageInfo(): Promise<InMemoryIndexStorageInfo | null> {
    if (this.index instanceof PersistentInMemoryVectorIndex) {
      return this.index.getStorageInfo();
    }
    return null;
  }

  isEmbeddingConfigured(): boolean {
    return this.aiClient.isEmbeddingConfigured();
  }

  getAnswerMode(): AnswerMode {
    return this.aiClient.getAnswerMode();
  }

  private async indexDocument(document: LegalDocument): Promise<{ chunkCount: number }> {
    const chunks = chunkDocument(document, this.chunking);
    const embeddings =
      chunks.length > 0 && this.aiClient.isEmbeddingConfigured()
        ? await this.aiClient.embedTexts(chunks.map((chunk) => chunk.text))
        : [];

    if (embeddings.length > 0 && embeddings.length !== chunks.length) {
      throw new Error("Embedding count mismatch.");
    }

    await this.index.upsertSource({
      sourceId: document.sourceId,
      docType: document.docType,
      chunks: chunks.map((chunk, index) => ({
        chunk,
        embedding: embeddings[index] ?? null,
      })),
    });

    return { chunkCount: chunks.length };
  }
}

/** Saved legislature pages are statutes; Word files are department policies. */
function fallbackDocType(fileName: string): DocType | undefined {
  if (isHtmlDocument(fileName)) {
    return "statute";
  }
  if (isDocxDocument(fileName)) {
    return "department_policy";
  }
  return undefined;
}

function toFailure(source: string, error: unknown): FailedIndexing {
  return {
    path: source,
    reason: describeError(error),
    ...(error instanceof AppError && { code: error.code }),
  };
}

function normalizeSourceName(source: string, index: number): string {
  const trimmed = source.trim();
  if (!trimmed) {
    return `uploaded-${index + 1}.txt`;
  }
  return trimmed.replace(/[\\/:*?"<>|]/g, "_");
}

function round4(value: number): number {
  return Number(value.toFixed(4));
}
