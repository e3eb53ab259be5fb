import type {
  ClearIndexResult,
  IndexedChunkInput,
  UpsertSourceInput,
  VectorIndex,
  VectorSearchInput,
} from "../../domain/vectorIndex.js";
import type { Candidate, LegalChunk, SourceRecord } from "../../domain/types.js";
import { scoreByTokenOverlap } from "../../utils/text.js";
import { clampUnit, cosineSimilarity } from "../../utils/vector.js";

export interface InMemoryVectorIndexSnapshot {
  sources: SourceRecord[];
  chunksBySourceId: Record<string, IndexedChunkInput[]>;
}

/**
 * Brute-force cosine K-NN over every stored chunk. Without a query embedding
 * (no embedding provider configured) it ranks by token overlap instead.
 */
export class InMemoryVectorIndex implements VectorIndex {
  protected sourceById = new Map<string, SourceRecord>();

  protected chunksBySourceId = new Map<string, IndexedChunkInput[]>();

  async upsertSource({ sourceId, docType, chunks }: UpsertSourceInput): Promise<SourceRecord> {
    const source: SourceRecord = {
      id: sourceId,
      path: sourceId,
      docType,
      indexedAt: new Date().toISOString(),
      chunkCount: chunks.length,
    };

    this.sourceById.set(sourceId, source);
    this.chunksBySourceId.set(
      sourceId,
      chunks.map((item) => ({ chunk: { ...item.chunk }, embedding: item.embedding })),
    );
    return source;
  }

  async listSources(): Promise<SourceRecord[]> {
    return [...this.sourceById.values()].sort((a, b) => a.path.localeCompare(b.path));
  }

  async search(input: VectorSearchInput): Promise<Candidate[]> {
    const k = Math.max(0, Math.floor(input.k));
    if (k === 0) {
      return [];
    }

    const candidates: Candidate[] = [];
    for (const { chunk, embedding } of this.iterateChunks()) {
      if (input.docType && chunk.docType !== input.docType) {
        continue;
      }

      let score: number;
      if (input.queryEmbedding) {
        if (!embedding) {
          continue;
        }
        score = cosineSimilarity(input.queryEmbedding, embedding);
      } else {
        score = scoreByTokenOverlap(input.query, chunk.text);
      }

      if (score <= 0) {
        continue;
      }
      candidates.push({ chunk, semanticScore: clampUnit(score) });
    }

    return candidates
      .sort((a, b) => b.semanticScore - a.semanticScore || compareChunks(a.chunk, b.chunk))
      .slice(0, k);
  }

  async getByCitationKey(key: string): Promise<LegalChunk | null> {
    let found: LegalChunk | null = null;
    for (const { chunk } of this.iterateChunks()) {
      if (chunk.citationKey !== key) {
        continue;
      }
      if (!found || compareChunks(chunk, found) < 0) {
        found = chunk;
      }
    }
    return found;
  }

  async clear(): Promise<ClearIndexResult> {
    const clearedSources = this.sourceById.size;
    let clearedChunks = 0;
    for (const chunks of this.chunksBySourceId.values()) {
      clearedChunks += chunks.length;
    }

    this.sourceById.clear();
    this.chunksBySourceId.clear();
    return { cleared_sources: clearedSources, cleared_chunks: clearedChunks };
  }

  protected exportSnapshot(): InMemoryVectorIndexSnapshot {
    const chunksBySourceId: Record<string, IndexedChunkInput[]> = {};
    for (const [sourceId, chunks] of this.chunksBySourceId.entries()) {
      chunksBySourceId[sourceId] = chunks.map((item) => ({
        chunk: { ...item.chunk },
        embedding: item.embedding,
      }));
    }
    return { sources: [...this.sourceById.values()], chunksBySourceId };
  }

  protected importSnapshot(snapshot: InMemoryVectorIndexSnapshot): void {
    this.sourceById.clear();
    this.chunksBySourceId.clear();

    for (const source of snapshot.sources) {
      this.sourceById.set(source.id, { ...source });
    }
    for (const [sourceId, chunks] of Object.entries(snapshot.chunksBySourceId)) {
      if (this.sourceById.has(sourceId)) {
        this.chunksBySourceId.set(sourceId, chunks);
      }
    }
  }

  private *iterateChunks(): Iterable<IndexedChunkInput> {
    for (const chunks of this.chunksBySourceId.values()) {
      yield* chunks;
    }
  }
}

function compareChunks(a: LegalChunk, b: LegalChunk): number {
  return a.sourceId.localeCompare(b.sourceId) || a.index - b.index;
}
