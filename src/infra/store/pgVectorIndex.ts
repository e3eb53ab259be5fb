import type { Pool } from "pg";
import type {
  ClearIndexResult,
  UpsertSourceInput,
  VectorIndex,
  VectorSearchInput,
} from "../../domain/vectorIndex.js";
import type { Candidate, DocType, LegalChunk, SourceRecord } from "../../domain/types.js";
import { parseDocType } from "../../pipelines/classification.js";
import { clampUnit } from "../../utils/vector.js";

interface PgChunkRow {
  chunk_id: string;
  source_id: string;
  doc_type: string;
  chunk_index: number;
  content: string;
  chapter: string | null;
  section_number: string | null;
  citation_key: string | null;
  part: number | null;
  char_start: number;
  char_end: number;
}

interface PgScoredChunkRow extends PgChunkRow {
  score: number | string;
}

interface PgSourceRow {
  id: string;
  path: string;
  doc_type: string;
  indexed_at: Date;
  chunk_count: number;
}

const CHUNK_COLUMNS = `
  c.id AS chunk_id,
  c.source_id,
  c.doc_type,
  c.chunk_index,
  c.content,
  c.chapter,
  c.section_number,
  c.citation_key,
  c.part,
  c.char_start,
  c.char_end
`;

export class PgVectorIndex implements VectorIndex {
  private initialized = false;

  constructor(
    private readonly pool: Pool,
    private readonly vectorDimension: number,
  ) {}

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await this.pool.query(`CREATE EXTENSION IF NOT EXISTS vector`);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS legal_sources (
        id TEXT PRIMARY KEY,
        path TEXT NOT NULL,
        doc_type TEXT NOT NULL,
        indexed_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        chunk_count INTEGER NOT NULL
      )
    `);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS legal_chunks (
        id TEXT PRIMARY KEY,
        source_id TEXT NOT NULL REFERENCES legal_sources(id) ON DELETE CASCADE,
        doc_type TEXT NOT NULL,
        chunk_index INTEGER NOT NULL,
        content TEXT NOT NULL,
        chapter TEXT,
        section_number TEXT,
        citation_key TEXT,
        part INTEGER,
        char_start INTEGER NOT NULL,
        char_end INTEGER NOT NULL,
        embedding VECTOR(${this.vectorDimension}) NOT NULL
      )
    `);
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS idx_legal_chunks_source_id ON legal_chunks(source_id)`,
    );
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS idx_legal_chunks_citation_key ON legal_chunks(citation_key)`,
    );
    await this.pool.query(`
      CREATE INDEX IF NOT EXISTS idx_legal_chunks_embedding
      ON legal_chunks USING ivfflat (embedding vector_cosine_ops)
      WITH (lists = 100)
    `);

    this.initialized = true;
  }

  async upsertSource(input: UpsertSourceInput): Promise<SourceRecord> {
    await this.initialize();

    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");

      const sourceResult = await client.query<{ indexed_at: Date; chunk_count: number }>(
        `
          INSERT INTO legal_sources (id, path, doc_type, indexed_at, chunk_count)
          VALUES ($1, $1, $2, NOW(), $3)
          ON CONFLICT (id)
          DO UPDATE SET doc_type = EXCLUDED.doc_type, indexed_at = NOW(), chunk_count = EXCLUDED.chunk_count
          RETURNING indexed_at, chunk_count
        `,
        [input.sourceId, input.docType, input.chunks.length],
      );

      await client.query(`DELETE FROM legal_chunks WHERE source_id = $1`, [input.sourceId]);

      for (const { chunk, embedding } of input.chunks) {
        if (!embedding) {
          throw new Error(
            "Missing embedding for pgvector upsert. Configure an embedding provider.",
          );
        }

        await client.query(
          `
            INSERT INTO legal_chunks (
              id, source_id, doc_type, chunk_index, content, chapter, section_number,
              citation_key, part, char_start, char_end, embedding
            )
            VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12::vector)
          `,
          [
            chunk.id,
            input.sourceId,
            chunk.docType,
            chunk.index,
            chunk.text,
            chunk.chapter,
            chunk.sectionNumber,
            chunk.citationKey,
            chunk.part,
            chunk.charStart,
            chunk.charEnd,
            toVectorLiteral(embedding),
          ],
        );
      }

      await client.query("COMMIT");

      return {
        id: input.sourceId,
        path: input.sourceId,
        docType: input.docType,
        indexedAt: sourceResult.rows[0].indexed_at.toISOString(),
        chunkCount: sourceResult.rows[0].chunk_count,
      };
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  async listSources(): Promise<SourceRecord[]> {
    await this.initialize();
    const result = await this.pool.query<PgSourceRow>(
      `SELECT id, path, doc_type, indexed_at, chunk_count FROM legal_sources ORDER BY path ASC`,
    );

    return result.rows.map((row) => ({
      id: row.id,
      path: row.path,
      docType: parseDocType(row.doc_type),
      indexedAt: row.indexed_at.toISOString(),
      chunkCount: row.chunk_count,
    }));
  }

  async search(input: VectorSearchInput): Promise<Candidate[]> {
    await this.initialize();
    if (!input.queryEmbedding) {
      throw new Error(
        "Query embedding is required for pgvector search. Configure an embedding provider.",
      );
    }

    const result = await this.pool.query<PgScoredChunkRow>(
      `
        SELECT ${CHUNK_COLUMNS},
          (1 - (c.embedding <=> $1::vector)) AS score
        FROM legal_chunks c
        WHERE ($2::text IS NULL OR c.doc_type = $2::text)
        ORDER BY c.embedding <=> $1::vector, c.id ASC
        LIMIT $3
      `,
      [toVectorLiteral(input.queryEmbedding), input.docType ?? null, input.k],
    );

    return result.rows.map((row) => ({
      chunk: toChunk(row),
      semanticScore: clampUnit(Number(row.score)),
    }));
  }

  async getByCitationKey(key: string): Promise<LegalChunk | null> {
    await this.initialize();
    const result = await this.pool.query<PgChunkRow>(
      `
        SELECT ${CHUNK_COLUMNS}
        FROM legal_chunks c
        WHERE c.citation_key = $1
        ORDER BY c.source_id ASC, c.chunk_index ASC
        LIMIT 1
      `,
      [key],
    );
    const row = result.rows[0];
    return row ? toChunk(row) : null;
  }

  async clear(): Promise<ClearIndexResult> {
    await this.initialize();
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");

      const sourceCount = await client.query<{ count: string }>(
        "SELECT COUNT(*)::text AS count FROM legal_sources",
      );
      const chunkCount = await client.query<{ count: string }>(
        "SELECT COUNT(*)::text AS count FROM legal_chunks",
      );

      await client.query("TRUNCATE TABLE legal_chunks, legal_sources");
      await client.query("COMMIT");

      return {
        cleared_sources: Number(sourceCount.rows[0]?.count ?? 0),
        cleared_chunks: Number(chunkCount.rows[0]?.count ?? 0),
      };
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }
}

function toChunk(row: PgChunkRow): LegalChunk {
  const docType: DocType = parseDocType(row.doc_type);
  return {
    id: row.chunk_id,
    sourceId: row.source_id,
    docType,
    index: row.chunk_index,
    text: row.content,
    chapter: row.chapter,
    sectionNumber: row.section_number,
    citationKey: row.citation_key,
    part: row.part,
    charStart: row.char_start,
    charEnd: row.char_end,
  };
}

function toVectorLiteral(values: number[]): string {
  return `[${values.join(",")}]`;
}
