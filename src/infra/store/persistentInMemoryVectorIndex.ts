import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { ClearIndexResult, UpsertSourceInput, VectorSearchInput } from "../../domain/vectorIndex.js";
import { DOC_TYPES, type Candidate, type LegalChunk, type SourceRecord } from "../../domain/types.js";
import { InMemoryVectorIndex, type InMemoryVectorIndexSnapshot } from "./inMemoryVectorIndex.js";

const CURRENT_FORMAT_VERSION = 1;

const docTypeSchema = z.enum(DOC_TYPES);

const chunkSchema = z.object({
  id: z.string(),
  sourceId: z.string(),
  docType: docTypeSchema,
  index: z.number().int().nonnegative(),
  text: z.string(),
  chapter: z.string().nullable(),
  sectionNumber: z.string().nullable(),
  citationKey: z.string().nullable(),
  part: z.number().int().positive().nullable(),
  charStart: z.number().int().nonnegative(),
  charEnd: z.number().int().nonnegative(),
});

const snapshotSchema = z.object({
  sources: z.array(
    z.object({
      id: z.string(),
      path: z.string(),
      docType: docTypeSchema,
      indexedAt: z.string(),
      chunkCount: z.number().int().nonnegative(),
    }),
  ),
  chunksBySourceId: z.record(
    z.array(
      z.object({
        chunk: chunkSchema,
        embedding: z.array(z.number()).nullable(),
      }),
    ),
  ),
});

const persistedIndexSchema = z.object({
  format_version: z.number().int(),
  saved_at: z.string(),
  snapshot: z.unknown(),
});

interface PersistedIndex {
  format_version: number;
  saved_at: string;
  snapshot: InMemoryVectorIndexSnapshot;
}

export interface PersistentInMemoryOptions {
  maxBytes: number;
}

export interface InMemoryIndexStorageInfo {
  path: string;
  exists: boolean;
  format_version: number;
  max_bytes: number;
  size_bytes: number;
  utilization_ratio: number;
}

/** In-memory index mirrored to a JSON snapshot after every write. */
export class PersistentInMemoryVectorIndex extends InMemoryVectorIndex {
  private initialized = false;

  private writeChain: Promise<void> = Promise.resolve();

  private readonly absolutePath: string;

  constructor(
    filePath: string,
    private readonly options: PersistentInMemoryOptions,
  ) {
    super();
    this.absolutePath = path.resolve(filePath);
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await fs.mkdir(path.dirname(this.absolutePath), { recursive: true });

    try {
      const raw = await fs.readFile(this.absolutePath, "utf-8");
      this.importSnapshot(parseSnapshotFromDisk(JSON.parse(raw)));
    } catch (error) {
      if (!isFileMissing(error)) {
        throw error;
      }
    }

    this.initialized = true;
  }

  async upsertSource(input: UpsertSourceInput): Promise<SourceRecord> {
    await this.initialize();
    const result = await super.upsertSource(input);
    await this.enqueueWrite(() => this.persistNow());
    return result;
  }

  async listSources(): Promise<SourceRecord[]> {
    await this.initialize();
    return super.listSources();
  }

  async search(input: VectorSearchInput): Promise<Candidate[]> {
    await this.initialize();
    return super.search(input);
  }

  async getByCitationKey(key: string): Promise<LegalChunk | null> {
    await this.initialize();
    return super.getByCitationKey(key);
  }

  async clear(): Promise<ClearIndexResult> {
    await this.initialize();
    const cleared = await super.clear();
    await this.enqueueWrite(() => this.persistNow());
    return cleared;
  }

  async getStorageInfo(): Promise<InMemoryIndexStorageInfo> {
    await this.initialize();
    const stats = await this.readStorageStat();
    return {
      path: this.absolutePath,
      exists: stats.exists,
      format_version: CURRENT_FORMAT_VERSION,
      max_bytes: this.options.maxBytes,
      size_bytes: stats.sizeBytes,
      utilization_ratio:
        this.options.maxBytes > 0
          ? Number((stats.sizeBytes / this.options.maxBytes).toFixed(4))
          : 0,
    };
  }

  async close(): Promise<void> {
    await this.initialize();
    await this.enqueueWrite(() => this.persistNow());
  }

  private enqueueWrite(task: () => Promise<void>): Promise<void> {
    this.writeChain = this.writeChain.then(task, task);
    return this.writeChain;
  }

  private async persistNow(): Promise<void> {
    const payload: PersistedIndex = {
      format_version: CURRENT_FORMAT_VERSION,
      saved_at: new Date().toISOString(),
      snapshot: this.exportSnapshot(),
    };

    const serialized = JSON.stringify(payload);
    const bytes = Buffer.byteLength(serialized, "utf-8");
    if (bytes > this.options.maxBytes) {
      throw new Error(
        `In-memory index snapshot exceeds size limit (${bytes} > ${this.options.maxBytes} bytes).`,
      );
    }

    await fs.mkdir(path.dirname(this.absolutePath), { recursive: true });
    const tempPath = `${this.absolutePath}.tmp`;
    await fs.writeFile(tempPath, serialized, "utf-8");
    await replaceFileSafely(tempPath, this.absolutePath, serialized);
  }

  private async readStorageStat(): Promise<{ exists: boolean; sizeBytes: number }> {
    try {
      const stat = await fs.stat(this.absolutePath);
      return { exists: true, sizeBytes: stat.size };
    } catch (error) {
      if (isFileMissing(error)) {
        return { exists: false, sizeBytes: 0 };
      }
      throw error;
    }
  }
}

function errorCode(error: unknown): string | null {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return null;
}

function isFileMissing(error: unknown): boolean {
  return errorCode(error) === "ENOENT";
}

async function replaceFileSafely(
  tempPath: string,
  targetPath: string,
  content: string,
): Promise<void> {
  try {
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!isReplaceableRenameError(error)) {
      throw error;
    }
  }

  try {
    await fs.rm(targetPath, { force: true });
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!isReplaceableRenameError(error)) {
      throw error;
    }
  }

  // Windows can keep the target locked; write in place as a last resort.
  await fs.writeFile(targetPath, content, "utf-8");
  await fs.rm(tempPath, { force: true });
}

function isReplaceableRenameError(error: unknown): boolean {
  const code = errorCode(error);
  return code === "EPERM" || code === "EEXIST" || code === "EBUSY";
}

export function parseSnapshotFromDisk(raw: unknown): InMemoryVectorIndexSnapshot {
  const envelope = persistedIndexSchema.safeParse(raw);
  if (!envelope.success) {
    throw new Error("Invalid in-memory index snapshot format.");
  }
  if (envelope.data.format_version !== CURRENT_FORMAT_VERSION) {
    throw new Error(
      `Unsupported in-memory index format version: ${envelope.data.format_version}. Expected ${CURRENT_FORMAT_VERSION}.`,
    );
  }

  const snapshot = snapshotSchema.safeParse(envelope.data.snapshot);
  if (!snapshot.success) {
    throw new Error("Invalid in-memory index snapshot format.");
  }
  return snapshot.data;
}
