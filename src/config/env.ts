import { z } from "zod";

const booleanFlag = z.enum(["true", "false"]);

const envSchema = z.object({
  DATABASE_URL: z.string().optional(),
  ENABLE_PGVECTOR: booleanFlag.optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  OPENAI_CHAT_MODEL: z.string().default("gpt-4o-mini"),
  EMBEDDING_PROVIDER: z.enum(["none", "openai", "ollama"]).optional(),
  ANSWER_MODE: z.enum(["client_llm", "openai", "ollama"]).default("client_llm"),
  OLLAMA_BASE_URL: z.string().default("http://127.0.0.1:11434"),
  OLLAMA_CHAT_MODEL: z.string().default("qwen2.5:7b-instruct"),
  OLLAMA_EMBEDDING_MODEL: z.string().default("nomic-embed-text"),
  MCP_TRANSPORT: z.enum(["stdio", "http"]).default("stdio"),
  MCP_HOST: z.string().default("0.0.0.0"),
  MCP_PORT: z.coerce.number().int().positive().default(3000),
  PERSIST_INMEMORY_INDEX: booleanFlag.default("true"),
  INMEMORY_INDEX_PATH: z.string().default(".data/legal-index.json"),
  MAX_INMEMORY_INDEX_BYTES: z.coerce.number().int().positive().default(50 * 1024 * 1024),
  VECTOR_DIMENSION: z.coerce.number().int().positive().default(1536),
  RETRIEVAL_TOP_N: z.coerce.number().int().min(1).max(50).default(5),
  RETRIEVAL_CANDIDATE_K: z.coerce.number().int().min(1).max(200).default(15),
  CROSS_REF_LIMIT: z.coerce.number().int().min(0).max(10).default(2),
  CROSS_REF_SCORE_FACTOR: z.coerce.number().gt(0).lt(1).default(0.9),
  CHUNK_MAX_CHARS: z.coerce.number().int().min(200).default(1200),
  CHUNK_WINDOW_CHARS: z.coerce.number().int().min(100).default(1000),
  CHUNK_OVERLAP_CHARS: z.coerce.number().int().min(0).default(200),
  DATA_DIR: z.string().default("data/raw"),
});

export type EmbeddingProvider = "none" | "openai" | "ollama";

export type AnswerMode = "client_llm" | "openai" | "ollama";

export interface AppConfig {
  enablePgvector: boolean;
  databaseUrl: string | null;
  openaiApiKey: string | null;
  embeddingModel: string;
  openaiChatModel: string;
  embeddingProvider: EmbeddingProvider;
  answerMode: AnswerMode;
  ollamaBaseUrl: string;
  ollamaChatModel: string;
  ollamaEmbeddingModel: string;
  transport: "stdio" | "http";
  host: string;
  port: number;
  persistInMemoryIndex: boolean;
  inMemoryIndexPath: string;
  maxInMemoryIndexBytes: number;
  vectorDimension: number;
  retrieval: RetrievalConfig;
  chunking: ChunkingConfig;
  dataDir: string;
}

export interface RetrievalConfig {
  topN: number;
  candidateK: number;
  crossRefLimit: number;
  crossRefScoreFactor: number;
}

export interface ChunkingConfig {
  maxChunkChars: number;
  windowChars: number;
  overlapChars: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  const enablePgvector = parsed.ENABLE_PGVECTOR === "true";

  if (enablePgvector && !parsed.DATABASE_URL) {
    throw new Error("ENABLE_PGVECTOR=true requires DATABASE_URL.");
  }
  if (parsed.CHUNK_OVERLAP_CHARS >= parsed.CHUNK_WINDOW_CHARS) {
    throw new Error("CHUNK_OVERLAP_CHARS must be smaller than CHUNK_WINDOW_CHARS.");
  }
  if (parsed.CHUNK_WINDOW_CHARS > parsed.CHUNK_MAX_CHARS) {
    throw new Error("CHUNK_WINDOW_CHARS must not exceed CHUNK_MAX_CHARS.");
  }

  const openaiApiKey = parsed.OPENAI_API_KEY?.trim() || null;
  const embeddingProvider =
    parsed.EMBEDDING_PROVIDER ?? (openaiApiKey ? "openai" : "none");

  return {
    enablePgvector,
    databaseUrl: parsed.DATABASE_URL ?? null,
    openaiApiKey,
    embeddingModel: parsed.OPENAI_EMBEDDING_MODEL,
    openaiChatModel: parsed.OPENAI_CHAT_MODEL,
    embeddingProvider,
    answerMode: parsed.ANSWER_MODE,
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL,
    ollamaChatModel: parsed.OLLAMA_CHAT_MODEL,
    ollamaEmbeddingModel: parsed.OLLAMA_EMBEDDING_MODEL,
    transport: parsed.MCP_TRANSPORT,
    host: parsed.MCP_HOST,
    port: parsed.MCP_PORT,
    persistInMemoryIndex: parsed.PERSIST_INMEMORY_INDEX === "true",
    inMemoryIndexPath: parsed.INMEMORY_INDEX_PATH,
    maxInMemoryIndexBytes: parsed.MAX_INMEMORY_INDEX_BYTES,
    vectorDimension: parsed.VECTOR_DIMENSION,
    retrieval: {
      topN: parsed.RETRIEVAL_TOP_N,
      candidateK: parsed.RETRIEVAL_CANDIDATE_K,
      crossRefLimit: parsed.CROSS_REF_LIMIT,
      crossRefScoreFactor: parsed.CROSS_REF_SCORE_FACTOR,
    },
    chunking: {
      maxChunkChars: parsed.CHUNK_MAX_CHARS,
      windowChars: parsed.CHUNK_WINDOW_CHARS,
      overlapChars: parsed.CHUNK_OVERLAP_CHARS,
    },
    dataDir: parsed.DATA_DIR,
  };
}
