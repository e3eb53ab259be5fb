import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config/env.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});

    expect(config.answerMode).toBe("client_llm");
    expect(config.embeddingProvider).toBe("none");
    expect(config.enablePgvector).toBe(false);
    expect(config.persistInMemoryIndex).toBe(true);
    expect(config.retrieval).toEqual({ topN: 5, candidateK: 15, crossRefLimit: 2, crossRefScoreFactor: 0.9 });
    expect(config.chunking).toEqual({ maxChunkChars: 1200, windowChars: 1000, overlapChars: 200 });
  });

  it("enables OpenAI embeddings when a key is present", () => {
    const config = loadConfig({ OPENAI_API_KEY: " test-key " });

    expect(config.openaiApiKey).toBe("test-key");
    expect(config.embeddingProvider).toBe("openai");
  });

  it("reads numeric settings from strings", () => {
    const config = loadConfig({ CROSS_REF_LIMIT: "0", RETRIEVAL_TOP_N: "3", MCP_PORT: "8080" });

    expect(config.retrieval.crossRefLimit).toBe(0);
    expect(config.retrieval.topN).toBe(3);
    expect(config.port).toBe(8080);
  });

  it("rejects inconsistent settings", () => {
    expect(() => loadConfig({ ENABLE_PGVECTOR: "true" })).toThrow("ENABLE_PGVECTOR=true requires DATABASE_URL.");
    expect(() => loadConfig({ CHUNK_OVERLAP_CHARS: "1000" })).toThrow(
      "CHUNK_OVERLAP_CHARS must be smaller than CHUNK_WINDOW_CHARS.",
    );
    expect(() => loadConfig({ CHUNK_WINDOW_CHARS: "1500" })).toThrow(
      "CHUNK_WINDOW_CHARS must not exceed CHUNK_MAX_CHARS.",
    );
    expect(() => loadConfig({ CROSS_REF_SCORE_FACTOR: "1" })).toThrow();
  });
});
