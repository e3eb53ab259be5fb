import type { AppConfig } from "../../config/env.js";
import type { VectorIndex } from "../../domain/vectorIndex.js";
import { createPostgresPool } from "../db/postgres.js";
import { InMemoryVectorIndex } from "./inMemoryVectorIndex.js";
import { PersistentInMemoryVectorIndex } from "./persistentInMemoryVectorIndex.js";
import { PgVectorIndex } from "./pgVectorIndex.js";

export interface VectorIndexBootstrapResult {
  index: VectorIndex;
  close: () => Promise<void>;
}

/** Builds the process-wide index handle once, at startup. */
export async function createVectorIndex(config: AppConfig): Promise<VectorIndexBootstrapResult> {
  if (!config.enablePgvector) {
    if (config.persistInMemoryIndex) {
      const index = new PersistentInMemoryVectorIndex(config.inMemoryIndexPath, {
        maxBytes: config.maxInMemoryIndexBytes,
      });
      await index.initialize();
      return {
        index,
        close: async () => {
          await index.close();
        },
      };
    }

    return {
      index: new InMemoryVectorIndex(),
      close: async () => {},
    };
  }

  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is required when pgvector is enabled.");
  }

  const pool = createPostgresPool(config.databaseUrl);
  const index = new PgVectorIndex(pool, config.vectorDimension);
  await index.initialize();

  return {
    index,
    close: async () => {
      await pool.end();
    },
  };
}
