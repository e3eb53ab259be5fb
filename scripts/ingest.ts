import "dotenv/config";
import { parseArgs } from "node:util";
import { loadConfig } from "../src/config/env.js";
import { DefaultAiClient } from "../src/infra/ai/defaultAiClient.js";
import { createVectorIndex } from "../src/infra/store/createVectorIndex.js";
import { LegalRetrievalService } from "../src/services/legalRetrievalService.js";

async function main() {
  const { values } = parseArgs({
    options: {
      "data-dir": { type: "string" },
      reset: { type: "boolean", default: false },
    },
  });

  const config = loadConfig();
  const aiClient = new DefaultAiClient(config);
  const { index, close } = await createVectorIndex(config);

  try {
    const service = new LegalRetrievalService(index, aiClient, {
      retrieval: config.retrieval,
      chunking: config.chunking,
    });
    const result = await service.ingestDirectory({
      directory: values["data-dir"] ?? config.dataDir,
      reset: values.reset ?? false,
    });
    console.log(JSON.stringify(result, null, 2));
    if (result.failed.length > 0) {
      process.exitCode = 1;
    }
  } finally {
    await close();
  }
}

main().catch((error) => {
  console.error("Ingestion failed:", error);
  process.exit(1);
});
