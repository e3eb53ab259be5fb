import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DOC_TYPES } from "../domain/types.js";
import type { LegalRetrievalService } from "../services/legalRetrievalService.js";
import { runTool } from "./toolResponse.js";

export function registerIngestDocumentsTool(
  server: McpServer,
  service: LegalRetrievalService,
  defaultDirectory: string,
) {
  server.registerTool(
    "ingest_documents",
    {
      title: "Ingest Documents",
      description:
        "Classifies, chunks and indexes every .pdf/.txt/.md/.html/.docx file in a directory. Do not run while queries are being served.",
      inputSchema: {
        directory: z
          .string()
          .min(1)
          .optional()
          .describe(`Directory to ingest (default: ${defaultDirectory})`),
        reset: z.boolean().optional().describe("Clear the index before ingesting"),
      },
    },
    async ({ directory, reset }) =>
      runTool(() =>
        service.ingestDirectory({ directory: directory ?? defaultDirectory, reset: reset ?? false }),
      ),
  );

  server.registerTool(
    "index_text",
    {
      title: "Index Text",
      description:
        "Indexes raw document text. Without doc_type the type is derived from the source name (346.txt, *case*, *policy*).",
      inputSchema: {
        documents: z
          .array(
            z.object({
              source: z.string().describe("Source name, e.g. 346.txt"),
              content: z.string().describe("Document text"),
              doc_type: z.enum(DOC_TYPES).optional(),
            }),
          )
          .min(1),
      },
    },
    async ({ documents }) => runTool(() => service.ingestRawDocuments(documents)),
  );
}
