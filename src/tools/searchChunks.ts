import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DOC_TYPES } from "../domain/types.js";
import type { LegalRetrievalService } from "../services/legalRetrievalService.js";
import { runTool } from "./toolResponse.js";

export function registerSearchChunksTool(server: McpServer, service: LegalRetrievalService) {
  server.registerTool(
    "search_chunks",
    {
      title: "Search Chunks",
      description:
        "Returns the ranked chunks for a query with the scoring breakdown (semantic score, citation and keyword matches, boost, cross-references).",
      inputSchema: {
        query: z.string().min(1).describe("Search query"),
        doc_type_filter: z
          .enum(DOC_TYPES)
          .optional()
          .describe("Restrict retrieval to one document type"),
      },
    },
    async ({ query, doc_type_filter }) =>
      runTool(() => service.searchChunks({ question: query, docTypeFilter: doc_type_filter })),
  );
}
