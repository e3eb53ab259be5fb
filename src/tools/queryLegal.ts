import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DOC_TYPES } from "../domain/types.js";
import type { LegalRetrievalService } from "../services/legalRetrievalService.js";
import { runTool } from "./toolResponse.js";

export function registerQueryLegalTool(server: McpServer, service: LegalRetrievalService) {
  server.registerTool(
    "query_legal",
    {
      title: "Query Legal Sources",
      description:
        "Answers a legal question from indexed statutes, case law and department policy, with cited sources and a confidence score.",
      inputSchema: {
        question: z.string().min(1).describe("Natural-language legal question"),
        doc_type_filter: z
          .enum(DOC_TYPES)
          .optional()
          .describe("Restrict retrieval to one document type"),
      },
    },
    async ({ question, doc_type_filter }) =>
      runTool(() => service.query({ question, docTypeFilter: doc_type_filter })),
  );
}
