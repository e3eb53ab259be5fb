import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { LegalRetrievalService } from "../services/legalRetrievalService.js";
import { runTool } from "./toolResponse.js";

export function registerListSourcesTool(server: McpServer, service: LegalRetrievalService) {
  server.registerTool(
    "list_sources",
    {
      title: "List Sources",
      description: "Lists indexed documents with their type and chunk count.",
      inputSchema: {},
    },
    async () =>
      runTool(async () => ({
        sources: await service.listSources(),
        storage: await service.getIndexStorageInfo(),
      })),
  );
}
