import { randomUUID } from "node:crypto";
import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import "dotenv/config";
import { z } from "zod";
import { loadConfig, type AppConfig } from "./config/env.js";
import {
  executeQueryRequest,
  QUERY_PATH,
  readJsonBody,
  toErrorResponse,
  writeJson,
} from "./http/restApi.js";
import { DefaultAiClient } from "./infra/ai/defaultAiClient.js";
import { createVectorIndex } from "./infra/store/createVectorIndex.js";
import { LegalRetrievalService } from "./services/legalRetrievalService.js";
import { registerIngestDocumentsTool } from "./tools/ingestDocuments.js";
import { registerListSourcesTool } from "./tools/listSources.js";
import { registerQueryLegalTool } from "./tools/queryLegal.js";
import { registerSearchChunksTool } from "./tools/searchChunks.js";

interface SessionEntry {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
}

type SessionMap = Record<string, SessionEntry>;

const SERVER_NAME = "legal-hybrid-rag";
const SERVER_VERSION = "0.1.0";
const MCP_PATH = "/mcp";

async function main() {
  const config = loadConfig();
  const aiClient = new DefaultAiClient(config);

  if (config.enablePgvector && !aiClient.isEmbeddingConfigured()) {
    throw new Error(
      "pgvector mode requires an embedding provider (OPENAI_API_KEY or EMBEDDING_PROVIDER=ollama).",
    );
  }

  const { index, close } = await createVectorIndex(config);
  const service = new LegalRetrievalService(index, aiClient, {
    retrieval: config.retrieval,
    chunking: config.chunking,
  });
  const shutdownTasks: Array<() => Promise<void>> = [close];

  if (config.transport === "http") {
    const stopHttpServer = await runHttpServer(config, service, () =>
      createAppServer(service, config),
    );
    shutdownTasks.unshift(stopHttpServer);
    console.error(`MCP HTTP server listening on http://${config.host}:${config.port}${MCP_PATH}`);
  } else {
    await runStdioServer(createAppServer(service, config));
  }

  const shutdown = async () => {
    for (const task of shutdownTasks) {
      await task();
    }
    process.exit(0);
  };

  process.on("SIGINT", () => {
    void shutdown();
  });
  process.on("SIGTERM", () => {
    void shutdown();
  });
}

function createAppServer(service: LegalRetrievalService, config: AppConfig): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Returns basic server status.",
      inputSchema: {
        name: z.string().optional().describe("Optional caller name"),
      },
    },
    async ({ name }) => {
      const who = name?.trim() || "anonymous";
      return {
        content: [
          {
            type: "text",
            text: `${SERVER_NAME} is running (embeddings: ${
              service.isEmbeddingConfigured() ? "on" : "off"
            }, answers: ${service.getAnswerMode()}). hello ${who}`,
          },
        ],
      };
    },
  );

  registerQueryLegalTool(server, service);
  registerSearchChunksTool(server, service);
  registerIngestDocumentsTool(server, service, config.dataDir);
  registerListSourcesTool(server, service);

  return server;
}

async function runStdioServer(server: McpServer): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

async function runHttpServer(
  config: AppConfig,
  service: LegalRetrievalService,
  serverFactory: () => McpServer,
): Promise<() => Promise<void>> {
  const sessions: SessionMap = {};

  const httpServer = createServer(async (req, res) => {
    try {
      const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

      if (url.pathname === "/healthz") {
        writeJson(res, {
          status: 200,
          body: {
            ok: true,
            embedding_enabled: service.isEmbeddingConfigured(),
            answer_mode: service.getAnswerMode(),
          },
        });
        return;
      }

      if (url.pathname === QUERY_PATH) {
        if (req.method !== "POST") {
          writeJson(res, { status: 405, body: { error: "Method not allowed" } });
          return;
        }
        const body = await readJsonBody(req);
        writeJson(res, await executeQueryRequest(service, body));
        return;
      }

      if (url.pathname !== MCP_PATH) {
        res.writeHead(404, { "Content-Type": "text/plain" });
        res.end("Not found");
        return;
      }

      if (req.method === "POST") {
        const body = await readJsonBody(req);
        await handleMcpPost(req, res, body, sessions, serverFactory);
        return;
      }

      if (req.method === "GET" || req.method === "DELETE") {
        await handleSessionRequest(req, res, sessions);
        return;
      }

      writeJson(res, { status: 405, body: { error: "Method not allowed" } });
    } catch (error) {
      if (!res.headersSent) {
        writeJson(res, toErrorResponse(error));
      }
    }
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.listen(config.port, config.host, () => resolve());
    httpServer.once("error", reject);
  });

  return async () => {
    await Promise.all(
      Object.values(sessions).map(async (entry) => {
        await entry.transport.close();
        await entry.server.close();
      }),
    );

    await new Promise<void>((resolve, reject) => {
      httpServer.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  };
}

async function handleMcpPost(
  req: IncomingMessage,
  res: ServerResponse,
  body: unknown,
  sessions: SessionMap,
  serverFactory: () => McpServer,
) {
  const sessionId = getSessionId(req);
  const existing = sessionId ? sessions[sessionId] : null;

  if (existing) {
    await existing.transport.handleRequest(req, res, body);
    return;
  }

  if (sessionId && !existing) {
    writeJsonRpcError(res, 404, -32001, "Session not found");
    return;
  }

  if (!isInitializeRequest(body)) {
    writeJsonRpcError(
      res,
      400,
      -32000,
      "Initialize request is required when session is not established",
    );
    return;
  }

  const server = serverFactory();
  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: () => randomUUID(),
    onsessioninitialized: (newSessionId) => {
      sessions[newSessionId] = { server, transport };
    },
  });

  transport.onclose = () => {
    const closedSessionId = transport.sessionId;
    if (!closedSessionId) {
      return;
    }

    const entry = sessions[closedSessionId];
    if (!entry) {
      return;
    }

    delete sessions[closedSessionId];
    entry.server.close().catch((error: unknown) => {
      console.error("[mcp] failed to close session server:", error);
    });
  };

  await server.connect(transport);
  await transport.handleRequest(req, res, body);
}

async function handleSessionRequest(
  req: IncomingMessage,
  res: ServerResponse,
  sessions: SessionMap,
) {
  const sessionId = getSessionId(req);
  if (!sessionId || !sessions[sessionId]) {
    res.writeHead(400, { "Content-Type": "text/plain" });
    res.end("Missing or invalid mcp-session-id");
    return;
  }

  await sessions[sessionId].transport.handleRequest(req, res);
}

function getSessionId(req: IncomingMessage): string | null {
  const headerValue = req.headers["mcp-session-id"];
  if (!headerValue) {
    return null;
  }
  return Array.isArray(headerValue) ? headerValue[0] : headerValue;
}

function writeJsonRpcError(
  res: ServerResponse,
  httpCode: number,
  code: number,
  message: string,
) {
  res.writeHead(httpCode, { "Content-Type": "application/json" });
  res.end(
    JSON.stringify({
      jsonrpc: "2.0",
      error: { code, message },
      id: null,
    }),
  );
}

main().catch((error) => {
  console.error("Failed to start MCP server:", error);
  process.exit(1);
});
