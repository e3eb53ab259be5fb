import type { IncomingMessage, ServerResponse } from "node:http";
import { z } from "zod";
import { AppError, ValidationError } from "../domain/errors.js";
import { DOC_TYPES } from "../domain/types.js";
import type { LegalRetrievalService } from "../services/legalRetrievalService.js";

export const QUERY_PATH = "/api/query";

export const queryRequestSchema = z.object({
  question: z.string(),
  doc_type_filter: z.enum(DOC_TYPES).optional(),
});

export interface RestResponse {
  status: number;
  body: unknown;
}

type QueryHandler = Pick<LegalRetrievalService, "query">;

export async function executeQueryRequest(
  service: QueryHandler,
  body: unknown,
): Promise<RestResponse> {
  try {
    const parsed = queryRequestSchema.safeParse(body);
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error);
    }

    const result = await service.query({
      question: parsed.data.question,
      docTypeFilter: parsed.data.doc_type_filter,
    });
    return { status: 200, body: result };
  } catch (error) {
    return toErrorResponse(error);
  }
}

export function toErrorResponse(error: unknown): RestResponse {
  if (error instanceof AppError) {
    return { status: error.statusCode, body: { error: error.toJSON() } };
  }
  console.error("[http] unexpected failure:", error);
  return {
    status: 500,
    body: { error: { code: "INTERNAL_ERROR", message: "Internal server error" } },
  };
}

export async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }

  const raw = Buffer.concat(chunks).toString("utf-8").trim();
  if (!raw) {
    return {};
  }

  try {
    return JSON.parse(raw);
  } catch {
    throw new ValidationError("Invalid JSON body");
  }
}

export function writeJson(res: ServerResponse, response: RestResponse): void {
  res.writeHead(response.status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(response.body));
}
