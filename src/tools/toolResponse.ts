import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { AppError, describeError } from "../domain/errors.js";

export function jsonResult(payload: unknown): CallToolResult {
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify(payload, null, 2),
      },
    ],
  };
}

/** Known errors keep their code; anything else is reported by message only. */
export function errorResult(error: unknown): CallToolResult {
  const body =
    error instanceof AppError
      ? { error: error.toJSON() }
      : { error: { code: "INTERNAL_ERROR", message: describeError(error) } };
  return { ...jsonResult(body), isError: true };
}

export async function runTool(task: () => Promise<unknown>): Promise<CallToolResult> {
  try {
    return jsonResult(await task());
  } catch (error) {
    if (!(error instanceof AppError)) {
      console.error("[tool] unexpected failure:", error);
    }
    return errorResult(error);
  }
}
