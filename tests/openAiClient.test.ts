import { afterEach, describe, expect, it, vi } from "vitest";
import { OpenAiClient } from "../src/infra/ai/openAiClient.js";
import { buildGroundedUserPrompt } from "../src/infra/ai/prompt.js";
import type { GroundingContext } from "../src/infra/ai/types.js";

const CONTEXTS: GroundingContext[] = [
  {
    source: "346.txt",
    docType: "statute",
    sectionNumber: "346.63",
    isCrossRef: false,
    text: "346.63 Operating under influence.",
  },
  {
    source: "346.txt",
    docType: "statute",
    sectionNumber: "346.65",
    isCrossRef: true,
    text: "346.65 Penalties.",
  },
];

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function createClient(apiKey: string | null = "test-key"): OpenAiClient {
  return new OpenAiClient({
    apiKey,
    embeddingModel: "embed-test",
    chatModel: "chat-test",
    baseUrl: "http://localhost:9999/v1/",
  });
}

describe("buildGroundedUserPrompt", () => {
  it("numbers the sources and labels cross-references", () => {
    expect(buildGroundedUserPrompt("What is the penalty?", CONTEXTS)).toBe(
      [
        "Question:",
        "What is the penalty?",
        "",
        "Legal sources:",
        "[1] 346.txt | § 346.63 | statute",
        "346.63 Operating under influence.",
        "",
        "[2] [Cross-Reference] 346.txt | § 346.65 | statute",
        "346.65 Penalties.",
        "",
        "Write a concise answer and cite like [1], [2].",
      ].join("\n"),
    );
  });
});

describe("OpenAiClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("returns embeddings in input order", async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) =>
      jsonResponse({
        data: [
          { index: 1, embedding: [0, 1] },
          { index: 0, embedding: [1, 0] },
        ],
      }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const embeddings = await createClient().embedTexts(["first", "second"]);

    expect(embeddings).toEqual([
      [1, 0],
      [0, 1],
    ]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][0]).toBe("http://localhost:9999/v1/embeddings");
  });

  it("sends the grounded prompt and trims the answer", async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) =>
      jsonResponse({ choices: [{ message: { content: "  Up to six months. [2]  " } }] }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const answer = await createClient().generateGroundedAnswer("What is the penalty?", CONTEXTS);

    expect(answer).toBe("Up to six months. [2]");
    const body: unknown = JSON.parse(String(fetchMock.mock.calls[0][1].body));
    expect(body).toMatchObject({
      model: "chat-test",
      messages: [{ role: "system" }, { role: "user", content: buildGroundedUserPrompt("What is the penalty?", CONTEXTS) }],
    });
  });

  it("reports HTTP failures with the status", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("rate limited", { status: 429 })),
    );

    await expect(createClient().embedQuery("owi")).rejects.toThrow(
      "OpenAI embeddings failed (429): rate limited",
    );
  });

  it("requires an API key", async () => {
    await expect(createClient(null).embedTexts(["owi"])).rejects.toThrow(
      "OPENAI_API_KEY is required for OpenAI operations.",
    );
    expect(createClient(null).isConfigured()).toBe(false);
  });
});
