import { z } from "zod";
import { buildGroundedUserPrompt, LEGAL_SYSTEM_PROMPT } from "./prompt.js";
import type { GroundingContext } from "./types.js";

interface OpenAiClientOptions {
  apiKey: string | null;
  embeddingModel: string;
  chatModel: string;
  baseUrl?: string;
}

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number(),
    }),
  ),
});

const chatResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable(),
      }),
    }),
  ),
});

const DEFAULT_BASE_URL = "https://api.openai.com/v1";

export class OpenAiClient {
  constructor(private readonly options: OpenAiClientOptions) {}

  isConfigured(): boolean {
    return Boolean(this.options.apiKey);
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    const apiKey = this.requireApiKey();

    const response = await fetch(`${this.baseUrl()}/embeddings`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.embeddingModel,
        input: texts,
      }),
    });

    if (!response.ok) {
      throw new Error(
        `OpenAI embeddings failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = embeddingResponseSchema.parse(await response.json());
    return data.data
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }

  async embedQuery(query: string): Promise<number[]> {
    const [embedding] = await this.embedTexts([query]);
    if (!embedding || embedding.length === 0) {
      throw new Error("OpenAI embeddings returned empty vector.");
    }
    return embedding;
  }

  async generateGroundedAnswer(
    question: string,
    contexts: GroundingContext[],
  ): Promise<string | null> {
    const apiKey = this.requireApiKey();

    const response = await fetch(`${this.baseUrl()}/chat/completions`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.chatModel,
        temperature: 0.1,
        messages: [
          { role: "system", content: LEGAL_SYSTEM_PROMPT },
          { role: "user", content: buildGroundedUserPrompt(question, contexts) },
        ],
      }),
    });

    if (!response.ok) {
      throw new Error(
        `OpenAI chat failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = chatResponseSchema.parse(await response.json());
    return data.choices[0]?.message.content?.trim() || null;
  }

  private baseUrl(): string {
    return (this.options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
  }

  private requireApiKey(): string {
    if (!this.options.apiKey) {
      throw new Error("OPENAI_API_KEY is required for OpenAI operations.");
    }
    return this.options.apiKey;
  }
}
