import { z } from "zod";
import { buildGroundedUserPrompt, LEGAL_SYSTEM_PROMPT } from "./prompt.js";
import type { GroundingContext } from "./types.js";

interface OllamaClientOptions {
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
}

const embeddingsResponseSchema = z.object({
  embedding: z.array(z.number()).optional(),
});

const chatResponseSchema = z.object({
  message: z
    .object({
      content: z.string().optional(),
    })
    .optional(),
});

const EMBEDDING_CONCURRENCY = 4;

export class OllamaClient {
  constructor(private readonly options: OllamaClientOptions) {}

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const workers = Math.min(EMBEDDING_CONCURRENCY, texts.length);
    const embeddings: number[][] = new Array(texts.length);
    let cursor = 0;

    const runWorker = async () => {
      while (true) {
        const index = cursor;
        cursor += 1;
        if (index >= texts.length) {
          return;
        }
        embeddings[index] = await this.embedQuery(texts[index]);
      }
    };

    await Promise.all(Array.from({ length: workers }, () => runWorker()));
    return embeddings;
  }

  async embedQuery(query: string): Promise<number[]> {
    const response = await fetch(`${this.options.baseUrl}/api/embeddings`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.embeddingModel,
        prompt: query,
      }),
    });

    if (!response.ok) {
      throw new Error(
        `Ollama embeddings failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = embeddingsResponseSchema.parse(await response.json());
    if (!data.embedding || data.embedding.length === 0) {
      throw new Error("Ollama embeddings returned empty vector.");
    }
    return data.embedding;
  }

  async generateGroundedAnswer(
    question: string,
    contexts: GroundingContext[],
  ): Promise<string | null> {
    const response = await fetch(`${this.options.baseUrl}/api/chat`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.chatModel,
        stream: false,
        keep_alive: "30m",
        options: {
          temperature: 0.1,
          num_predict: 320,
          top_p: 0.9,
        },
        messages: [
          { role: "system", content: LEGAL_SYSTEM_PROMPT },
          { role: "user", content: buildGroundedUserPrompt(question, contexts) },
        ],
      }),
    });

    if (!response.ok) {
      throw new Error(
        `Ollama chat failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = chatResponseSchema.parse(await response.json());
    return data.message?.content?.trim() || null;
  }
}
