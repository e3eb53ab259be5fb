import type { AnswerMode } from "../../config/env.js";
import type { DocType } from "../../domain/types.js";

/** One retrieved passage as handed to the generation model. */
export interface GroundingContext {
  source: string;
  docType: DocType;
  sectionNumber: string | null;
  isCrossRef: boolean;
  text: string;
}

export interface AiClient {
  isEmbeddingConfigured(): boolean;
  embedTexts(texts: string[]): Promise<number[][]>;
  embedQuery(query: string): Promise<number[]>;
  getAnswerMode(): AnswerMode;
  /** `null` when answers are left to the calling client. */
  generateGroundedAnswer(question: string, contexts: GroundingContext[]): Promise<string | null>;
}
