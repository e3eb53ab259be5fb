import type { GroundingContext } from "./types.js";

export const LEGAL_SYSTEM_PROMPT = [
  "You are a legal research assistant for law enforcement officers.",
  "Answer only from the provided legal sources.",
  "Cite the statute section or source for every statement, like [1] or [2].",
  "If the sources are insufficient, say so clearly.",
].join(" ");

export function formatContextLabel(context: GroundingContext): string {
  const parts = [context.source];
  if (context.sectionNumber) {
    parts.push(`§ ${context.sectionNumber}`);
  }
  parts.push(context.docType);
  const label = parts.join(" | ");
  return context.isCrossRef ? `[Cross-Reference] ${label}` : label;
}

export function buildGroundedUserPrompt(question: string, contexts: GroundingContext[]): string {
  const contextBlock = contexts
    .map((context, idx) => `[${idx + 1}] ${formatContextLabel(context)}\n${context.text}`)
    .join("\n\n");

  return `Question:\n${question}\n\nLegal sources:\n${contextBlock}\n\nWrite a concise answer and cite like [1], [2].`;
}
