import type { GroundingContext } from "../infra/ai/types.js";
import type { DocType, ResultSet, ScoredResult } from "../domain/types.js";
import { truncate } from "../utils/text.js";

export interface QuerySource {
  source_file: string;
  doc_type: DocType;
  section_number: string | null;
  is_cross_ref: boolean;
}

export const NO_MATERIAL_ANSWER =
  "No relevant legal material was found in the indexed documents. Try naming the statute section or describing the conduct more specifically.";

const SUMMARY_CHARS = 240;

/** Result order kept; one entry per (source file, section). */
export function toSources(resultSet: ResultSet): QuerySource[] {
  const seen = new Set<string>();
  const sources: QuerySource[] = [];
  for (const result of resultSet.results) {
    const { chunk } = result;
    const key = `${chunk.sourceId}\u0000${chunk.sectionNumber ?? ""}`;
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    sources.push({
      source_file: chunk.sourceId,
      doc_type: chunk.docType,
      section_number: chunk.sectionNumber,
      is_cross_ref: result.isCrossRef,
    });
  }
  return sources;
}

export function toGroundingContexts(resultSet: ResultSet): GroundingContext[] {
  return resultSet.results.map((result) => ({
    source: result.chunk.sourceId,
    docType: result.chunk.docType,
    sectionNumber: result.chunk.sectionNumber,
    isCrossRef: result.isCrossRef,
    text: result.chunk.text,
  }));
}

/**
 * Answer used when no generation model is configured: lists each retrieved
 * provision with a short excerpt so the calling client can compose its own.
 */
export function buildDeterministicAnswer(question: string, resultSet: ResultSet): string {
  if (resultSet.results.length === 0) {
    return NO_MATERIAL_ANSWER;
  }

  const lines = [`Question: ${question}`, "Relevant legal material:"];
  resultSet.results.forEach((result, idx) => {
    lines.push(`${idx + 1}. ${describeResult(result)}: ${truncate(result.chunk.text, SUMMARY_CHARS)}`);
  });
  return lines.join("\n");
}

function describeResult(result: ScoredResult): string {
  const { chunk } = result;
  const label = chunk.sectionNumber
    ? `§ ${chunk.sectionNumber} (${chunk.sourceId})`
    : `${chunk.sourceId}#${chunk.index}`;
  return result.isCrossRef ? `[Cross-Reference] ${label}` : label;
}
