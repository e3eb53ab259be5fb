import type { LegalChunk, ScoredResult } from "../src/domain/types.js";

export function makeChunk(overrides: Partial<LegalChunk> & Pick<LegalChunk, "id" | "text">): LegalChunk {
  return {
    sourceId: "346.txt",
    docType: "statute",
    index: 0,
    chapter: null,
    sectionNumber: null,
    citationKey: null,
    part: null,
    charStart: 0,
    charEnd: overrides.text.length,
    ...overrides,
  };
}

export function makeSection(key: string, text: string, sourceId = "346.txt"): LegalChunk {
  return makeChunk({
    id: `${sourceId}#${key}`,
    sourceId,
    text,
    chapter: key.split(".")[0],
    sectionNumber: key,
    citationKey: key,
  });
}

export function directResult(chunk: LegalChunk, finalScore: number, rank = 0): ScoredResult {
  return {
    chunk,
    semanticScore: finalScore,
    statuteMatches: 0,
    termMatches: 0,
    boost: 0,
    finalScore,
    rank,
    isCrossRef: false,
    citedBy: null,
  };
}
