import type { Candidate, QueryReferences, ResultSet, ScoredResult } from "../domain/types.js";
import { containsCitation } from "../utils/citations.js";
import { containsWord } from "../utils/text.js";
import { clampUnit } from "../utils/vector.js";

// Boost weights in hundredths.
const STATUTE_MATCH_WEIGHT = 15;
const TERM_MATCH_WEIGHT = 5;
const BOOST_CAP = 40;

export const DEFAULT_TOP_N = 5;

export interface ScoringOptions {
  topN?: number;
}

export function computeBoost(statuteMatches: number, termMatches: number): number {
  const hundredths = Math.min(
    STATUTE_MATCH_WEIGHT * Math.max(0, statuteMatches) + TERM_MATCH_WEIGHT * Math.max(0, termMatches),
    BOOST_CAP,
  );
  return hundredths / 100;
}

export function countStatuteMatches(candidate: Candidate, citationRefs: readonly string[]): number {
  const { chunk } = candidate;
  return citationRefs.filter((ref) => ref === chunk.citationKey || containsCitation(chunk.text, ref))
    .length;
}

export function countTermMatches(candidate: Candidate, terms: readonly string[]): number {
  return terms.filter((term) => containsWord(candidate.chunk.text, term)).length;
}

/**
 * Re-ranks index candidates with the citation and keyword boost and keeps the
 * best `topN`. The candidate's position in `candidates` is its rank.
 */
export function scoreCandidates(
  candidates: readonly Candidate[],
  references: QueryReferences,
  options: ScoringOptions = {},
): ResultSet {
  const topN = Math.max(0, Math.floor(options.topN ?? DEFAULT_TOP_N));

  const scored: ScoredResult[] = candidates.map((candidate, rank) => {
    const statuteMatches = countStatuteMatches(candidate, references.citationRefs);
    const termMatches = countTermMatches(candidate, references.terms);
    const boost = computeBoost(statuteMatches, termMatches);
    return {
      chunk: candidate.chunk,
      semanticScore: candidate.semanticScore,
      statuteMatches,
      termMatches,
      boost,
      finalScore: candidate.semanticScore + boost,
      rank,
      isCrossRef: false,
      citedBy: null,
    };
  });

  scored.sort((a, b) => b.finalScore - a.finalScore || a.rank - b.rank);
  const results = scored.slice(0, topN);

  return {
    results,
    confidence: results.length > 0 ? clampUnit(results[0].finalScore) : 0,
  };
}
