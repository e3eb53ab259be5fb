import { ExpansionLookupError } from "../domain/errors.js";
import type { DocType, LegalChunk, ResultSet, ScoredResult } from "../domain/types.js";
import type { CitationLookup } from "../domain/vectorIndex.js";
import { listCitationKeys } from "../utils/citations.js";

export const DEFAULT_CROSS_REF_LIMIT = 2;
export const DEFAULT_CROSS_REF_SCORE_FACTOR = 0.9;

export interface ExpansionOptions {
  limit?: number;
  /** Multiplier in (0, 1) applied to the referencing result's final score. */
  scoreFactor?: number;
  docTypeFilter?: DocType;
}

interface PendingReference {
  key: string;
  from: ScoredResult;
}

/**
 * Appends the chunks cited from inside the retrieved results, one level deep.
 * Appended results are never scanned themselves, so citation cycles end here.
 */
export async function expandCitations(
  resultSet: ResultSet,
  lookup: CitationLookup,
  options: ExpansionOptions = {},
): Promise<ResultSet> {
  const limit = Math.max(0, Math.floor(options.limit ?? DEFAULT_CROSS_REF_LIMIT));
  const scoreFactor = options.scoreFactor ?? DEFAULT_CROSS_REF_SCORE_FACTOR;
  if (limit === 0 || resultSet.results.length === 0) {
    return resultSet;
  }

  const seenKeys = new Set<string>();
  const seenChunkIds = new Set<string>();
  for (const result of resultSet.results) {
    seenChunkIds.add(result.chunk.id);
    if (result.chunk.citationKey) {
      seenKeys.add(result.chunk.citationKey);
    }
  }

  const pending: PendingReference[] = [];
  for (const result of resultSet.results) {
    // A zero score has no smaller discounted score to give a cross-reference.
    if (result.isCrossRef || result.finalScore <= 0) {
      continue;
    }
    for (const key of listCitationKeys(result.chunk.text, { requirePrefix: true })) {
      if (!seenKeys.has(key)) {
        seenKeys.add(key);
        pending.push({ key, from: result });
      }
    }
  }

  const appended: ScoredResult[] = [];
  for (const { key, from } of pending) {
    if (appended.length >= limit) {
      break;
    }

    let chunk: LegalChunk | null;
    try {
      chunk = await lookup.getByCitationKey(key);
    } catch (error) {
      console.error("[expansion] skipped:", new ExpansionLookupError(key, error).message, error);
      return resultSet;
    }

    if (!chunk || seenChunkIds.has(chunk.id)) {
      continue;
    }
    if (options.docTypeFilter && chunk.docType !== options.docTypeFilter) {
      continue;
    }

    seenChunkIds.add(chunk.id);
    const score = from.finalScore * scoreFactor;
    appended.push({
      chunk,
      semanticScore: score,
      statuteMatches: 0,
      termMatches: 0,
      boost: 0,
      finalScore: score,
      rank: -1,
      isCrossRef: true,
      citedBy: from.chunk.citationKey ?? from.chunk.id,
    });
  }

  if (appended.length === 0) {
    return resultSet;
  }
  return {
    results: [...resultSet.results, ...appended],
    confidence: resultSet.confidence,
  };
}
