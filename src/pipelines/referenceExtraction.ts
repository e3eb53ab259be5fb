import { readFileSync } from "node:fs";
import { z } from "zod";
import { EmptyQueryError } from "../domain/errors.js";
import type { QueryReferences } from "../domain/types.js";
import { findCitations } from "../utils/citations.js";
import { levenshteinDistance, splitWords } from "../utils/text.js";

const LEXICON_URL = new URL("../../data/legal-lexicon.json", import.meta.url);

const lexiconSchema = z.object({
  abbreviations: z.record(z.string().min(1)),
  misspellings: z.record(z.string().min(1)),
  dictionary: z.array(z.string().min(1)),
  stopwords: z.array(z.string().min(1)),
});

export interface Lexicon {
  abbreviations: Map<string, string[]>;
  misspellings: Map<string, string>;
  dictionary: string[];
  dictionarySet: Set<string>;
  stopwords: Set<string>;
  /** Longest abbreviation measured in words. */
  maxAbbreviationWords: number;
}

const INFLECTION_SUFFIXES = ["s", "es", "ed", "ing", "ly"];
const MIN_CORRECTABLE_LENGTH = 4;

let cachedLexicon: Lexicon | null = null;

export function loadLexicon(): Lexicon {
  if (!cachedLexicon) {
    const raw: unknown = JSON.parse(readFileSync(LEXICON_URL, "utf-8"));
    cachedLexicon = buildLexicon(lexiconSchema.parse(raw));
  }
  return cachedLexicon;
}

export function buildLexicon(input: z.infer<typeof lexiconSchema>): Lexicon {
  const abbreviations = new Map<string, string[]>();
  let maxAbbreviationWords = 1;
  for (const [key, expansion] of Object.entries(input.abbreviations)) {
    const keyWords = splitWords(key);
    if (keyWords.length === 0) {
      continue;
    }
    maxAbbreviationWords = Math.max(maxAbbreviationWords, keyWords.length);
    abbreviations.set(keyWords.join(" "), splitWords(expansion));
  }

  const misspellings = new Map<string, string>();
  for (const [wrong, right] of Object.entries(input.misspellings)) {
    misspellings.set(wrong.toLowerCase(), right.toLowerCase());
  }

  const dictionary = [...new Set(input.dictionary.map((word) => word.toLowerCase()))].sort();

  return {
    abbreviations,
    misspellings,
    dictionary,
    dictionarySet: new Set(dictionary),
    stopwords: new Set(input.stopwords.map((word) => word.toLowerCase())),
    maxAbbreviationWords,
  };
}

/**
 * Splits a question into the statute citations it names and the normalized
 * keyword terms used for boosting.
 */
export function extractReferences(
  queryText: string,
  lexicon: Lexicon = loadLexicon(),
): QueryReferences {
  if (!queryText.trim()) {
    throw new EmptyQueryError();
  }

  const citations = findCitations(queryText);
  const citationRefs = [...new Set(citations.map((match) => match.key))].sort();

  let residual = queryText;
  for (const match of [...citations].reverse()) {
    residual = `${residual.slice(0, match.start)} ${residual.slice(match.end)}`;
  }

  const corrected = splitWords(residual).map((token) => correctSpelling(token, lexicon));
  const expanded = [...corrected, ...expandAbbreviations(corrected, lexicon)];

  const terms = new Set<string>();
  for (const token of expanded) {
    if (token.length < 2 || /^\d+$/.test(token) || lexicon.stopwords.has(token)) {
      continue;
    }
    terms.add(token);
  }

  return { citationRefs, terms: [...terms].sort() };
}

export function correctSpelling(token: string, lexicon: Lexicon): string {
  const known = lexicon.misspellings.get(token);
  if (known) {
    return known;
  }
  if (
    token.length < MIN_CORRECTABLE_LENGTH ||
    /\d/.test(token) ||
    isKnownWord(token, lexicon)
  ) {
    return token;
  }

  const maxDistance = token.length <= 5 ? 1 : 2;
  let best: string | null = null;
  let bestDistance = maxDistance + 1;

  // Dictionary is sorted, so the first word at the best distance wins ties.
  for (const word of lexicon.dictionary) {
    if (Math.abs(word.length - token.length) > maxDistance) {
      continue;
    }
    const distance = levenshteinDistance(token, word);
    if (distance < bestDistance) {
      best = word;
      bestDistance = distance;
    }
  }

  return best ?? token;
}

function isKnownWord(token: string, lexicon: Lexicon): boolean {
  if (
    lexicon.dictionarySet.has(token) ||
    lexicon.stopwords.has(token) ||
    lexicon.abbreviations.has(token)
  ) {
    return true;
  }
  return INFLECTION_SUFFIXES.some(
    (suffix) =>
      token.length > suffix.length + 2 &&
      token.endsWith(suffix) &&
      lexicon.dictionarySet.has(token.slice(0, -suffix.length)),
  );
}

function expandAbbreviations(tokens: string[], lexicon: Lexicon): string[] {
  const expansions: string[] = [];
  for (let start = 0; start < tokens.length; start += 1) {
    for (let size = 1; size <= lexicon.maxAbbreviationWords; size += 1) {
      if (start + size > tokens.length) {
        break;
      }
      const phrase = tokens.slice(start, start + size).join(" ");
      const expansion = lexicon.abbreviations.get(phrase);
      if (expansion) {
        expansions.push(...expansion);
      }
    }
  }
  return expansions;
}
