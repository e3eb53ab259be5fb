const WORD_REGEX = /[\p{L}\p{N}]+/gu;

export function normalizeText(text: string): string {
  return text.replace(/\r\n?/g, "\n").replace(/\t/g, " ").trim();
}

/** Lower-cased word tokens in order of appearance, apostrophes folded away. */
export function splitWords(text: string): string[] {
  return text.toLowerCase().replace(/['’]/g, "").match(WORD_REGEX) ?? [];
}

export function tokenize(text: string): string[] {
  const tokens = new Set<string>();
  for (const word of splitWords(text)) {
    if (word.length < 2) {
      continue;
    }
    tokens.add(word);
    if (word.length >= 4 && /[^su]s$/.test(word) && !/\d/.test(word)) {
      tokens.add(word.slice(0, -1));
    }
  }
  return [...tokens];
}

/** Cosine-style overlap of the two token sets, in [0, 1]. */
export function scoreByTokenOverlap(query: string, target: string): number {
  const queryTokens = new Set(tokenize(query));
  if (queryTokens.size === 0) {
    return 0;
  }

  const targetTokens = new Set(tokenize(target));
  if (targetTokens.size === 0) {
    return 0;
  }

  let overlap = 0;
  for (const token of queryTokens) {
    if (targetTokens.has(token)) {
      overlap += 1;
    }
  }

  return overlap / Math.sqrt(queryTokens.size * targetTokens.size);
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Case-insensitive match of `term` bounded by non letter/digit characters. */
export function containsWord(text: string, term: string): boolean {
  if (!term) {
    return false;
  }
  const pattern = new RegExp(
    `(?<![\\p{L}\\p{N}])${escapeRegExp(term)}(?![\\p{L}\\p{N}])`,
    "iu",
  );
  return pattern.test(text);
}

export function levenshteinDistance(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  if (a.length === 0) {
    return b.length;
  }
  if (b.length === 0) {
    return a.length;
  }

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  let current = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i += 1) {
    current[0] = i;
    for (let j = 1; j <= b.length; j += 1) {
      const substitution = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        previous[j] + 1,
        current[j - 1] + 1,
        previous[j - 1] + substitution,
      );
    }
    [previous, current] = [current, previous];
  }

  return previous[b.length];
}

export function truncate(text: string, maxChars: number): string {
  const normalized = text.replace(/\s+/g, " ").trim();
  if (normalized.length <= maxChars) {
    return normalized;
  }
  return `${normalized.slice(0, maxChars - 3)}...`;
}
