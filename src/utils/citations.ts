// `<chapter>.<section>` where the chapter has no leading zero and neither part
// continues a longer number ("0.08", "1346.63" and "346.635" do not match 346.63).
const CITATION_KEY = String.raw`(?<![\d$])(?<!\d\.)([1-9]\d{0,2}\.\d{2,3})(?!\d)`;
const CITATION_PREFIX = String.raw`(?:§{1,2}\s*|\bss?\.\s*|\bsec(?:tions?)?\.?\s*)`;

const OPTIONAL_PREFIX_PATTERN = new RegExp(`${CITATION_PREFIX}?${CITATION_KEY}`, "gi");
const REQUIRED_PREFIX_PATTERN = new RegExp(`${CITATION_PREFIX}${CITATION_KEY}`, "gi");

export interface CitationMatch {
  key: string;
  start: number;
  end: number;
}

export function findCitations(
  text: string,
  options: { requirePrefix?: boolean } = {},
): CitationMatch[] {
  const pattern = options.requirePrefix ? REQUIRED_PREFIX_PATTERN : OPTIONAL_PREFIX_PATTERN;
  const matches: CitationMatch[] = [];
  for (const match of text.matchAll(pattern)) {
    const start = match.index ?? 0;
    matches.push({ key: match[1], start, end: start + match[0].length });
  }
  return matches;
}

/** Distinct citation keys in order of first appearance. */
export function listCitationKeys(
  text: string,
  options: { requirePrefix?: boolean } = {},
): string[] {
  return [...new Set(findCitations(text, options).map((match) => match.key))];
}

export function containsCitation(text: string, key: string): boolean {
  const escaped = key.replace(/\./g, "\\.");
  return new RegExp(`(?<!\\d)(?<!\\d\\.)${escaped}(?!\\d)`).test(text);
}
