export const DOC_TYPES = ["statute", "case_law", "department_policy"] as const;

export type DocType = (typeof DOC_TYPES)[number];

export interface LegalDocument {
  sourceId: string;
  docType: DocType;
  text: string;
}

export interface LegalChunk {
  id: string;
  sourceId: string;
  docType: DocType;
  index: number;
  text: string;
  chapter: string | null;
  sectionNumber: string | null;
  citationKey: string | null;
  /** 1-based part number when a single section spans several chunks. */
  part: number | null;
  charStart: number;
  charEnd: number;
}

export interface SourceRecord {
  id: string;
  path: string;
  docType: DocType;
  indexedAt: string;
  chunkCount: number;
}

export interface QueryReferences {
  citationRefs: readonly string[];
  terms: readonly string[];
}

export interface Candidate {
  chunk: LegalChunk;
  semanticScore: number;
}

export interface ScoredResult {
  chunk: LegalChunk;
  semanticScore: number;
  statuteMatches: number;
  termMatches: number;
  boost: number;
  finalScore: number;
  /** Position in the candidate list returned by the index; -1 for cross-references. */
  rank: number;
  isCrossRef: boolean;
  citedBy: string | null;
}

export interface ResultSet {
  results: ScoredResult[];
  confidence: number;
}
