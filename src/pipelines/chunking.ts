import path from "node:path";
import { ClassificationError } from "../domain/errors.js";
import type { LegalChunk, LegalDocument } from "../domain/types.js";
import { normalizeText } from "../utils/text.js";

export interface ChunkingOptions {
  /** Longest span kept as a single chunk before it is split further. */
  maxChunkChars: number;
  /** Window length used by the fixed-length fallback splitter. */
  windowChars: number;
  overlapChars: number;
}

export const DEFAULT_CHUNKING_OPTIONS: ChunkingOptions = {
  maxChunkChars: 1200,
  windowChars: 1000,
  overlapChars: 200,
};

interface SectionInfo {
  chapter: string;
  sectionNumber: string;
}

interface ChunkSpan {
  start: number;
  end: number;
  chapter: string | null;
  section: SectionInfo | null;
  part: number | null;
}

export interface Range {
  start: number;
  end: number;
}

// Chapter numbers never start with 0, so "0.08" on its own line is not a header.
const SECTION_HEADER_REGEX = /^[ \t]*§?[ \t]*([1-9]\d{0,2})\.(\d{2,3})(?=[ \t]|$)/gm;
const SUBSECTION_REGEX = /^[ \t]*\((\d+)\)/gm;
const PARAGRAPH_BREAK_REGEX = /\n[ \t]*\n/g;
const MIN_BOUNDARY_RATIO = 0.55;

export function chunkDocument(
  document: LegalDocument,
  options: Partial<ChunkingOptions> = {},
): LegalChunk[] {
  const resolved = resolveOptions(options);
  const text = normalizeText(document.text);
  if (!text) {
    return [];
  }

  let spans: ChunkSpan[];
  switch (document.docType) {
    case "statute":
      spans = chunkStatute(text, chapterFromSourceId(document.sourceId), resolved);
      break;
    case "case_law":
    case "department_policy":
      spans = chunkParagraphs(text, resolved);
      break;
    default:
      return rejectDocType(document.docType);
  }

  return spans.map((span, index) => ({
    id: `${document.sourceId}#${index}`,
    sourceId: document.sourceId,
    docType: document.docType,
    index,
    text: text.slice(span.start, span.end),
    chapter: span.section?.chapter ?? span.chapter,
    sectionNumber: span.section?.sectionNumber ?? null,
    citationKey: span.section?.sectionNumber ?? null,
    part: span.part,
    charStart: span.start,
    charEnd: span.end,
  }));
}

/** `346.pdf` and `346.txt` name chapter 346; other names carry no chapter. */
export function chapterFromSourceId(sourceId: string): string | null {
  const base = path.basename(sourceId, path.extname(sourceId));
  return /^\d{1,3}$/.test(base) ? base : null;
}

function rejectDocType(docType: never): never {
  throw new ClassificationError(`Unrecognized document type: ${String(docType)}`);
}

function resolveOptions(options: Partial<ChunkingOptions>): ChunkingOptions {
  const maxChunkChars = Math.max(1, options.maxChunkChars ?? DEFAULT_CHUNKING_OPTIONS.maxChunkChars);
  const windowChars = Math.max(
    1,
    Math.min(options.windowChars ?? DEFAULT_CHUNKING_OPTIONS.windowChars, maxChunkChars),
  );
  const overlapChars = Math.min(
    Math.max(options.overlapChars ?? DEFAULT_CHUNKING_OPTIONS.overlapChars, 0),
    windowChars - 1,
  );
  return { maxChunkChars, windowChars, overlapChars };
}

function chunkStatute(
  text: string,
  chapterHint: string | null,
  options: ChunkingOptions,
): ChunkSpan[] {
  const headers = findSectionHeaders(text, chapterHint);
  if (headers.length === 0) {
    return splitUnsectioned(text, { start: 0, end: text.length }, chapterHint, options);
  }

  const spans: ChunkSpan[] = [];
  if (headers[0].start > 0) {
    spans.push(
      ...splitUnsectioned(text, { start: 0, end: headers[0].start }, chapterHint, options),
    );
  }

  for (let i = 0; i < headers.length; i += 1) {
    const end = i + 1 < headers.length ? headers[i + 1].start : text.length;
    spans.push(...chunkSection(text, { start: headers[i].start, end }, headers[i].section, options));
  }

  return spans;
}

function findSectionHeaders(
  text: string,
  chapterHint: string | null,
): Array<{ start: number; section: SectionInfo }> {
  const headers: Array<{ start: number; section: SectionInfo }> = [];
  for (const match of text.matchAll(SECTION_HEADER_REGEX)) {
    const chapter = match[1];
    if (chapterHint && chapter !== chapterHint) {
      continue;
    }
    headers.push({
      start: match.index ?? 0,
      section: { chapter, sectionNumber: `${chapter}.${match[2]}` },
    });
  }
  return headers;
}

/**
 * One chunk per section when it fits. Longer sections are packed along their
 * top-level subsections so "(1)(a)" and "(1)(b)" never land in different chunks.
 */
function chunkSection(
  text: string,
  range: Range,
  section: SectionInfo,
  options: ChunkingOptions,
): ChunkSpan[] {
  const trimmed = trimRange(text, range);
  if (!trimmed) {
    return [];
  }

  const toSpan = (part: Range): ChunkSpan => ({
    ...part,
    chapter: section.chapter,
    section,
    part: null,
  });

  if (trimmed.end - trimmed.start <= options.maxChunkChars) {
    return [toSpan(trimmed)];
  }

  const parts = packBlocks(text, splitAtSubsections(text, trimmed), options.maxChunkChars, options);
  return parts.map((part, index) => ({ ...toSpan(part), part: index + 1 }));
}

function splitAtSubsections(text: string, range: Range): Range[] {
  const body = text.slice(range.start, range.end);
  const cuts: number[] = [];
  let previousNumber: string | null = null;

  for (const match of body.matchAll(SUBSECTION_REGEX)) {
    const offset = match.index ?? 0;
    if (offset === 0 || match[1] === previousNumber) {
      continue;
    }
    previousNumber = match[1];
    cuts.push(range.start + offset);
  }

  const blocks: Range[] = [];
  let cursor = range.start;
  for (const cut of cuts) {
    blocks.push({ start: cursor, end: cut });
    cursor = cut;
  }
  blocks.push({ start: cursor, end: range.end });
  return blocks;
}

function splitUnsectioned(
  text: string,
  range: Range,
  chapter: string | null,
  options: ChunkingOptions,
): ChunkSpan[] {
  const trimmed = trimRange(text, range);
  if (!trimmed) {
    return [];
  }
  const pieces =
    trimmed.end - trimmed.start <= options.maxChunkChars
      ? [trimmed]
      : splitIntoWindows(text, trimmed, options);
  return pieces.map((piece) => ({ ...piece, chapter, section: null, part: null }));
}

function chunkParagraphs(text: string, options: ChunkingOptions): ChunkSpan[] {
  return packBlocks(text, findParagraphs(text), options.windowChars, options).map((range) => ({
    ...range,
    chapter: null,
    section: null,
    part: null,
  }));
}

/**
 * Merges consecutive blocks while the merged span stays within `packLimit`.
 * Blocks longer than `maxChunkChars` go through the window splitter on their own.
 */
function packBlocks(
  text: string,
  blocks: Range[],
  packLimit: number,
  options: ChunkingOptions,
): Range[] {
  const packed: Range[] = [];
  let current: Range | null = null;

  for (const block of blocks) {
    if (block.end - block.start > options.maxChunkChars) {
      if (current) {
        packed.push(current);
        current = null;
      }
      packed.push(...splitIntoWindows(text, block, options));
    } else if (current && block.end - current.start <= packLimit) {
      current = { start: current.start, end: block.end };
    } else {
      if (current) {
        packed.push(current);
      }
      current = block;
    }
  }
  if (current) {
    packed.push(current);
  }

  return packed
    .map((range) => trimRange(text, range))
    .filter((range): range is Range => range !== null);
}

function findParagraphs(text: string): Range[] {
  const paragraphs: Range[] = [];
  let cursor = 0;
  for (const match of text.matchAll(PARAGRAPH_BREAK_REGEX)) {
    const breakStart = match.index ?? 0;
    const piece = trimRange(text, { start: cursor, end: breakStart });
    if (piece) {
      paragraphs.push(piece);
    }
    cursor = breakStart + match[0].length;
  }
  const tail = trimRange(text, { start: cursor, end: text.length });
  if (tail) {
    paragraphs.push(tail);
  }
  return paragraphs;
}

/**
 * Fixed-length windows with a trailing overlap. Windows end on the strongest
 * natural boundary in their last 45 %, otherwise on whitespace; a window only
 * cuts through a token that is longer than the window itself.
 */
export function splitIntoWindows(text: string, range: Range, options: ChunkingOptions): Range[] {
  const { windowChars, overlapChars } = options;
  const windows: Range[] = [];
  let cursor = range.start;

  while (cursor < range.end) {
    const hardEnd = Math.min(cursor + windowChars, range.end);
    const cut =
      hardEnd < range.end
        ? findNaturalBoundary(text, cursor, hardEnd, Math.floor(windowChars * MIN_BOUNDARY_RATIO))
        : hardEnd;

    const piece = trimRange(text, { start: cursor, end: cut });
    if (piece) {
      windows.push(piece);
    }
    if (cut >= range.end) {
      break;
    }

    let next = Math.max(cut - overlapChars, cursor + 1);
    while (next < cut && !isWhitespace(text[next - 1])) {
      next += 1;
    }
    while (next < range.end && isWhitespace(text[next])) {
      next += 1;
    }
    cursor = next;
  }

  return windows;
}

function findNaturalBoundary(text: string, start: number, end: number, minLength: number): number {
  const window = text.slice(start, end);
  const separators: Array<{ token: string; keep: number }> = [
    { token: "\n\n", keep: 0 },
    { token: "\n", keep: 0 },
    { token: ". ", keep: 1 },
    { token: "? ", keep: 1 },
    { token: "! ", keep: 1 },
    { token: "; ", keep: 1 },
  ];

  for (const { token, keep } of separators) {
    const index = window.lastIndexOf(token);
    if (index >= 0 && index + keep >= minLength) {
      return start + index + keep;
    }
  }

  if (isWhitespace(text[end])) {
    return end;
  }
  const lastSpace = Math.max(window.lastIndexOf(" "), window.lastIndexOf("\n"));
  return lastSpace > 0 ? start + lastSpace : end;
}

function trimRange(text: string, range: Range): Range | null {
  let { start, end } = range;
  while (start < end && isWhitespace(text[start])) {
    start += 1;
  }
  while (end > start && isWhitespace(text[end - 1])) {
    end -= 1;
  }
  return end > start ? { start, end } : null;
}

function isWhitespace(char: string | undefined): boolean {
  return char !== undefined && /\s/.test(char);
}
