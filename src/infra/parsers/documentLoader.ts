import { execFile } from "node:child_process";
import { promises as fs } from "node:fs";
import path from "node:path";
import { promisify } from "node:util";
import mammoth from "mammoth";
import { describeError } from "../../domain/errors.js";
import { normalizeText } from "../../utils/text.js";

const execFileAsync = promisify(execFile);
const SUPPORTED_EXTENSIONS = new Set([".md", ".txt", ".pdf", ".html", ".htm", ".docx"]);

const HTML_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
  sect: "§",
};

export function isSupportedDocumentExtension(filePath: string): boolean {
  return SUPPORTED_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

export function isHtmlDocument(filePath: string): boolean {
  const ext = path.extname(filePath).toLowerCase();
  return ext === ".html" || ext === ".htm";
}

export function isDocxDocument(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === ".docx";
}

export function getSupportedDocumentExtensions(): string[] {
  return [...SUPPORTED_EXTENSIONS];
}

export async function loadDocumentText(filePath: string): Promise<string> {
  const ext = path.extname(filePath).toLowerCase();

  if (ext === ".md" || ext === ".txt") {
    const content = await fs.readFile(filePath, "utf-8");
    return normalizeText(content);
  }

  if (isHtmlDocument(filePath)) {
    const content = await fs.readFile(filePath, "utf-8");
    return htmlToText(content);
  }

  if (ext === ".pdf") {
    return loadPdfText(filePath);
  }

  if (isDocxDocument(filePath)) {
    return loadDocxText(filePath);
  }

  throw new Error(
    `Unsupported extension: ${ext}. Allowed: ${getSupportedDocumentExtensions().join(", ")}`,
  );
}

/** Visible text of an HTML page, one line per text run; scripts and styles dropped. */
export function htmlToText(html: string): string {
  const text = html
    .replace(/<(script|style)\b[^>]*>[\s\S]*?<\/\1\s*>/gi, " ")
    .replace(/<!--[\s\S]*?-->/g, " ")
    .replace(/<[^>]+>/g, "\n")
    .replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity: string, body: string) =>
      decodeEntity(entity, body),
    );

  return normalizeText(
    text
      .split("\n")
      .map((line) => line.replace(/[ \t\u00a0]+/g, " ").trim())
      .filter(Boolean)
      .join("\n"),
  );
}

function decodeEntity(entity: string, body: string): string {
  const lower = body.toLowerCase();
  if (lower.startsWith("#x")) {
    return String.fromCodePoint(Number.parseInt(lower.slice(2), 16));
  }
  if (lower.startsWith("#")) {
    return String.fromCodePoint(Number.parseInt(lower.slice(1), 10));
  }
  return HTML_ENTITIES[lower] ?? entity;
}

/** Raw paragraph text of a Word document; mammoth reports tracked changes as accepted. */
async function loadDocxText(filePath: string): Promise<string> {
  const buffer = await fs.readFile(filePath);
  let value: string;
  try {
    ({ value } = await mammoth.extractRawText({ buffer }));
  } catch (error) {
    throw new Error(`Could not read Word document ${path.basename(filePath)}: ${describeError(error)}`, {
      cause: error,
    });
  }

  const text = normalizeText(value);
  if (!text) {
    throw new Error(`No text could be extracted from ${path.basename(filePath)}.`);
  }
  return text;
}

async function loadPdfText(filePath: string): Promise<string> {
  const buffer = await fs.readFile(filePath);

  const viaPdfParse = await tryParsePdfWithLibrary(buffer, filePath);
  if (viaPdfParse) {
    return viaPdfParse;
  }

  const viaPdftotext = await tryParsePdfWithPdftotext(filePath);
  if (viaPdftotext) {
    return viaPdftotext;
  }

  throw new Error(`No text could be extracted from ${path.basename(filePath)}.`);
}

async function tryParsePdfWithLibrary(buffer: Buffer, filePath: string): Promise<string | null> {
  try {
    const { PDFParse } = await import("pdf-parse");
    const parser = new PDFParse({ data: buffer });
    try {
      const parsed = await parser.getText();
      return normalizeText(parsed.text) || null;
    } finally {
      await parser.destroy();
    }
  } catch (error) {
    console.error(`[loader] pdf-parse failed for ${filePath}:`, describeError(error));
    return null;
  }
}

async function tryParsePdfWithPdftotext(filePath: string): Promise<string | null> {
  try {
    const { stdout } = await execFileAsync("pdftotext", ["-layout", filePath, "-"]);
    return normalizeText(stdout) || null;
  } catch (error) {
    console.error(`[loader] pdftotext failed for ${filePath}:`, describeError(error));
    return null;
  }
}
