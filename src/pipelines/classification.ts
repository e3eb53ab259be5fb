import path from "node:path";
import { ClassificationError } from "../domain/errors.js";
import { DOC_TYPES, type DocType } from "../domain/types.js";

/**
 * Derives a document's type from its file name: chapter files such as
 * `346.pdf` are statutes, `*case*`/`*opinion*` are case law, `*policy*` are
 * department policy. Names matching none of these take `fallback` when one is
 * given (pages saved from a legislature site are statutes).
 */
export function classifyDocument(fileName: string, fallback?: DocType): DocType {
  const base = path.basename(fileName);
  const lower = base.toLowerCase();

  if (/^\d{1,3}\.[a-z0-9]+$/.test(lower)) {
    return "statute";
  }
  if (lower.includes("case") || lower.includes("opinion")) {
    return "case_law";
  }
  if (lower.includes("policy")) {
    return "department_policy";
  }
  if (fallback) {
    return fallback;
  }
  throw new ClassificationError(`Cannot determine document type for ${base}.`);
}

export function isDocType(value: string): value is DocType {
  return DOC_TYPES.some((docType) => docType === value);
}

export function parseDocType(value: string): DocType {
  const normalized = value.trim().toLowerCase();
  if (!isDocType(normalized)) {
    throw new ClassificationError(`Unrecognized document type: ${value}`);
  }
  return normalized;
}
