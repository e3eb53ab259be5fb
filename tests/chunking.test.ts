import { describe, expect, it } from "vitest";
import { ClassificationError } from "../src/domain/errors.js";
import type { LegalDocument } from "../src/domain/types.js";
import { chapterFromSourceId, chunkDocument, splitIntoWindows } from "../src/pipelines/chunking.js";
import { htmlToText } from "../src/infra/parsers/documentLoader.js";
import { parseDocType } from "../src/pipelines/classification.js";

const STATUTE_TEXT = [
  "CHAPTER 346",
  "RULES OF THE ROAD",
  "",
  "346.63 Operating under influence of intoxicant.",
  "(1) No person may drive or operate a motor vehicle while:",
  "(a) Under the influence of an intoxicant; or",
  "(b) The person has a prohibited alcohol concentration.",
  "(2) No person may cause injury to another person by operating a vehicle while intoxicated.",
  "",
  "346.65 Penalties.",
  "Any person violating s. 346.63 may be fined.",
].join("\n");

function statute(text: string, sourceId = "346.txt"): LegalDocument {
  return { sourceId, docType: "statute", text };
}

describe("chunkDocument", () => {
  it("splits statutes into one chunk per detected section", () => {
    const chunks = chunkDocument(statute(STATUTE_TEXT));

    expect(chunks.map((chunk) => chunk.citationKey)).toEqual([null, "346.63", "346.65"]);
    expect(chunks.map((chunk) => chunk.id)).toEqual(["346.txt#0", "346.txt#1", "346.txt#2"]);
    expect(chunks[0].text).toBe("CHAPTER 346\nRULES OF THE ROAD");
    expect(chunks[0].chapter).toBe("346");
    expect(chunks[2].text).toBe("346.65 Penalties.\nAny person violating s. 346.63 may be fined.");

    const section = chunks[1];
    expect(section.sectionNumber).toBe("346.63");
    expect(section.chapter).toBe("346");
    expect(section.docType).toBe("statute");
    expect(section.part).toBeNull();
    expect(section.text.startsWith("346.63 Operating under influence of intoxicant.")).toBe(true);
    expect(section.text).toContain("(a) Under the influence of an intoxicant; or");
    expect(section.text).toContain("(b) The person has a prohibited alcohol concentration.");
    expect(section.text.endsWith("operating a vehicle while intoxicated.")).toBe(true);
  });

  it("records offsets that reproduce the chunk text", () => {
    for (const chunk of chunkDocument(statute(STATUTE_TEXT))) {
      expect(STATUTE_TEXT.slice(chunk.charStart, chunk.charEnd)).toBe(chunk.text);
    }
  });

  it("keeps (1)(a) and (1)(b) together when a long section is split", () => {
    const text = [
      "346.63 Operating under influence.",
      "(1) No person may drive or operate a motor vehicle while any of the following applies:",
      "(a) The person is under the influence of an intoxicant.",
      "(b) The person has a prohibited alcohol concentration.",
      "(2) No person may cause injury to another person by the operation of a vehicle while intoxicated.",
    ].join("\n");

    const chunks = chunkDocument(statute(text), {
      maxChunkChars: 240,
      windowChars: 150,
      overlapChars: 30,
    });

    expect(chunks).toHaveLength(2);
    expect(chunks.map((chunk) => chunk.part)).toEqual([1, 2]);
    expect(chunks.every((chunk) => chunk.citationKey === "346.63")).toBe(true);
    expect(chunks[0].text).toContain("(a) The person is under the influence of an intoxicant.");
    expect(chunks[0].text).toContain("(b) The person has a prohibited alcohol concentration.");
    expect(chunks[1].text).toBe(
      "(2) No person may cause injury to another person by the operation of a vehicle while intoxicated.",
    );
  });

  it("falls back to overlapping windows when no section boundary is found", () => {
    const text = Array.from(
      { length: 40 },
      (_, i) => `Officer duty clause ${i + 1} requires reasonable care during every traffic stop.`,
    ).join(" ");

    const chunks = chunkDocument(statute(text));

    expect(chunks).toHaveLength(4);
    expect(chunks[0].charStart).toBe(0);
    expect(chunks[chunks.length - 1].charEnd).toBe(text.length);
    for (const chunk of chunks) {
      expect(chunk.text.length).toBeLessThanOrEqual(1000);
      expect(chunk.text.endsWith("every traffic stop.")).toBe(true);
      expect(chunk.citationKey).toBeNull();
      if (chunk.charStart > 0) {
        expect(text[chunk.charStart - 1]).toBe(" ");
      }
    }
    for (let i = 1; i < chunks.length; i += 1) {
      const overlap = chunks[i - 1].charEnd - chunks[i].charStart;
      expect(overlap).toBeGreaterThan(0);
      expect(overlap).toBeLessThanOrEqual(200);
    }
  });

  it("only treats the file's own chapter as section boundaries", () => {
    const text = [
      "346.63 Operating under influence.",
      "A person who commits homicide is guilty under",
      "940.09 Homicide by intoxicated use of a vehicle.",
      "further text.",
    ].join("\n");

    const chunks = chunkDocument(statute(text));

    expect(chunks).toHaveLength(1);
    expect(chunks[0].citationKey).toBe("346.63");
    expect(chunks[0].text).toBe(text);
  });

  it("splits case law on paragraph boundaries", () => {
    const text = [
      "State v. Example, decided by the court of appeals.",
      "The officer stopped the vehicle after observing erratic driving.",
      "The court held that reasonable suspicion supported the stop.",
    ].join("\n\n");

    const document: LegalDocument = {
      sourceId: "state-v-example-case.txt",
      docType: "case_law",
      text,
    };

    const separate = chunkDocument(document, {
      maxChunkChars: 120,
      windowChars: 100,
      overlapChars: 20,
    });
    expect(separate.map((chunk) => chunk.text)).toEqual([
      "State v. Example, decided by the court of appeals.",
      "The officer stopped the vehicle after observing erratic driving.",
      "The court held that reasonable suspicion supported the stop.",
    ]);
    expect(separate.every((chunk) => chunk.sectionNumber === null)).toBe(true);

    const packed = chunkDocument(document);
    expect(packed).toHaveLength(1);
    expect(packed[0].text).toBe(text);
  });

  it("returns no chunks for a document without text", () => {
    expect(chunkDocument(statute("  \n\t \n"))).toEqual([]);
  });

  it("rejects unknown document type tags", () => {
    expect(() => parseDocType("regulation")).toThrow(ClassificationError);
  });

  it("refuses to chunk a document of an unknown type", () => {
    const untyped: LegalDocument = JSON.parse(
      '{"sourceId":"rules.txt","docType":"regulation","text":"1.01 Scope."}',
    );

    expect(() => chunkDocument(untyped)).toThrow(
      new ClassificationError("Unrecognized document type: regulation"),
    );
  });

  it("sub-splits a long case-law paragraph into overlapping windows ending on sentences", () => {
    const longParagraph = Array.from(
      { length: 40 },
      (_, i) => `The court weighed factor ${i + 1} when it reviewed the traffic stop.`,
    ).join(" ");
    const text = `State v. Doe\n\n${longParagraph}\n\nWe affirm.`;

    const chunks = chunkDocument({ sourceId: "state-v-doe-case.txt", docType: "case_law", text });

    expect(chunks.map((chunk) => [chunk.charStart, chunk.charEnd])).toEqual([
      [0, 12],
      [14, 1012],
      [818, 1768],
      [1574, 2524],
      [2526, 2536],
    ]);
    const windows = chunks.slice(1, 4);
    for (const window of windows) {
      expect(window.text.length).toBeLessThanOrEqual(1000);
      expect(window.text.endsWith("reviewed the traffic stop.")).toBe(true);
    }
    for (let i = 1; i < windows.length; i += 1) {
      const overlap = windows[i - 1].charEnd - windows[i].charStart;
      expect(overlap).toBeGreaterThan(0);
      expect(overlap).toBeLessThanOrEqual(200);
    }
  });

  it("does not treat a decimal table cell as a section header", () => {
    const text = htmlToText(
      "<p>346.63 Operating under influence.</p><p>(1) No person may drive while:</p>" +
        "<table><tr><td>0.08</td><td>adult limit</td></tr></table>" +
        "<p>(b) The person has a prohibited alcohol concentration.</p>",
    );

    const chunks = chunkDocument({ sourceId: "owi-laws.html", docType: "statute", text });

    expect(chunks.map((chunk) => [chunk.citationKey, chunk.text])).toEqual([
      [
        "346.63",
        "346.63 Operating under influence.\n(1) No person may drive while:\n0.08\nadult limit\n(b) The person has a prohibited alcohol concentration.",
      ],
    ]);
  });
});

describe("splitIntoWindows", () => {
  it("cuts through a token only when it is longer than the window", () => {
    const text = "x".repeat(250);
    const windows = splitIntoWindows(
      text,
      { start: 0, end: text.length },
      { maxChunkChars: 100, windowChars: 100, overlapChars: 20 },
    );

    expect(windows).toEqual([
      { start: 0, end: 100 },
      { start: 100, end: 200 },
      { start: 200, end: 250 },
    ]);
  });
});

describe("chapterFromSourceId", () => {
  it("reads the chapter from numeric file names", () => {
    expect(chapterFromSourceId("346.pdf")).toBe("346");
    expect(chapterFromSourceId("data/raw/940.txt")).toBe("940");
    expect(chapterFromSourceId("patrol-policy.pdf")).toBeNull();
  });
});
