import { describe, expect, it } from "vitest";
import type { Candidate } from "../src/domain/types.js";
import { computeBoost, scoreCandidates } from "../src/pipelines/hybridScoring.js";
import { makeChunk, makeSection } from "./fixtures.js";

const NO_REFERENCES = { citationRefs: [], terms: [] };

function candidate(id: string, text: string, semanticScore: number): Candidate {
  return { chunk: makeChunk({ id, text }), semanticScore };
}

describe("scoreCandidates", () => {
  it("adds citation and keyword boosts to the semantic score", () => {
    const candidates: Candidate[] = [
      {
        chunk: makeSection("346.63", "§346.63 OWI elements of the offense."),
        semanticScore: 0.7,
      },
    ];

    const resultSet = scoreCandidates(candidates, {
      citationRefs: ["346.63"],
      terms: ["owi", "elements"],
    });

    const [top] = resultSet.results;
    expect(top.statuteMatches).toBe(1);
    expect(top.termMatches).toBe(2);
    expect(top.boost).toBe(0.25);
    expect(top.finalScore).toBeCloseTo(0.95, 10);
    expect(top.isCrossRef).toBe(false);
    expect(resultSet.confidence).toBeCloseTo(0.95, 10);
  });

  it("returns an empty result set with zero confidence for no candidates", () => {
    expect(scoreCandidates([], { citationRefs: ["346.63"], terms: ["owi"] })).toEqual({
      results: [],
      confidence: 0,
    });
  });

  it("caps the boost at 0.40 however many terms match", () => {
    const words = [
      "alpha", "bravo", "charlie", "delta", "echo", "foxtrot", "golf", "hotel",
      "india", "juliet", "kilo", "lima", "mike", "november", "oscar", "papa",
    ];
    const resultSet = scoreCandidates([candidate("c#0", words.join(" "), 0.5)], {
      citationRefs: [],
      terms: words,
    });

    expect(resultSet.results[0].termMatches).toBe(16);
    expect(resultSet.results[0].boost).toBe(0.4);
    expect(resultSet.results[0].finalScore).toBeCloseTo(0.9, 10);
  });

  it("matches citations in the text only on digit boundaries", () => {
    const resultSet = scoreCandidates(
      [
        candidate("a#0", "Penalties under s. 346.635 apply.", 0.5),
        candidate("b#0", "See s. 346.63 for the offense.", 0.4),
      ],
      { citationRefs: ["346.63"], terms: [] },
    );

    const byId = new Map(resultSet.results.map((result) => [result.chunk.id, result]));
    expect(byId.get("a#0")?.statuteMatches).toBe(0);
    expect(byId.get("b#0")?.statuteMatches).toBe(1);
  });

  it("matches terms case-insensitively on word boundaries", () => {
    const resultSet = scoreCandidates(
      [candidate("a#0", "The STOP was lawful; stopping is not at issue.", 0.5)],
      { citationRefs: [], terms: ["stop", "lawful", "issue", "top"] },
    );
    expect(resultSet.results[0].termMatches).toBe(3);
  });

  it("re-ranks by final score", () => {
    const resultSet = scoreCandidates(
      [
        candidate("a#0", "General discussion of traffic law.", 0.8),
        {
          chunk: makeSection("346.63", "346.63 Operating under influence."),
          semanticScore: 0.7,
        },
      ],
      { citationRefs: ["346.63"], terms: [] },
    );

    expect(resultSet.results.map((result) => result.chunk.id)).toEqual(["346.txt#346.63", "a#0"]);
    expect(resultSet.results.map((result) => result.rank)).toEqual([1, 0]);
  });

  it("breaks final-score ties by original rank", () => {
    const plain = candidate("plain#0", "Nothing relevant here.", 0.75);
    const boosted: Candidate = {
      chunk: makeSection("346.63", "346.63 OWI elements."),
      semanticScore: 0.5,
    };
    const references = { citationRefs: ["346.63"], terms: ["owi", "elements"] };

    const plainFirst = scoreCandidates([plain, boosted], references);
    expect(plainFirst.results.map((result) => result.finalScore)).toEqual([0.75, 0.75]);
    expect(plainFirst.results.map((result) => result.chunk.id)).toEqual(["plain#0", "346.txt#346.63"]);

    const boostedFirst = scoreCandidates([boosted, plain], references);
    expect(boostedFirst.results.map((result) => result.chunk.id)).toEqual(["346.txt#346.63", "plain#0"]);
  });

  it("keeps the top N results", () => {
    const candidates = Array.from({ length: 7 }, (_, i) =>
      candidate(`c#${i}`, `Chunk number ${i}.`, 0.9 - i * 0.1),
    );

    expect(scoreCandidates(candidates, NO_REFERENCES).results).toHaveLength(5);
    expect(
      scoreCandidates(candidates, NO_REFERENCES, { topN: 2 }).results.map((result) => result.chunk.id),
    ).toEqual(["c#0", "c#1"]);
  });

  it("clamps confidence to [0, 1] without touching the final score", () => {
    const resultSet = scoreCandidates(
      [{ chunk: makeSection("346.63", "346.63 Operating under influence."), semanticScore: 0.9 }],
      { citationRefs: ["346.63"], terms: [] },
    );

    expect(resultSet.results[0].finalScore).toBeCloseTo(1.05, 10);
    expect(resultSet.confidence).toBe(1);
  });

  it("never scores below the semantic score", () => {
    const resultSet = scoreCandidates(
      [
        candidate("a#0", "OWI refusal and implied consent.", 0.6),
        candidate("b#0", "Unrelated text.", 0.3),
        candidate("c#0", "", 0),
      ],
      { citationRefs: ["346.63"], terms: ["owi", "consent"] },
    );

    for (const result of resultSet.results) {
      expect(result.finalScore).toBeGreaterThanOrEqual(result.semanticScore);
      expect(result.boost).toBeGreaterThanOrEqual(0);
      expect(result.boost).toBeLessThanOrEqual(0.4);
    }
  });

  it("is deterministic and independent of reference order", () => {
    const candidates = [
      candidate("a#0", "OWI elements and penalties.", 0.61),
      candidate("b#0", "Elements of reckless driving.", 0.61),
      candidate("c#0", "OWI penalties.", 0.6),
    ];

    const first = scoreCandidates(candidates, { citationRefs: [], terms: ["owi", "elements"] });
    const second = scoreCandidates(candidates, { citationRefs: [], terms: ["owi", "elements"] });
    const reordered = scoreCandidates(candidates, { citationRefs: [], terms: ["elements", "owi"] });

    expect(second).toEqual(first);
    expect(reordered).toEqual(first);
    expect(first.results.map((result) => result.chunk.id)).toEqual(["a#0", "b#0", "c#0"]);
  });
});

describe("computeBoost", () => {
  it("is bounded and non-decreasing in each kind of match", () => {
    for (let statutes = 0; statutes <= 5; statutes += 1) {
      for (let terms = 0; terms <= 20; terms += 1) {
        const boost = computeBoost(statutes, terms);
        expect(boost).toBeGreaterThanOrEqual(0);
        expect(boost).toBeLessThanOrEqual(0.4);
        expect(computeBoost(statutes + 1, terms)).toBeGreaterThanOrEqual(boost);
        expect(computeBoost(statutes, terms + 1)).toBeGreaterThanOrEqual(boost);
      }
    }
  });

  it("weights a citation as three keywords", () => {
    expect(computeBoost(1, 0)).toBe(0.15);
    expect(computeBoost(0, 3)).toBe(0.15);
    expect(computeBoost(2, 2)).toBe(0.4);
    expect(computeBoost(0, 0)).toBe(0);
  });
});
