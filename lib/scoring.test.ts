import { describe, expect, it } from "vitest";

import { createPartialRatioScorer } from "@/lib/fuzzy";
import { buildResumeTokens, computeAtsScore, emptyMatchResult, roundToTenth } from "@/lib/scoring";

const fuzzy = createPartialRatioScorer();

describe("computeAtsScore", () => {
  it("scores the worked application example", () => {
    const result = computeAtsScore(
      ["Python", "Django", "AWS"],
      "Experienced Python developer. Built REST APIs with Django.",
      { fuzzy },
    );
    expect(result).toEqual({ score: 66.7, matched: ["Python", "Django"], missing: ["AWS"] });
  });

  it("matches an exact token with fuzzy matching disabled", () => {
    expect(computeAtsScore(["sql"], "SQL, Python", { fuzzy: null })).toEqual({
      score: 100,
      matched: ["sql"],
      missing: [],
    });
  });

  it("matches a keyword embedded in a longer word", () => {
    expect(computeAtsScore(["java"], "JavaScript engineer", { fuzzy: null }).matched).toEqual(["java"]);
  });

  it("matches a near miss through the fuzzy tier", () => {
    const result = computeAtsScore(["Kubernetes"], "Ran services on Kubernetis clusters", { fuzzy });
    expect(result).toEqual({ score: 100, matched: ["Kubernetes"], missing: [] });
  });

  it("matches a keyword with two letters swapped", () => {
    expect(computeAtsScore(["Python"], "Pyhton developer", { fuzzy })).toEqual({
      score: 100,
      matched: ["Python"],
      missing: [],
    });
  });

  it("matches a keyword longer than the whole resume text when the text fits inside it", () => {
    expect(computeAtsScore(["Python developer"], "Python", { fuzzy }).matched).toEqual(["Python developer"]);
  });

  it("does not read fragments of accented words as keywords", () => {
    expect(computeAtsScore(["R"], "Résumé: Java", { fuzzy: null })).toEqual({
      score: 0,
      matched: [],
      missing: ["R"],
    });
  });

  it("scores zero with empty lists for no keywords", () => {
    expect(computeAtsScore([], "Python developer", { fuzzy })).toEqual({ score: 0, matched: [], missing: [] });
  });

  it("drops blank keywords from the inputs, the outputs and the total", () => {
    expect(computeAtsScore(["Python", "", "  ", "Go"], "python", { fuzzy: null })).toEqual({
      score: 50,
      matched: ["Python"],
      missing: ["Go"],
    });
  });

  it("reports keywords in their original spelling", () => {
    expect(computeAtsScore([" Python ", "SQL"], "python", { fuzzy: null })).toEqual({
      score: 50,
      matched: [" Python "],
      missing: ["SQL"],
    });
  });

  it("scores every keyword missing against empty text", () => {
    expect(computeAtsScore(["Python", "SQL"], "", { fuzzy })).toEqual({
      score: 0,
      matched: [],
      missing: ["Python", "SQL"],
    });
  });

  it("is idempotent", () => {
    const keywords = ["React", "Redux", "GraphQL", "Docker"];
    const text = "React and Redux front ends, some Docker.";
    expect(computeAtsScore(keywords, text, { fuzzy })).toEqual(computeAtsScore(keywords, text, { fuzzy }));
  });

  it("partitions the non-blank keywords in input order", () => {
    const cases: Array<[string[], string]> = [
      [["Python", "SQL", "Go", "Rust"], "Go and Python services backed by SQL"],
      [["node.js", " ", "TypeScript", "C#"], "Node.js, TypeScript"],
      [["a", "b", "c"], ""],
    ];

    for (const [keywords, text] of cases) {
      const { score, matched, missing } = computeAtsScore(keywords, text, { fuzzy: null });
      const nonBlank = keywords.filter((k) => k.trim().length > 0);

      expect([...matched, ...missing].sort()).toEqual([...nonBlank].sort());
      expect(matched.filter((k) => missing.includes(k))).toEqual([]);
      expect(matched).toEqual(nonBlank.filter((k) => matched.includes(k)));
      expect(missing).toEqual(nonBlank.filter((k) => missing.includes(k)));
      expect(score).toBe(roundToTenth(100 * (matched.length / nonBlank.length)));
      expect(score).toBeGreaterThanOrEqual(0);
      expect(score).toBeLessThanOrEqual(100);
    }
  });
});

describe("roundToTenth", () => {
  it("rounds to one decimal place", () => {
    expect(roundToTenth(200 / 3)).toBe(66.7);
    expect(roundToTenth(100 / 3)).toBe(33.3);
    expect(roundToTenth(Number.NaN)).toBe(0);
  });

  it("sends exact ties to the even tenth", () => {
    expect(roundToTenth(6.25)).toBe(6.2);
    expect(roundToTenth(31.25)).toBe(31.2);
    expect(roundToTenth(18.75)).toBe(18.8);
    expect(roundToTenth(0.75)).toBe(0.8);
  });

  it("rounds values just off a tie by their stored value", () => {
    // 0.15 is stored slightly below 0.15.
    expect(roundToTenth(0.15)).toBe(0.1);
    expect(roundToTenth(0.26)).toBe(0.3);
  });
});

describe("computeAtsScore rounding", () => {
  const keywords = Array.from({ length: 16 }, (_, i) => `skill${i}`);

  it.each([
    [1, 6.2],
    [3, 18.8],
    [5, 31.2],
  ])("scores %i of 16 keywords as %s", (hits, expected) => {
    const text = keywords.slice(0, hits).join(" ");
    expect(computeAtsScore(keywords, text, { fuzzy: null }).score).toBe(expected);
  });
});

describe("buildResumeTokens", () => {
  it("builds the token set and the space-joined text", () => {
    const resume = buildResumeTokens("Built REST APIs.");
    expect([...resume.tokens]).toEqual(["built", "rest", "apis"]);
    expect(resume.joined).toBe("built rest apis");
  });
});

describe("emptyMatchResult", () => {
  it("reports every non-blank keyword as missing", () => {
    expect(emptyMatchResult(["A", " ", "B"])).toEqual({ score: 0, matched: [], missing: ["A", "B"] });
  });
});
