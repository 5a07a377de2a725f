/**
 * Unit tests for pattern-based candidate extraction.
 */

import { describe, it, expect } from "vitest";
import {
  collectNumeralCandidates,
  extractTextMatches,
  isFigureReference,
  isReferenceNumeral,
  pickShortestLabel,
} from "@/lib/numerals/extractCandidates";
import { createFakeModel } from "../helpers/fakeLinguisticModel";

describe("extractTextMatches", () => {
  it("should pair each phrase with the numeral that follows it", () => {
    expect(extractTextMatches("A flexible main body 100 and a front flap 120.")).toEqual([
      { rawPhrase: "A flexible main body", numerals: ["100"], span: { start: 0, end: 24 } },
      { rawPhrase: " and a front flap", numerals: ["120"], span: { start: 24, end: 45 } },
    ]);
  });

  it("should split comma-separated numeral lists", () => {
    const [match] = extractTextMatches("pockets 160, 161, 162 are shown");
    expect(match.rawPhrase).toBe("pockets");
    expect(match.numerals).toEqual(["160", "161", "162"]);
  });

  it("should drop the lead-in clause before 'shown as'", () => {
    const [match] = extractTextMatches("the device is shown as housing 20");
    expect(match.rawPhrase).toBe("housing");
    expect(match.numerals).toEqual(["20"]);
  });

  it("should never read numbers longer than four digits", () => {
    expect(extractTextMatches("code 12345.")).toEqual([]);

    const matches = extractTextMatches("serial 12345 body 100");
    expect(matches).toHaveLength(1);
    expect(matches[0].rawPhrase).toBe("serial 12345 body");
    expect(matches[0].numerals).toEqual(["100"]);
  });

  it("should not read digits of a decimal number", () => {
    const matches = extractTextMatches("a width of 2.5 and a body 100");
    expect(matches).toHaveLength(1);
    expect(matches[0].rawPhrase).toBe("a width of 2.5 and a body");
  });

  it("should read numerals with a letter suffix as the base numeral", () => {
    expect(extractTextMatches("A lever 120a engages a spring 130.")).toEqual([
      { rawPhrase: "A lever", numerals: ["120"], span: { start: 0, end: 12 } },
      { rawPhrase: " engages a spring", numerals: ["130"], span: { start: 12, end: 33 } },
    ]);
  });

  it("should list a numeral once when several suffixes share it", () => {
    const [match] = extractTextMatches("flaps 250a, 250b, 251 fold");
    expect(match.rawPhrase).toBe("flaps");
    expect(match.numerals).toEqual(["250", "251"]);
  });

  it("should return no matches for empty text", () => {
    expect(extractTextMatches("")).toEqual([]);
    expect(extractTextMatches("No numerals here.")).toEqual([]);
  });
});

describe("isReferenceNumeral", () => {
  it("should accept 1-4 digit tokens only", () => {
    expect(isReferenceNumeral("7")).toBe(true);
    expect(isReferenceNumeral("1000")).toBe(true);
    expect(isReferenceNumeral("12345")).toBe(false);
    expect(isReferenceNumeral("2.5")).toBe(false);
  });
});

describe("isFigureReference", () => {
  it("should flag figure captions", () => {
    expect(isFigureReference("FIG.")).toBe(true);
    expect(isFigureReference("FIG. 3A shows a lid")).toBe(true);
    expect(isFigureReference(" as seen in figs 4")).toBe(true);
  });

  it("should not flag words that merely start with 'fig'", () => {
    expect(isFigureReference("a figure-eight strap")).toBe(false);
  });
});

describe("collectNumeralCandidates", () => {
  const model = createFakeModel();

  it("should group labels by numeral in first-seen order", () => {
    const text =
      "A flexible main body 100 and a front flap 120. " +
      "The main body of the invention 100 rests on a base 500.";

    expect(collectNumeralCandidates(text, model)).toEqual([
      {
        numeral: "100",
        labelCandidates: ["flexible main body", "main body invention"],
        source: "TEXT",
      },
      { numeral: "120", labelCandidates: ["front flap"], source: "TEXT" },
      { numeral: "500", labelCandidates: ["base"], source: "TEXT" },
    ]);
  });

  it("should skip figure numbers", () => {
    expect(collectNumeralCandidates("FIG. 1 shows a body 100.", model)).toEqual([
      { numeral: "100", labelCandidates: ["body"], source: "TEXT" },
    ]);
    expect(collectNumeralCandidates("FIG. 3A shows a lid 40.", model)).toEqual([
      { numeral: "40", labelCandidates: ["lid"], source: "TEXT" },
    ]);
  });

  it("should give every numeral in a list the same label", () => {
    expect(collectNumeralCandidates("handles 30, 31", model)).toEqual([
      { numeral: "30", labelCandidates: ["handle"], source: "TEXT" },
      { numeral: "31", labelCandidates: ["handle"], source: "TEXT" },
    ]);
  });

  it("should skip phrases that normalize to nothing", () => {
    expect(collectNumeralCandidates("the overall frontal view 5", model)).toEqual([]);
  });

  it("should use lower-cased phrases without a model", () => {
    expect(collectNumeralCandidates("Body 100 and flap 120.", null)).toEqual([
      { numeral: "100", labelCandidates: ["body"], source: "TEXT" },
      { numeral: "120", labelCandidates: ["and flap"], source: "TEXT" },
    ]);
  });
});

describe("pickShortestLabel", () => {
  it("should pick the shortest label", () => {
    expect(pickShortestLabel(["flexible main body", "body", "main body"])).toBe("body");
  });

  it("should keep the first label on ties", () => {
    expect(pickShortestLabel(["lid", "cap"])).toBe("lid");
  });

  it("should return undefined for no labels", () => {
    expect(pickShortestLabel([])).toBeUndefined();
  });
});
