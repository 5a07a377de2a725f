/**
 * Unit tests for the correlation engine.
 */

import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { correlateDetailed, planAnnotations } from "@/lib/numerals/correlate";
import type { ValidatedNumber } from "@/lib/numerals/types";
import { createFakeModel, quad } from "../helpers/fakeLinguisticModel";

const TEXT =
  "A flexible main body 100 and a front flap 120. " +
  "The main body of the invention 100 rests on a base 500.";

const DETECTIONS: unknown[] = [
  { box: quad(10, 10, 50, 30), text: "1OO", confidence: 0.9 },
  { box: quad(12, 11, 52, 31), text: "100", confidence: 0.8 },
  { box: quad(200, 200, 240, 220), text: "l2O", confidence: 0.95 },
  { box: quad(300, 300, 340, 320), text: "777", confidence: 0.4 },
  { box: quad(400, 400, 440, 420), text: "HK", confidence: 0.9 },
  { text: "500", confidence: 0.9 },
];

describe("correlateDetailed", () => {
  const model = createFakeModel();

  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should label detected numerals first and keep text-only numerals", () => {
    const report = correlateDetailed(TEXT, DETECTIONS, model);

    expect(report.labels).toEqual({
      "100": "flexible main body",
      "120": "front flap",
      "500": "base",
    });
    expect(report.presentNumerals).toEqual(["100", "120"]);
    expect(report.textOnlyNumerals).toEqual(["500"]);
  });

  it("should collapse duplicate readings and drop unusable detections", () => {
    const report = correlateDetailed(TEXT, DETECTIONS, model);

    expect(report.validatedNumbers.map((n) => [n.originalText, n.correctedText])).toEqual([
      ["l2O", "120"],
      ["1OO", "100"],
    ]);
    expect(console.warn).toHaveBeenCalledWith("[Numerals] Skipped malformed OCR detections:", {
      malformed: 1,
      total: 6,
    });
  });

  it("should plan one annotation per labelled detection", () => {
    const report = correlateDetailed(TEXT, DETECTIONS, model);

    expect(report.annotations).toEqual([
      { box: quad(200, 200, 240, 220), numeral: "120", label: "front flap", confidence: 0.95 },
      { box: quad(10, 10, 50, 30), numeral: "100", label: "flexible main body", confidence: 0.9 },
    ]);
  });

  it("should label every numeral from text when there are no detections", () => {
    const report = correlateDetailed(TEXT, [], model);

    expect(report.presentNumerals).toEqual([]);
    expect(report.textOnlyNumerals).toEqual(["100", "120", "500"]);
    expect(report.annotations).toEqual([]);
  });

  it("should use a custom label picker", () => {
    const report = correlateDetailed(TEXT, [], model, {
      pickLabel: (labels) => labels[labels.length - 1],
    });

    expect(report.labels["100"]).toBe("main body invention");
  });

  it("should apply threshold overrides", () => {
    const report = correlateDetailed(TEXT, DETECTIONS, model, { minConfidence: 0.92 });

    expect(report.presentNumerals).toEqual(["120"]);
    expect(report.textOnlyNumerals).toEqual(["100", "500"]);
  });

  it("should return empty results for text without numerals", () => {
    const report = correlateDetailed("No numerals here.", DETECTIONS, model);

    expect(report.labels).toEqual({});
    expect(report.annotations).toEqual([]);
  });
});

describe("planAnnotations", () => {
  function validated(correctedText: string, confidence: number): ValidatedNumber {
    return {
      box: quad(0, 0, 10, 10),
      originalText: correctedText,
      correctedText,
      value: Number(correctedText),
      confidence,
    };
  }

  it("should skip numbers without a label or that are not whole numerals", () => {
    const targets = planAnnotations(
      [validated("2.5", 0.9), validated("42", 0.8), validated("12345", 0.9), validated("7", 0.7)],
      { "7": "lid", "12345": "serial" }
    );

    expect(targets).toEqual([{ box: quad(0, 0, 10, 10), numeral: "7", label: "lid", confidence: 0.7 }]);
  });
});
