/**
 * OCR digit correction and filtering for reference numerals read off drawings.
 *
 * OCR engines routinely confuse digits with similar glyphs (6/b, 0/O, 1/l, 5/S).
 * Detections are corrected, checked for numeric-ness and kept only above a
 * confidence floor.
 */

import { z } from "zod";
import type { DetectionFilterOptions, ValidatedNumber } from "./types";

export const DEFAULT_MIN_CONFIDENCE = 0.6;
export const DEFAULT_MIN_DIGIT_RATIO = 0.7;

/** Visually confusable glyph → digit. */
export const OCR_DIGIT_SUBSTITUTIONS: ReadonlyMap<string, string> = new Map([
  ["b", "6"],
  ["B", "6"],
  ["o", "0"],
  ["O", "0"],
  ["D", "0"],
  ["l", "1"],
  ["I", "1"],
  ["i", "1"],
  ["S", "5"],
  ["s", "5"],
  ["Z", "2"],
  ["z", "2"],
  ["g", "9"],
  ["G", "9"],
  ["q", "9"],
  ["Q", "9"],
  ["T", "7"],
  ["t", "7"],
]);

const pointSchema = z.tuple([z.number().finite(), z.number().finite()]);

export const detectionSchema = z.object({
  box: z.tuple([pointSchema, pointSchema, pointSchema, pointSchema]),
  text: z.string(),
  confidence: z.number().min(0).max(1),
});

const STRICT_FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

/**
 * Parse text that is entirely a floating-point literal; null otherwise.
 * Unlike parseFloat, trailing garbage ("1.2.3") is rejected.
 */
export function parseStrictFloat(text: string): number | null {
  if (!STRICT_FLOAT_PATTERN.test(text)) return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

/**
 * Map confusable glyphs to digits, then drop everything that is not a digit or '.'.
 *
 * @example correctOcrDigits("1OO") // "100"
 */
export function correctOcrDigits(raw: string): string {
  let corrected = "";
  for (const ch of raw) {
    corrected += OCR_DIGIT_SUBSTITUTIONS.get(ch) ?? ch;
  }
  return corrected.replace(/[^\d.]/g, "");
}

/**
 * True when the text is a float literal, or at least `minDigitRatio` of its
 * word characters are digits.
 */
export function isNumericText(text: string, minDigitRatio = DEFAULT_MIN_DIGIT_RATIO): boolean {
  const cleaned = text.replace(/[^\w.]/g, "");
  if (parseStrictFloat(cleaned) !== null) return true;
  if (cleaned.length === 0) return false;

  const digitCount = (cleaned.match(/\d/g) ?? []).length;
  return digitCount / cleaned.length >= minDigitRatio;
}

/**
 * Validate, correct and filter raw OCR detections.
 * Malformed entries (missing box/text/confidence, confidence outside 0..1) are skipped.
 */
export function filterValidNumbers(
  detections: readonly unknown[],
  options: DetectionFilterOptions = {}
): ValidatedNumber[] {
  const minConfidence = options.minConfidence ?? DEFAULT_MIN_CONFIDENCE;
  const minDigitRatio = options.minDigitRatio ?? DEFAULT_MIN_DIGIT_RATIO;

  const valid: ValidatedNumber[] = [];
  let malformed = 0;

  for (const candidate of detections) {
    const parsed = detectionSchema.safeParse(candidate);
    if (!parsed.success) {
      malformed++;
      continue;
    }

    const { box, text, confidence } = parsed.data;
    if (confidence < minConfidence) continue;

    const correctedText = correctOcrDigits(text);
    if (correctedText.length === 0 || !isNumericText(correctedText, minDigitRatio)) continue;

    const value = parseStrictFloat(correctedText);
    if (value === null) continue;

    valid.push({ box, originalText: text, correctedText, value, confidence });
  }

  if (malformed > 0) {
    console.warn("[Numerals] Skipped malformed OCR detections:", {
      malformed,
      total: detections.length,
    });
  }

  return valid;
}
