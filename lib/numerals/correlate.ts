/**
 * Reference numeral correlation: merge text candidates with numerals seen in the drawing.
 *
 * Flow: Text candidates → OCR numerals (corrected, deduplicated) → one label per numeral
 *
 * Numerals detected in the image are labelled first. Numerals found only in the
 * text are kept too, since a drawing is not always available.
 */

import { dedupeDetections } from "./dedupeDetections";
import { filterValidNumbers } from "./digitCorrection";
import { collectNumeralCandidates, isReferenceNumeral, pickShortestLabel } from "./extractCandidates";
import type { LinguisticModel } from "./linguisticModel";
import type {
  AnnotationTarget,
  CorrelationOptions,
  CorrelationReport,
  NumeralLabelMap,
  ValidatedNumber,
} from "./types";

export function correlateDetailed(
  text: string,
  detections: readonly unknown[],
  model: LinguisticModel | null,
  options: CorrelationOptions = {}
): CorrelationReport {
  const pickLabel = options.pickLabel ?? pickShortestLabel;

  const candidates = collectNumeralCandidates(text, model);
  const validatedNumbers = dedupeDetections(
    filterValidNumbers(detections, options),
    options.overlapThreshold
  );
  const detected = new Set(validatedNumbers.map((v) => v.correctedText));

  const labels: NumeralLabelMap = {};
  const presentNumerals: string[] = [];
  const textOnlyNumerals: string[] = [];

  // Pass 1: numerals present in the drawing
  for (const { numeral, labelCandidates } of candidates) {
    if (!detected.has(numeral)) continue;
    const label = pickLabel(labelCandidates);
    if (label) {
      labels[numeral] = label;
      presentNumerals.push(numeral);
    }
  }

  // Pass 2: numerals only described in the text
  for (const { numeral, labelCandidates } of candidates) {
    if (Object.hasOwn(labels, numeral)) continue;
    const label = pickLabel(labelCandidates);
    if (label) {
      labels[numeral] = label;
      textOnlyNumerals.push(numeral);
    }
  }

  return {
    labels,
    presentNumerals,
    textOnlyNumerals,
    validatedNumbers,
    annotations: planAnnotations(validatedNumbers, labels),
  };
}

/**
 * Boxes the renderer should label: detections that read as a whole 1-4 digit
 * numeral with a known label.
 */
export function planAnnotations(
  numbers: readonly ValidatedNumber[],
  labels: NumeralLabelMap
): AnnotationTarget[] {
  const targets: AnnotationTarget[] = [];
  for (const { box, correctedText, confidence } of numbers) {
    if (!isReferenceNumeral(correctedText) || !Object.hasOwn(labels, correctedText)) continue;
    targets.push({ box, numeral: correctedText, label: labels[correctedText], confidence });
  }
  return targets;
}
