/**
 * Reference numeral correlation - public API.
 *
 * Usage:
 * ```typescript
 * const labels = correlate(patentText, ocrDetections);
 * // { "100": "flexible main body", "120": "front flap" }
 *
 * const textOnly = extractAndNormalize(patentText);
 * ```
 *
 * The linguistic model is created lazily on first use and shared read-only by
 * every call in the process. Thresholds come from `getNumeralConfig()` unless
 * overridden per call.
 */

import { getNumeralConfig } from "@/lib/config/numerals";
import { describeError } from "@/lib/utils/error";
import { correlateDetailed as correlateWithModel } from "./correlate";
import { createCompromiseModel, type LinguisticModel } from "./linguisticModel";
import type { CorrelationOptions, CorrelationReport, NumeralLabelMap } from "./types";

export type {
  AnnotationTarget,
  CorrelationOptions,
  CorrelationReport,
  Detection,
  LabelPicker,
  NumeralCandidate,
  NumeralLabelMap,
  Point,
  Quad,
  TextMatch,
  ValidatedNumber,
} from "./types";
export type { LinguisticModel } from "./linguisticModel";
export { correctOcrDigits, isNumericText, filterValidNumbers } from "./digitCorrection";
export { dedupeDetections } from "./dedupeDetections";
export { extractTextMatches, collectNumeralCandidates, pickShortestLabel } from "./extractCandidates";
export { normalizePhrase } from "./normalizePhrase";
export {
  LabelMapParseError,
  formatLabelMap,
  parseLabelMap,
  serializeLabelMap,
} from "./labelMapJson";

// undefined = not initialized yet, null = unavailable (degraded labels)
let sharedModel: LinguisticModel | null | undefined;

/**
 * Process-wide linguistic model, created at most once.
 * Returns null when disabled by configuration or when it fails to initialize.
 */
export function getLinguisticModel(): LinguisticModel | null {
  if (sharedModel !== undefined) return sharedModel;

  const { linguisticModel } = getNumeralConfig();
  if (linguisticModel === "none") {
    console.log("[Numerals] Linguistic model disabled, labels will be lower-cased phrases");
    sharedModel = null;
    return sharedModel;
  }

  try {
    sharedModel = createCompromiseModel();
  } catch (error) {
    console.warn("[Numerals] Linguistic model unavailable, falling back to raw phrases:", describeError(error));
    sharedModel = null;
  }
  return sharedModel;
}

/** Drop the cached model so the next call re-reads configuration. Tests only. */
export function resetLinguisticModel(): void {
  sharedModel = undefined;
}

function resolveOptions(options: CorrelationOptions): CorrelationOptions {
  const config = getNumeralConfig();
  return {
    minConfidence: config.minConfidence,
    overlapThreshold: config.overlapThreshold,
    minDigitRatio: config.minDigitRatio,
    ...options,
  };
}

/**
 * Full engine with the intermediate results the annotation step needs.
 */
export function correlateDetailed(
  documentText: string,
  detections: readonly unknown[] = [],
  options: CorrelationOptions = {}
): CorrelationReport {
  const report = correlateWithModel(
    documentText,
    detections,
    getLinguisticModel(),
    resolveOptions(options)
  );

  console.log("[Numerals] Correlated reference numerals:", {
    textLength: documentText.length,
    detections: detections.length,
    validatedNumbers: report.validatedNumbers.length,
    labelled: Object.keys(report.labels).length,
    presentInDrawing: report.presentNumerals.length,
  });

  return report;
}

/**
 * Numeral → label map from text and OCR detections.
 * Detections that are malformed are skipped; an empty result means no numerals were found.
 */
export function correlate(
  documentText: string,
  detections: readonly unknown[] = [],
  options: CorrelationOptions = {}
): NumeralLabelMap {
  return correlateDetailed(documentText, detections, options).labels;
}

/**
 * Text-only mode, for documents without drawings.
 */
export function extractAndNormalize(
  documentText: string,
  options: CorrelationOptions = {}
): NumeralLabelMap {
  return correlate(documentText, [], options);
}
