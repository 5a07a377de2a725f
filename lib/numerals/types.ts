/**
 * Types for reference numeral correlation.
 *
 * Flow: Patent text → candidate labels, OCR detections → numerals seen in the drawing,
 * then both merge into one label per numeral.
 */

/** A single (x, y) vertex in image pixel space. */
export type Point = [number, number];

/** Four vertices forming the detected text polygon (OCR engines emit quads). */
export type Quad = [Point, Point, Point, Point];

/**
 * One text region reported by the external OCR engine.
 */
export interface Detection {
  box: Quad;
  text: string;
  confidence: number; // 0..1
}

/**
 * A detection whose text survived digit correction and numeric validation.
 */
export interface ValidatedNumber {
  box: Quad;
  originalText: string;
  correctedText: string;
  value: number;
  confidence: number;
}

/**
 * Raw (phrase, numerals) pair found by the pattern extractor.
 * Offsets are UTF-16 indexes into the source text.
 */
export type TextMatch = {
  rawPhrase: string;
  numerals: string[];
  span: { start: number; end: number };
};

export type CandidateSource = "TEXT";

export type NumeralCandidate = {
  numeral: string;
  labelCandidates: string[]; // first-seen order
  source: CandidateSource;
};

/** Final output: numeral ("100") → single chosen label. */
export type NumeralLabelMap = Record<string, string>;

/** A labelled numeral the external renderer can draw on the drawing. */
export type AnnotationTarget = {
  box: Quad;
  numeral: string;
  label: string;
  confidence: number;
};

export type CorrelationReport = {
  labels: NumeralLabelMap;
  /** Numerals read from the drawing that also have a text label. */
  presentNumerals: string[];
  /** Numerals labelled from text only (not detected, or no detections supplied). */
  textOnlyNumerals: string[];
  validatedNumbers: ValidatedNumber[];
  annotations: AnnotationTarget[];
};

/** Chooses one label from the candidates collected for a numeral. */
export type LabelPicker = (labels: readonly string[]) => string | undefined;

export interface DetectionFilterOptions {
  /** Minimum OCR confidence to keep a detection. Default: 0.6 */
  minConfidence?: number;
  /** Minimum share of digit characters for non-float text to count as numeric. Default: 0.7 */
  minDigitRatio?: number;
}

export interface CorrelationOptions extends DetectionFilterOptions {
  /** IoU above which two detections count as the same glyph cluster. Default: 0.5 */
  overlapThreshold?: number;
  /** Label selection policy. Default: shortest label, first seen on ties. */
  pickLabel?: LabelPicker;
}
