/**
 * Extract reference numeral candidates from patent text using regex patterns (no image required).
 *
 * Patterns are based on the way patent descriptions name drawing parts:
 * "a flexible main body 100, front flap 120, and insulated compartment flaps 250, 251"
 * "a frame indicated generally as 10"
 */

import type { LinguisticModel } from "./linguisticModel";
import { normalizePhrase } from "./normalizePhrase";
import type { NumeralCandidate, TextMatch } from "./types";

/**
 * Optional lead-in clause, a free-form phrase, then a comma-separated list of
 * 1-4 digit numbers, each with an optional letter suffix ("120a"). Numbers must
 * be whole tokens: "12345" and "2.5" never yield a numeral.
 */
const NUMERAL_PHRASE_PATTERN = new RegExp(
  String.raw`(?:[\w\s\-,;:()]*?\s(?:indicated\s+(?:generally\s+)?as|identified\s+as|as|no\.?|reference\s+numerals?|shown\s+as)\s+)?` +
    String.raw`([\w\s\-.,;:()]+?)\s*(?<!\d\.)\b(\d{1,4}[a-zA-Z]?(?:,\s*\d{1,4}[a-zA-Z]?)*)\b(?!\.\d)`,
  "g"
);

/** "FIG. 3", "figs 4a" inside a phrase mark a caption, not a part. */
const FIGURE_REFERENCE_PATTERN = /\bfigs?\.?\s*\d+\w*\b/i;

/** A phrase ending in "FIG." means the number list itself is a figure number. */
const TRAILING_FIGURE_WORD_PATTERN = /\bfigs?\.?\s*$/i;

/** "120a" and "120" name parts of the same numbered element. */
const NUMERAL_SUFFIX_PATTERN = /^(\d{1,4})[a-zA-Z]$/;

export function isReferenceNumeral(token: string): boolean {
  return /^\d{1,4}$/.test(token);
}

/**
 * Scan the text left to right for non-overlapping (phrase, numerals) pairs.
 */
export function extractTextMatches(text: string): TextMatch[] {
  if (!text || typeof text !== "string") {
    return [];
  }

  const matches: TextMatch[] = [];
  for (const match of text.matchAll(NUMERAL_PHRASE_PATTERN)) {
    const [whole, rawPhrase, numberList] = match;
    const start = match.index ?? 0;

    matches.push({
      rawPhrase,
      numerals: [
        ...new Set(
          numberList
            .split(",")
            .map((n) => n.trim().replace(NUMERAL_SUFFIX_PATTERN, "$1"))
            .filter(isReferenceNumeral)
        ),
      ],
      span: { start, end: start + whole.length },
    });
  }
  return matches;
}

export function isFigureReference(phrase: string): boolean {
  return FIGURE_REFERENCE_PATTERN.test(phrase) || TRAILING_FIGURE_WORD_PATTERN.test(phrase);
}

/**
 * Build the numeral → candidate labels table.
 * Candidates keep the order in which numerals and labels appear in the text.
 */
export function collectNumeralCandidates(
  text: string,
  model: LinguisticModel | null
): NumeralCandidate[] {
  const byNumeral = new Map<string, NumeralCandidate>();
  // Patent text repeats the same phrases many times
  const labelCache = new Map<string, string>();

  for (const { rawPhrase, numerals } of extractTextMatches(text)) {
    if (isFigureReference(rawPhrase)) continue;

    const phrase = rawPhrase.toLowerCase();
    let label = labelCache.get(phrase);
    if (label === undefined) {
      label = normalizePhrase(phrase, model);
      labelCache.set(phrase, label);
    }
    if (!label) continue;

    for (const numeral of numerals) {
      const existing = byNumeral.get(numeral);
      if (existing) {
        existing.labelCandidates.push(label);
      } else {
        byNumeral.set(numeral, { numeral, labelCandidates: [label], source: "TEXT" });
      }
    }
  }

  return [...byNumeral.values()];
}

/**
 * Shortest label wins; the first one seen wins ties.
 * Concise labels are more often the canonical part name than restated descriptions.
 */
export function pickShortestLabel(labels: readonly string[]): string | undefined {
  let best: string | undefined;
  for (const label of labels) {
    if (best === undefined || label.length < best.length) {
      best = label;
    }
  }
  return best;
}
