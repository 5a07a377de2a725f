/**
 * Reduce a descriptive phrase from patent text to a short canonical label.
 *
 * "a plurality of fixed carry handles" → "fixed carry handle"
 *
 * Returns "" when the phrase has no usable label. Without a linguistic model the
 * phrase is only lower-cased and trimmed of edge whitespace and punctuation.
 */

import stopwords from "./data/stopwords.json";
import {
  chunkNounPhrases,
  type AnalyzedToken,
  type LinguisticModel,
  type PhraseAnalysis,
} from "./linguisticModel";

/** Head words too generic to name a part. */
export const HEAD_EXCLUSIONS: ReadonlySet<string> = new Set([
  "it",
  "access",
  "extent",
  "width",
  "ends",
  "structure",
  "point",
  "form",
  "define",
  "has",
  "portion",
  "side",
  "area",
  "view",
  "figure",
]);

/** Used when no noun phrase qualifies and single tokens are scanned instead. */
export const TOKEN_FALLBACK_EXCLUSIONS: ReadonlySet<string> = new Set(
  [...HEAD_EXCLUSIONS].filter((word) => word !== "side" && word !== "area")
);

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function buildStopwordPattern(words: readonly string[]): RegExp {
  // Longest first so "may be made of" wins over "may be"
  const alternatives = [...words]
    .sort((a, b) => b.length - a.length)
    .map((word) => escapeRegExp(word).replace(/ /g, "\\s+"));
  return new RegExp(`(?<!\\w)(?:${alternatives.join("|")})(?!\\w)`, "gi");
}

const STOPWORD_PATTERN = buildStopwordPattern(stopwords);
const FIGURE_TOKEN_PATTERN = /\bfigs?\.?\s*\d+[a-z]*\b/gi;
const EDGE_PUNCTUATION_PATTERN = /^[ ,.\-:;]+|[ ,.\-:;]+$/g;
const REPEATED_WORD_PATTERN = /\b(\w+)\b(?: \1\b)+/g;

/**
 * Steps 1-3: strip stop words and figure tokens, collapse whitespace, trim edge punctuation.
 */
export function cleanPhrase(phrase: string): string {
  return phrase
    .toLowerCase()
    .replace(STOPWORD_PATTERN, " ")
    .replace(FIGURE_TOKEN_PATTERN, " ")
    .replace(/\s+/g, " ")
    .replace(EDGE_PUNCTUATION_PATTERN, "");
}

/**
 * The word right before a reference numeral names the part, even where the
 * tagger reads it as a verb or adjective ("screws 14", "the opening 16").
 */
function analyzeReferentPhrase(phrase: string, model: LinguisticModel): PhraseAnalysis {
  const analysis = model.analyze(phrase);
  const last = analysis.tokens[analysis.tokens.length - 1];
  if (!last || (last.tag !== "VERB" && last.tag !== "ADJ") || !/^[a-z]/i.test(last.text)) {
    return analysis;
  }

  const tokens: AnalyzedToken[] = [...analysis.tokens.slice(0, -1), { ...last, tag: "NOUN" }];
  return { tokens, nounPhrases: chunkNounPhrases(tokens) };
}

/**
 * Pick the phrase that names the referent: the rightmost noun phrase with a
 * non-generic head, else the rightmost non-generic noun token.
 */
function selectHeadPhrase(cleaned: string, model: LinguisticModel): string {
  const { tokens, nounPhrases } = analyzeReferentPhrase(cleaned, model);

  for (let i = nounPhrases.length - 1; i >= 0; i--) {
    const phrase = nounPhrases[i];
    if (!HEAD_EXCLUSIONS.has(phrase.head.text.toLowerCase())) {
      return phrase.text;
    }
  }

  for (let i = tokens.length - 1; i >= 0; i--) {
    const token = tokens[i];
    if (
      (token.tag === "NOUN" || token.tag === "PROPN") &&
      !TOKEN_FALLBACK_EXCLUSIONS.has(token.text.toLowerCase())
    ) {
      return token.text;
    }
  }

  return "";
}

export function normalizePhrase(phrase: string, model: LinguisticModel | null): string {
  if (!model) {
    return phrase.toLowerCase().replace(/\s+/g, " ").replace(EDGE_PUNCTUATION_PATTERN, "");
  }

  const cleaned = cleanPhrase(phrase);
  if (!cleaned) return "";

  const headPhrase = selectHeadPhrase(cleaned, model);
  if (!headPhrase) return "";

  const words: string[] = [];
  for (const token of analyzeReferentPhrase(headPhrase.toLowerCase(), model).tokens) {
    if (token.tag === "NOUN" || token.tag === "PROPN") {
      words.push(model.singularize(token.text) ?? token.text);
    } else if (token.tag === "ADJ") {
      words.push(token.text);
    }
  }

  const label = words.join(" ").replace(REPEATED_WORD_PATTERN, "$1");
  return label.length > 1 ? label : "";
}
