/**
 * Dictionary-backed linguistic model for deterministic normalizer tests.
 * Words missing from the dictionary are tagged OTHER.
 */

import {
  buildPhraseAnalysis,
  type AnalyzedToken,
  type CoarseTag,
  type LinguisticModel,
} from "@/lib/numerals/linguisticModel";
import type { Quad } from "@/lib/numerals/types";

const TAGS: Record<string, CoarseTag> = {
  body: "NOUN",
  flap: "NOUN",
  base: "NOUN",
  invention: "NOUN",
  lid: "NOUN",
  pad: "NOUN",
  pads: "NOUN",
  housing: "NOUN",
  view: "NOUN",
  side: "NOUN",
  x: "NOUN",
  compartment: "NOUN",
  compartments: "NOUN",
  handle: "NOUN",
  handles: "NOUN",
  acme: "PROPN",
  flexible: "ADJ",
  main: "ADJ",
  front: "ADJ",
  overall: "ADJ",
  frontal: "ADJ",
  fixed: "ADJ",
  shows: "VERB",
  rests: "VERB",
  insulated: "VERB",
  carrying: "VERB",
  noting: "VERB",
  // Tagger misreadings seen on bare plural and gerund part names
  wheels: "VERB",
  opening: "VERB",
};

const SINGULARS: Record<string, string> = {
  pads: "pad",
  compartments: "compartment",
  handles: "handle",
  wheels: "wheel",
};

export function createFakeModel(): LinguisticModel {
  return {
    name: "fake",
    analyze(phrase) {
      const tokens: AnalyzedToken[] = phrase
        .split(/\s+/)
        .map((word) => word.replace(/^[^\w]+|[^\w]+$/g, ""))
        .filter((word) => word.length > 0)
        .map((word) => {
          const tag = TAGS[word.toLowerCase()] ?? "OTHER";
          return { text: word, tag, participle: tag === "VERB" && /(?:ed|ing)$/.test(word) };
        });
      return buildPhraseAnalysis(tokens);
    },
    singularize(word) {
      return SINGULARS[word] ?? null;
    },
  };
}

/** Axis-aligned quad from corner coordinates. */
export function quad(x0: number, y0: number, x1: number, y1: number): Quad {
  return [
    [x0, y0],
    [x1, y0],
    [x1, y1],
    [x0, y1],
  ];
}
