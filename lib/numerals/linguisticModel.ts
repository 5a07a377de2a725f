/**
 * Linguistic model used by the phrase normalizer.
 *
 * The normalizer only needs three things from a language model: coarse
 * part-of-speech tags, noun phrases with their head word, and a singular form
 * for plural nouns. This module defines that contract and the default
 * implementation backed by compromise (tagging) and pluralize (singular forms).
 *
 * Models hold no per-call state. The process-wide instance lives in
 * `@/lib/numerals` (see getLinguisticModel) and is handed to callers explicitly.
 */

import nlp from "compromise";
import pluralize from "pluralize";
import patentLexicon from "./data/patentLexicon.json";

export type CoarseTag = "NOUN" | "PROPN" | "ADJ" | "VERB" | "OTHER";

export type AnalyzedToken = {
  text: string;
  tag: CoarseTag;
  /** Past participle or gerund ("insulated", "carrying"); may modify a following noun. */
  participle: boolean;
};

export type NounPhrase = {
  text: string;
  tokens: AnalyzedToken[];
  /** Grammatical head: the last noun of the phrase. */
  head: AnalyzedToken;
};

export type PhraseAnalysis = {
  tokens: AnalyzedToken[];
  /** Noun phrases in reading order. */
  nounPhrases: NounPhrase[];
};

export interface LinguisticModel {
  readonly name: string;
  analyze(phrase: string): PhraseAnalysis;
  /** Singular form of a plural noun, or null when the word has none. */
  singularize(word: string): string | null;
}

const NOMINAL_TAGS: ReadonlySet<CoarseTag> = new Set(["NOUN", "PROPN"]);
const PHRASE_TAGS: ReadonlySet<CoarseTag> = new Set(["NOUN", "PROPN", "ADJ"]);

/**
 * A participle between a non-noun and an adjective or noun is an attributive
 * modifier ("insulated compartment"), so it is re-tagged ADJ. After a noun it
 * starts a clause instead ("housing containing a motor").
 */
export function promoteAttributiveParticiples(tokens: AnalyzedToken[]): AnalyzedToken[] {
  return tokens.map((token, i) => {
    const prev = tokens[i - 1];
    const next = tokens[i + 1];
    if (
      token.tag === "VERB" &&
      token.participle &&
      next &&
      PHRASE_TAGS.has(next.tag) &&
      !(prev && NOMINAL_TAGS.has(prev.tag))
    ) {
      return { ...token, tag: "ADJ" };
    }
    return token;
  });
}

/**
 * Group tokens into noun phrases of the form ADJ* NOUN+. An adjective after a
 * noun starts the next phrase; adjectives with no noun after them are dropped.
 */
export function chunkNounPhrases(tokens: AnalyzedToken[]): NounPhrase[] {
  const phrases: NounPhrase[] = [];
  let run: AnalyzedToken[] = [];

  const flush = () => {
    let lastNoun = -1;
    run.forEach((token, i) => {
      if (NOMINAL_TAGS.has(token.tag)) lastNoun = i;
    });
    if (lastNoun >= 0) {
      const phraseTokens = run.slice(0, lastNoun + 1);
      phrases.push({
        text: phraseTokens.map((t) => t.text).join(" "),
        tokens: phraseTokens,
        head: phraseTokens[lastNoun],
      });
    }
    run = [];
  };

  for (const token of tokens) {
    const previous = run[run.length - 1];
    if (token.tag === "ADJ" && previous && NOMINAL_TAGS.has(previous.tag)) {
      flush();
    }
    if (PHRASE_TAGS.has(token.tag)) {
      run.push(token);
    } else {
      flush();
    }
  }
  flush();

  return phrases;
}

/**
 * Build the analysis for an already tagged token sequence.
 */
export function buildPhraseAnalysis(tokens: AnalyzedToken[]): PhraseAnalysis {
  const promoted = promoteAttributiveParticiples(tokens);
  return { tokens: promoted, nounPhrases: chunkNounPhrases(promoted) };
}

function cleanWord(text: string): string {
  return text.trim().replace(/^[^\w]+|[^\w]+$/g, "");
}

// Letters and digits only, for lining compromise terms up with the source words
function spellingKey(text: string): string {
  return text.toLowerCase().replace(/[^a-z0-9]/g, "");
}

type TermView = { has(match: string): boolean };

type TaggedTerm = { key: string; tag: CoarseTag; participle: boolean };

function coarseTag(term: TermView): CoarseTag {
  if (term.has("#Pronoun")) return "OTHER";
  if (term.has("#ProperNoun")) return "PROPN";
  if (term.has("#Noun")) return "NOUN";
  if (term.has("#Adjective")) return "ADJ";
  if (term.has("#Verb")) return "VERB";
  return "OTHER";
}

// Domain lexicon entries are authoritative over compromise's contextual re-tagging
function lexiconTag(entry: string | undefined): CoarseTag | null {
  if (entry === "Adjective") return "ADJ";
  if (entry === "Singular" || entry === "Plural" || entry === "Noun") return "NOUN";
  return null;
}

const lexicon: Readonly<Record<string, string>> = patentLexicon;
let lexiconRegistered = false;

function lookupLexicon(word: string): string | undefined {
  const key = word.toLowerCase();
  return Object.hasOwn(lexicon, key) ? lexicon[key] : undefined;
}

/**
 * Create the default model.
 *
 * The bundled patent lexicon goes into compromise's process-wide lexicon the
 * first time a model is created and is never changed afterwards, so every
 * model tags the same way. Throws if compromise cannot tag a probe phrase.
 */
export function createCompromiseModel(): LinguisticModel {
  if (!lexiconRegistered) {
    nlp.addWords({ ...lexicon });
    lexiconRegistered = true;
  }

  const analyze = (phrase: string): PhraseAnalysis => {
    const terms: TaggedTerm[] = [];
    nlp(phrase)
      .terms()
      .forEach((term) => {
        const key = spellingKey(term.text());
        if (!key) return;
        terms.push({
          key,
          tag: coarseTag(term),
          participle: term.has("(#PastTense|#Participle|#Gerund)"),
        });
      });

    // Words come from the phrase itself: compromise may split "non-insulated"
    // into two terms, and the last of them carries the tag for the whole word
    const tokens: AnalyzedToken[] = [];
    let nextTerm = 0;
    for (const raw of phrase.split(/\s+/)) {
      const text = cleanWord(raw);
      const key = spellingKey(text);
      if (!key) continue;

      let spelled = "";
      let cursor = nextTerm;
      let last: TaggedTerm | undefined;
      while (
        cursor < terms.length &&
        spelled.length < key.length &&
        key.startsWith(spelled + terms[cursor].key)
      ) {
        spelled += terms[cursor].key;
        last = terms[cursor];
        cursor++;
      }
      const aligned = spelled === key ? last : undefined;
      if (aligned) nextTerm = cursor;

      tokens.push({
        text,
        tag: lexiconTag(lookupLexicon(text)) ?? aligned?.tag ?? "OTHER",
        participle: aligned?.participle ?? false,
      });
    }

    return buildPhraseAnalysis(tokens);
  };

  const probe = analyze("a main body");
  if (probe.tokens.length === 0) {
    throw new Error("compromise returned no terms for probe phrase");
  }

  return {
    name: "compromise",
    analyze,
    singularize(word: string): string | null {
      if (!pluralize.isPlural(word)) return null;
      const singular = pluralize.singular(word);
      return singular && singular !== word ? singular : null;
    },
  };
}
