/**
 * Reference numeral correlation configuration.
 *
 * All thresholds have working defaults; environment variables only tune them.
 * - NUMERAL_MIN_CONFIDENCE     minimum OCR confidence (0..1, default 0.6)
 * - NUMERAL_OVERLAP_THRESHOLD  IoU above which detections are duplicates (0..1, default 0.5)
 * - NUMERAL_MIN_DIGIT_RATIO    digit share for non-float OCR text to count as numeric (0..1, default 0.7)
 * - NUMERAL_LINGUISTIC_MODEL   "compromise" (default) or "none" for lower-case/trim labels only
 */

import { z } from "zod";

export type LinguisticModelKind = "compromise" | "none";

export interface NumeralConfig {
  minConfidence: number;
  overlapThreshold: number;
  minDigitRatio: number;
  linguisticModel: LinguisticModelKind;
}

export const DEFAULT_NUMERAL_CONFIG: NumeralConfig = {
  minConfidence: 0.6,
  overlapThreshold: 0.5,
  minDigitRatio: 0.7,
  linguisticModel: "compromise",
};

const ratioSchema = z.coerce.number().finite().min(0).max(1);
const modelKindSchema = z.enum(["compromise", "none"]);

function readRatio(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;

  const parsed = ratioSchema.safeParse(raw);
  if (!parsed.success) {
    console.warn(`[Numerals Config] Ignoring invalid ${name}, using default:`, {
      value: raw,
      default: fallback,
    });
    return fallback;
  }
  return parsed.data;
}

function readModelKind(env: NodeJS.ProcessEnv): LinguisticModelKind {
  const raw = env.NUMERAL_LINGUISTIC_MODEL;
  if (raw === undefined || raw.trim() === "") return DEFAULT_NUMERAL_CONFIG.linguisticModel;

  const parsed = modelKindSchema.safeParse(raw.trim().toLowerCase());
  if (!parsed.success) {
    console.warn("[Numerals Config] Unknown NUMERAL_LINGUISTIC_MODEL, using default:", {
      value: raw,
      default: DEFAULT_NUMERAL_CONFIG.linguisticModel,
    });
    return DEFAULT_NUMERAL_CONFIG.linguisticModel;
  }
  return parsed.data;
}

/**
 * Resolve the correlation configuration from environment variables.
 */
export function getNumeralConfig(env: NodeJS.ProcessEnv = process.env): NumeralConfig {
  return {
    minConfidence: readRatio(env, "NUMERAL_MIN_CONFIDENCE", DEFAULT_NUMERAL_CONFIG.minConfidence),
    overlapThreshold: readRatio(
      env,
      "NUMERAL_OVERLAP_THRESHOLD",
      DEFAULT_NUMERAL_CONFIG.overlapThreshold
    ),
    minDigitRatio: readRatio(env, "NUMERAL_MIN_DIGIT_RATIO", DEFAULT_NUMERAL_CONFIG.minDigitRatio),
    linguisticModel: readModelKind(env),
  };
}
