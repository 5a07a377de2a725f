/**
 * Declarative load/save of numeral → label maps.
 *
 * Maps are stored as plain JSON objects and validated on load. Content is
 * never evaluated.
 */

import { z } from "zod";
import { getErrorMessage } from "@/lib/utils/error";
import type { NumeralLabelMap } from "./types";

export class LabelMapParseError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(message);
    this.name = "LabelMapParseError";
  }
}

const labelMapSchema = z.record(
  z.string().regex(/^\d{1,4}$/, "Numeral keys must be 1-4 digits"),
  z.string().trim().min(1, "Labels must be non-empty")
);

/** Numerals in ascending numeric order ("7" before "100"). */
export function sortNumerals(numerals: Iterable<string>): string[] {
  return [...numerals].sort((a, b) => Number(a) - Number(b) || a.localeCompare(b));
}

export function serializeLabelMap(map: NumeralLabelMap): string {
  const ordered = sortNumerals(Object.keys(map)).map((numeral) => [numeral, map[numeral]]);
  return JSON.stringify(Object.fromEntries(ordered), null, 2) + "\n";
}

export function parseLabelMap(json: string): NumeralLabelMap {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new LabelMapParseError(
      `Label map is not valid JSON: ${getErrorMessage(error)}`
    );
  }

  const parsed = labelMapSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new LabelMapParseError(`Invalid label map: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
}

/**
 * Human-readable table, one numeral per line in numeric order.
 */
export function formatLabelMap(map: NumeralLabelMap): string {
  const numerals = sortNumerals(Object.keys(map));
  if (numerals.length === 0) {
    return "No reference numerals found";
  }

  const lines = numerals.map((numeral) => `${numeral.padStart(4)} → ${map[numeral]}`);
  lines.push(`Total: ${numerals.length} numerals`);
  return lines.join("\n");
}
