/**
 * Correlate a patent text file with OCR detections from the command line.
 *
 * Usage:
 *   npm run correlate -- <text-file> [detections.json] [--out labels.json]
 *
 * detections.json holds the OCR engine output as an array of
 * { box: [[x, y] x4], text, confidence }. Without it only the text is used.
 */

import { config } from "dotenv";
import { readFileSync, writeFileSync } from "fs";
import { resolve } from "path";
import { correlateDetailed, formatLabelMap, serializeLabelMap } from "@/lib/numerals";
import { getErrorMessage } from "@/lib/utils/error";

// Load .env.local first, then .env (Next.js convention)
config({ path: resolve(process.cwd(), ".env.local") });
config({ path: resolve(process.cwd(), ".env") });

type CliArgs = { textPath: string; detectionsPath: string | null; outPath: string | null };

function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  let outPath: string | null = null;

  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === "--out") {
      outPath = argv[++i] ?? null;
      if (!outPath) throw new Error("--out requires a file path");
    } else {
      positional.push(argv[i]);
    }
  }

  if (positional.length === 0 || positional.length > 2) {
    throw new Error("Usage: npm run correlate -- <text-file> [detections.json] [--out labels.json]");
  }

  return { textPath: positional[0], detectionsPath: positional[1] ?? null, outPath };
}

function readDetections(path: string): unknown[] {
  const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
  if (!Array.isArray(parsed)) {
    throw new Error(`${path} must contain a JSON array of detections`);
  }
  return parsed;
}

function main(): void {
  const args = parseArgs(process.argv.slice(2));
  const text = readFileSync(args.textPath, "utf-8");
  const detections = args.detectionsPath ? readDetections(args.detectionsPath) : [];

  const report = correlateDetailed(text, detections);

  console.log(formatLabelMap(report.labels));
  if (detections.length > 0) {
    console.log(
      `Seen in drawing: ${report.presentNumerals.length}, text only: ${report.textOnlyNumerals.length}`
    );
  }

  if (args.outPath) {
    writeFileSync(args.outPath, serializeLabelMap(report.labels), "utf-8");
    console.log(`Label map saved to: ${args.outPath}`);
  }
}

try {
  main();
} catch (error) {
  console.error(`[Correlate CLI] ${getErrorMessage(error)}`);
  process.exitCode = 1;
}
