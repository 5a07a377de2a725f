/**
 * Correlate patent text with OCR detections from a drawing.
 *
 * POST /api/numerals/correlate
 * Body: {
 *   "text": string,
 *   "detections"?: [{ "box": [[x, y] x4], "text": string, "confidence": 0..1 }]
 * }
 *
 * Malformed detections are skipped rather than failing the request.
 * Returns: { labels, presentNumerals, textOnlyNumerals, annotations, count }
 */

import { NextResponse } from "next/server";
import { z } from "zod";
import { correlateDetailed } from "@/lib/numerals";
import { describeError } from "@/lib/utils/error";

export const runtime = "nodejs";

const correlateRequestSchema = z.object({
  text: z.string(),
  detections: z.array(z.unknown()).optional(),
});

export async function GET() {
  return NextResponse.json(
    { ok: false, message: "Use POST with a JSON body: { text, detections? }" },
    { status: 405 }
  );
}

export async function POST(req: Request) {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    return NextResponse.json({ error: "Request body must be JSON" }, { status: 400 });
  }

  const parsed = correlateRequestSchema.safeParse(body);
  if (!parsed.success) {
    return NextResponse.json(
      { error: "Expected { text: string, detections?: array }" },
      { status: 400 }
    );
  }

  const { text, detections = [] } = parsed.data;

  try {
    const report = correlateDetailed(text, detections);
    return NextResponse.json({
      labels: report.labels,
      presentNumerals: report.presentNumerals,
      textOnlyNumerals: report.textOnlyNumerals,
      annotations: report.annotations,
      count: Object.keys(report.labels).length,
    });
  } catch (error) {
    console.error("[Numerals API] Correlation failed:", {
      ...describeError(error),
      textLength: text.length,
      detections: detections.length,
    });
    return NextResponse.json({ error: "Correlation failed" }, { status: 500 });
  }
}
