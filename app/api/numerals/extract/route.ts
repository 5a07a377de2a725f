/**
 * Text-only reference numeral extraction.
 *
 * POST /api/numerals/extract
 * Body: { "text": string }
 *
 * Returns: { labels: { [numeral]: label }, count }
 */

import { NextResponse } from "next/server";
import { z } from "zod";
import { extractAndNormalize } from "@/lib/numerals";
import { describeError } from "@/lib/utils/error";

export const runtime = "nodejs";

const extractRequestSchema = z.object({
  text: z.string(),
});

export async function GET() {
  return NextResponse.json(
    { ok: false, message: "Use POST with a JSON body: { text }" },
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

  const parsed = extractRequestSchema.safeParse(body);
  if (!parsed.success) {
    return NextResponse.json({ error: "Field 'text' must be a string" }, { status: 400 });
  }

  try {
    const labels = extractAndNormalize(parsed.data.text);
    return NextResponse.json({ labels, count: Object.keys(labels).length });
  } catch (error) {
    console.error("[Numerals API] Extraction failed:", describeError(error));
    return NextResponse.json({ error: "Extraction failed" }, { status: 500 });
  }
}
