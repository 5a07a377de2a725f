/**
 * Duplicate suppression for OCR detections.
 *
 * Several OCR passes (original and preprocessed image) usually read the same
 * numeral more than once. Boxes are compared as axis-aligned rectangles spanning
 * each polygon's min/max x and y, not as exact polygons.
 */

import type { Point } from "./types";

export const DEFAULT_OVERLAP_THRESHOLD = 0.5;

export type Rect = { x0: number; y0: number; x1: number; y1: number };

export function boundingRect(box: readonly Point[]): Rect {
  const xs = box.map(([x]) => x);
  const ys = box.map(([, y]) => y);
  return {
    x0: Math.min(...xs),
    y0: Math.min(...ys),
    x1: Math.max(...xs),
    y1: Math.max(...ys),
  };
}

/**
 * Intersection-over-union of two rectangles (0 when they do not overlap).
 */
export function rectIoU(a: Rect, b: Rect): number {
  const x0 = Math.max(a.x0, b.x0);
  const y0 = Math.max(a.y0, b.y0);
  const x1 = Math.min(a.x1, b.x1);
  const y1 = Math.min(a.y1, b.y1);

  if (x1 <= x0 || y1 <= y0) return 0;

  const intersection = (x1 - x0) * (y1 - y0);
  const areaA = (a.x1 - a.x0) * (a.y1 - a.y0);
  const areaB = (b.x1 - b.x0) * (b.y1 - b.y0);
  const union = areaA + areaB - intersection;
  return union > 0 ? intersection / union : 0;
}

/**
 * Keep at most one detection per glyph cluster, preferring the most confident reading.
 * Equal confidences keep input order. The input array is not modified.
 */
export function dedupeDetections<T extends { box: readonly Point[]; confidence: number }>(
  numbers: readonly T[],
  overlapThreshold = DEFAULT_OVERLAP_THRESHOLD
): T[] {
  const ranked = [...numbers].sort((a, b) => b.confidence - a.confidence);

  const accepted: { item: T; rect: Rect }[] = [];
  for (const item of ranked) {
    const rect = boundingRect(item.box);
    const isDuplicate = accepted.some((kept) => rectIoU(rect, kept.rect) > overlapThreshold);
    if (!isDuplicate) {
      accepted.push({ item, rect });
    }
  }

  return accepted.map(({ item }) => item);
}
