// src/surveyStats.ts
// Survey geometry derived from trace headers: the summary record and the line ranges.
import type { BoundingBox, LineRange, SurveySummary, TraceHeaderSet } from "./types.ts";

/**
 * Reduce a trace set to its summary record.
 * Pure function – one pass over the coordinates, no sorting.
 *
 * An empty set yields `traceCount: 0`, `area: 0` and no `boundingBox`.
 */
export function summarize(traces: TraceHeaderSet, byteSize = 0): SurveySummary {
  if (!Number.isSafeInteger(byteSize) || byteSize < 0) {
    throw new RangeError(`byteSize must be a non-negative integer, got ${byteSize}`);
  }

  if (traces.length === 0) {
    return { traceCount: 0, byteSize, area: 0 };
  }

  let minX = Infinity,
    maxX = -Infinity,
    minY = Infinity,
    maxY = -Infinity;
  for (const { x, y } of traces) {
    if (x < minX) minX = x;
    if (x > maxX) maxX = x;
    if (y < minY) minY = y;
    if (y > maxY) maxY = y;
  }

  const boundingBox: BoundingBox = { minX, maxX, minY, maxY };
  return {
    traceCount: traces.length,
    byteSize,
    boundingBox,
    area: boxArea(boundingBox),
  };
}

/** Rectangular-extent area of a bounding box. */
export function boxArea(box: BoundingBox): number {
  return (box.maxX - box.minX) * (box.maxY - box.minY);
}

/**
 * Inline / crossline number ranges over the trace headers, or `undefined`
 * when there is nothing to range over.
 */
export function lineRanges(
  traces: TraceHeaderSet
): { inline: LineRange; crossline: LineRange } | undefined {
  if (traces.length === 0) return undefined;

  const inline: LineRange = { min: Infinity, max: -Infinity };
  const crossline: LineRange = { min: Infinity, max: -Infinity };
  for (const t of traces) {
    if (t.inline < inline.min) inline.min = t.inline;
    if (t.inline > inline.max) inline.max = t.inline;
    if (t.crossline < crossline.min) crossline.min = t.crossline;
    if (t.crossline > crossline.max) crossline.max = t.crossline;
  }
  return { inline, crossline };
}

/**
 * Rough survey area from the line-number extents, in km².
 * Treats one line step as one metre – the same approximation the
 * inventory dashboards have always shown.
 */
export function surveyAreaKm2(inline: LineRange, crossline: LineRange): number {
  const ilDist = Math.abs(inline.max - inline.min);
  const xlDist = Math.abs(crossline.max - crossline.min);
  return (ilDist * xlDist) / 1_000_000;
}
