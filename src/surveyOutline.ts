/*********************************************************************
 * src/surveyOutline.ts
 *
 * Chart/map geometry for one survey:
 *   - the closed bounding‑box ring (five points, first == last)
 *   - the acquisition path in trace order, Douglas‑Peucker simplified
 * both wrapped in a GeoJSON FeatureCollection. Coordinates stay in the
 * survey's projected units (usually metres).
 *********************************************************************/

import simplify from "simplify-js";
import type { BoundingBox, TraceHeaderSet } from "./types.ts";

export type Position = [number, number];

export interface OutlineFeature {
  type: "Feature";
  properties: { kind: "boundary" | "path"; pointCount: number };
  geometry:
    | { type: "Polygon"; coordinates: Position[][] }
    | { type: "LineString"; coordinates: Position[] };
}

export interface SurveyOutline {
  type: "FeatureCollection";
  features: OutlineFeature[];
}

/** Closed ring around the box, counter‑clockwise from the lower‑left corner. */
export function boundaryRing(box: BoundingBox): Position[] {
  return [
    [box.minX, box.minY],
    [box.maxX, box.minY],
    [box.maxX, box.maxY],
    [box.minX, box.maxY],
    [box.minX, box.minY],
  ];
}

/**
 * Run RDP on the path. Paths of two points or fewer are returned as is,
 * consecutive duplicates are dropped first.
 */
export function simplifyPath(coords: Position[], tolerance: number): Position[] {
  const cleaned: Position[] = [];
  for (const pt of coords) {
    const last = cleaned[cleaned.length - 1];
    if (last && last[0] === pt[0] && last[1] === pt[1]) continue;
    cleaned.push(pt);
  }
  if (cleaned.length <= 2 || tolerance <= 0) return cleaned;

  const points = cleaned.map(([x, y]) => ({ x, y }));
  return simplify(points, tolerance, false).map((p): Position => [p.x, p.y]);
}

export function surveyOutline(
  traces: TraceHeaderSet,
  box: BoundingBox | undefined,
  tolerance = 0
): SurveyOutline {
  const features: OutlineFeature[] = [];

  if (box) {
    features.push({
      type: "Feature",
      properties: { kind: "boundary", pointCount: 5 },
      geometry: { type: "Polygon", coordinates: [boundaryRing(box)] },
    });
  }

  const path = simplifyPath(
    traces.map((t): Position => [t.x, t.y]),
    tolerance
  );
  if (path.length > 0) {
    features.push({
      type: "Feature",
      properties: { kind: "path", pointCount: path.length },
      geometry: { type: "LineString", coordinates: path },
    });
  }

  return { type: "FeatureCollection", features };
}
