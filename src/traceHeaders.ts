// src/traceHeaders.ts
import { SegyReadError } from "./errors.ts";
import type { RawTraceHeader } from "./segyReader.ts";
import type { CoordinateSource, TraceHeader, TraceHeaderSet } from "./types.ts";

/**
 * SEGY coordinate scalar: positive multiplies, negative divides,
 * zero means "no scaling".
 */
export function applyScalar(value: number, scalar: number): number {
  if (scalar > 0) return value * scalar;
  if (scalar < 0) return value / -scalar;
  return value;
}

export interface TraceHeaderOptions {
  coordinates?: CoordinateSource;
  fileName?: string;
}

/**
 * Map the reader's loose header rows into a typed, frozen `TraceHeaderSet`.
 * A missing or non‑finite value is a parse failure – it is never folded
 * into the statistics.
 */
export function toTraceHeaderSet(
  raw: ReadonlyArray<RawTraceHeader>,
  options: TraceHeaderOptions = {}
): TraceHeaderSet {
  const { coordinates = "source", fileName } = options;
  const [xKey, yKey] = coordinates === "cdp" ? ["CDP_X", "CDP_Y"] : ["SourceX", "SourceY"];

  const traces: TraceHeader[] = raw.map((row, index) => {
    const field = (key: string): number => {
      const value = row[key];
      if (typeof value !== "number" || !Number.isFinite(value)) {
        throw new SegyReadError(`trace ${index} has a non-finite ${key} (${String(value)})`, {
          fileName,
          traceIndex: index,
        });
      }
      return value;
    };

    const scalar = field("SourceGroupScalar");
    return Object.freeze({
      x: applyScalar(field(xKey), scalar),
      y: applyScalar(field(yKey), scalar),
      sampleCount: field("TRACE_SAMPLE_COUNT"),
      inline: field("INLINE_3D"),
      crossline: field("CROSSLINE_3D"),
    });
  });

  return Object.freeze(traces);
}
