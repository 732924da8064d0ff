// src/traceStatistics.ts
// Amplitude statistics and histogram bins for the chart data of one upload.
import type { HistogramBin, TraceStatistics } from "./types.ts";

type Samples = ArrayLike<number>;

function assertFinite(samples: Samples): void {
  for (let i = 0; i < samples.length; i++) {
    if (!Number.isFinite(samples[i])) {
      throw new RangeError(`sample ${i} is not a finite number (${samples[i]})`);
    }
  }
}

function sortedCopy(samples: Samples): Float64Array {
  return Float64Array.from(samples).sort();
}

/**
 * Percentile with linear interpolation between the two closest ranks.
 * `sorted` must be ascending; `q` is in [0, 100].
 */
export function percentile(sorted: Samples, q: number): number {
  if (sorted.length === 0) throw new RangeError("percentile of an empty sample set");
  const pos = (q / 100) * (sorted.length - 1);
  const lo = Math.floor(pos);
  const hi = Math.min(lo + 1, sorted.length - 1);
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo);
}

/** Basic amplitude statistics over the decoded samples, which must all be finite. */
export function computeTraceStatistics(samples: Samples): TraceStatistics {
  const n = samples.length;
  if (n === 0) throw new RangeError("no samples to compute statistics from");
  assertFinite(samples);

  let sum = 0,
    sumSq = 0,
    min = Infinity,
    max = -Infinity;
  for (let i = 0; i < n; i++) {
    const v = samples[i];
    sum += v;
    sumSq += v * v;
    if (v < min) min = v;
    if (v > max) max = v;
  }
  const mean = sum / n;

  let squaredDev = 0;
  for (let i = 0; i < n; i++) {
    const d = samples[i] - mean;
    squaredDev += d * d;
  }

  return {
    mean,
    median: percentile(sortedCopy(samples), 50),
    standardDeviation: Math.sqrt(squaredDev / n),
    min,
    max,
    rms: Math.sqrt(sumSq / n),
  };
}

/**
 * Equal‑width histogram of the amplitudes after dropping outliers
 * outside 1.5 × IQR of the quartiles.
 */
export function amplitudeHistogram(samples: Samples, binCount = 100): HistogramBin[] {
  if (!Number.isInteger(binCount) || binCount < 1) {
    throw new RangeError(`binCount must be a positive integer, got ${binCount}`);
  }
  if (samples.length === 0) return [];
  assertFinite(samples);

  const sorted = sortedCopy(samples);
  const q1 = percentile(sorted, 25);
  const q3 = percentile(sorted, 75);
  const iqr = q3 - q1;
  const low = q1 - 1.5 * iqr;
  const high = q3 + 1.5 * iqr;
  const kept = sorted.filter((v) => v >= low && v <= high);

  // With finite samples the quartiles lie inside the data, so `kept` is never empty
  const min = kept[0];
  const max = kept[kept.length - 1];
  if (min === max) return [{ start: min, end: max, count: kept.length }];

  const width = (max - min) / binCount;
  const bins: HistogramBin[] = Array.from({ length: binCount }, (_, i) => ({
    start: min + i * width,
    end: i === binCount - 1 ? max : min + (i + 1) * width,
    count: 0,
  }));
  for (const v of kept) {
    const idx = Math.min(binCount - 1, Math.floor((v - min) / width));
    bins[idx].count++;
  }
  return bins;
}
