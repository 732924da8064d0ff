import { describe, expect, it } from 'vitest';

import { amplitudeHistogram, computeTraceStatistics, percentile } from '../src/traceStatistics.ts';

describe('percentile', () => {
  it('interpolates linearly between ranks', () => {
    const sorted = [1, 2, 3, 4];

    expect(percentile(sorted, 0)).toBe(1);
    expect(percentile(sorted, 25)).toBe(1.75);
    expect(percentile(sorted, 50)).toBe(2.5);
    expect(percentile(sorted, 75)).toBe(3.25);
    expect(percentile(sorted, 100)).toBe(4);
  });

  it('rejects an empty sample set', () => {
    expect(() => percentile([], 50)).toThrow(RangeError);
  });
});

describe('computeTraceStatistics', () => {
  it('computes mean, median, spread and RMS', () => {
    const stats = computeTraceStatistics(Float64Array.of(4, 1, 3, 2));

    expect(stats).toEqual({
      mean: 2.5,
      median: 2.5,
      standardDeviation: Math.sqrt(1.25),
      min: 1,
      max: 4,
      rms: Math.sqrt(7.5),
    });
  });

  it('uses the middle value as median for odd counts', () => {
    expect(computeTraceStatistics([-5, 10, 0]).median).toBe(0);
  });

  it('rejects an empty sample set', () => {
    expect(() => computeTraceStatistics([])).toThrow('no samples to compute statistics from');
  });

  it('rejects samples that are not finite', () => {
    expect(() => computeTraceStatistics([1, 2, 3, NaN])).toThrow(
      new RangeError('sample 3 is not a finite number (NaN)')
    );
    expect(() => computeTraceStatistics(Float64Array.of(Infinity, 0))).toThrow('sample 0 is not a finite number (Infinity)');
  });
});

describe('amplitudeHistogram', () => {
  it('drops IQR outliers before binning', () => {
    const bins = amplitudeHistogram([1, 2, 3, 4, 100], 3);

    expect(bins).toEqual([
      { start: 1, end: 2, count: 1 },
      { start: 2, end: 3, count: 1 },
      { start: 3, end: 4, count: 2 },
    ]);
  });

  it('defaults to 100 bins', () => {
    const bins = amplitudeHistogram([0, 1, 2, 3]);

    expect(bins).toHaveLength(100);
    expect(bins.reduce((sum, b) => sum + b.count, 0)).toBe(4);
    expect(bins[99].end).toBe(3);
  });

  it('puts constant samples into a single bin', () => {
    expect(amplitudeHistogram([5, 5, 5], 10)).toEqual([{ start: 5, end: 5, count: 3 }]);
  });

  it('returns no bins for no samples', () => {
    expect(amplitudeHistogram([])).toEqual([]);
  });

  it('rejects samples that are not finite', () => {
    expect(() => amplitudeHistogram([1, 2, 3, NaN])).toThrow(new RangeError('sample 3 is not a finite number (NaN)'));
  });

  it('rejects a non-positive bin count', () => {
    expect(() => amplitudeHistogram([1, 2], 0)).toThrow(RangeError);
  });
});
