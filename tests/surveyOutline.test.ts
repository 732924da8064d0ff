import { describe, expect, it } from 'vitest';

import { boundaryRing, simplifyPath, surveyOutline } from '../src/surveyOutline.ts';
import type { TraceHeader } from '../src/types.ts';

function trace(x: number, y: number): TraceHeader {
  return { x, y, sampleCount: 1, inline: 0, crossline: 0 };
}

describe('boundaryRing', () => {
  it('closes the ring on its first corner', () => {
    expect(boundaryRing({ minX: 0, maxX: 10, minY: 0, maxY: 5 })).toEqual([
      [0, 0],
      [10, 0],
      [10, 5],
      [0, 5],
      [0, 0],
    ]);
  });
});

describe('simplifyPath', () => {
  it('drops points on a straight line', () => {
    const path = simplifyPath(
      [
        [0, 0],
        [1, 0],
        [2, 0],
        [3, 0],
      ],
      0.5
    );

    expect(path).toEqual([
      [0, 0],
      [3, 0],
    ]);
  });

  it('only removes consecutive duplicates when the tolerance is zero', () => {
    const path = simplifyPath(
      [
        [0, 0],
        [0, 0],
        [1, 1],
        [2, 2],
      ],
      0
    );

    expect(path).toEqual([
      [0, 0],
      [1, 1],
      [2, 2],
    ]);
  });

  it('leaves two-point paths alone', () => {
    expect(
      simplifyPath(
        [
          [0, 0],
          [5, 5],
        ],
        100
      )
    ).toEqual([
      [0, 0],
      [5, 5],
    ]);
  });
});

describe('surveyOutline', () => {
  it('holds the boundary polygon and the acquisition path', () => {
    const traces = [trace(0, 0), trace(10, 0), trace(10, 5)];
    const outline = surveyOutline(traces, { minX: 0, maxX: 10, minY: 0, maxY: 5 });

    expect(outline.type).toBe('FeatureCollection');
    expect(outline.features).toHaveLength(2);
    expect(outline.features[0]).toEqual({
      type: 'Feature',
      properties: { kind: 'boundary', pointCount: 5 },
      geometry: { type: 'Polygon', coordinates: [boundaryRing({ minX: 0, maxX: 10, minY: 0, maxY: 5 })] },
    });
    expect(outline.features[1]).toEqual({
      type: 'Feature',
      properties: { kind: 'path', pointCount: 3 },
      geometry: {
        type: 'LineString',
        coordinates: [
          [0, 0],
          [10, 0],
          [10, 5],
        ],
      },
    });
  });

  it('is empty when there are no traces', () => {
    expect(surveyOutline([], undefined)).toEqual({ type: 'FeatureCollection', features: [] });
  });
});
