import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

export interface FixtureTrace {
  scalar?: number;
  sourceX?: number;
  sourceY?: number;
  cdpX?: number;
  cdpY?: number;
  inline?: number;
  crossline?: number;
  /** Format 1 samples are written as raw IBM words */
  samples?: number[];
}

export interface FixtureOptions {
  samplesPerTrace: number;
  sampleIntervalUs?: number;
  formatCode?: number;
  extendedHeaders?: number;
  traces: FixtureTrace[];
}

const BYTES_PER_SAMPLE: Record<number, number> = { 1: 4, 2: 4, 3: 2, 4: 4, 5: 4, 8: 1 };

function writeSample(view: DataView, offset: number, formatCode: number, value: number) {
  switch (formatCode) {
    case 1:
      view.setUint32(offset, value, false);
      break;
    case 2:
      view.setInt32(offset, value, false);
      break;
    case 3:
      view.setInt16(offset, value, false);
      break;
    case 8:
      view.setInt8(offset, value);
      break;
    default:
      view.setFloat32(offset, value, false);
  }
}

/** Minimal big-endian SEGY file held in memory. */
export function buildSegy(options: FixtureOptions): Uint8Array {
  const { samplesPerTrace, sampleIntervalUs = 2000, formatCode = 5, extendedHeaders = 0, traces } = options;
  const bytesPerSample = BYTES_PER_SAMPLE[formatCode] ?? 4;
  const traceSize = 240 + samplesPerTrace * bytesPerSample;
  const dataStart = 3600 + Math.max(0, extendedHeaders) * 3200;

  const bytes = new Uint8Array(dataStart + traces.length * traceSize);
  const view = new DataView(bytes.buffer);

  view.setUint16(3216, sampleIntervalUs, false);
  view.setUint16(3220, samplesPerTrace, false);
  view.setInt16(3224, formatCode, false);
  view.setInt16(3504, extendedHeaders, false);

  traces.forEach((trace, i) => {
    const base = dataStart + i * traceSize;
    view.setInt16(base + 70, trace.scalar ?? 0, false);
    view.setInt32(base + 72, trace.sourceX ?? 0, false);
    view.setInt32(base + 76, trace.sourceY ?? 0, false);
    view.setUint16(base + 114, samplesPerTrace, false);
    view.setInt32(base + 180, trace.cdpX ?? 0, false);
    view.setInt32(base + 184, trace.cdpY ?? 0, false);
    view.setInt32(base + 188, trace.inline ?? 0, false);
    view.setInt32(base + 192, trace.crossline ?? 0, false);

    (trace.samples ?? []).forEach((value, s) => {
      writeSample(view, base + 240 + s * bytesPerSample, formatCode, value);
    });
  });

  return bytes;
}

/** Four traces on the corners of a 100 × 50 rectangle, inlines 10–11, crosslines 20–21. */
export function cornerSurvey(): Uint8Array {
  return buildSegy({
    samplesPerTrace: 2,
    traces: [
      { sourceX: 1000, sourceY: 2000, inline: 10, crossline: 20, samples: [0.5, -0.5] },
      { sourceX: 1100, sourceY: 2000, inline: 10, crossline: 21, samples: [1, -1] },
      { sourceX: 1100, sourceY: 2050, inline: 11, crossline: 21, samples: [2, -2] },
      { sourceX: 1000, sourceY: 2050, inline: 11, crossline: 20, samples: [4, -4] },
    ],
  });
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'segy-stats-'));
}
