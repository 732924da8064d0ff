import { promises as fs } from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { SegyReadError } from '../src/errors.ts';
import { ibmToIeee, readSegy, readSegyFile } from '../src/segyReader.ts';
import { buildSegy, cornerSurvey, makeTempDir } from './helpers/segyFixture.ts';

function wordView(word: number): DataView {
  const view = new DataView(new ArrayBuffer(4));
  view.setUint32(0, word, false);
  return view;
}

describe('ibmToIeee', () => {
  it('decodes IBM single-precision words', () => {
    expect(ibmToIeee(wordView(0x00000000), 0)).toBe(0);
    expect(ibmToIeee(wordView(0x41100000), 0)).toBe(1);
    expect(ibmToIeee(wordView(0xc276a000), 0)).toBe(-118.625);
  });
});

describe('readSegy', () => {
  it('reads the binary header and every trace header', () => {
    const dataset = readSegy(cornerSurvey(), { fileName: 'corners.sgy' });

    expect(dataset.fileName).toBe('corners.sgy');
    expect(dataset.byteSize).toBe(3600 + 4 * (240 + 2 * 4));
    expect(dataset.sampleIntervalUs).toBe(2000);
    expect(dataset.samplesPerTrace).toBe(2);
    expect(dataset.formatCode).toBe(5);
    expect(dataset.totalTraces).toBe(4);
    expect(dataset.headers).toHaveLength(4);
    expect(dataset.headers[2]).toEqual({
      SourceGroupScalar: 0,
      SourceX: 1100,
      SourceY: 2050,
      TRACE_SAMPLE_COUNT: 2,
      CDP_X: 0,
      CDP_Y: 0,
      INLINE_3D: 11,
      CROSSLINE_3D: 21,
    });
    expect(dataset.samples).toBeUndefined();
  });

  it('decodes only maxTraces traces but reports the full count', () => {
    const dataset = readSegy(cornerSurvey(), { maxTraces: 2, withSamples: true });

    expect(dataset.totalTraces).toBe(4);
    expect(dataset.headers).toHaveLength(2);
    expect(Array.from(dataset.samples ?? [])).toEqual([0.5, -0.5, 1, -1]);
  });

  it('decodes IEEE float samples trace after trace', () => {
    const dataset = readSegy(cornerSurvey(), { withSamples: true });

    expect(Array.from(dataset.samples ?? [])).toEqual([0.5, -0.5, 1, -1, 2, -2, 4, -4]);
  });

  it('decodes int16 and IBM float samples', () => {
    const int16 = readSegy(
      buildSegy({ samplesPerTrace: 3, formatCode: 3, traces: [{ samples: [-300, 0, 1200] }] }),
      { withSamples: true }
    );
    expect(Array.from(int16.samples ?? [])).toEqual([-300, 0, 1200]);

    const ibm = readSegy(
      buildSegy({ samplesPerTrace: 2, formatCode: 1, traces: [{ samples: [0x41100000, 0xc276a000] }] }),
      { withSamples: true }
    );
    expect(Array.from(ibm.samples ?? [])).toEqual([1, -118.625]);
  });

  it('decodes int32 and int8 samples', () => {
    const int32 = readSegy(
      buildSegy({ samplesPerTrace: 3, formatCode: 2, traces: [{ samples: [-70000, 0, 2147483647] }] }),
      { withSamples: true }
    );
    expect(int32.formatCode).toBe(2);
    expect(int32.byteSize).toBe(3600 + 240 + 3 * 4);
    expect(Array.from(int32.samples ?? [])).toEqual([-70000, 0, 2147483647]);

    const int8 = readSegy(
      buildSegy({
        samplesPerTrace: 3,
        formatCode: 8,
        traces: [{ inline: 4, samples: [-128, 5, 127] }, { inline: 5, samples: [1, -1, 0] }],
      }),
      { withSamples: true }
    );
    expect(int8.byteSize).toBe(3600 + 2 * (240 + 3));
    expect(int8.totalTraces).toBe(2);
    expect(int8.headers.map((h) => h.INLINE_3D)).toEqual([4, 5]);
    expect(Array.from(int8.samples ?? [])).toEqual([-128, 5, 127, 1, -1, 0]);
  });

  it('skips extended textual headers', () => {
    const dataset = readSegy(
      buildSegy({ samplesPerTrace: 1, extendedHeaders: 2, traces: [{ inline: 77, crossline: 5 }] })
    );

    expect(dataset.totalTraces).toBe(1);
    expect(dataset.headers[0].INLINE_3D).toBe(77);
    expect(dataset.headers[0].CROSSLINE_3D).toBe(5);
  });

  it('accepts a file with headers but no traces', () => {
    const dataset = readSegy(buildSegy({ samplesPerTrace: 10, traces: [] }));

    expect(dataset.totalTraces).toBe(0);
    expect(dataset.headers).toEqual([]);
  });

  it('rejects a file shorter than the headers', () => {
    expect(() => readSegy(new Uint8Array(100), { fileName: 'tiny.sgy' })).toThrow(
      new SegyReadError('file is 100 bytes, shorter than the 3600-byte SEGY headers', { fileName: 'tiny.sgy' })
    );
  });

  it('rejects zero samples per trace', () => {
    expect(() => readSegy(buildSegy({ samplesPerTrace: 0, traces: [] }))).toThrow(
      'binary header declares 0 samples per trace'
    );
  });

  it('rejects an unsupported sample format', () => {
    expect(() => readSegy(buildSegy({ samplesPerTrace: 1, formatCode: 4, traces: [{}] }))).toThrow(
      'unsupported sample format code 4'
    );
  });

  it('rejects a variable extended textual header count', () => {
    const bytes = buildSegy({ samplesPerTrace: 1, extendedHeaders: -1, traces: [{}] });

    expect(() => readSegy(bytes, { fileName: 'ext.sgy' })).toThrow(
      new SegyReadError('variable extended textual header count (-1) is not supported', { fileName: 'ext.sgy' })
    );
  });

  it('rejects non-finite IEEE samples', () => {
    const bytes = buildSegy({ samplesPerTrace: 4, traces: [{ samples: [1, 2, 3, 4] }, { samples: [1, 2, 3, NaN] }] });

    expect(() => readSegy(bytes, { withSamples: true })).toThrow('trace 1 has a non-finite sample 3 (NaN)');
    // headers alone are still readable
    expect(readSegy(bytes).totalTraces).toBe(2);
  });

  it('rejects trace data that is not a whole number of traces', () => {
    const truncated = cornerSurvey().subarray(0, 3600 + 4 * 248 - 1);

    expect(() => readSegy(truncated)).toThrow(SegyReadError);
    expect(() => readSegy(truncated)).toThrow(
      'trace data (991 bytes) is not a multiple of the 248-byte trace size'
    );
  });
});

describe('readSegyFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads the same dataset as the in-memory reader', async () => {
    const filePath = path.join(dir, 'corners.sgy');
    await fs.writeFile(filePath, cornerSurvey());

    const fromDisk = await readSegyFile(filePath, { fileName: 'corners.sgy', withSamples: true });

    expect(fromDisk).toEqual(readSegy(cornerSurvey(), { fileName: 'corners.sgy', withSamples: true }));
  });

  it('reads only the requested traces', async () => {
    const filePath = path.join(dir, 'corners.sgy');
    await fs.writeFile(filePath, cornerSurvey());

    const dataset = await readSegyFile(filePath, { maxTraces: 3, withSamples: true });

    expect(dataset.totalTraces).toBe(4);
    expect(dataset.headers.map((h) => h.SourceX)).toEqual([1000, 1100, 1100]);
    expect(Array.from(dataset.samples ?? [])).toEqual([0.5, -0.5, 1, -1, 2, -2]);
  });

  it('applies the same layout checks', async () => {
    const filePath = path.join(dir, 'tiny.sgy');
    await fs.writeFile(filePath, new Uint8Array(100));

    await expect(readSegyFile(filePath, { fileName: 'tiny.sgy' })).rejects.toThrow(
      'tiny.sgy: file is 100 bytes, shorter than the 3600-byte SEGY headers'
    );
  });

  it('passes a missing file through as ENOENT', async () => {
    await expect(readSegyFile(path.join(dir, 'gone.sgy'))).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
