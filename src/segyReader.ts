/*********************************************************************
 * src/segyReader.ts
 *
 * Narrow SEGY reader: binary header, trace headers and (optionally)
 * the amplitude samples. Everything is big‑endian.
 *
 *   0     3200 bytes  textual header (EBCDIC / ASCII, ignored)
 *   3200   400 bytes  binary header
 *   3600  n × 3200    extended textual headers (count at byte 3505)
 *   ...   traces      240‑byte header + samples × bytesPerSample
 *
 * The trace headers come back as loose `Record<string, number>` rows
 * keyed by field name; `toTraceHeaderSet` turns them into typed records.
 *
 * `readSegy` works on bytes already in memory (uploads); `readSegyFile`
 * reads at offsets from an open file, so inventory files never have to
 * fit into one buffer.
 *********************************************************************/

import { promises as fs } from "fs";
import type { FileHandle } from "fs/promises";
import { SegyReadError } from "./errors.ts";

export const TEXT_HEADER_SIZE = 3200;
export const BINARY_HEADER_SIZE = 400;
export const TRACE_HEADER_SIZE = 240;

/** Binary header byte offsets (0‑based) */
const BIN_SAMPLE_INTERVAL = 3216;
const BIN_SAMPLES_PER_TRACE = 3220;
const BIN_FORMAT_CODE = 3224;
const BIN_EXTENDED_HEADERS = 3504;

/** Trace header fields – 0‑based offset and width in bytes */
export const TRACE_FIELDS = {
  SourceGroupScalar: { offset: 70, size: 2 },
  SourceX: { offset: 72, size: 4 },
  SourceY: { offset: 76, size: 4 },
  TRACE_SAMPLE_COUNT: { offset: 114, size: 2 },
  CDP_X: { offset: 180, size: 4 },
  CDP_Y: { offset: 184, size: 4 },
  INLINE_3D: { offset: 188, size: 4 },
  CROSSLINE_3D: { offset: 192, size: 4 },
} as const;

export type TraceField = keyof typeof TRACE_FIELDS;

export type RawTraceHeader = Record<string, number>;

type SampleDecoder = (view: DataView, offset: number) => number;

/**
 * Converts IBM System/360 floats (still common in older SEGY files) to
 * IEEE doubles.
 */
export const ibmToIeee = (view: DataView, offset: number): number => {
  const word = view.getUint32(offset, false);
  if (word === 0) return 0.0;

  const sign = (word >>> 31) & 0x01;
  const exp = (word >>> 24) & 0x7f;
  const fraction = (word & 0x00ffffff) / 0x1000000;

  return (sign ? -1 : 1) * fraction * Math.pow(16, exp - 64);
};

const SAMPLE_FORMATS: Record<number, { bytes: number; decode: SampleDecoder }> = {
  1: { bytes: 4, decode: ibmToIeee },
  2: { bytes: 4, decode: (v, o) => v.getInt32(o, false) },
  3: { bytes: 2, decode: (v, o) => v.getInt16(o, false) },
  5: { bytes: 4, decode: (v, o) => v.getFloat32(o, false) },
  8: { bytes: 1, decode: (v, o) => v.getInt8(o) },
};

export interface ReadSegyOptions {
  fileName?: string;
  /** Decode at most this many traces (the total count is still reported) */
  maxTraces?: number;
  /** Also decode the amplitude samples of the decoded traces */
  withSamples?: boolean;
}

export interface SegyDataset {
  fileName?: string;
  byteSize: number;
  sampleIntervalUs: number;
  samplesPerTrace: number;
  formatCode: number;
  totalTraces: number;
  headers: RawTraceHeader[];
  /** Samples of the decoded traces, trace after trace */
  samples?: Float64Array;
}

function readField(view: DataView, base: number, field: TraceField): number {
  const { offset, size } = TRACE_FIELDS[field];
  return size === 2
    ? view.getInt16(base + offset, false)
    : view.getInt32(base + offset, false);
}

const HEADER_END = TEXT_HEADER_SIZE + BINARY_HEADER_SIZE;

/** Read files in blocks of whole traces of roughly this many bytes */
const READ_BLOCK_BYTES = 4 * 1024 * 1024;

interface TraceLayout {
  sampleIntervalUs: number;
  samplesPerTrace: number;
  formatCode: number;
  bytesPerSample: number;
  decode: SampleDecoder;
  dataStart: number;
  traceSize: number;
  totalTraces: number;
}

interface DecodeTarget {
  fileName?: string;
  headers: RawTraceHeader[];
  samples?: Float64Array;
}

function fail(fileName: string | undefined, message: string, traceIndex?: number): never {
  throw new SegyReadError(message, { fileName, traceIndex });
}

/**
 * Validate the binary header against the file length. `head` must hold
 * the first 3600 bytes whenever `byteSize` allows it.
 */
function parseLayout(head: DataView, byteSize: number, fileName?: string): TraceLayout {
  if (byteSize < HEADER_END) {
    fail(fileName, `file is ${byteSize} bytes, shorter than the ${HEADER_END}-byte SEGY headers`);
  }

  const sampleIntervalUs = head.getUint16(BIN_SAMPLE_INTERVAL, false);
  const samplesPerTrace = head.getUint16(BIN_SAMPLES_PER_TRACE, false);
  const formatCode = head.getInt16(BIN_FORMAT_CODE, false);
  const extendedHeaders = head.getInt16(BIN_EXTENDED_HEADERS, false);

  if (samplesPerTrace === 0) fail(fileName, "binary header declares 0 samples per trace");

  const format = SAMPLE_FORMATS[formatCode];
  if (!format) fail(fileName, `unsupported sample format code ${formatCode}`);

  if (extendedHeaders < 0) {
    fail(fileName, `variable extended textual header count (${extendedHeaders}) is not supported`);
  }

  const dataStart = HEADER_END + extendedHeaders * TEXT_HEADER_SIZE;
  const dataLength = byteSize - dataStart;
  if (dataLength < 0) {
    fail(fileName, `file ends inside its ${extendedHeaders} extended textual header(s)`);
  }

  const traceSize = TRACE_HEADER_SIZE + samplesPerTrace * format.bytes;
  if (dataLength % traceSize !== 0) {
    fail(
      fileName,
      `trace data (${dataLength} bytes) is not a multiple of the ${traceSize}-byte trace size`
    );
  }

  return {
    sampleIntervalUs,
    samplesPerTrace,
    formatCode,
    bytesPerSample: format.bytes,
    decode: format.decode,
    dataStart,
    traceSize,
    totalTraces: dataLength / traceSize,
  };
}

function decodeCountFor(layout: TraceLayout, maxTraces?: number): number {
  return maxTraces === undefined
    ? layout.totalTraces
    : Math.min(Math.max(0, maxTraces), layout.totalTraces);
}

/**
 * Decode `count` consecutive traces starting at `base` in `view`;
 * `firstIndex` is the file‑wide index of the first one.
 */
function decodeTraces(
  view: DataView,
  base: number,
  count: number,
  firstIndex: number,
  layout: TraceLayout,
  out: DecodeTarget
): void {
  const { samplesPerTrace, bytesPerSample, decode, traceSize } = layout;
  for (let i = 0; i < count; i++) {
    const pos = base + i * traceSize;
    const header: RawTraceHeader = {};
    for (const field of Object.keys(TRACE_FIELDS) as TraceField[]) {
      header[field] = readField(view, pos, field);
    }
    out.headers.push(header);

    if (out.samples) {
      const traceIndex = firstIndex + i;
      const sampleBase = pos + TRACE_HEADER_SIZE;
      for (let s = 0; s < samplesPerTrace; s++) {
        const value = decode(view, sampleBase + s * bytesPerSample);
        // only IEEE floats can carry NaN / ±Infinity
        if (!Number.isFinite(value)) {
          fail(out.fileName, `trace ${traceIndex} has a non-finite sample ${s} (${value})`, traceIndex);
        }
        out.samples[traceIndex * samplesPerTrace + s] = value;
      }
    }
  }
}

function toDataset(
  layout: TraceLayout,
  byteSize: number,
  out: DecodeTarget
): SegyDataset {
  return {
    fileName: out.fileName,
    byteSize,
    sampleIntervalUs: layout.sampleIntervalUs,
    samplesPerTrace: layout.samplesPerTrace,
    formatCode: layout.formatCode,
    totalTraces: layout.totalTraces,
    headers: out.headers,
    samples: out.samples,
  };
}

/**
 * Decode a SEGY byte stream. Throws `SegyReadError` when the bytes do not
 * describe a whole number of fixed‑length traces in a supported format.
 */
export function readSegy(bytes: Uint8Array, options: ReadSegyOptions = {}): SegyDataset {
  const { fileName, maxTraces, withSamples = false } = options;
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const layout = parseLayout(view, bytes.byteLength, fileName);

  const count = decodeCountFor(layout, maxTraces);
  const out: DecodeTarget = {
    fileName,
    headers: [],
    samples: withSamples ? new Float64Array(count * layout.samplesPerTrace) : undefined,
  };
  decodeTraces(view, layout.dataStart, count, 0, layout, out);
  return toDataset(layout, bytes.byteLength, out);
}

async function readAt(
  handle: FileHandle,
  into: Uint8Array,
  position: number,
  fileName?: string
): Promise<void> {
  const { bytesRead } = await handle.read(into, 0, into.byteLength, position);
  if (bytesRead !== into.byteLength) {
    fail(fileName, `short read at byte ${position}: got ${bytesRead} of ${into.byteLength}`);
  }
}

/**
 * Same as `readSegy`, but reads from disk: the size comes from `stat`,
 * and only the headers plus the traces that get decoded are read, in
 * blocks of whole traces.
 */
export async function readSegyFile(filePath: string, options: ReadSegyOptions = {}): Promise<SegyDataset> {
  const { fileName, maxTraces, withSamples = false } = options;
  const handle = await fs.open(filePath, "r");
  try {
    const { size } = await handle.stat();
    const head = new Uint8Array(Math.min(size, HEADER_END));
    await readAt(handle, head, 0, fileName);
    const layout = parseLayout(new DataView(head.buffer), size, fileName);

    const count = decodeCountFor(layout, maxTraces);
    const out: DecodeTarget = {
      fileName,
      headers: [],
      samples: withSamples ? new Float64Array(count * layout.samplesPerTrace) : undefined,
    };

    const tracesPerBlock = Math.max(1, Math.floor(READ_BLOCK_BYTES / layout.traceSize));
    const block = new Uint8Array(Math.min(tracesPerBlock, count) * layout.traceSize);
    const view = new DataView(block.buffer);
    for (let first = 0; first < count; first += tracesPerBlock) {
      const n = Math.min(tracesPerBlock, count - first);
      const chunk = n * layout.traceSize === block.byteLength ? block : block.subarray(0, n * layout.traceSize);
      await readAt(handle, chunk, layout.dataStart + first * layout.traceSize, fileName);
      decodeTraces(view, 0, n, first, layout, out);
    }

    return toDataset(layout, size, out);
  } finally {
    await handle.close();
  }
}
