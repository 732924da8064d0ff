/*********************************************************************
 * src/segyAnalyzer.ts
 *
 * Glue between the reader and the statistics:
 *   bytes | file → readSegy(File) → toTraceHeaderSet → summarize / lineRanges
 *
 * `analyzeSegyBytes` handles one uploaded file, `analyzeSegyFile` one
 * file on disk; `analyzeInventory` loops over an inventory, collecting
 * missing and unreadable files instead of stopping at the first one.
 *********************************************************************/

import * as path from "path";
import { errorMessage } from "./errors.ts";
import { isSegyFileName } from "./inventory.ts";
import { readSegy, readSegyFile, type SegyDataset } from "./segyReader.ts";
import { lineRanges, summarize, surveyAreaKm2 } from "./surveyStats.ts";
import { toTraceHeaderSet } from "./traceHeaders.ts";
import type {
  CoordinateSource,
  InventoryAnalysis,
  InventoryEntry,
  LineRange,
  SegyFileReport,
  SurveyBoundaries,
  SurveyCoverage,
  TraceHeaderSet,
} from "./types.ts";

const BYTES_PER_MB = 1024 * 1024;

export interface AnalyzeOptions {
  maxTraces?: number;
  coordinates?: CoordinateSource;
  withSamples?: boolean;
}

export interface InventoryOptions extends AnalyzeOptions {
  /**
   * Called with every file that analyzed cleanly, before the next one is
   * read. A rejection aborts the whole run.
   */
  onAnalyzed?: (analysis: SegyAnalysis) => Promise<void>;
}

export interface SegyAnalysis {
  report: SegyFileReport;
  traces: TraceHeaderSet;
  samples?: Float64Array;
}

function buildAnalysis(
  dataset: SegyDataset,
  file: { fileName: string; filePath: string },
  options: AnalyzeOptions
): SegyAnalysis {
  const { fileName, filePath } = file;
  const traces = toTraceHeaderSet(dataset.headers, {
    coordinates: options.coordinates,
    fileName,
  });

  const ranges = lineRanges(traces);
  const report: SegyFileReport = {
    filePath,
    fileName,
    sizeMb: dataset.byteSize / BYTES_PER_MB,
    totalTraces: dataset.totalTraces,
    sampleIntervalUs: dataset.sampleIntervalUs,
    samplesPerTrace: dataset.samplesPerTrace,
    inlineRange: ranges?.inline,
    crosslineRange: ranges?.crossline,
    surveyAreaKm2: ranges ? surveyAreaKm2(ranges.inline, ranges.crossline) : 0,
    summary: summarize(traces, dataset.byteSize),
  };

  return { report, traces, samples: dataset.samples };
}

export function analyzeSegyBytes(
  bytes: Uint8Array,
  file: { fileName: string; filePath?: string },
  options: AnalyzeOptions = {}
): SegyAnalysis {
  const { fileName, filePath = fileName } = file;
  const dataset = readSegy(bytes, {
    fileName,
    maxTraces: options.maxTraces,
    withSamples: options.withSamples,
  });
  return buildAnalysis(dataset, { fileName, filePath }, options);
}

/** Analyze a file on disk without loading more of it than the decoded traces. */
export async function analyzeSegyFile(
  filePath: string,
  fileName: string = path.basename(filePath),
  options: AnalyzeOptions = {}
): Promise<SegyAnalysis> {
  const dataset = await readSegyFile(filePath, {
    fileName,
    maxTraces: options.maxTraces,
    withSamples: options.withSamples,
  });
  return buildAnalysis(dataset, { fileName, filePath }, options);
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Analyze every SEGY file of the inventory, one after the other. */
export async function analyzeInventory(
  entries: ReadonlyArray<InventoryEntry>,
  options: InventoryOptions = {}
): Promise<InventoryAnalysis> {
  const { onAnalyzed, ...analyzeOptions } = options;
  const result: InventoryAnalysis = { reports: [], missingFiles: [], errorFiles: [] };

  for (const entry of entries.filter((e) => isSegyFileName(e.fileName))) {
    let analysis: SegyAnalysis;
    try {
      analysis = await analyzeSegyFile(entry.filePath, entry.fileName, {
        ...analyzeOptions,
        withSamples: false,
      });
    } catch (err) {
      if (isMissing(err)) {
        console.warn(`⚠️  ${entry.filePath} listed in the inventory but not found`);
        result.missingFiles.push(entry.filePath);
      } else {
        console.error(`❌ Error analyzing SEGY file ${entry.filePath}: ${errorMessage(err)}`);
        result.errorFiles.push({ filePath: entry.filePath, error: errorMessage(err) });
      }
      continue;
    }

    if (onAnalyzed) await onAnalyzed(analysis);
    result.reports.push(analysis.report);
  }

  return result;
}

export function surveyCoverage(
  entries: ReadonlyArray<InventoryEntry>,
  analysis: InventoryAnalysis
): SurveyCoverage {
  const segyEntries = entries.filter((e) => isSegyFileName(e.fileName));
  const totalSizeMb = segyEntries.reduce((sum, e) => sum + e.sizeMb, 0);

  return {
    totalSegyFiles: segyEntries.length,
    accessibleFiles: analysis.reports.length,
    missingFiles: analysis.missingFiles.length,
    errorFiles: analysis.errorFiles.length,
    totalAreaKm2: analysis.reports.reduce((sum, r) => sum + r.surveyAreaKm2, 0),
    sizeGb: totalSizeMb / 1024,
  };
}

function mergeRange(acc: LineRange | undefined, next: LineRange | undefined): LineRange | undefined {
  if (!next) return acc;
  if (!acc) return { ...next };
  return { min: Math.min(acc.min, next.min), max: Math.max(acc.max, next.max) };
}

/** Overall inline / crossline extent over all analyzed files. */
export function surveyBoundaries(reports: ReadonlyArray<SegyFileReport>): SurveyBoundaries | undefined {
  let inlineRange: LineRange | undefined;
  let crosslineRange: LineRange | undefined;
  for (const r of reports) {
    inlineRange = mergeRange(inlineRange, r.inlineRange);
    crosslineRange = mergeRange(crosslineRange, r.crosslineRange);
  }
  if (!inlineRange || !crosslineRange) return undefined;
  return { inlineRange, crosslineRange };
}
