/* src/types.ts ----------------------------------------------------------- */

/**
 * One trace as seen by the statistics code. Built from the raw reader
 * output by `toTraceHeaderSet` – every field is a finite number.
 */
export interface TraceHeader {
  /** Easting, already multiplied by the header's coordinate scalar */
  x: number;
  /** Northing, already multiplied by the header's coordinate scalar */
  y: number;
  sampleCount: number;
  inline: number;
  crossline: number;
}

export type TraceHeaderSet = ReadonlyArray<TraceHeader>;

export interface BoundingBox {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

/**
 * Result of `summarize`. `boundingBox` is left out entirely for an empty
 * trace set – never filled with zeros.
 */
export interface SurveySummary {
  readonly traceCount: number;
  readonly byteSize: number;
  readonly boundingBox?: Readonly<BoundingBox>;
  readonly area: number;
}

export interface LineRange {
  min: number;
  max: number;
}

/** Per-file record produced by the analyzer. */
export interface SegyFileReport {
  filePath: string;
  fileName: string;
  sizeMb: number;
  /** Every trace in the file, even when only part of it was decoded */
  totalTraces: number;
  sampleIntervalUs: number;
  samplesPerTrace: number;
  inlineRange?: LineRange;
  crosslineRange?: LineRange;
  surveyAreaKm2: number;
  summary: SurveySummary;
}

export interface InventoryEntry {
  filePath: string;
  fileName: string;
  sizeMb: number;
}

/** One row of an inventory CSV export */
export interface InventoryRecord extends InventoryEntry {
  fileType: string;
  /** Content hash; an empty string means the file was never hashed */
  hash: string;
}

export interface FileError {
  filePath: string;
  error: string;
}

export interface InventoryAnalysis {
  reports: SegyFileReport[];
  missingFiles: string[];
  errorFiles: FileError[];
}

export interface SurveyCoverage {
  totalSegyFiles: number;
  accessibleFiles: number;
  missingFiles: number;
  errorFiles: number;
  totalAreaKm2: number;
  sizeGb: number;
}

export interface SurveyBoundaries {
  inlineRange: LineRange;
  crosslineRange: LineRange;
}

export interface TraceStatistics {
  mean: number;
  median: number;
  standardDeviation: number;
  min: number;
  max: number;
  rms: number;
}

export interface HistogramBin {
  /** Inclusive lower edge */
  start: number;
  /** Exclusive upper edge (inclusive for the last bin) */
  end: number;
  count: number;
}

export type CoordinateSource = "source" | "cdp";

/** Dashboard grouping: by the inventory's file type, or by file extension */
export type GroupBy = "fileType" | "extension";

export interface InventoryOverview {
  totalFiles: number;
  totalSizeGb: number;
  uniqueFileTypes: number;
}

/** One row of the grouped breakdown */
export interface CategorySummary {
  /** File type, or the extension when grouping by extension */
  category: string;
  /** Set when grouping by extension: rows are per extension and file type */
  fileType?: string;
  totalFiles: number;
  duplicateFiles: number;
  originalFiles: number;
  avgSizeMb: number;
  totalSizeMb: number;
}

export interface PieSlice {
  name: string;
  value: number;
  percentage: number;
  /** Slices under 5 % are left to the legend */
  showLabel: boolean;
}

export interface PieChart {
  total: number;
  slices: PieSlice[];
}

export interface LargestFile {
  fileName: string;
  filePath: string;
  fileType: string;
  extension: string;
  sizeMb: number;
  sizeGb: number;
  hash: string;
}

export interface DuplicateAnalysis {
  /** Every file whose hash occurs more than once, first copies included */
  duplicateFiles: number;
  duplicatePercentage: number;
  duplicateSizeGb: number;
  summary: CategorySummary[];
  countChart: PieChart;
  sizeChart: PieChart;
}

export interface InventoryDashboard {
  groupBy: GroupBy;
  overview: InventoryOverview;
  summary: CategorySummary[];
  countChart: PieChart;
  sizeChart: PieChart;
  largestFiles: LargestFile[];
  duplicates: DuplicateAnalysis;
}
