/*********************************************************************
 * src/inventoryDashboard.ts
 *
 * Numbers behind the file inventory dashboard: overview, grouped
 * breakdown, pie chart data, the largest files and the duplicates.
 *
 * A file counts as a duplicate when an earlier row carries the same
 * hash; the first copy is the "original". Rows without a hash are
 * never duplicates.
 *********************************************************************/

import type {
  CategorySummary,
  DuplicateAnalysis,
  GroupBy,
  InventoryDashboard,
  InventoryOverview,
  InventoryRecord,
  LargestFile,
  PieChart,
  PieSlice,
} from "./types.ts";

/** Pie charts with more categories than this fold the tail into "Other" */
const MAX_PIE_SLICES = 8;
const LARGEST_FILES = 20;

/** `seismic data` → `Seismic Data`, `3d-SEISMIC` → `3D-Seismic` */
export function titleCase(value: string): string {
  return value.replace(/[A-Za-z]+/g, (word) => word[0].toUpperCase() + word.slice(1).toLowerCase());
}

/** Lower‑cased extension after the last dot, or "no extension". */
export function fileExtension(fileName: string): string {
  const match = /\.([^.]+)$/.exec(fileName);
  const ext = match ? match[1].trim().toLowerCase() : "";
  return ext || "no extension";
}

export function parseGroupBy(raw: unknown): GroupBy | undefined {
  if (raw === undefined || raw === "" || raw === "fileType" || raw === "type") return "fileType";
  if (raw === "extension") return "extension";
  return undefined;
}

function sum(values: Iterable<number>): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}

export function inventoryOverview(records: ReadonlyArray<InventoryRecord>): InventoryOverview {
  return {
    totalFiles: records.length,
    totalSizeGb: sum(records.map((r) => r.sizeMb)) / 1024,
    uniqueFileTypes: new Set(records.map((r) => titleCase(r.fileType))).size,
  };
}

/** `true` for every record whose hash already appeared on an earlier row. */
export function duplicateFlags(records: ReadonlyArray<InventoryRecord>): boolean[] {
  const seen = new Set<string>();
  return records.map(({ hash }) => {
    if (!hash) return false;
    if (seen.has(hash)) return true;
    seen.add(hash);
    return false;
  });
}

interface Group {
  category: string;
  fileType?: string;
  totalFiles: number;
  duplicateFiles: number;
  totalSizeMb: number;
}

function byCountThenName(a: Group, b: Group): number {
  if (a.totalFiles !== b.totalFiles) return b.totalFiles - a.totalFiles;
  if (a.category !== b.category) return a.category < b.category ? -1 : 1;
  const at = a.fileType ?? "";
  const bt = b.fileType ?? "";
  return at === bt ? 0 : at < bt ? -1 : 1;
}

/**
 * Grouped breakdown, largest groups first. By extension the rows are
 * per extension and file type pair.
 */
export function summarizeCategories(
  records: ReadonlyArray<InventoryRecord>,
  groupBy: GroupBy
): CategorySummary[] {
  const flags = duplicateFlags(records);
  const groups = new Map<string, Group>();

  records.forEach((record, i) => {
    const fileType = titleCase(record.fileType);
    const group: Group =
      groupBy === "extension"
        ? { category: fileExtension(record.fileName), fileType, totalFiles: 0, duplicateFiles: 0, totalSizeMb: 0 }
        : { category: fileType, totalFiles: 0, duplicateFiles: 0, totalSizeMb: 0 };
    const key = `${group.category}\u0000${group.fileType ?? ""}`;
    const current = groups.get(key) ?? group;
    current.totalFiles++;
    if (flags[i]) current.duplicateFiles++;
    current.totalSizeMb += record.sizeMb;
    groups.set(key, current);
  });

  return [...groups.values()].sort(byCountThenName).map(
    (g): CategorySummary => ({
      ...g,
      originalFiles: g.totalFiles - g.duplicateFiles,
      avgSizeMb: g.totalSizeMb / g.totalFiles,
    })
  );
}

/**
 * Pie chart data. Up to eight categories are shown as they are. Beyond
 * that the largest ones are kept (at least seven, or as many as it takes
 * to reach 95 %, but never all) and the rest are summed into "Other".
 * Slices come out largest first.
 */
export function pieChart(items: ReadonlyArray<{ name: string; value: number }>): PieChart {
  const total = sum(items.map((i) => i.value));
  let slices = items.map((i) => ({
    name: i.name,
    value: i.value,
    percentage: total > 0 ? (i.value / total) * 100 : 0,
  }));

  if (slices.length > MAX_PIE_SLICES) {
    const sorted = [...slices].sort((a, b) => b.percentage - a.percentage);
    let cumulative = 0;
    let under95 = 0;
    for (const s of sorted) {
      cumulative += s.percentage;
      if (cumulative < 95) under95++;
    }
    const keep = Math.min(Math.max(7, under95 + 1), sorted.length - 1);
    const rest = sorted.slice(keep);
    slices = [
      ...sorted.slice(0, keep),
      {
        name: "Other",
        value: sum(rest.map((s) => s.value)),
        percentage: sum(rest.map((s) => s.percentage)),
      },
    ];
  }

  return {
    total,
    slices: slices
      .sort((a, b) => b.value - a.value)
      .map((s): PieSlice => ({ ...s, showLabel: s.percentage >= 5 })),
  };
}

/** One pie entry per category; by extension the file types are merged. */
function pieSources(summary: ReadonlyArray<CategorySummary>): Array<{ name: string; files: number; sizeMb: number }> {
  const merged = new Map<string, { name: string; files: number; sizeMb: number }>();
  for (const row of summary) {
    const current = merged.get(row.category) ?? { name: row.category, files: 0, sizeMb: 0 };
    current.files += row.totalFiles;
    current.sizeMb += row.totalSizeMb;
    merged.set(row.category, current);
  }
  return [...merged.values()];
}

function charts(summary: ReadonlyArray<CategorySummary>): { countChart: PieChart; sizeChart: PieChart } {
  const sources = pieSources(summary);
  return {
    countChart: pieChart(sources.map((s) => ({ name: s.name, value: s.files }))),
    sizeChart: pieChart(sources.map((s) => ({ name: s.name, value: s.sizeMb }))),
  };
}

/** The biggest files, largest first; ties keep inventory order. */
export function largestFiles(records: ReadonlyArray<InventoryRecord>, limit = LARGEST_FILES): LargestFile[] {
  return [...records]
    .sort((a, b) => b.sizeMb - a.sizeMb)
    .slice(0, limit)
    .map((r) => ({
      fileName: r.fileName,
      filePath: r.filePath,
      fileType: titleCase(r.fileType),
      extension: fileExtension(r.fileName),
      sizeMb: r.sizeMb,
      sizeGb: r.sizeMb / 1024,
      hash: r.hash,
    }));
}

/** Statistics over every file that shares its hash with another one. */
export function duplicateAnalysis(records: ReadonlyArray<InventoryRecord>, groupBy: GroupBy): DuplicateAnalysis {
  const counts = new Map<string, number>();
  for (const { hash } of records) {
    if (hash) counts.set(hash, (counts.get(hash) ?? 0) + 1);
  }
  const duplicates = records.filter((r) => (counts.get(r.hash) ?? 0) > 1);
  const summary = summarizeCategories(duplicates, groupBy);

  return {
    duplicateFiles: duplicates.length,
    duplicatePercentage: records.length > 0 ? (duplicates.length / records.length) * 100 : 0,
    duplicateSizeGb: sum(duplicates.map((r) => r.sizeMb)) / 1024,
    summary,
    ...charts(summary),
  };
}

export function buildInventoryDashboard(
  records: ReadonlyArray<InventoryRecord>,
  groupBy: GroupBy = "fileType"
): InventoryDashboard {
  const summary = summarizeCategories(records, groupBy);
  return {
    groupBy,
    overview: inventoryOverview(records),
    summary,
    ...charts(summary),
    largestFiles: largestFiles(records),
    duplicates: duplicateAnalysis(records, groupBy),
  };
}

/** `512.0 MB`, or `1.5 GB` from 1024 MB up. */
export function formatStorage(sizeMb: number): string {
  return sizeMb >= 1024 ? `${(sizeMb / 1024).toFixed(1)} GB` : `${sizeMb.toFixed(1)} MB`;
}
