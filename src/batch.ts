/*********************************************************************
 * src/batch.ts
 *
 * Batch pass over an inventory: analyzes every SEGY file, writes one
 * `<name>_outline.geojson` per readable file into the processed folder
 * and returns the coverage numbers for the summary printout.
 *
 * Unreadable SEGY files are listed and skipped; an outline that cannot
 * be written rejects the whole run.
 *********************************************************************/

import { promises as fs } from "fs";
import * as path from "path";
import {
  analyzeInventory,
  surveyBoundaries,
  surveyCoverage,
  type AnalyzeOptions,
} from "./segyAnalyzer.ts";
import { surveyOutline, type SurveyOutline } from "./surveyOutline.ts";
import type {
  InventoryAnalysis,
  InventoryEntry,
  SurveyBoundaries,
  SurveyCoverage,
} from "./types.ts";

export interface BatchOptions extends AnalyzeOptions {
  processedDir: string;
  outlineTolerance?: number;
}

export interface BatchResult {
  analysis: InventoryAnalysis;
  coverage: SurveyCoverage;
  boundaries?: SurveyBoundaries;
  outlinePaths: string[];
}

/** `survey.sgy` → `survey_outline.geojson` */
export function outlineFileName(segyFileName: string): string {
  return `${path.parse(segyFileName).name}_outline.geojson`;
}

async function writeGeoJSON(filePath: string, outline: SurveyOutline): Promise<void> {
  await fs.writeFile(filePath, JSON.stringify(outline, null, 2), "utf8");
}

export async function runBatch(
  entries: ReadonlyArray<InventoryEntry>,
  options: BatchOptions
): Promise<BatchResult> {
  const { processedDir, outlineTolerance = 0, ...analyzeOptions } = options;
  await fs.mkdir(processedDir, { recursive: true });

  const outlinePaths: string[] = [];
  const analysis = await analyzeInventory(entries, {
    ...analyzeOptions,
    onAnalyzed: async ({ report, traces }) => {
      const outPath = path.join(processedDir, outlineFileName(report.fileName));
      await writeGeoJSON(outPath, surveyOutline(traces, report.summary.boundingBox, outlineTolerance));
      outlinePaths.push(outPath);
      console.log(`✅ Processed ${report.fileName} (${report.totalTraces} traces)`);
    },
  });

  return {
    analysis,
    coverage: surveyCoverage(entries, analysis),
    boundaries: surveyBoundaries(analysis.reports),
    outlinePaths,
  };
}
