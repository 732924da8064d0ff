/*********************************************************************
 * src/analyze.ts
 *
 * Analyzes every SEGY file of an inventory and writes the survey
 * outlines into ./processed (or PROCESSED_DIR).
 *
 * Run with:
 *   npm run analyze -- [dataDir]
 *   npm run analyze -- --manifest inventory.json
 *   npm run analyze -- --manifest file_inventory.csv [--group-by extension]
 *
 * Without arguments the directory from SEGY_DATA_DIR is scanned. A CSV
 * inventory export also gets the inventory dashboard printed (overview,
 * breakdown, largest files, duplicates) before the SEGY pass.
 *********************************************************************/

import dotenv from "dotenv";
import { parseArgs } from "util";
import { runBatch } from "./batch.ts";
import { loadConfig } from "./config.ts";
import { errorMessage } from "./errors.ts";
import { isCsvFileName, loadInventoryCsv, loadInventoryManifest, scanInventory } from "./inventory.ts";
import { buildInventoryDashboard, formatStorage, parseGroupBy } from "./inventoryDashboard.ts";
import type { InventoryDashboard, InventoryEntry } from "./types.ts";

function printDashboard(dashboard: InventoryDashboard): void {
  const { overview, summary, largestFiles, duplicates } = dashboard;
  console.log(`📊 Files:            ${overview.totalFiles}`);
  console.log(`   total size:       ${overview.totalSizeGb.toFixed(2)} GB`);
  console.log(`   file types:       ${overview.uniqueFileTypes}`);

  console.log(`📈 By ${dashboard.groupBy === "extension" ? "extension" : "file type"}:`);
  for (const row of summary) {
    const label = row.fileType ? `${row.category} (${row.fileType})` : row.category;
    console.log(
      `   ${label}: ${row.totalFiles} file(s), ${row.duplicateFiles} duplicate(s), ${formatStorage(row.totalSizeMb)}`
    );
  }

  console.log(`📁 Largest files:`);
  for (const f of largestFiles) {
    console.log(`   ${f.sizeGb.toFixed(2)} GB  ${f.filePath}`);
  }

  console.log(
    `🔍 Duplicates:       ${duplicates.duplicateFiles} (${duplicates.duplicatePercentage.toFixed(1)}%, ` +
      `${duplicates.duplicateSizeGb.toFixed(2)} GB)`
  );
}

async function main(): Promise<void> {
  dotenv.config();
  const config = loadConfig();

  const { values, positionals } = parseArgs({
    options: {
      manifest: { type: "string", short: "m" },
      "group-by": { type: "string", short: "g" },
    },
    allowPositionals: true,
  });

  const groupBy = parseGroupBy(values["group-by"]);
  if (!groupBy) throw new Error(`--group-by must be "type" or "extension", got "${values["group-by"]}"`);

  let entries: InventoryEntry[];
  if (values.manifest && isCsvFileName(values.manifest)) {
    const records = await loadInventoryCsv(values.manifest);
    printDashboard(buildInventoryDashboard(records, groupBy));
    entries = records;
  } else if (values.manifest) {
    entries = await loadInventoryManifest(values.manifest);
  } else {
    entries = await scanInventory(positionals[0] ?? config.dataDir);
  }
  console.log(`🔎 Found ${entries.length} file(s) in the inventory.`);

  const { coverage, boundaries, outlinePaths } = await runBatch(entries, {
    processedDir: config.processedDir,
    outlineTolerance: config.outlineTolerance,
    maxTraces: config.maxTracesPerFile,
    coordinates: config.coordinateSource,
  });

  console.log(`📊 SEGY files:       ${coverage.totalSegyFiles}`);
  console.log(`   accessible:       ${coverage.accessibleFiles}`);
  console.log(`   missing:          ${coverage.missingFiles}`);
  console.log(`   unreadable:       ${coverage.errorFiles}`);
  console.log(`   total size:       ${coverage.sizeGb.toFixed(2)} GB`);
  console.log(`   total area:       ${coverage.totalAreaKm2.toFixed(3)} km²`);
  if (boundaries) {
    const { inlineRange: il, crosslineRange: xl } = boundaries;
    console.log(`   inlines:          ${il.min} – ${il.max}`);
    console.log(`   crosslines:       ${xl.min} – ${xl.max}`);
  }
  console.log(`🎉 Wrote ${outlinePaths.length} outline(s) to ${config.processedDir}`);
}

main().catch((e) => {
  console.error("❌ Fatal error:", errorMessage(e));
  process.exit(1);
});
