/*********************************************************************
 * src/inventory.ts
 *
 * Builds the list of files the analyzer works on, either by walking a
 * directory, from a JSON manifest of the form
 *
 *   [{ "file_path": "...", "file_name": "...", "size_mb": 12.5 }, ...]
 *
 * or from the inventory CSV export
 *
 *   file_path,file_name,size_mb,file_type,hash
 *
 * Manifest entries may point at files that no longer exist – the
 * analyzer reports those as missing.
 *********************************************************************/

import { promises as fs } from "fs";
import * as path from "path";
import * as XLSX from "xlsx";
import { InventoryError, errorMessage } from "./errors.ts";
import type { InventoryEntry, InventoryRecord } from "./types.ts";

const BYTES_PER_MB = 1024 * 1024;

export function isSegyFileName(name: string): boolean {
  const lower = name.toLowerCase();
  return lower.endsWith(".sgy") || lower.endsWith(".segy");
}

/** Every regular file under `dir`, sorted by path. */
export async function scanInventory(dir: string): Promise<InventoryEntry[]> {
  const entries: InventoryEntry[] = [];

  async function walk(current: string): Promise<void> {
    const dirEntries = await fs.readdir(current, { withFileTypes: true });
    for (const e of dirEntries) {
      const full = path.join(current, e.name);
      if (e.isDirectory()) {
        await walk(full);
      } else if (e.isFile()) {
        const stat = await fs.stat(full);
        entries.push({ filePath: full, fileName: e.name, sizeMb: stat.size / BYTES_PER_MB });
      }
    }
  }

  await walk(path.resolve(dir));
  return entries.sort((a, b) => a.filePath.localeCompare(b.filePath));
}

/**
 * Read a manifest file. Relative `file_path`s resolve against the
 * manifest's own directory; a missing `size_mb` counts as 0.
 */
export async function loadInventoryManifest(manifestPath: string): Promise<InventoryEntry[]> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.readFile(manifestPath, "utf8"));
  } catch (err) {
    throw new InventoryError(manifestPath, errorMessage(err));
  }
  if (!Array.isArray(parsed)) {
    throw new InventoryError(manifestPath, "expected a JSON array of file records");
  }

  const baseDir = path.dirname(path.resolve(manifestPath));
  return parsed.map((item: unknown, index): InventoryEntry => {
    if (!item || typeof item !== "object") {
      throw new InventoryError(manifestPath, `entry ${index} is not an object`);
    }
    const record: Record<string, unknown> = Object.fromEntries(Object.entries(item));
    const filePath = record.file_path;
    if (typeof filePath !== "string" || filePath.length === 0) {
      throw new InventoryError(manifestPath, `entry ${index} has no file_path`);
    }
    const sizeMb = record.size_mb ?? 0;
    if (typeof sizeMb !== "number" || !Number.isFinite(sizeMb) || sizeMb < 0) {
      throw new InventoryError(manifestPath, `entry ${index} has an invalid size_mb`);
    }
    const fileName =
      typeof record.file_name === "string" && record.file_name ? record.file_name : path.basename(filePath);

    return { filePath: path.resolve(baseDir, filePath), fileName, sizeMb };
  });
}

const CSV_COLUMNS = ["file_path", "file_name", "size_mb", "file_type", "hash"] as const;
type CsvColumn = (typeof CSV_COLUMNS)[number];

export function isCsvFileName(name: string): boolean {
  return name.toLowerCase().endsWith(".csv");
}

function csvRows(text: string, source: string): unknown[][] {
  if (text.trim().length === 0) throw new InventoryError(source, "the CSV is empty");
  try {
    // raw: keep every cell as text, hashes must not turn into numbers
    const workbook = XLSX.read(text, { type: "string", raw: true });
    const sheet = workbook.Sheets[workbook.SheetNames[0]];
    if (!sheet) return [];
    return XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: "", blankrows: false });
  } catch (err) {
    throw new InventoryError(source, errorMessage(err));
  }
}

/**
 * Parse an inventory CSV export. Column order is free; `file_name` may be
 * left out (the base name of `file_path` is used) and an empty
 * `file_type` becomes "Unknown".
 */
export function parseInventoryCsv(text: string, source = "CSV upload"): InventoryRecord[] {
  const [headerRow, ...rows] = csvRows(text, source);
  if (!headerRow) throw new InventoryError(source, "the CSV has no header row");

  const header = headerRow.map((cell) => String(cell).trim().toLowerCase());
  const column = new Map<CsvColumn, number>();
  for (const name of CSV_COLUMNS) {
    const index = header.indexOf(name);
    if (index >= 0) column.set(name, index);
  }
  const missing = CSV_COLUMNS.filter((name) => name !== "file_name" && !column.has(name));
  if (missing.length > 0) {
    throw new InventoryError(source, `missing column(s): ${missing.join(", ")}`);
  }

  return rows.map((row, i): InventoryRecord => {
    const cell = (name: CsvColumn): string => {
      const index = column.get(name);
      return index === undefined ? "" : String(row[index] ?? "").trim();
    };
    const record = i + 1;

    const filePath = cell("file_path");
    if (!filePath) throw new InventoryError(source, `record ${record} has no file_path`);

    const rawSize = cell("size_mb");
    const sizeMb = Number(rawSize);
    if (rawSize === "" || !Number.isFinite(sizeMb) || sizeMb < 0) {
      throw new InventoryError(source, `record ${record} has an invalid size_mb "${rawSize}"`);
    }

    return {
      filePath,
      fileName: cell("file_name") || path.basename(filePath),
      sizeMb,
      fileType: cell("file_type") || "Unknown",
      hash: cell("hash"),
    };
  });
}

/** Read an inventory CSV; relative `file_path`s resolve against its directory. */
export async function loadInventoryCsv(csvPath: string): Promise<InventoryRecord[]> {
  let text: string;
  try {
    text = await fs.readFile(csvPath, "utf8");
  } catch (err) {
    throw new InventoryError(csvPath, errorMessage(err));
  }
  const baseDir = path.dirname(path.resolve(csvPath));
  return parseInventoryCsv(text, csvPath).map((r) => ({ ...r, filePath: path.resolve(baseDir, r.filePath) }));
}
