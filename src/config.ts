/*********************************************************************
 * src/config.ts
 *
 * Typed view over the environment. Entry points call `dotenv.config()`
 * first, then `loadConfig()`; tests pass their own env object.
 *
 *   PORT                 HTTP port                         (4000)
 *   SEGY_DATA_DIR        directory scanned for the inventory (./data)
 *   PROCESSED_DIR        where the CLI writes outlines     (./processed)
 *   UPLOAD_LIMIT_MB      largest accepted upload           (512)
 *   MAX_TRACES_PER_FILE  decode at most this many traces   (all)
 *   COORDINATE_SOURCE    "source" or "cdp"                 (source)
 *   OUTLINE_TOLERANCE    path simplification, survey units (0 = off)
 *********************************************************************/

import * as path from "path";
import { ConfigError } from "./errors.ts";
import type { CoordinateSource } from "./types.ts";

export interface AppConfig {
  port: number;
  dataDir: string;
  processedDir: string;
  uploadLimitMb: number;
  maxTracesPerFile?: number;
  coordinateSource: CoordinateSource;
  outlineTolerance: number;
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number, integer: boolean): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || (integer && !Number.isInteger(value))) {
    throw new ConfigError(key, `must be a non-negative ${integer ? "integer" : "number"}, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const coordinateSource = env.COORDINATE_SOURCE?.trim() || "source";
  if (coordinateSource !== "source" && coordinateSource !== "cdp") {
    throw new ConfigError("COORDINATE_SOURCE", `must be "source" or "cdp", got "${coordinateSource}"`);
  }

  const maxTraces = env.MAX_TRACES_PER_FILE?.trim()
    ? readNumber(env, "MAX_TRACES_PER_FILE", 0, true)
    : undefined;

  return {
    port: readNumber(env, "PORT", 4000, true),
    dataDir: path.resolve(env.SEGY_DATA_DIR?.trim() || "data"),
    processedDir: path.resolve(env.PROCESSED_DIR?.trim() || "processed"),
    uploadLimitMb: readNumber(env, "UPLOAD_LIMIT_MB", 512, false),
    maxTracesPerFile: maxTraces,
    coordinateSource,
    outlineTolerance: readNumber(env, "OUTLINE_TOLERANCE", 0, false),
  };
}
