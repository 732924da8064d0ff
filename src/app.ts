/*******************************************************************
 * src/app.ts – Express API around the SEGY analyzer
 *
 * Endpoints
 * ----------
 * POST /api/segy
 *   Body: the raw SEGY file (Content-Type: application/octet-stream)
 *   Query parameters (all optional):
 *     - name=<file name>      (used in reports and error messages)
 *     - maxTraces=<n>         (decode at most n traces)
 *
 *   Returns: { report, outline, traceStatistics, histogram }
 *            400 – no body / bad query, 413 – body over the upload
 *            limit, 422 – { error: "input unreadable", detail }
 *
 * GET /api/inventory
 *   Scans SEGY_DATA_DIR and returns
 *   { coverage, boundaries, errorFiles, missingFiles }
 *
 * GET /api/inventory/files
 *   Per-file reports for the same inventory.
 *
 * POST /api/inventory/csv
 *   Body: an inventory CSV export (Content-Type: text/csv)
 *         columns file_path, file_name, size_mb, file_type, hash
 *   Query parameters (optional):
 *     - groupBy=fileType|extension   (default fileType)
 *
 *   Returns: the inventory dashboard – overview, grouped breakdown,
 *            pie chart data, largest files and duplicate analysis
 *            400 – no body / bad groupBy, 422 – malformed CSV
 *
 * Nothing is kept between requests – every call receives its file or
 * inventory and hands back plain values.
 ******************************************************************/

import express, {
  type ErrorRequestHandler,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import cors from "cors";
import type { AppConfig } from "./config.ts";
import { InventoryError, SegyReadError, errorMessage } from "./errors.ts";
import { parseInventoryCsv, scanInventory } from "./inventory.ts";
import { buildInventoryDashboard, parseGroupBy } from "./inventoryDashboard.ts";
import {
  analyzeInventory,
  analyzeSegyBytes,
  surveyBoundaries,
  surveyCoverage,
} from "./segyAnalyzer.ts";
import { surveyOutline, type SurveyOutline } from "./surveyOutline.ts";
import { amplitudeHistogram, computeTraceStatistics } from "./traceStatistics.ts";
import type {
  FileError,
  HistogramBin,
  SegyFileReport,
  SurveyBoundaries,
  SurveyCoverage,
  TraceStatistics,
} from "./types.ts";

/** Shape of a successful POST /api/segy reply */
export interface SegyUploadResponse {
  report: SegyFileReport;
  outline: SurveyOutline;
  /** null when the file has no samples */
  traceStatistics: TraceStatistics | null;
  histogram: HistogramBin[] | null;
}

export interface InventoryResponse {
  coverage: SurveyCoverage;
  boundaries: SurveyBoundaries | null;
  errorFiles: FileError[];
  missingFiles: string[];
}

export interface ErrorResponse {
  error: string;
  detail?: string;
}

class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "HttpError";
    this.status = status;
  }
}

function parseMaxTraces(raw: unknown, fallback: number | undefined): number | undefined {
  if (raw === undefined || raw === "") return fallback;
  const value = typeof raw === "string" ? Number(raw) : NaN;
  if (!Number.isInteger(value) || value < 0) {
    throw new HttpError(400, "maxTraces must be a non-negative integer");
  }
  return value;
}

function statusOf(err: unknown): number {
  if (err instanceof HttpError) return err.status;
  // body-parser errors (413 entity.too.large, 400 malformed) carry their own status
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return 500;
}

export function createApp(config: AppConfig): express.Express {
  const app = express();

  // Allow a dashboard served from another port to call us
  app.use(cors());

  // -----------------------------------------------------------------
  // POST /api/segy – analyze one uploaded file
  // -----------------------------------------------------------------
  app.post(
    "/api/segy",
    express.raw({ type: "application/octet-stream", limit: `${config.uploadLimitMb}mb` }),
    (req: Request, res: Response) => {
      if (!Buffer.isBuffer(req.body) || req.body.length === 0) {
        throw new HttpError(400, "Expected the SEGY file as an application/octet-stream body");
      }
      const fileName = typeof req.query.name === "string" && req.query.name ? req.query.name : "upload.sgy";
      const maxTraces = parseMaxTraces(req.query.maxTraces, config.maxTracesPerFile);

      const { report, traces, samples } = analyzeSegyBytes(
        req.body,
        { fileName },
        { maxTraces, coordinates: config.coordinateSource, withSamples: true }
      );

      const hasSamples = samples !== undefined && samples.length > 0;
      const payload: SegyUploadResponse = {
        report,
        outline: surveyOutline(traces, report.summary.boundingBox, config.outlineTolerance),
        traceStatistics: hasSamples ? computeTraceStatistics(samples) : null,
        histogram: hasSamples ? amplitudeHistogram(samples) : null,
      };
      res.json(payload);
    }
  );

  // -----------------------------------------------------------------
  // GET /api/inventory – coverage over the data directory
  // -----------------------------------------------------------------
  app.get("/api/inventory", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const entries = await scanInventory(config.dataDir);
      const analysis = await analyzeInventory(entries, {
        maxTraces: config.maxTracesPerFile,
        coordinates: config.coordinateSource,
      });
      const payload: InventoryResponse = {
        coverage: surveyCoverage(entries, analysis),
        boundaries: surveyBoundaries(analysis.reports) ?? null,
        errorFiles: analysis.errorFiles,
        missingFiles: analysis.missingFiles,
      };
      res.json(payload);
    } catch (err) {
      next(err);
    }
  });

  app.get("/api/inventory/files", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const entries = await scanInventory(config.dataDir);
      const analysis = await analyzeInventory(entries, {
        maxTraces: config.maxTracesPerFile,
        coordinates: config.coordinateSource,
      });
      res.json(analysis.reports);
    } catch (err) {
      next(err);
    }
  });

  // -----------------------------------------------------------------
  // POST /api/inventory/csv – dashboard over an uploaded inventory export
  // -----------------------------------------------------------------
  app.post(
    "/api/inventory/csv",
    express.text({ type: ["text/csv", "text/plain"], limit: `${config.uploadLimitMb}mb` }),
    (req: Request, res: Response) => {
      if (typeof req.body !== "string" || req.body.length === 0) {
        throw new HttpError(400, "Expected the inventory as a text/csv body");
      }
      const groupBy = parseGroupBy(req.query.groupBy);
      if (!groupBy) throw new HttpError(400, 'groupBy must be "fileType" or "extension"');

      const name = typeof req.query.name === "string" && req.query.name ? req.query.name : "CSV upload";
      res.json(buildInventoryDashboard(parseInventoryCsv(req.body, name), groupBy));
    }
  );

  app.get("/health", (_req, res) => {
    res.send("OK");
  });

  const handleErrors: ErrorRequestHandler = (err, req, res, _next) => {
    if (err instanceof SegyReadError) {
      const body: ErrorResponse = { error: "input unreadable", detail: err.message };
      res.status(422).json(body);
      return;
    }
    if (err instanceof InventoryError && req.method === "POST") {
      const body: ErrorResponse = { error: "inventory unreadable", detail: err.message };
      res.status(422).json(body);
      return;
    }
    if (err instanceof InventoryError) {
      console.error(`❌ ${err.message}`);
      const body: ErrorResponse = { error: "inventory unavailable", detail: err.message };
      res.status(500).json(body);
      return;
    }
    const status = statusOf(err);
    if (status >= 500) console.error("❌ Request failed:", err);
    const body: ErrorResponse = { error: errorMessage(err) };
    res.status(status).json(body);
  };
  app.use(handleErrors);

  return app;
}
