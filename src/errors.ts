/**
 * Raised when an uploaded or inventoried file cannot be decoded as SEGY,
 * or when its headers carry values the statistics cannot use.
 * The HTTP layer reports it as "input unreadable".
 */
export class SegyReadError extends Error {
  readonly fileName?: string;

  readonly traceIndex?: number;

  constructor(
    message: string,
    details: { fileName?: string; traceIndex?: number } = {}
  ) {
    super(details.fileName ? `${details.fileName}: ${message}` : message);
    this.name = "SegyReadError";
    this.fileName = details.fileName;
    this.traceIndex = details.traceIndex;
  }
}

export class InventoryError extends Error {
  readonly source: string;

  constructor(source: string, message: string) {
    super(`Invalid inventory ${source} – ${message}`);
    this.name = "InventoryError";
    this.source = source;
  }
}

export class ConfigError extends Error {
  readonly key: string;

  constructor(key: string, message: string) {
    super(`${key} ${message} – check your .env file`);
    this.name = "ConfigError";
    this.key = key;
  }
}

/** Message of anything thrown, for logs and error listings. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
