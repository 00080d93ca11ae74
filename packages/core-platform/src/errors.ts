export type AppErrorSeverity = "info" | "warn" | "error";

export interface AppErrorMetadata {
  code?: string;
  source?: string;
  cause?: unknown;
  severity?: AppErrorSeverity;
}

export class AppError extends Error {
  readonly code?: string;
  readonly source?: string;
  readonly cause?: unknown;
  readonly severity: AppErrorSeverity;

  constructor(message: string, metadata: AppErrorMetadata = {}) {
    super(message);
    this.name = "AppError";
    this.code = metadata.code;
    this.source = metadata.source;
    this.cause = metadata.cause;
    this.severity = metadata.severity ?? "error";
  }
}

export function isAppError(input: unknown): input is AppError {
  return input instanceof AppError;
}

/**
 * One-line rendering of any thrown value, e.g.
 * `STORAGE_READ_FAILED: Backing file is not valid JSON (/tmp/.page-memory.json)`.
 */
export function describeError(input: unknown): string {
  if (isAppError(input)) {
    const prefix = input.code ? `${input.code}: ` : "";
    const suffix = input.source ? ` (${input.source})` : "";
    return `${prefix}${input.message}${suffix}`;
  }
  if (input instanceof Error) {
    return input.message;
  }
  return String(input);
}
