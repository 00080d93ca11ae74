import { AppError } from "@core-platform";

export class StorageReadError extends AppError {
  constructor(message: string, source?: string, cause?: unknown) {
    super(message, { code: "STORAGE_READ_FAILED", source, cause, severity: "warn" });
    this.name = "StorageReadError";
  }
}

export class StorageWriteError extends AppError {
  constructor(message: string, source?: string, cause?: unknown) {
    super(message, { code: "STORAGE_WRITE_FAILED", source, cause, severity: "warn" });
    this.name = "StorageWriteError";
  }
}
