import { accessSync, constants, existsSync, readFileSync, renameSync, rmSync, writeFileSync } from "fs";
import { dirname } from "path";
import { StorageReadError, StorageWriteError } from "../errors";
import { decodePageRecord, encodePageRecord } from "../serializer";
import type { PageRecord, PageStoreBackend } from "../types";

export interface FileBackendOptions {
  filePath: string;
}

export class FilePageBackend implements PageStoreBackend {
  readonly filePath: string;

  constructor(options: FileBackendOptions) {
    this.filePath = options.filePath;
  }

  load(): PageRecord | undefined {
    if (!existsSync(this.filePath)) {
      return undefined;
    }

    let raw: string;
    try {
      raw = readFileSync(this.filePath, "utf8");
    } catch (error) {
      throw new StorageReadError("Unable to read backing file", this.filePath, error);
    }
    return decodePageRecord(raw, this.filePath);
  }

  save(record: PageRecord): void {
    if (!isWritable(this.filePath)) {
      throw new StorageWriteError("Backing file is not writable, skipping write", this.filePath);
    }

    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      writeFileSync(tempPath, encodePageRecord(record), "utf8");
      renameSync(tempPath, this.filePath);
    } catch (error) {
      rmSync(tempPath, { force: true });
      throw new StorageWriteError("Failed to write backing file", this.filePath, error);
    }
  }
}

function isWritable(filePath: string): boolean {
  try {
    accessSync(dirname(filePath), constants.W_OK);
    if (existsSync(filePath)) {
      accessSync(filePath, constants.W_OK);
    }
    return true;
  } catch {
    return false;
  }
}

export function createFileBackend(options: FileBackendOptions) {
  return new FilePageBackend(options);
}
