import { decodePageRecord, encodePageRecord } from "../serializer";
import type { PageRecord, PageStoreBackend } from "../types";

export interface MemoryBackendOptions {
  /** Serialized contents, as they would appear on disk. */
  raw?: string;
}

/** Keeps the serialized text in memory and runs it through the same codec as the file backend. */
export class MemoryPageBackend implements PageStoreBackend {
  raw?: string;
  writes = 0;

  constructor(options: MemoryBackendOptions = {}) {
    this.raw = options.raw;
  }

  load(): PageRecord | undefined {
    if (this.raw === undefined) {
      return undefined;
    }
    return decodePageRecord(this.raw, "memory");
  }

  save(record: PageRecord): void {
    this.raw = encodePageRecord(record);
    this.writes += 1;
  }
}

export function createMemoryBackend(options: MemoryBackendOptions = {}) {
  return new MemoryPageBackend(options);
}
