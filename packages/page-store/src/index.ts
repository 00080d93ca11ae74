import { EventBus, describeError } from "@core-platform";
import { StorageReadError, StorageWriteError } from "./errors";
import { decodePageRecord, encodePageRecord, isPageEntry, isValidPage } from "./serializer";
import { createFileBackend, FilePageBackend } from "./storage/file";
import { createMemoryBackend, MemoryPageBackend } from "./storage/memory";
import type { PageEntry, PageRecord, PageStoreBackend } from "./types";

export type PageStoreEvents = {
  "page:saved": { key: string; page: number };
  "page:removed": { key: string };
};

export interface PageStoreOptions {
  backend: PageStoreBackend;
}

/**
 * Maps document keys to the last page viewed. Nothing is cached: every call
 * reads the backend afresh and every write replaces the whole record, so the
 * backend stays the only source of truth between calls.
 *
 * Storage failures never escape. A record that cannot be loaded reads as
 * empty, and a write that cannot happen is skipped; both are logged.
 */
export class PageStore {
  private readonly backend: PageStoreBackend;
  private readonly events = new EventBus<PageStoreEvents>();

  constructor(options: PageStoreOptions) {
    this.backend = options.backend;
  }

  on = this.events.on.bind(this.events);
  off = this.events.off.bind(this.events);

  getPage(key: string): number | undefined {
    if (!key) {
      return undefined;
    }
    return this.load().get(key);
  }

  setPage(key: string, page: number): boolean {
    if (!key) {
      console.warn("[page-store] Ignoring page for empty document key");
      return false;
    }
    if (!isValidPage(page)) {
      console.warn(`[page-store] Ignoring invalid page ${page} for "${key}"`);
      return false;
    }

    const record = this.load();
    record.set(key, page);
    if (!this.persist(record)) {
      return false;
    }
    this.events.emit("page:saved", { key, page });
    return true;
  }

  removePage(key: string): boolean {
    const record = this.load();
    if (!record.delete(key)) {
      return false;
    }
    if (!this.persist(record)) {
      return false;
    }
    this.events.emit("page:removed", { key });
    return true;
  }

  entries(): PageEntry[] {
    return [...this.load().entries()];
  }

  private load(): PageRecord {
    try {
      return this.backend.load() ?? new Map();
    } catch (error) {
      console.warn(`[page-store] Failed to load page record, treating as empty: ${describeError(error)}`);
      return new Map();
    }
  }

  private persist(record: PageRecord): boolean {
    try {
      this.backend.save(record);
      return true;
    } catch (error) {
      console.warn(`[page-store] Failed to persist page record: ${describeError(error)}`);
      return false;
    }
  }
}

export function createFilePageStore(filePath: string) {
  return new PageStore({ backend: createFileBackend({ filePath }) });
}

export {
  FilePageBackend,
  MemoryPageBackend,
  StorageReadError,
  StorageWriteError,
  createFileBackend,
  createMemoryBackend,
  decodePageRecord,
  encodePageRecord,
  isPageEntry,
  isValidPage,
};

export type { FileBackendOptions } from "./storage/file";
export type { MemoryBackendOptions } from "./storage/memory";
export type { PageEntry, PageRecord, PageStoreBackend };
