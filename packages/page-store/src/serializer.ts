import { StorageReadError } from "./errors";
import type { PageEntry, PageRecord } from "./types";

export function isValidPage(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 1;
}

export function isPageEntry(value: unknown): value is PageEntry {
  return Array.isArray(value) && value.length === 2 && typeof value[0] === "string" && isValidPage(value[1]);
}

/**
 * Serializes as a JSON list of `[key, page]` pairs:
 *
 *   [["report",12],["notes",3]]
 */
export function encodePageRecord(record: PageRecord): string {
  return `${JSON.stringify([...record.entries()])}\n`;
}

export function decodePageRecord(raw: string, source?: string): PageRecord {
  const record: PageRecord = new Map();
  if (raw.trim() === "") {
    return record;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new StorageReadError("Backing file is not valid JSON", source, error);
  }

  if (!Array.isArray(parsed)) {
    throw new StorageReadError("Backing file does not hold a list of entries", source);
  }

  parsed.forEach((entry: unknown, index) => {
    if (!isPageEntry(entry)) {
      throw new StorageReadError(`Entry ${index} is not a [key, page] pair`, source);
    }
    record.set(entry[0], entry[1]);
  });

  return record;
}
