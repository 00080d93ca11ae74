/** Document key -> last viewed page (1-indexed). */
export type PageRecord = Map<string, number>;

export type PageEntry = [key: string, page: number];

export interface PageStoreBackend {
  load(): PageRecord | undefined;
  save(record: PageRecord): void;
}
