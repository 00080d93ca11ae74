import { dirname, isAbsolute, join } from "path";

export const DEFAULT_STORE_FILE = ".page-memory.json";
export const STORE_FILE_ENV = "PAGE_MEMORY_FILE";

export interface PageMemoryConfig {
  /**
   * Backing file for saved pages. A relative name lands beside each viewed
   * document; an absolute path is shared by every document.
   */
  storeFile: string;
}

export function resolveConfig(
  overrides: Partial<PageMemoryConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): PageMemoryConfig {
  const fromEnv = env[STORE_FILE_ENV]?.trim();
  return {
    storeFile: overrides.storeFile ?? (fromEnv ? fromEnv : DEFAULT_STORE_FILE),
  };
}

export function resolveStorePath(storeFile: string, documentPath: string): string {
  if (isAbsolute(storeFile)) {
    return storeFile;
  }
  return join(dirname(documentPath), storeFile);
}
