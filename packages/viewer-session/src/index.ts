export { PageMemoryController, setupPageMemory } from "./controller";
export type { PageMemoryOptions, SessionEvents } from "./controller";
export { DEFAULT_STORE_FILE, STORE_FILE_ENV, resolveConfig, resolveStorePath } from "./config";
export type { PageMemoryConfig } from "./config";
export { documentKey } from "./documentKey";
export { SaveGuard } from "./guard";
export type { SaveState } from "./guard";
export type { ViewerEvents, ViewerHost } from "./types";
