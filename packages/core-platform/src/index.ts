export { EventBus } from "./events";
export type { EventHandler, EventMap, Unsubscribe } from "./events";
export { AppError, describeError, isAppError } from "./errors";
export type { AppErrorMetadata, AppErrorSeverity } from "./errors";
