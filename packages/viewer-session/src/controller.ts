import { EventBus, describeError } from "@core-platform";
import { createFilePageStore, PageStore } from "@page-store";
import { resolveConfig, resolveStorePath } from "./config";
import type { PageMemoryConfig } from "./config";
import { documentKey } from "./documentKey";
import { SaveGuard } from "./guard";
import type { ViewerEvents, ViewerHost } from "./types";

export type SessionEvents = {
  "page:restored": { key: string; page: number };
  "page:saved": { key: string; page: number };
  "save:suppressed": { documentPath: string };
};

export interface PageMemoryOptions extends Partial<PageMemoryConfig> {
  /** Fixed store; when set, `storeFile` is not consulted. */
  store?: PageStore;
  guard?: SaveGuard;
  env?: NodeJS.ProcessEnv;
}

export class PageMemoryController {
  readonly guard: SaveGuard;
  private readonly host: ViewerHost;
  private readonly config: PageMemoryConfig;
  private readonly store?: PageStore;
  private readonly events = new EventBus<SessionEvents>();
  private attached = false;

  constructor(host: ViewerHost, options: PageMemoryOptions = {}) {
    this.host = host;
    this.guard = options.guard ?? new SaveGuard();
    this.store = options.store;
    this.config = resolveConfig({ storeFile: options.storeFile }, options.env);
  }

  on = this.events.on.bind(this.events);
  off = this.events.off.bind(this.events);

  attach() {
    if (this.attached) return;
    this.host.on("activation:before", this.handleActivationBefore);
    this.host.on("activation:after", this.handleActivationAfter);
    this.host.on("mode:entered", this.handleModeEntered);
    this.host.on("page:changed", this.handlePageChanged);
    this.attached = true;
  }

  dispose() {
    if (!this.attached) return;
    this.host.off("activation:before", this.handleActivationBefore);
    this.host.off("activation:after", this.handleActivationAfter);
    this.host.off("mode:entered", this.handleModeEntered);
    this.host.off("page:changed", this.handlePageChanged);
    this.attached = false;
  }

  restore(documentPath: string): number | undefined {
    if (!this.host.isViewerMode()) return undefined;
    const key = documentKey(documentPath);
    if (!key) return undefined;

    const page = this.storeFor(documentPath).getPage(key);
    if (page === undefined) return undefined;

    this.host.gotoPage(page);
    this.events.emit("page:restored", { key, page });
    return page;
  }

  save(documentPath: string): boolean {
    if (!this.guard.allowsSave) {
      this.events.emit("save:suppressed", { documentPath });
      return false;
    }
    if (!this.host.isViewerMode()) return false;
    const key = documentKey(documentPath);
    if (!key) return false;

    const page = this.host.currentPage();
    if (!this.storeFor(documentPath).setPage(key, page)) return false;

    this.events.emit("page:saved", { key, page });
    return true;
  }

  private storeFor(documentPath: string): PageStore {
    return this.store ?? createFilePageStore(resolveStorePath(this.config.storeFile, documentPath));
  }

  private readonly handleActivationBefore = () => {
    this.guard.disable();
  };

  private readonly handleActivationAfter = () => {
    this.guard.enable();
  };

  private readonly handleModeEntered = ({ documentPath }: ViewerEvents["mode:entered"]) => {
    try {
      this.restore(documentPath);
    } catch (error) {
      console.warn(`[viewer-session] Failed to restore page for ${documentPath}: ${describeError(error)}`);
    }
  };

  private readonly handlePageChanged = ({ documentPath }: ViewerEvents["page:changed"]) => {
    try {
      this.save(documentPath);
    } catch (error) {
      console.warn(`[viewer-session] Failed to save page for ${documentPath}: ${describeError(error)}`);
    }
  };
}

/** Single init call: builds a controller and registers all four lifecycle hooks. */
export function setupPageMemory(host: ViewerHost, options: PageMemoryOptions = {}) {
  const controller = new PageMemoryController(host, options);
  controller.attach();
  return controller;
}
